/**
 * Shell Detection Module
 *
 * Detects the user's interactive shell and where its profile lives.
 *
 * @module shell/detector
 */

import { homedir } from "node:os";
import { basename, join } from "node:path";

import type { ShellConfig, ShellDetectionResult, ShellType } from "./types.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Shell configuration lookup table
 */
const SHELL_CONFIGS: Record<ShellType, (home: string, platform: NodeJS.Platform) => ShellConfig> = {
  bash: (home) => ({
    shell: "bash",
    rcFiles: [join(home, ".bashrc"), join(home, ".bash_profile")],
    commentPrefix: "#",
  }),

  zsh: (home) => ({
    shell: "zsh",
    rcFiles: [join(home, ".zshrc")],
    commentPrefix: "#",
  }),

  fish: (home) => ({
    shell: "fish",
    rcFiles: [join(home, ".config", "fish", "config.fish")],
    commentPrefix: "#",
  }),

  powershell: (home, platform) => ({
    shell: "powershell",
    rcFiles: [
      platform === "win32"
        ? join(home, "Documents", "WindowsPowerShell", "Microsoft.PowerShell_profile.ps1")
        : join(home, ".config", "powershell", "Microsoft.PowerShell_profile.ps1"),
    ],
    commentPrefix: "#",
  }),

  pwsh: (home, platform) => ({
    shell: "pwsh",
    rcFiles: [
      platform === "win32"
        ? join(home, "Documents", "PowerShell", "Microsoft.PowerShell_profile.ps1")
        : join(home, ".config", "powershell", "Microsoft.PowerShell_profile.ps1"),
    ],
    commentPrefix: "#",
  }),

  // cmd has no profile file
  cmd: () => ({
    shell: "cmd",
    rcFiles: [],
    commentPrefix: "REM",
  }),
};

// =============================================================================
// Shell Detection
// =============================================================================

/**
 * Detect the current shell from environment
 *
 * Detection order:
 * 1. PowerShell environment markers
 * 2. $SHELL environment variable (Unix)
 * 3. $ComSpec (Windows)
 * 4. Default to bash (Unix) or powershell (Windows)
 */
export function detectShell(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): ShellDetectionResult {
  if (env.PSModulePath && !env.SHELL) {
    const isPwsh =
      env.POWERSHELL_DISTRIBUTION_CHANNEL?.includes("PSCore") || env.TERM_PROGRAM === "pwsh";
    return isPwsh
      ? { shell: "pwsh", path: "pwsh" }
      : { shell: "powershell", path: "powershell.exe" };
  }

  const shellEnv = env.SHELL;
  if (shellEnv) {
    const shellType = parseShellName(basename(shellEnv));
    if (shellType) {
      return { shell: shellType, path: shellEnv };
    }
  }

  if (platform === "win32") {
    const comSpec = env.ComSpec;
    if (comSpec?.toLowerCase().includes("cmd.exe")) {
      return { shell: "cmd", path: comSpec };
    }
    return { shell: "powershell", path: "powershell.exe" };
  }

  return { shell: "bash", path: "/bin/bash" };
}

/**
 * Parse shell name to ShellType
 *
 * @param name - Shell name (e.g., "bash", "zsh.exe")
 */
export function parseShellName(name: string): ShellType | undefined {
  const normalized = name.toLowerCase().replace(/\.exe$/, "");

  switch (normalized) {
    case "bash":
    case "zsh":
    case "fish":
    case "powershell":
    case "pwsh":
    case "cmd":
      return normalized;
    default:
      return undefined;
  }
}

/**
 * Get shell configuration for a specific shell type
 */
export function getShellConfig(
  shell: ShellType,
  home: string = homedir(),
  platform: NodeJS.Platform = process.platform
): ShellConfig {
  return SHELL_CONFIGS[shell](home, platform);
}

/**
 * Get the primary RC file path for a shell, or undefined when it has none
 */
export function getPrimaryRcFile(
  shell: ShellType,
  home: string = homedir(),
  platform: NodeJS.Platform = process.platform
): string | undefined {
  return getShellConfig(shell, home, platform).rcFiles[0];
}
