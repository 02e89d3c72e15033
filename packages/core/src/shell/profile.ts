/**
 * Shell profile export lines
 *
 * Last-resort persistence for a credential: an export statement appended to
 * the rc file of the user's shell.
 *
 * @module shell/profile
 */

import { appendFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname } from "node:path";

import { Err, Ok, type Result } from "@tern/shared";

import { describeError, ErrorCode, TernError } from "../errors/types.js";
import { detectShell, getPrimaryRcFile } from "./detector.js";
import type { ShellType } from "./types.js";

/**
 * Where an export line was written
 */
export interface ProfileExport {
  readonly shell: ShellType;
  readonly path: string;
}

/**
 * Options for appendExportToProfile
 */
export interface AppendExportOptions {
  /** Environment used for shell detection (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** User home directory (default: os.homedir()) */
  home?: string;
  platform?: NodeJS.Platform;
}

/**
 * Format an export statement in the syntax of the given shell.
 *
 * @returns The line, or undefined for shells without a profile (cmd)
 */
export function formatExportLine(shell: ShellType, name: string, value: string): string | undefined {
  switch (shell) {
    case "bash":
    case "zsh":
      return `export ${name}="${value}"`;
    case "fish":
      return `set -gx ${name} "${value}"`;
    case "powershell":
    case "pwsh":
      return `$env:${name} = "${value}"`;
    case "cmd":
      return undefined;
  }
}

/**
 * Append an export of `name` to the profile of the user's configured shell.
 */
export async function appendExportToProfile(
  name: string,
  value: string,
  options: AppendExportOptions = {}
): Promise<Result<ProfileExport, TernError>> {
  const platform = options.platform ?? process.platform;
  const { shell } = detectShell(options.env, platform);
  const rcFile = getPrimaryRcFile(shell, options.home ?? homedir(), platform);
  const line = formatExportLine(shell, name, value);

  if (!rcFile || !line) {
    return Err(
      new TernError(`Shell '${shell}' has no profile file to export ${name} from`, ErrorCode.CREDENTIAL_PERSIST_FAILED)
    );
  }

  try {
    await mkdir(dirname(rcFile), { recursive: true });
    await appendFile(rcFile, `\n# Added by tern setup\n${line}\n`, "utf-8");
    return Ok({ shell, path: rcFile });
  } catch (error) {
    return Err(
      new TernError(`Failed to update ${rcFile}: ${describeError(error)}`, ErrorCode.CREDENTIAL_PERSIST_FAILED, {
        cause: error,
        context: { shell, path: rcFile },
      })
    );
  }
}
