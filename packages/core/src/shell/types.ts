/**
 * Shell Types
 *
 * Shell identities and per-shell profile conventions used when a credential
 * has to be exported from the user's shell profile.
 *
 * @module shell/types
 */

import { z } from "zod";

/**
 * Supported shell types
 */
export const ShellTypeSchema = z.enum(["bash", "zsh", "fish", "powershell", "pwsh", "cmd"]);

/** Inferred type for shell types */
export type ShellType = z.infer<typeof ShellTypeSchema>;

/**
 * Shell detection result
 */
export interface ShellDetectionResult {
  /** Detected shell type */
  readonly shell: ShellType;
  /** Full path to shell executable */
  readonly path: string;
}

/**
 * Shell configuration file locations
 */
export interface ShellConfig {
  readonly shell: ShellType;
  /** RC file path(s); the first is the one tern writes to */
  readonly rcFiles: readonly string[];
  /** Comment prefix for shell scripts */
  readonly commentPrefix: string;
}
