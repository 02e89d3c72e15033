import * as os from "node:os";
import * as path from "node:path";

import { Err, Ok, type Result } from "@tern/shared";

import { ErrorCode, TernError } from "../errors/types.js";
import { type RuntimeConfig, RuntimeConfigSchema } from "./schema.js";

// ============================================
// Runtime Configuration Loader
// ============================================

/**
 * Environment variable to config key mappings
 */
const ENV_MAPPINGS: Record<string, keyof RuntimeConfig> = {
  TERN_HOME: "home",
  TERN_LOG_LEVEL: "logLevel",
  TERN_LOG_JSON: "jsonLogs",
  TERN_VERIFY_TIMEOUT_MS: "verifyTimeoutMs",
  TERN_SKIP_VERIFY: "skipVerify",
  TERN_SECRET_PASSPHRASE: "secretPassphrase",
  TERN_MAX_KEY_ATTEMPTS: "maxCredentialAttempts",
};

/**
 * Options for loadRuntimeConfig
 */
export interface LoadRuntimeConfigOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** User home directory (default: os.homedir()) */
  homeDir?: string;
  /** Values that win over the environment, e.g. from CLI flags */
  overrides?: Partial<RuntimeConfig>;
}

/**
 * Default tern home: ~/.tern
 */
export function defaultTernHome(homeDir: string = os.homedir()): string {
  return path.join(homeDir, ".tern");
}

/**
 * Build the runtime configuration from TERN_* environment variables.
 *
 * @example
 * ```typescript
 * // With TERN_LOG_LEVEL=debug set:
 * const result = loadRuntimeConfig();
 * if (result.ok) {
 *   result.value.logLevel; // "debug"
 * }
 * ```
 */
export function loadRuntimeConfig(
  options: LoadRuntimeConfigOptions = {}
): Result<RuntimeConfig, TernError> {
  const env = options.env ?? process.env;
  const raw: Record<string, unknown> = { home: defaultTernHome(options.homeDir) };

  for (const [envVar, key] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }

  for (const [key, value] of Object.entries(options.overrides ?? {})) {
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  const parsed = RuntimeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return Err(
      new TernError(`Invalid tern configuration: ${issues}`, ErrorCode.CONFIG_INVALID, {
        cause: parsed.error,
        hint: "Check the TERN_* environment variables.",
      })
    );
  }

  return Ok(parsed.data);
}
