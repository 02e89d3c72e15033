import { z } from "zod";

// ============================================
// Runtime Configuration Schema
// ============================================

/**
 * Log level names accepted from the environment
 */
export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

/**
 * Boolean flag read from an environment variable ("1", "true", "yes", "on")
 */
export const EnvFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) =>
    typeof value === "boolean" ? value : ["1", "true", "yes", "on"].includes(value.toLowerCase())
  );

/**
 * Settings that change how the onboarding run behaves, independent of the
 * choices the user makes inside the wizard.
 */
export const RuntimeConfigSchema = z.object({
  /** Directory holding credentials, state, config and the setup marker */
  home: z.string().min(1),
  /** Minimum log level */
  logLevel: LogLevelSchema.default("warn"),
  /** Emit JSON log lines instead of formatted text */
  jsonLogs: EnvFlagSchema.default(false),
  /** Hard cutoff for live credential verification */
  verifyTimeoutMs: z.coerce.number().int().positive().default(10_000),
  /** Skip live verification entirely (offline installs) */
  skipVerify: EnvFlagSchema.default(false),
  /** Passphrase for the encrypted secondary credential store; unset disables it */
  secretPassphrase: z.string().min(1).optional(),
  /** How many times a malformed credential is re-prompted before the step fails */
  maxCredentialAttempts: z.coerce.number().int().min(1).max(10).default(3),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
