// ============================================
// tern Error Types
// ============================================

/**
 * Categorized error codes for the onboarding core.
 *
 * Categories:
 * - 1xxx: Configuration errors
 * - 2xxx: Credential errors
 * - 3xxx: Provider errors
 * - 4xxx: Onboarding persistence errors
 * - 5xxx: System errors
 */
export enum ErrorCode {
  // 1xxx - Configuration errors
  CONFIG_INVALID = 1001,

  // 2xxx - Credential errors
  CREDENTIAL_INVALID_FORMAT = 2001,
  CREDENTIAL_NOT_FOUND = 2002,
  CREDENTIAL_PERSIST_FAILED = 2003,
  CREDENTIAL_VERIFICATION_FAILED = 2004,

  // 3xxx - Provider errors
  PROVIDER_UNAVAILABLE = 3001,
  PROVIDER_CHOICE_INVALID = 3002,
  LOCAL_RUNTIME_MISSING = 3003,

  // 4xxx - Onboarding persistence errors
  STATE_LOAD_FAILED = 4001,
  STATE_SAVE_FAILED = 4002,
  CONFIG_SAVE_FAILED = 4003,
  MARKER_WRITE_FAILED = 4004,

  // 5xxx - System errors
  SYSTEM_IO_ERROR = 5001,
  SYSTEM_UNKNOWN = 5999,
}

/**
 * Error severity levels that determine handling strategy.
 */
export enum ErrorSeverity {
  /** Handled locally, e.g. by prompting again */
  RECOVERABLE = "recoverable",
  /** User needs to fix something */
  USER_ACTION = "user_action",
  /** Cannot continue */
  FATAL = "fatal",
}

/**
 * Infers the appropriate severity level from an error code.
 *
 * - Malformed credential, I/O errors → RECOVERABLE
 * - Missing provider, failed verification, bad config → USER_ACTION
 * - Unknown errors → FATAL
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.CREDENTIAL_INVALID_FORMAT:
    case ErrorCode.SYSTEM_IO_ERROR:
    case ErrorCode.STATE_LOAD_FAILED:
      return ErrorSeverity.RECOVERABLE;

    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CREDENTIAL_NOT_FOUND:
    case ErrorCode.CREDENTIAL_PERSIST_FAILED:
    case ErrorCode.CREDENTIAL_VERIFICATION_FAILED:
    case ErrorCode.PROVIDER_UNAVAILABLE:
    case ErrorCode.PROVIDER_CHOICE_INVALID:
    case ErrorCode.LOCAL_RUNTIME_MISSING:
    case ErrorCode.STATE_SAVE_FAILED:
    case ErrorCode.CONFIG_SAVE_FAILED:
    case ErrorCode.MARKER_WRITE_FAILED:
      return ErrorSeverity.USER_ACTION;

    default:
      return ErrorSeverity.FATAL;
  }
}

/**
 * Options for creating a TernError.
 */
export interface TernErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
  /** Next steps shown to the user */
  hint?: string;
}

/**
 * Base error class for all tern errors.
 *
 * Provides:
 * - Categorized error codes
 * - Automatic severity inference
 * - Error cause chaining
 * - An optional hint with instructions for the user
 */
export class TernError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly hint?: string;

  constructor(message: string, code: ErrorCode, options?: TernErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "TernError";
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TernError);
    }
  }

  /**
   * The severity level of this error, inferred from the error code.
   */
  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      hint: this.hint,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Render any thrown value as a message string.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
