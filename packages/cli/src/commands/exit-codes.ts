/**
 * Exit Codes
 *
 * Process exit codes for the tern CLI, following Unix conventions:
 * - 0: Success
 * - 1: General error
 * - 2: Usage/argument error
 * - 130: Interrupted (128 + SIGINT)
 *
 * @module cli/commands/exit-codes
 */

import type { OnboardingRunResult } from "@tern/core";

export const EXIT_CODES = {
  /** Successful execution, including an already completed setup */
  SUCCESS: 0,
  /** Provider resolution or a setup step failed */
  ERROR: 1,
  /** Usage/argument error */
  USAGE_ERROR: 2,
  /** Interrupted by signal (128 + SIGINT=2) */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class ExitCodeMapper {
  static fromRun(result: OnboardingRunResult): ExitCode {
    switch (result.status) {
      case "already-complete":
      case "completed":
        return EXIT_CODES.SUCCESS;
      case "failed":
        return EXIT_CODES.ERROR;
    }
  }

  static fromException(error: unknown): ExitCode {
    // AbortError indicates user interruption
    if (error instanceof Error && error.name === "AbortError") {
      return EXIT_CODES.INTERRUPTED;
    }
    return EXIT_CODES.ERROR;
  }
}
