/**
 * Test Command Step
 *
 * Offers a dry run of one example request so the user sees tern answer
 * before setup ends.
 *
 * @module onboarding/steps/test-command
 */

import type { Result } from "@tern/shared";

import type { TernError } from "../../errors/types.js";
import type { StepHandler } from "../types.js";

export const EXAMPLE_REQUESTS = [
  "find the ten largest files under this directory",
  "show which process is listening on port 8080",
  "compress the logs folder into a dated tarball",
  "list git branches merged into main",
  "count lines of code per file extension",
  "convert all PNG images here to WebP",
  "show disk usage by top-level directory",
  "undo the last git commit but keep the changes",
  "find files modified in the last 24 hours",
  "print my public IP address",
] as const;

/**
 * Runs a request without executing anything and returns what tern would do
 */
export interface TestCommandRunner {
  dryRun(request: string): Promise<Result<string, TernError>>;
}

export interface TestCommandStepOptions {
  runner?: TestCommandRunner;
  /** Picks the example to run (default: random) */
  pickExample?: (examples: readonly string[]) => string;
}

function pickRandom(examples: readonly string[]): string {
  return examples[Math.floor(Math.random() * examples.length)] ?? EXAMPLE_REQUESTS[0];
}

export function createTestCommandStep(options: TestCommandStepOptions = {}): StepHandler {
  const pick = options.pickExample ?? pickRandom;

  return {
    id: "test-command",
    async execute({ interactive, prompter, output, logger }) {
      const { runner } = options;
      if (!runner || !interactive) {
        return { status: "skipped" };
      }

      const request = pick(EXAMPLE_REQUESTS);
      if (!(await prompter.confirm(`Try a dry run of "${request}"?`, true))) {
        return { status: "skipped", message: "Declined" };
      }

      const result = await runner.dryRun(request);
      if (!result.ok) {
        logger.warn("Dry run failed", { error: result.error.message });
        output.warn(`The dry run did not work: ${result.error.message}`);
        return { status: "skipped", message: result.error.message };
      }

      output.info(result.value);
      return { status: "completed", data: { testCommand: request } };
    },
  };
}
