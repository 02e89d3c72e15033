/**
 * Shell Integration Step
 *
 * @module onboarding/steps/shell-integration
 */

import type { Result } from "@tern/shared";

import type { TernError } from "../../errors/types.js";
import { detectShell } from "../../shell/detector.js";
import type { ShellType } from "../../shell/types.js";
import type { StepHandler } from "../types.js";

/**
 * Installs tern's shell hooks (completion, keybindings). Supplied by the host
 * application; setup only asks whether to run it.
 */
export interface ShellIntegrator {
  integrate(shell: ShellType): Promise<Result<{ readonly path?: string }, TernError>>;
}

export interface ShellIntegrationStepOptions {
  integrator?: ShellIntegrator;
  /** Environment used to detect the user's shell (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export function createShellIntegrationStep(options: ShellIntegrationStepOptions = {}): StepHandler {
  return {
    id: "shell-integration",
    async execute({ interactive, prompter, output, logger }) {
      const { integrator } = options;
      if (!integrator) {
        return { status: "skipped", message: "Shell integration is not available" };
      }
      if (!interactive) {
        return { status: "skipped", message: "Shell integration needs confirmation" };
      }

      const { shell } = detectShell(options.env);
      if (!(await prompter.confirm(`Enable shell integration for ${shell}?`, true))) {
        return { status: "skipped", message: "Declined" };
      }

      const result = await integrator.integrate(shell);
      if (!result.ok) {
        logger.warn("Shell integration failed", { error: result.error.message });
        output.warn(`Shell integration failed: ${result.error.message}`);
        return { status: "skipped", message: result.error.message };
      }

      output.success(result.value.path ? `Shell integration added to ${result.value.path}` : "Shell integration enabled");
      return { status: "completed", data: { shellIntegration: { shell, path: result.value.path } } };
    },
  };
}
