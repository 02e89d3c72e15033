/**
 * Setup Command
 *
 * `tern setup`, `tern setup status` and `tern setup reset`.
 *
 * @module cli/commands/setup
 */

import {
  type CreateOnboardingOptions,
  createOnboarding,
  describeError,
  type EnvironmentMap,
  type Logger,
  PROVIDERS,
  type Prompter,
  type RuntimeConfig,
  SETUP_STEP_CONFIG,
  type WizardOutput,
} from "@tern/core";
import { maskSecret } from "@tern/shared";

import { EXIT_CODES, type ExitCode, ExitCodeMapper } from "./exit-codes.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Everything a setup command needs from the process it runs in
 */
export interface SetupContext {
  config: RuntimeConfig;
  env: EnvironmentMap;
  userHome: string;
  cwd: string;
  prompter: Prompter;
  output: WizardOutput;
  logger: Logger;
  /** Whether a user can answer prompts (stdin is a terminal) */
  canPrompt: boolean;
  /** Extra wiring for tests and embedders (verifier, integrators, clock) */
  onboarding?: Partial<CreateOnboardingOptions>;
}

export interface SetupCommandOptions {
  /** Run the wizard even when setup already completed */
  force?: boolean;
  /** Never prompt; take defaults and the first available provider */
  nonInteractive?: boolean;
}

export interface SetupCommandResult {
  success: boolean;
  exitCode: ExitCode;
  message: string;
}

function wire(context: SetupContext, interactive: boolean) {
  return createOnboarding({
    ...context.onboarding,
    config: context.config,
    prompter: context.prompter,
    output: context.output,
    logger: context.logger,
    interactive,
    env: context.env,
    exportToEnvironment: true,
    userHome: context.userHome,
    cwd: context.cwd,
  });
}

// =============================================================================
// tern setup
// =============================================================================

function interrupted(output: WizardOutput): SetupCommandResult {
  output.warn("Setup interrupted. Run `tern setup` to continue where you left off.");
  return { success: false, exitCode: EXIT_CODES.INTERRUPTED, message: "Interrupted" };
}

export async function runSetup(options: SetupCommandOptions, context: SetupContext): Promise<SetupCommandResult> {
  const { output } = context;
  const interactive = context.canPrompt && !options.nonInteractive;
  const { machine } = wire(context, interactive);

  try {
    const result = await machine.run({ force: options.force });
    const exitCode = ExitCodeMapper.fromRun(result);

    switch (result.status) {
      case "already-complete":
        output.success("tern is already set up. Run `tern setup --force` to change your settings.");
        return { success: true, exitCode, message: "Setup already complete" };
      case "completed":
        return { success: true, exitCode, message: "Setup complete" };
      case "failed": {
        // An aborted step surfaces as the failure's cause
        if (ExitCodeMapper.fromException(result.error.cause) === EXIT_CODES.INTERRUPTED) {
          return interrupted(output);
        }
        output.error(`${SETUP_STEP_CONFIG[result.step].title}: ${result.message}`);
        if (result.error.hint) {
          output.info(result.error.hint);
        }
        return { success: false, exitCode, message: result.message };
      }
    }
  } catch (error) {
    const exitCode = ExitCodeMapper.fromException(error);
    if (exitCode === EXIT_CODES.INTERRUPTED) {
      return interrupted(output);
    }
    context.logger.error("Setup failed unexpectedly", { error: describeError(error) });
    output.error(describeError(error));
    return { success: false, exitCode, message: describeError(error) };
  }
}

// =============================================================================
// tern setup status
// =============================================================================

export async function runSetupStatus(context: SetupContext): Promise<SetupCommandResult> {
  const { output } = context;
  const { machine, availability, locator, paths } = wire(context, false);
  const status = await machine.status();

  output.heading("tern setup status");
  output.info(`Home:      ${paths.home}`);
  output.info(`Setup:     ${status.complete ? "complete" : "not complete"}`);
  if (status.config) {
    output.info(`Provider:  ${status.config.provider}`);
    output.info(`Updated:   ${status.config.updatedAt}`);
  }
  if (!status.complete && status.state) {
    output.info(`Resume at: ${SETUP_STEP_CONFIG[status.state.currentStep].title}`);
  }

  output.info("Providers:");
  for (const provider of await availability.report()) {
    const descriptor = PROVIDERS[provider.kind];
    if (!provider.available) {
      const malformed = provider.diagnostics.find((diagnostic) => diagnostic.status === "invalid");
      output.info(
        `  ${descriptor.displayName}: ${malformed ? `malformed value in ${malformed.location ?? malformed.provenance}` : "not configured"}`
      );
    } else if (descriptor.credentialName) {
      const credential = await locator.locate(descriptor.credentialName, provider.kind);
      const masked = credential ? ` ${maskSecret(credential.value)}` : "";
      output.info(`  ${descriptor.displayName}: ready (${provider.provenance ?? "unknown"})${masked}`);
    } else {
      output.info(`  ${descriptor.displayName}: ready (${provider.executablePath ?? "on PATH"})`);
    }
  }

  return {
    success: true,
    exitCode: EXIT_CODES.SUCCESS,
    message: status.complete ? "Setup complete" : "Setup not complete",
  };
}

// =============================================================================
// tern setup reset
// =============================================================================

/**
 * Forget wizard progress so the next `tern setup` runs again. Credentials and
 * the saved config are kept.
 */
export async function runSetupReset(context: SetupContext): Promise<SetupCommandResult> {
  const { machine } = wire(context, false);
  try {
    await machine.reset();
  } catch (error) {
    context.output.error(`Could not reset setup: ${describeError(error)}`);
    return { success: false, exitCode: EXIT_CODES.ERROR, message: describeError(error) };
  }
  context.output.success("Setup reset. Run `tern setup` to start again.");
  return { success: true, exitCode: EXIT_CODES.SUCCESS, message: "Setup reset" };
}
