/**
 * Onboarding Module
 *
 * First-run setup: provider selection, credential configuration and the
 * persisted wizard that drives them.
 *
 * @module onboarding
 */

export { buildSetupConfig, collectedDataFromConfig, SetupConfigStore } from "./config-store.js";
export { type CreateOnboardingOptions, createOnboarding, type Onboarding } from "./create.js";
export {
  OnboardingStateMachine,
  type OnboardingStateMachineOptions,
  type RunOptions,
  type SetupStatus,
} from "./machine.js";
export { SetupMarker } from "./marker.js";
export { NULL_OUTPUT, type PromptChoice, type Prompter, type WizardOutput } from "./prompter.js";
export { WizardStateStore } from "./state-store.js";
export * from "./steps/index.js";
export {
  DEFAULT_PREFERENCES,
  type OnboardingRunResult,
  type Preferences,
  PreferencesSchema,
  SETUP_STEP_CONFIG,
  SETUP_STEPS,
  type SetupConfig,
  SetupConfigSchema,
  type SetupStep,
  type SetupStepConfig,
  SetupStepSchema,
  type StepContext,
  type StepHandler,
  type StepOutcome,
  type Verbosity,
  VerbositySchema,
  type WizardState,
  WizardStateSchema,
} from "./types.js";
