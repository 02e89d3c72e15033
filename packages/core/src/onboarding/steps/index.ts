/**
 * Setup steps
 *
 * @module onboarding/steps
 */

export { type CompleteStepOptions, createCompleteStep } from "./complete.js";
export { createHardwareDetectionStep, type HardwareDetectionStepOptions } from "./hardware-detection.js";
export { createPreferencesStep } from "./preferences.js";
export { createProviderSetupStep, type ProviderSetupStepOptions } from "./provider-setup.js";
export {
  createShellIntegrationStep,
  type ShellIntegrationStepOptions,
  type ShellIntegrator,
} from "./shell-integration.js";
export {
  createTestCommandStep,
  EXAMPLE_REQUESTS,
  type TestCommandRunner,
  type TestCommandStepOptions,
} from "./test-command.js";
export { createWelcomeStep, WELCOME_MESSAGE } from "./welcome.js";
