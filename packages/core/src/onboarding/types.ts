/**
 * Onboarding Type Definitions
 *
 * Types for the setup wizard: step identifiers, the persisted wizard state,
 * the setup configuration it produces, and the step contract.
 *
 * @module onboarding/types
 */

import { z } from "zod";

import type { TernError } from "../errors/types.js";
import { HardwareInfoSchema } from "../hardware/detector.js";
import type { Logger } from "../logger/logger.js";
import { ProviderKindSchema } from "../providers/catalog.js";
import type { Prompter, WizardOutput } from "./prompter.js";

// =============================================================================
// Step Types
// =============================================================================

/**
 * Setup step identifiers
 */
export const SetupStepSchema = z.enum([
  "welcome",
  "provider-setup",
  "hardware-detection",
  "preferences",
  "shell-integration",
  "test-command",
  "complete",
]);

export type SetupStep = z.infer<typeof SetupStepSchema>;

/**
 * All setup steps in order
 */
export const SETUP_STEPS: readonly SetupStep[] = SetupStepSchema.options;

/**
 * Step metadata for display
 */
export interface SetupStepConfig {
  readonly id: SetupStep;
  readonly title: string;
  readonly description: string;
}

export const SETUP_STEP_CONFIG: Record<SetupStep, SetupStepConfig> = {
  welcome: {
    id: "welcome",
    title: "Welcome",
    description: "What setup will do",
  },
  "provider-setup": {
    id: "provider-setup",
    title: "AI Provider",
    description: "Choose a backend and configure its credential",
  },
  "hardware-detection": {
    id: "hardware-detection",
    title: "Hardware",
    description: "Record CPU and memory for local model defaults",
  },
  preferences: {
    id: "preferences",
    title: "Preferences",
    description: "Confirmation, verbosity and caching",
  },
  "shell-integration": {
    id: "shell-integration",
    title: "Shell Integration",
    description: "Hook tern into your shell",
  },
  "test-command": {
    id: "test-command",
    title: "Try It",
    description: "Run a dry-run request",
  },
  complete: {
    id: "complete",
    title: "Done",
    description: "Save configuration",
  },
};

// =============================================================================
// Wizard State
// =============================================================================

const StepListSchema = z.array(SetupStepSchema).transform((steps) => [...new Set(steps)]);

/**
 * Persisted wizard progress. Unknown fields are dropped on load; a step
 * listed as both completed and skipped is kept as completed.
 */
export const WizardStateSchema = z
  .object({
    currentStep: SetupStepSchema.default("welcome"),
    completedSteps: StepListSchema.default([]),
    skippedSteps: StepListSchema.default([]),
    collectedData: z.record(z.unknown()).default({}),
    startedAt: z
      .string()
      .datetime({ offset: true })
      .default(() => new Date().toISOString()),
    completedAt: z.string().datetime({ offset: true }).optional(),
  })
  .transform((state) => ({
    ...state,
    skippedSteps: state.skippedSteps.filter((step) => !state.completedSteps.includes(step)),
  }));

export type WizardState = z.output<typeof WizardStateSchema>;

// =============================================================================
// Setup Configuration
// =============================================================================

export const VerbositySchema = z.enum(["quiet", "normal", "verbose"]);

export type Verbosity = z.infer<typeof VerbositySchema>;

export const PreferencesSchema = z.object({
  /** Run suggested commands without asking */
  autoConfirm: z.boolean().catch(false).default(false),
  verbosity: VerbositySchema.catch("normal").default("normal"),
  /** Cache model responses */
  cachingEnabled: z.boolean().catch(true).default(true),
});

export type Preferences = z.infer<typeof PreferencesSchema>;

export const DEFAULT_PREFERENCES: Preferences = {
  autoConfirm: false,
  verbosity: "normal",
  cachingEnabled: true,
};

/**
 * The configuration document the rest of the application reads.
 * Malformed fields fall back to their defaults.
 */
export const SetupConfigSchema = z.object({
  provider: ProviderKindSchema.catch("none").default("none"),
  /** The chosen provider is ready to use (always true for the local runner) */
  credentialConfigured: z.boolean().catch(false).default(false),
  hardware: HardwareInfoSchema.optional().catch(undefined),
  preferences: PreferencesSchema.catch(DEFAULT_PREFERENCES).default(DEFAULT_PREFERENCES),
  updatedAt: z
    .string()
    .datetime({ offset: true })
    .default(() => new Date().toISOString()),
});

export type SetupConfig = z.infer<typeof SetupConfigSchema>;

// =============================================================================
// Step Contract
// =============================================================================

/**
 * Result of a single step.
 *
 * `data` is merged into the wizard's collected data. `next` jumps forward;
 * the steps in between are recorded as skipped.
 */
export type StepOutcome =
  | {
      readonly status: "completed" | "skipped";
      readonly message?: string;
      readonly data?: Record<string, unknown>;
      readonly next?: SetupStep;
    }
  | { readonly status: "failed"; readonly message: string; readonly error: TernError };

/**
 * Everything a step may use while running
 */
export interface StepContext {
  /** Snapshot of the state before this step ran */
  readonly state: WizardState;
  readonly interactive: boolean;
  readonly prompter: Prompter;
  readonly output: WizardOutput;
  readonly logger: Logger;
}

export interface StepHandler {
  readonly id: SetupStep;
  /** The setup config is saved after this step succeeds */
  readonly touchesConfig?: boolean;
  execute(context: StepContext): Promise<StepOutcome>;
}

/**
 * Result of {@link OnboardingStateMachine.run}
 */
export type OnboardingRunResult =
  | { readonly status: "already-complete" }
  | { readonly status: "completed"; readonly state: WizardState; readonly config: SetupConfig }
  | {
      readonly status: "failed";
      readonly step: SetupStep;
      readonly message: string;
      readonly error: TernError;
      readonly state: WizardState;
    };
