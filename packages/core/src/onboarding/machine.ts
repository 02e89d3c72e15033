/**
 * Onboarding State Machine
 *
 * Runs the setup steps in order, persisting progress around every step.
 *
 * @module onboarding/machine
 */

import { describeError, ErrorCode, TernError } from "../errors/types.js";
import { createSilentLogger, type Logger } from "../logger/logger.js";
import { buildSetupConfig, collectedDataFromConfig, type SetupConfigStore } from "./config-store.js";
import type { SetupMarker } from "./marker.js";
import { NULL_OUTPUT, type Prompter, type WizardOutput } from "./prompter.js";
import type { WizardStateStore } from "./state-store.js";
import {
  type OnboardingRunResult,
  SETUP_STEP_CONFIG,
  SETUP_STEPS,
  type SetupConfig,
  type SetupStep,
  type StepHandler,
  type StepOutcome,
  type WizardState,
} from "./types.js";

export interface OnboardingStateMachineOptions {
  /** One handler per step in {@link SETUP_STEPS} */
  steps: readonly StepHandler[];
  stateStore: WizardStateStore;
  configStore: SetupConfigStore;
  marker: SetupMarker;
  prompter: Prompter;
  output?: WizardOutput;
  logger?: Logger;
  interactive: boolean;
  /** Time source for timestamps (default: () => new Date()) */
  now?: () => Date;
}

export interface RunOptions {
  /** Run even when the setup marker exists */
  force?: boolean;
}

/**
 * Snapshot for `tern setup status`
 */
export interface SetupStatus {
  readonly complete: boolean;
  readonly state?: WizardState;
  readonly config?: SetupConfig;
}

/**
 * Onboarding State Machine
 *
 * - every run starts at `welcome`; data collected by earlier runs is kept
 *   and offered as defaults
 * - state is saved before each step and after each outcome
 * - a failed step stops the run; `complete` never runs and the state file
 *   is left for inspection
 * - `completedAt` is stamped once, after the first successful run
 *
 * @example
 * ```typescript
 * const machine = new OnboardingStateMachine({ steps, stateStore, configStore, marker, prompter, interactive: true });
 * if (await machine.needsSetup()) {
 *   const result = await machine.run();
 * }
 * ```
 */
export class OnboardingStateMachine {
  private readonly handlers: ReadonlyMap<SetupStep, StepHandler>;
  private readonly options: OnboardingStateMachineOptions;
  private readonly output: WizardOutput;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: OnboardingStateMachineOptions) {
    this.options = options;
    this.handlers = new Map(options.steps.map((handler) => [handler.id, handler]));
    this.output = options.output ?? NULL_OUTPUT;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());

    const missing = SETUP_STEPS.filter((step) => !this.handlers.has(step));
    if (missing.length > 0) {
      throw new TernError(`No handler for setup steps: ${missing.join(", ")}`, ErrorCode.SYSTEM_UNKNOWN);
    }
  }

  async needsSetup(): Promise<boolean> {
    return !(await this.options.marker.exists());
  }

  async status(): Promise<SetupStatus> {
    const [complete, state, config] = await Promise.all([
      this.options.marker.exists(),
      this.options.stateStore.load(),
      this.options.configStore.load(),
    ]);
    return {
      complete,
      state: state.ok ? state.value : undefined,
      config: config.ok ? config.value : undefined,
    };
  }

  /**
   * Remove the marker and the saved progress. Config and credentials stay.
   */
  async reset(): Promise<void> {
    await this.options.marker.remove();
    await this.options.stateStore.delete();
  }

  async run(runOptions: RunOptions = {}): Promise<OnboardingRunResult> {
    if (!runOptions.force && !(await this.needsSetup())) {
      this.logger.debug("Setup marker present; nothing to do");
      return { status: "already-complete" };
    }

    const state = await this.initialState();
    let index = 0;

    while (index < SETUP_STEPS.length) {
      const step = SETUP_STEPS[index];
      const handler = step === undefined ? undefined : this.handlers.get(step);
      if (step === undefined || handler === undefined) {
        break;
      }

      state.currentStep = step;
      await this.persist(state);
      this.logger.debug(`Running step ${step}`);

      const outcome = await this.execute(handler, state);

      if (outcome.status === "failed") {
        this.logger.error(`Setup step ${step} failed`, { code: outcome.error.code, message: outcome.message });
        await this.persist(state);
        return { status: "failed", step, message: outcome.message, error: outcome.error, state: cloneState(state) };
      }

      this.record(state, step, outcome.status);
      Object.assign(state.collectedData, outcome.data);
      if (outcome.message) {
        this.logger.info(`${SETUP_STEP_CONFIG[step].title}: ${outcome.message}`);
      }

      const nextIndex = this.resolveNext(state, index, outcome);

      if (handler.touchesConfig) {
        const saved = await this.options.configStore.save(buildSetupConfig(state.collectedData, this.now()));
        if (!saved.ok) {
          this.logger.error(`Could not save configuration after ${step}`, { message: saved.error.message });
          await this.persist(state);
          return { status: "failed", step, message: saved.error.message, error: saved.error, state: cloneState(state) };
        }
      }

      await this.persist(state);
      index = nextIndex;
    }

    state.completedAt ??= this.now().toISOString();
    await this.persist(state);

    return { status: "completed", state: cloneState(state), config: buildSetupConfig(state.collectedData, this.now()) };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async initialState(): Promise<WizardState> {
    const loaded = await this.options.stateStore.load();
    if (!loaded.ok) {
      this.logger.warn("Ignoring unreadable wizard state", { message: loaded.error.message });
    }
    const previous = loaded.ok ? loaded.value : undefined;

    return {
      currentStep: "welcome",
      completedSteps: [],
      skippedSteps: [],
      collectedData: previous ? { ...previous.collectedData } : await this.savedChoices(),
      startedAt: previous?.startedAt ?? this.now().toISOString(),
      completedAt: previous?.completedAt,
    };
  }

  private async savedChoices(): Promise<Record<string, unknown>> {
    const config = await this.options.configStore.load();
    if (!config.ok) {
      this.logger.warn("Ignoring unreadable setup configuration", { message: config.error.message });
      return {};
    }
    return config.value ? collectedDataFromConfig(config.value) : {};
  }

  private async execute(handler: StepHandler, state: WizardState): Promise<StepOutcome> {
    const step = SETUP_STEP_CONFIG[handler.id];
    this.output.heading(step.title);
    try {
      return await handler.execute({
        state: cloneState(state),
        interactive: this.options.interactive,
        prompter: this.options.prompter,
        output: this.output,
        logger: this.logger.child({ step: handler.id }),
      });
    } catch (error) {
      const message = `${step.title} failed: ${describeError(error)}`;
      return {
        status: "failed",
        message,
        error: error instanceof TernError ? error : new TernError(message, ErrorCode.SYSTEM_UNKNOWN, { cause: error }),
      };
    }
  }

  /**
   * Index of the step to run next; steps a forward jump passes over are
   * recorded as skipped.
   */
  private resolveNext(state: WizardState, index: number, outcome: StepOutcome): number {
    if (outcome.status === "failed" || outcome.next === undefined) {
      return index + 1;
    }

    const target = SETUP_STEPS.indexOf(outcome.next);
    if (target <= index) {
      this.logger.warn(`Ignoring backward jump to ${outcome.next}`);
      return index + 1;
    }

    for (const bypassed of SETUP_STEPS.slice(index + 1, target)) {
      this.record(state, bypassed, "skipped");
    }
    return target;
  }

  private record(state: WizardState, step: SetupStep, status: "completed" | "skipped"): void {
    const [into, from] =
      status === "completed" ? [state.completedSteps, state.skippedSteps] : [state.skippedSteps, state.completedSteps];

    const existing = from.indexOf(step);
    if (existing !== -1) {
      from.splice(existing, 1);
    }
    if (!into.includes(step)) {
      into.push(step);
    }
  }

  private async persist(state: WizardState): Promise<void> {
    const saved = await this.options.stateStore.save(state);
    if (!saved.ok) {
      this.logger.warn("Could not save wizard state", { message: saved.error.message });
    }
  }
}

function cloneState(state: WizardState): WizardState {
  return {
    ...state,
    completedSteps: [...state.completedSteps],
    skippedSteps: [...state.skippedSteps],
    collectedData: { ...state.collectedData },
  };
}
