/**
 * Complete Step
 *
 * Writes the final configuration, then the setup marker.
 *
 * @module onboarding/steps/complete
 */

import { buildSetupConfig, type SetupConfigStore } from "../config-store.js";
import type { SetupMarker } from "../marker.js";
import type { StepHandler } from "../types.js";

export interface CompleteStepOptions {
  configStore: SetupConfigStore;
  marker: SetupMarker;
}

export function createCompleteStep(options: CompleteStepOptions): StepHandler {
  return {
    id: "complete",
    async execute({ state, output }) {
      const saved = await options.configStore.save(buildSetupConfig(state.collectedData));
      if (!saved.ok) {
        return { status: "failed", message: saved.error.message, error: saved.error };
      }

      const marked = await options.marker.create();
      if (!marked.ok) {
        return { status: "failed", message: marked.error.message, error: marked.error };
      }

      output.success("Setup complete. Run `tern setup --force` to change these settings later.");
      return { status: "completed" };
    },
  };
}
