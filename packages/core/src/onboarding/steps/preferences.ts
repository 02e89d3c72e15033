/**
 * Preferences Step
 *
 * Asks for the few behaviour switches tern exposes. Answers from a previous
 * run are offered as defaults; a non-interactive run keeps them as they are.
 *
 * @module onboarding/steps/preferences
 */

import { DEFAULT_PREFERENCES, type Preferences, PreferencesSchema, type StepHandler, type Verbosity } from "../types.js";

const VERBOSITY_CHOICES = [
  { value: "quiet", name: "Quiet", description: "Only results and errors" },
  { value: "normal", name: "Normal", description: "Results with short explanations" },
  { value: "verbose", name: "Verbose", description: "Everything tern is doing" },
] as const satisfies readonly { value: Verbosity; name: string; description: string }[];

export function createPreferencesStep(): StepHandler {
  return {
    id: "preferences",
    touchesConfig: true,
    async execute({ state, interactive, prompter }) {
      const current = PreferencesSchema.catch(DEFAULT_PREFERENCES).parse(state.collectedData.preferences ?? {});

      if (!interactive) {
        return { status: "completed", message: "Using default preferences", data: { preferences: current } };
      }

      const preferences: Preferences = {
        autoConfirm: await prompter.confirm(
          "Run suggested commands without asking for confirmation?",
          current.autoConfirm
        ),
        verbosity: await prompter.select("How much output do you want?", VERBOSITY_CHOICES, current.verbosity),
        cachingEnabled: await prompter.confirm("Cache responses to speed up repeated requests?", current.cachingEnabled),
      };

      return { status: "completed", data: { preferences } };
    },
  };
}
