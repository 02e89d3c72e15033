/**
 * Welcome Step
 *
 * @module onboarding/steps/welcome
 */

import { SETUP_STEP_CONFIG, SETUP_STEPS, type StepHandler } from "../types.js";

export const WELCOME_MESSAGE = "Welcome to tern! This short setup connects tern to an AI provider.";

/**
 * Create the welcome step: prints what the remaining steps will do.
 */
export function createWelcomeStep(): StepHandler {
  return {
    id: "welcome",
    async execute({ output }) {
      output.heading(WELCOME_MESSAGE);
      for (const step of SETUP_STEPS.slice(1, -1)) {
        const { title, description } = SETUP_STEP_CONFIG[step];
        output.info(`  - ${title}: ${description}`);
      }
      return { status: "completed" };
    },
  };
}
