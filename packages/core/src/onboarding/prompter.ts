/**
 * Interaction seams for the onboarding flow
 *
 * The core never touches the terminal directly; the CLI supplies an
 * inquirer-backed {@link Prompter} and a chalk-backed {@link WizardOutput}.
 *
 * @module onboarding/prompter
 */

/**
 * A choice in a select prompt
 */
export interface PromptChoice<T extends string> {
  readonly value: T;
  readonly name: string;
  readonly description?: string;
}

/**
 * Asks the user questions. Every method resolves to the supplied default
 * (or an empty string for secrets) when the user cancels the prompt.
 */
export interface Prompter {
  input(message: string, defaultValue?: string): Promise<string>;
  /** Masked input for credentials */
  secret(message: string): Promise<string>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  select<T extends string>(message: string, choices: readonly PromptChoice<T>[], defaultValue: T): Promise<T>;
}

/**
 * Sink for user-facing messages
 */
export interface WizardOutput {
  heading(text: string): void;
  info(text: string): void;
  success(text: string): void;
  warn(text: string): void;
  error(text: string): void;
}

/**
 * Output sink that discards everything
 */
export const NULL_OUTPUT: WizardOutput = {
  heading: () => undefined,
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
