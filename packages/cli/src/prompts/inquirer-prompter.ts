/**
 * Prompter backed by @inquirer/prompts
 *
 * @module cli/prompts/inquirer-prompter
 */

import { confirm, input, password, select } from "@inquirer/prompts";
import { createSilentLogger, type Logger, type PromptChoice, type Prompter } from "@tern/core";

export interface InquirerPrompterOptions {
  /** Aborting this signal cancels the open prompt */
  signal?: AbortSignal;
  logger?: Logger;
}

/** Ctrl+C inside a prompt, and a prompt aborted through its signal */
const CANCELLATION_ERROR_NAMES = new Set(["ExitPromptError", "AbortPromptError"]);

/**
 * A cancelled prompt resolves to the caller's default.
 */
export class InquirerPrompter implements Prompter {
  private readonly logger: Logger;

  constructor(private readonly options: InquirerPrompterOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  async input(message: string, defaultValue?: string): Promise<string> {
    return this.ask(() => input({ message, default: defaultValue }, { signal: this.options.signal }), defaultValue ?? "");
  }

  async secret(message: string): Promise<string> {
    return this.ask(() => password({ message, mask: "*" }, { signal: this.options.signal }), "");
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    return this.ask(() => confirm({ message, default: defaultValue }, { signal: this.options.signal }), defaultValue);
  }

  async select<T extends string>(message: string, choices: readonly PromptChoice<T>[], defaultValue: T): Promise<T> {
    return this.ask(
      () =>
        select<T>(
          {
            message,
            choices: choices.map((choice) => ({ value: choice.value, name: choice.name, description: choice.description })),
            default: defaultValue,
          },
          { signal: this.options.signal }
        ),
      defaultValue
    );
  }

  private async ask<T>(prompt: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await prompt();
    } catch (error) {
      if (error instanceof Error && CANCELLATION_ERROR_NAMES.has(error.name)) {
        this.logger.debug("Prompt cancelled; using the default", { reason: error.name });
        return fallback;
      }
      throw error;
    }
  }
}
