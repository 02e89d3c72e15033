/**
 * Scripted prompter and recording output sink for tests
 */

import type { PromptChoice, Prompter, WizardOutput } from "../../onboarding/prompter.js";

type Answer = string | boolean;

/**
 * Answers prompts from a queue. When the queue runs dry every prompt behaves
 * like a cancelled one and returns its default.
 */
export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  private readonly answers: Answer[];

  constructor(answers: readonly Answer[] = []) {
    this.answers = [...answers];
  }

  get remaining(): number {
    return this.answers.length;
  }

  async input(message: string, defaultValue = ""): Promise<string> {
    const answer = this.next(message);
    return typeof answer === "string" ? answer : defaultValue;
  }

  async secret(message: string): Promise<string> {
    const answer = this.next(message);
    return typeof answer === "string" ? answer : "";
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const answer = this.next(message);
    return typeof answer === "boolean" ? answer : defaultValue;
  }

  async select<T extends string>(message: string, choices: readonly PromptChoice<T>[], defaultValue: T): Promise<T> {
    const answer = this.next(message);
    return choices.find((choice) => choice.value === answer)?.value ?? defaultValue;
  }

  private next(message: string): Answer | undefined {
    this.asked.push(message);
    return this.answers.shift();
  }
}

export interface RecordedLine {
  readonly kind: keyof WizardOutput;
  readonly text: string;
}

export class RecordingOutput implements WizardOutput {
  readonly lines: RecordedLine[] = [];

  heading(text: string): void {
    this.lines.push({ kind: "heading", text });
  }

  info(text: string): void {
    this.lines.push({ kind: "info", text });
  }

  success(text: string): void {
    this.lines.push({ kind: "success", text });
  }

  warn(text: string): void {
    this.lines.push({ kind: "warn", text });
  }

  error(text: string): void {
    this.lines.push({ kind: "error", text });
  }

  texts(kind?: keyof WizardOutput): string[] {
    return this.lines.filter((line) => kind === undefined || line.kind === kind).map((line) => line.text);
  }
}
