/**
 * Terminal output sink for the setup wizard
 *
 * @module cli/output/terminal-output
 */

import type { WizardOutput } from "@tern/core";
import chalk, { type ChalkInstance } from "chalk";

export interface TerminalOutputOptions {
  /** Chalk instance to render with (default: the auto-detecting one) */
  chalk?: ChalkInstance;
  /** Writer for regular lines (default: stdout) */
  write?: (line: string) => void;
  /** Writer for warnings and errors (default: stderr) */
  writeError?: (line: string) => void;
}

export class TerminalOutput implements WizardOutput {
  private readonly chalk: ChalkInstance;
  private readonly write: (line: string) => void;
  private readonly writeError: (line: string) => void;

  constructor(options: TerminalOutputOptions = {}) {
    this.chalk = options.chalk ?? chalk;
    this.write = options.write ?? ((line) => console.log(line));
    this.writeError = options.writeError ?? ((line) => console.error(line));
  }

  heading(text: string): void {
    this.write(this.chalk.bold(`\n${text}\n`));
  }

  info(text: string): void {
    this.write(text);
  }

  success(text: string): void {
    this.write(this.chalk.green(`✓ ${text}`));
  }

  warn(text: string): void {
    this.writeError(this.chalk.yellow(`⚠ ${text}`));
  }

  error(text: string): void {
    this.writeError(this.chalk.red(`✗ ${text}`));
  }
}
