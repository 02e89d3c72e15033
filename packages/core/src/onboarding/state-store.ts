/**
 * Wizard state persistence
 *
 * @module onboarding/state-store
 */

import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { Err, Ok, type Result } from "@tern/shared";

import { isErrnoException } from "../credentials/env-document.js";
import { describeError, ErrorCode, TernError } from "../errors/types.js";
import { type WizardState, WizardStateSchema } from "./types.js";

/**
 * Reads and writes `wizard_state.json`.
 */
export class WizardStateStore {
  constructor(readonly path: string) {}

  /**
   * @returns Ok(undefined) when no state has been saved yet
   */
  async load(): Promise<Result<WizardState | undefined, TernError>> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return Ok(undefined);
      }
      return Err(this.loadError(`Failed to read ${this.path}: ${describeError(error)}`, error));
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      return Err(this.loadError(`${this.path} is not valid JSON`, error));
    }

    const parsed = WizardStateSchema.safeParse(json);
    if (!parsed.success) {
      return Err(this.loadError(`${this.path} has an unexpected shape`, parsed.error));
    }
    return Ok(parsed.data);
  }

  async save(state: WizardState): Promise<Result<void, TernError>> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, `${JSON.stringify(state, null, 2)}\n`, "utf-8");
      return Ok(undefined);
    } catch (error) {
      return Err(
        new TernError(`Failed to save ${this.path}: ${describeError(error)}`, ErrorCode.STATE_SAVE_FAILED, {
          cause: error,
        })
      );
    }
  }

  async delete(): Promise<void> {
    await rm(this.path, { force: true });
  }

  private loadError(message: string, cause: unknown): TernError {
    return new TernError(message, ErrorCode.STATE_LOAD_FAILED, { cause, context: { path: this.path } });
  }
}
