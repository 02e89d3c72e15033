/**
 * Setup configuration persistence
 *
 * @module onboarding/config-store
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { Err, Ok, type Result } from "@tern/shared";

import { isErrnoException } from "../credentials/env-document.js";
import { describeError, ErrorCode, TernError } from "../errors/types.js";
import { type SetupConfig, SetupConfigSchema } from "./types.js";

/**
 * Build the configuration document from the wizard's collected data.
 */
export function buildSetupConfig(collectedData: Record<string, unknown>, now: Date = new Date()): SetupConfig {
  return SetupConfigSchema.parse({
    provider: collectedData.provider,
    credentialConfigured: collectedData.credentialConfigured,
    hardware: collectedData.hardware,
    preferences: collectedData.preferences,
    updatedAt: now.toISOString(),
  });
}

/**
 * The collected data a saved configuration stands for; seeds a run that has
 * no wizard state (first run after `reset()`).
 */
export function collectedDataFromConfig(config: SetupConfig): Record<string, unknown> {
  const { provider, credentialConfigured, hardware, preferences } = config;
  return hardware === undefined
    ? { provider, credentialConfigured, preferences }
    : { provider, credentialConfigured, hardware, preferences };
}

/**
 * Reads and writes `config.json`. Every save replaces the whole document via
 * a temporary file and a rename.
 */
export class SetupConfigStore {
  constructor(readonly path: string) {}

  async load(): Promise<Result<SetupConfig | undefined, TernError>> {
    try {
      const content = await readFile(this.path, "utf-8");
      return Ok(SetupConfigSchema.parse(JSON.parse(content)));
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return Ok(undefined);
      }
      return Err(
        new TernError(`Failed to read ${this.path}: ${describeError(error)}`, ErrorCode.SYSTEM_IO_ERROR, {
          cause: error,
        })
      );
    }
  }

  async save(config: SetupConfig): Promise<Result<void, TernError>> {
    const tmpPath = `${this.path}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmpPath, `${JSON.stringify(config, null, 2)}\n`, "utf-8");
      await rename(tmpPath, this.path);
      return Ok(undefined);
    } catch (error) {
      return Err(
        new TernError(`Failed to save ${this.path}: ${describeError(error)}`, ErrorCode.CONFIG_SAVE_FAILED, {
          cause: error,
        })
      );
    }
  }
}
