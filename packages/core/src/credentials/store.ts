/**
 * Credential Store
 *
 * Persists credentials to the canonical `.env` in the tern home, falling back
 * to the user's shell profile and finally to the current run only.
 *
 * @module credentials/store
 */

import { chmod, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { Err, Ok, type Result } from "@tern/shared";

import { describeError, ErrorCode, TernError } from "../errors/types.js";
import { createSilentLogger, type Logger } from "../logger/logger.js";
import { providerKindForCredential } from "../providers/catalog.js";
import { type AppendExportOptions, appendExportToProfile } from "../shell/profile.js";
import type { CredentialCache } from "./cache.js";
import { isErrnoException, isValidEnvName, upsertEnvDocument } from "./env-document.js";
import type { EnvironmentMap, Provenance, SecondaryStore } from "./types.js";

const SECURE_FILE_MODE = 0o600;

/**
 * Outcome of {@link CredentialStore.upsert}
 */
export interface UpsertReport {
  /** False when the value only lives in this run */
  readonly persisted: boolean;
  readonly location: Extract<Provenance, "canonical-file" | "shell-profile" | "process-env">;
  /** File that received the value */
  readonly path?: string;
  readonly secondary: "stored" | "failed" | "disabled";
  /** Why persistence fell back, when it did */
  readonly error?: TernError;
}

export interface CredentialStoreOptions {
  /** `<tern home>/.env` */
  credentialFile: string;
  cache: CredentialCache;
  env: EnvironmentMap;
  /** Also set written values in `env` (default: false) */
  exportToEnvironment?: boolean;
  secondary?: SecondaryStore;
  /** Shell detection inputs for the profile fallback; false disables it */
  profile?: AppendExportOptions | false;
  logger?: Logger;
}

/**
 * Credential Store
 *
 * Write order:
 * 1. canonical file: replace the NAME line in place or append it (mode 0600)
 * 2. on failure, an export line in the shell rc file
 * 3. on failure again, the run cache only, reported as not persisted
 *
 * Every written value is also recorded in the run cache, and copied to the
 * secondary store when one is configured.
 */
export class CredentialStore {
  private readonly options: CredentialStoreOptions;
  private readonly logger: Logger;

  constructor(options: CredentialStoreOptions) {
    this.options = options;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Persist `value` under `name`.
   *
   * @returns Err(CREDENTIAL_INVALID_FORMAT) for a bad name or a value that is
   *   blank or contains quotes or line breaks; otherwise a report of where the
   *   value ended up
   */
  async upsert(name: string, value: string): Promise<Result<UpsertReport, TernError>> {
    const rejection = this.checkInput(name, value);
    if (rejection) {
      return Err(rejection);
    }

    const secondary = await this.writeSecondary(name, value);
    const primary = await this.writeCanonical(name, value);

    let report: UpsertReport;
    if (primary.ok) {
      report = { persisted: true, location: "canonical-file", path: this.options.credentialFile, secondary };
    } else {
      this.logger.warn(`Could not save ${name} to ${this.options.credentialFile}`, { error: primary.error.message });
      report = await this.writeFallback(name, value, primary.error, secondary);
    }

    this.options.cache.set({
      name,
      value,
      providerKind: providerKindForCredential(name),
      provenance: report.location,
    });
    if (this.options.exportToEnvironment) {
      this.options.env[name] = value;
    }

    return Ok(report);
  }

  private checkInput(name: string, value: string): TernError | undefined {
    if (!isValidEnvName(name)) {
      return new TernError(`Invalid credential name: ${name}`, ErrorCode.CREDENTIAL_INVALID_FORMAT);
    }
    if (value.trim() === "") {
      return new TernError(`${name} cannot be blank`, ErrorCode.CREDENTIAL_INVALID_FORMAT);
    }
    if (/["'\r\n]/.test(value)) {
      return new TernError(`${name} cannot contain quotes or line breaks`, ErrorCode.CREDENTIAL_INVALID_FORMAT);
    }
    return undefined;
  }

  private async writeCanonical(name: string, value: string): Promise<Result<void, TernError>> {
    const path = this.options.credentialFile;
    try {
      let current = "";
      try {
        current = await readFile(path, "utf-8");
      } catch (error) {
        if (!(isErrnoException(error) && error.code === "ENOENT")) {
          throw error;
        }
      }

      await mkdir(dirname(path), { recursive: true, mode: 0o700 });
      await writeFile(path, upsertEnvDocument(current, name, value), { encoding: "utf-8", mode: SECURE_FILE_MODE });
      // writeFile only applies mode on creation
      await chmod(path, SECURE_FILE_MODE);
      return Ok(undefined);
    } catch (error) {
      return Err(
        new TernError(`Failed to write ${path}: ${describeError(error)}`, ErrorCode.CREDENTIAL_PERSIST_FAILED, {
          cause: error,
          context: { path },
        })
      );
    }
  }

  private async writeFallback(
    name: string,
    value: string,
    primaryError: TernError,
    secondary: UpsertReport["secondary"]
  ): Promise<UpsertReport> {
    if (this.options.profile !== false) {
      const exported = await appendExportToProfile(name, value, this.options.profile);
      if (exported.ok) {
        this.logger.info(`Saved ${name} to ${exported.value.path}`);
        return {
          persisted: true,
          location: "shell-profile",
          path: exported.value.path,
          secondary,
          error: primaryError,
        };
      }
      this.logger.warn(`Could not add ${name} to the shell profile`, { error: exported.error.message });
    }

    this.logger.error(`${name} was not saved; it is available for this run only`);
    return {
      persisted: false,
      location: "process-env",
      secondary,
      error: new TernError(`${name} could not be saved`, ErrorCode.CREDENTIAL_PERSIST_FAILED, {
        cause: primaryError,
        hint: `Add ${name} to ${this.options.credentialFile} manually.`,
      }),
    };
  }

  private async writeSecondary(name: string, value: string): Promise<UpsertReport["secondary"]> {
    const store = this.options.secondary;
    if (!store) {
      return "disabled";
    }
    const result = await store.set(name, value);
    if (!result.ok) {
      this.logger.warn(`Could not copy ${name} to ${store.location}`, { error: result.error.message });
      return "failed";
    }
    return "stored";
  }
}
