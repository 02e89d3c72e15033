import { mkdir, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { Err, Ok, type Result } from "@tern/shared";

import { describeError, ErrorCode, TernError } from "../errors/types.js";

/**
 * The zero-byte `.setup_complete` sentinel. Its absence is what triggers
 * onboarding.
 */
export class SetupMarker {
  constructor(readonly path: string) {}

  async exists(): Promise<boolean> {
    try {
      await stat(this.path);
      return true;
    } catch {
      return false;
    }
  }

  async create(): Promise<Result<void, TernError>> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, "");
      return Ok(undefined);
    } catch (error) {
      return Err(
        new TernError(`Failed to write ${this.path}: ${describeError(error)}`, ErrorCode.MARKER_WRITE_FAILED, {
          cause: error,
        })
      );
    }
  }

  async remove(): Promise<void> {
    await rm(this.path, { force: true });
  }
}
