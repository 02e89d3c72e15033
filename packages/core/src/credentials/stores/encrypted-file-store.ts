/**
 * Encrypted File Credential Store
 *
 * Secondary credential storage using AES-256-GCM encryption with scrypt key
 * derivation. Enabled only when a passphrase is configured.
 *
 * @module credentials/stores/encrypted-file-store
 */

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from "node:crypto";
import { chmod, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { Err, Ok, type Result } from "@tern/shared";
import { z } from "zod";

import { describeError, ErrorCode, TernError } from "../../errors/types.js";
import { isErrnoException } from "../env-document.js";
import type { SecondaryStore } from "../types.js";

// =============================================================================
// Encryption Constants
// =============================================================================

/**
 * scrypt parameters: N=16384 (2^14), r=8, p=1
 */
const SCRYPT_PARAMS = {
  N: 16384,
  r: 8,
  p: 1,
  keyLength: 32, // AES-256
} as const;

const SALT_LENGTH = 32;

const IV_LENGTH = 16;

const FORMAT_VERSION = 1;

const SECURE_FILE_MODE = 0o600;

// =============================================================================
// File Format
// =============================================================================

const EncryptedEntrySchema = z.object({
  iv: z.string(),
  data: z.string(),
  authTag: z.string(),
  updatedAt: z.string(),
});

type EncryptedEntry = z.infer<typeof EncryptedEntrySchema>;

const EncryptedFileSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  /** Salt for key derivation (hex) */
  salt: z.string(),
  /** Credential name → encrypted value */
  credentials: z.record(EncryptedEntrySchema),
});

type EncryptedFile = z.infer<typeof EncryptedFileSchema>;

export interface EncryptedFileStoreOptions {
  filePath: string;
  passphrase: string;
}

// =============================================================================
// EncryptedFileStore Implementation
// =============================================================================

/**
 * Stores credential values in a JSON file where each value is encrypted with
 * its own IV. The file is written with 0600 permissions.
 *
 * @example
 * ```typescript
 * const store = new EncryptedFileStore({
 *   filePath: paths.secondaryStoreFile,
 *   passphrase: config.secretPassphrase,
 * });
 * await store.set("OPENAI_API_KEY", value);
 * ```
 */
export class EncryptedFileStore implements SecondaryStore {
  private readonly filePath: string;
  private readonly passphrase: string;
  private document: EncryptedFile | null = null;
  private derivedKey: Buffer | null = null;

  constructor(options: EncryptedFileStoreOptions) {
    this.filePath = options.filePath;
    this.passphrase = options.passphrase;
  }

  get location(): string {
    return this.filePath;
  }

  async get(name: string): Promise<Result<string | undefined, TernError>> {
    const loaded = await this.load();
    if (!loaded.ok) {
      return loaded;
    }

    const entry = loaded.value?.credentials[name];
    if (!entry) {
      return Ok(undefined);
    }
    return this.decrypt(entry);
  }

  async set(name: string, value: string): Promise<Result<void, TernError>> {
    const loaded = await this.load();
    if (!loaded.ok) {
      return loaded;
    }

    const current = loaded.value ?? this.initialize();
    const encrypted = this.encrypt(value);
    if (!encrypted.ok) {
      return encrypted;
    }

    // Only a document that reached the disk becomes the cached one
    const next: EncryptedFile = { ...current, credentials: { ...current.credentials, [name]: encrypted.value } };
    const saved = await this.save(next);
    if (saved.ok) {
      this.document = next;
    }
    return saved;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Load the file, or Ok(null) when it does not exist yet
   */
  private async load(): Promise<Result<EncryptedFile | null, TernError>> {
    if (this.document !== null) {
      return Ok(this.document);
    }

    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return Ok(null);
      }
      return Err(this.ioError(`Failed to read ${this.filePath}: ${describeError(error)}`, error));
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      return Err(this.ioError(`Credential store ${this.filePath} is not valid JSON`, error));
    }

    const parsed = EncryptedFileSchema.safeParse(json);
    if (!parsed.success) {
      return Err(this.ioError(`Unsupported credential store format in ${this.filePath}`, parsed.error));
    }

    this.deriveKey(Buffer.from(parsed.data.salt, "hex"));
    this.document = parsed.data;
    return Ok(parsed.data);
  }

  private initialize(): EncryptedFile {
    const salt = randomBytes(SALT_LENGTH);
    this.deriveKey(salt);
    return {
      version: FORMAT_VERSION,
      salt: salt.toString("hex"),
      credentials: {},
    };
  }

  private async save(document: EncryptedFile): Promise<Result<void, TernError>> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(document, null, 2), {
        encoding: "utf-8",
        mode: SECURE_FILE_MODE,
      });
      await rename(tmpPath, this.filePath);
      await chmod(this.filePath, SECURE_FILE_MODE);
      return Ok(undefined);
    } catch (error) {
      return Err(this.ioError(`Failed to write ${this.filePath}: ${describeError(error)}`, error));
    }
  }

  private deriveKey(salt: Buffer): void {
    this.derivedKey = scryptSync(this.passphrase, salt, SCRYPT_PARAMS.keyLength, {
      N: SCRYPT_PARAMS.N,
      r: SCRYPT_PARAMS.r,
      p: SCRYPT_PARAMS.p,
    });
  }

  private encrypt(value: string): Result<EncryptedEntry, TernError> {
    if (!this.derivedKey) {
      return Err(this.ioError("Encryption key not initialized"));
    }

    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv("aes-256-gcm", this.derivedKey, iv);
    const encrypted = Buffer.concat([cipher.update(value, "utf-8"), cipher.final()]);

    return Ok({
      iv: iv.toString("hex"),
      data: encrypted.toString("hex"),
      authTag: cipher.getAuthTag().toString("hex"),
      updatedAt: new Date().toISOString(),
    });
  }

  private decrypt(entry: EncryptedEntry): Result<string, TernError> {
    if (!this.derivedKey) {
      return Err(this.ioError("Encryption key not initialized"));
    }

    try {
      const decipher = createDecipheriv("aes-256-gcm", this.derivedKey, Buffer.from(entry.iv, "hex"));
      decipher.setAuthTag(Buffer.from(entry.authTag, "hex"));
      const decrypted = Buffer.concat([decipher.update(Buffer.from(entry.data, "hex")), decipher.final()]);
      return Ok(decrypted.toString("utf-8"));
    } catch (error) {
      // Wrong passphrase or tampered file
      return Err(this.ioError(`Failed to decrypt a value in ${this.filePath}`, error));
    }
  }

  private ioError(message: string, cause?: unknown): TernError {
    return new TernError(message, ErrorCode.SYSTEM_IO_ERROR, { cause, context: { path: this.filePath } });
  }
}
