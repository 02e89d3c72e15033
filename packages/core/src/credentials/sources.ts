/**
 * Credential Sources
 *
 * Each source answers "what does this location say about NAME?". The
 * locator walks them in the order returned by {@link createDefaultSources}.
 *
 * @module credentials/sources
 */

import { readFile, stat } from "node:fs/promises";
import { dirname, join } from "node:path";

import { z } from "zod";

import { describeError } from "../errors/types.js";
import type { Logger } from "../logger/logger.js";
import { isErrnoException, readEnvDocument } from "./env-document.js";
import type { EnvironmentMap, Provenance, SecondaryStore, SourceLookup } from "./types.js";

// =============================================================================
// Source Interface
// =============================================================================

export interface CredentialSource {
  readonly provenance: Provenance;
  /**
   * A blank entry in an authoritative source ends the lookup with "absent"
   * instead of falling through to later sources.
   */
  readonly authoritative: boolean;
  lookup(name: string): Promise<SourceLookup>;
}

function classify(value: string | undefined, location: string): SourceLookup {
  if (value === undefined) {
    return { status: "absent", location };
  }
  if (value.trim() === "") {
    return { status: "blank", location };
  }
  return { status: "found", value, location };
}

async function lookupInEnvFile(path: string, name: string, logger?: Logger): Promise<SourceLookup> {
  try {
    const entries = await readEnvDocument(path);
    return classify(entries?.[name], path);
  } catch (error) {
    logger?.warn(`Could not read ${path}`, { error: describeError(error) });
    return { status: "absent", location: path };
  }
}

// =============================================================================
// Canonical File
// =============================================================================

/**
 * `<tern home>/.env`, the file tern itself writes.
 */
export class CanonicalFileSource implements CredentialSource {
  readonly provenance = "canonical-file" as const;
  readonly authoritative = true;

  constructor(
    private readonly path: string,
    private readonly logger?: Logger
  ) {}

  lookup(name: string): Promise<SourceLookup> {
    return lookupInEnvFile(this.path, name, this.logger);
  }
}

// =============================================================================
// Environment
// =============================================================================

export class EnvironmentSource implements CredentialSource {
  readonly provenance = "process-env" as const;
  readonly authoritative = false;

  constructor(private readonly env: EnvironmentMap) {}

  async lookup(name: string): Promise<SourceLookup> {
    return classify(this.env[name], `$${name}`);
  }
}

// =============================================================================
// Provider CLI Files
// =============================================================================

const CliAuthFileSchema = z.record(z.unknown());

/**
 * Credential files written by the providers' own command-line tools.
 * Keys are credential names; values are JSON files holding a field of the
 * same name.
 */
export function defaultProviderCliFiles(userHome: string): Record<string, readonly string[]> {
  return {
    OPENAI_API_KEY: [join(userHome, ".codex", "auth.json")],
  };
}

export class ProviderCliSource implements CredentialSource {
  readonly provenance = "provider-cli" as const;
  readonly authoritative = false;

  constructor(
    private readonly files: Record<string, readonly string[]>,
    private readonly logger?: Logger
  ) {}

  async lookup(name: string): Promise<SourceLookup> {
    for (const path of this.files[name] ?? []) {
      const value = await this.readField(path, name);
      if (value !== undefined) {
        return classify(value, path);
      }
    }
    return { status: "absent" };
  }

  private async readField(path: string, name: string): Promise<string | undefined> {
    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (error) {
      if (!(isErrnoException(error) && error.code === "ENOENT")) {
        this.logger?.warn(`Could not read ${path}`, { error: describeError(error) });
      }
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      this.logger?.warn(`Ignoring unparseable ${path}`, { error: describeError(error) });
      return undefined;
    }

    const parsed = CliAuthFileSchema.safeParse(json);
    const field = parsed.success ? parsed.data[name] : undefined;
    return typeof field === "string" ? field : undefined;
  }
}

// =============================================================================
// Project File
// =============================================================================

/** Files whose presence marks a directory as a project root */
export const PROJECT_MARKERS = [".git", "package.json", "pyproject.toml", "Cargo.toml", "go.mod"] as const;

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the nearest ancestor of `start` (inclusive) that carries a project marker.
 */
export async function findProjectRoot(start: string): Promise<string | undefined> {
  let dir = start;
  for (;;) {
    for (const marker of PROJECT_MARKERS) {
      if (await exists(join(dir, marker))) {
        return dir;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

/**
 * `.env` at the root of the project containing the working directory
 */
export class ProjectFileSource implements CredentialSource {
  readonly provenance = "project-file" as const;
  readonly authoritative = false;

  constructor(
    private readonly cwd: string,
    private readonly logger?: Logger
  ) {}

  async lookup(name: string): Promise<SourceLookup> {
    const root = await findProjectRoot(this.cwd);
    if (!root) {
      return { status: "absent" };
    }
    return lookupInEnvFile(join(root, ".env"), name, this.logger);
  }
}

// =============================================================================
// Secondary Store
// =============================================================================

export class SecondaryStoreSource implements CredentialSource {
  readonly provenance = "secondary-store" as const;
  readonly authoritative = false;

  constructor(
    private readonly store: SecondaryStore,
    private readonly logger?: Logger
  ) {}

  async lookup(name: string): Promise<SourceLookup> {
    const result = await this.store.get(name);
    if (!result.ok) {
      this.logger?.warn(`Could not read ${this.store.location}`, { error: result.error.message });
      return { status: "absent", location: this.store.location };
    }
    return classify(result.value, this.store.location);
  }
}

// =============================================================================
// Default Chain
// =============================================================================

export interface DefaultSourcesOptions {
  /** `<tern home>/.env` */
  credentialFile: string;
  env: EnvironmentMap;
  /** The user's home directory, for provider CLI files */
  userHome: string;
  /** Working directory used to find the project root */
  cwd: string;
  secondary?: SecondaryStore;
  logger?: Logger;
}

/**
 * The lookup chain, highest priority first.
 */
export function createDefaultSources(options: DefaultSourcesOptions): CredentialSource[] {
  const sources: CredentialSource[] = [
    new CanonicalFileSource(options.credentialFile, options.logger),
    new EnvironmentSource(options.env),
    new ProviderCliSource(defaultProviderCliFiles(options.userHome), options.logger),
    new ProjectFileSource(options.cwd, options.logger),
  ];
  if (options.secondary) {
    sources.push(new SecondaryStoreSource(options.secondary, options.logger));
  }
  return sources;
}
