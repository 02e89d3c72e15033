/**
 * Credential Type Definitions
 *
 * @module credentials/types
 */

import type { Result } from "@tern/shared";
import { z } from "zod";

import type { TernError } from "../errors/types.js";
import type { ProviderKind } from "../providers/catalog.js";

// =============================================================================
// Provenance
// =============================================================================

/**
 * Where a credential was found or persisted.
 *
 * - canonical-file: `<tern home>/.env`
 * - process-env: the environment map the run was started with
 * - provider-cli: a provider's own CLI credential file
 * - project-file: `.env` at the root of the current project
 * - secondary-store: the encrypted credential file
 * - shell-profile: an export line in the user's shell rc file
 */
export const ProvenanceSchema = z.enum([
  "canonical-file",
  "process-env",
  "provider-cli",
  "project-file",
  "secondary-store",
  "shell-profile",
]);

export type Provenance = z.infer<typeof ProvenanceSchema>;

// =============================================================================
// Credential
// =============================================================================

/**
 * A resolved credential. Only ever built from a well-formed value.
 */
export interface Credential {
  /** Environment-style name, e.g. ANTHROPIC_API_KEY */
  readonly name: string;
  readonly value: string;
  readonly providerKind: ProviderKind;
  readonly provenance: Provenance;
}

/**
 * Outcome of checking a raw value against a provider's format
 */
export type CredentialInspection =
  | { readonly status: "absent" }
  | { readonly status: "invalid"; readonly reason: string }
  | { readonly status: "valid"; readonly value: string };

// =============================================================================
// Lookup
// =============================================================================

/**
 * What a single source reported for a name
 */
export type SourceLookup =
  | { readonly status: "absent"; readonly location?: string }
  | { readonly status: "blank"; readonly location?: string }
  | { readonly status: "found"; readonly value: string; readonly location?: string };

/**
 * One entry per source the locator consulted, in chain order
 */
export interface SourceDiagnostic {
  readonly provenance: Provenance;
  readonly status: "absent" | "blank" | "invalid" | "valid";
  /** File path or variable the value came from */
  readonly location?: string;
  /** Why an invalid value was rejected */
  readonly reason?: string;
}

/**
 * Full result of a locator inspection
 */
export interface LocateResult {
  readonly credential?: Credential;
  readonly diagnostics: readonly SourceDiagnostic[];
}

/**
 * Mutable environment map (process.env or an injected record)
 */
export type EnvironmentMap = Record<string, string | undefined>;

// =============================================================================
// Secondary Store
// =============================================================================

/**
 * Optional backup location that receives a copy of every persisted
 * credential and is consulted last during lookup.
 */
export interface SecondaryStore {
  /** Human-readable location, used in diagnostics */
  readonly location: string;
  /** Read a value; Ok(undefined) when the name is not stored */
  get(name: string): Promise<Result<string | undefined, TernError>>;
  set(name: string, value: string): Promise<Result<void, TernError>>;
}
