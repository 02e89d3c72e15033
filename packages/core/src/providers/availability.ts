/**
 * Provider Availability
 *
 * Answers "which backends can this user reach right now?".
 *
 * @module providers/availability
 */

import type { CredentialLocator } from "../credentials/locator.js";
import type { Provenance, SourceDiagnostic } from "../credentials/types.js";
import { type KnownProviderKind, PROVIDER_ORDER, PROVIDERS } from "./catalog.js";
import { findExecutable } from "./executable.js";

/**
 * Per-provider detail behind {@link ProviderAvailability.detect}
 */
export interface ProviderStatus {
  readonly kind: KnownProviderKind;
  readonly available: boolean;
  /** Where the credential came from, for credential-based providers */
  readonly provenance?: Provenance;
  /** Resolved path of the runner, for local providers */
  readonly executablePath?: string;
  readonly diagnostics: readonly SourceDiagnostic[];
}

export interface ProviderAvailabilityOptions {
  locator: CredentialLocator;
  /** PATH lookup (default: {@link findExecutable} over process.env) */
  findExecutable?: (name: string) => Promise<string | undefined>;
}

/**
 * Detects reachable providers. Nothing is memoized: every call looks again,
 * so a key saved a moment ago is picked up.
 */
export class ProviderAvailability {
  private readonly locator: CredentialLocator;
  private readonly which: (name: string) => Promise<string | undefined>;

  constructor(options: ProviderAvailabilityOptions) {
    this.locator = options.locator;
    this.which = options.findExecutable ?? ((name) => findExecutable(name));
  }

  /**
   * The set of reachable providers, iterating in canonical order
   */
  async detect(): Promise<ReadonlySet<KnownProviderKind>> {
    const statuses = await this.report();
    return new Set(statuses.filter((status) => status.available).map((status) => status.kind));
  }

  async report(): Promise<ProviderStatus[]> {
    const statuses: ProviderStatus[] = [];
    for (const kind of PROVIDER_ORDER) {
      statuses.push(await this.check(kind));
    }
    return statuses;
  }

  async check(kind: KnownProviderKind): Promise<ProviderStatus> {
    const provider = PROVIDERS[kind];

    if (provider.credentialName) {
      const { credential, diagnostics } = await this.locator.inspect(provider.credentialName, kind);
      return { kind, available: credential !== undefined, provenance: credential?.provenance, diagnostics };
    }

    if (provider.executable) {
      const executablePath = await this.which(provider.executable);
      return { kind, available: executablePath !== undefined, executablePath, diagnostics: [] };
    }

    return { kind, available: false, diagnostics: [] };
  }
}
