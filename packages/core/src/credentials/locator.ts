/**
 * Credential Locator
 *
 * Resolves a credential by walking an ordered chain of sources and returning
 * the first well-formed hit.
 *
 * @module credentials/locator
 */

import { createSilentLogger, type Logger } from "../logger/logger.js";
import type { ProviderKind } from "../providers/catalog.js";
import type { CredentialCache } from "./cache.js";
import type { CredentialSource } from "./sources.js";
import type { Credential, EnvironmentMap, LocateResult, SourceDiagnostic } from "./types.js";
import { inspectCredential } from "./validation.js";

export interface CredentialLocatorOptions {
  /** Lookup chain, highest priority first */
  sources: readonly CredentialSource[];
  cache: CredentialCache;
  /** Environment that hits are exported to and blank entries clear */
  env: EnvironmentMap;
  /** Mirror every hit into `env` so child processes see it (default: false) */
  exportToEnvironment?: boolean;
  logger?: Logger;
}

/**
 * Credential Locator
 *
 * Lookup rules:
 * - sources are consulted in order; the first valid value wins
 * - a malformed value is logged and skipped
 * - a blank entry in an authoritative source ends the lookup as absent and
 *   clears the cached and exported value for that name
 * - when the chain has nothing, a value recorded earlier in this run
 *   (e.g. one that could not be persisted) is returned from the cache
 *
 * @example
 * ```typescript
 * const locator = new CredentialLocator({ sources, cache, env: process.env });
 * const { credential, diagnostics } = await locator.inspect("ANTHROPIC_API_KEY", "anthropic");
 * ```
 */
export class CredentialLocator {
  private readonly sources: readonly CredentialSource[];
  private readonly cache: CredentialCache;
  private readonly env: EnvironmentMap;
  private readonly exportToEnvironment: boolean;
  private readonly logger: Logger;

  constructor(options: CredentialLocatorOptions) {
    this.sources = options.sources;
    this.cache = options.cache;
    this.env = options.env;
    this.exportToEnvironment = options.exportToEnvironment ?? false;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Find the effective credential for `name`, or undefined when absent.
   */
  async locate(name: string, kind: ProviderKind): Promise<Credential | undefined> {
    return (await this.inspect(name, kind)).credential;
  }

  /**
   * Like {@link locate}, with one diagnostic per consulted source.
   */
  async inspect(name: string, kind: ProviderKind): Promise<LocateResult> {
    const diagnostics: SourceDiagnostic[] = [];

    for (const source of this.sources) {
      const lookup = await source.lookup(name);
      const { provenance } = source;

      if (lookup.status === "absent") {
        diagnostics.push({ provenance, status: "absent", location: lookup.location });
        continue;
      }

      if (lookup.status === "blank") {
        diagnostics.push({ provenance, status: "blank", location: lookup.location });
        if (source.authoritative) {
          this.logger.debug(`${name} is blank in ${lookup.location ?? provenance}; treating as unset`);
          this.forget(name);
          return { diagnostics };
        }
        continue;
      }

      const inspection = inspectCredential(lookup.value, kind);
      if (inspection.status !== "valid") {
        const reason = inspection.status === "invalid" ? inspection.reason : "empty value";
        this.logger.warn(`Ignoring malformed ${name} from ${lookup.location ?? provenance}`, { reason });
        diagnostics.push({ provenance, status: "invalid", location: lookup.location, reason });
        continue;
      }

      diagnostics.push({ provenance, status: "valid", location: lookup.location });
      const credential: Credential = { name, value: inspection.value, providerKind: kind, provenance };
      this.remember(credential);
      return { credential, diagnostics };
    }

    const cached = this.cache.get(name);
    if (cached && inspectCredential(cached.value, kind).status === "valid") {
      return { credential: cached, diagnostics };
    }

    return { diagnostics };
  }

  private remember(credential: Credential): void {
    this.cache.set(credential);
    if (this.exportToEnvironment) {
      this.env[credential.name] = credential.value;
    }
  }

  private forget(name: string): void {
    this.cache.delete(name);
    delete this.env[name];
  }
}
