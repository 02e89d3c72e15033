/**
 * Live credential verification
 *
 * @module credentials/verifier
 */

import { type Dispatcher, fetch as undiciFetch } from "undici";

import { describeError } from "../errors/types.js";
import { createSilentLogger, type Logger } from "../logger/logger.js";
import type { ProviderKind } from "../providers/catalog.js";

/**
 * Checks a credential against the provider it belongs to.
 */
export interface CredentialVerifier {
  verify(kind: ProviderKind, credential: string): Promise<boolean>;
}

interface VerifyTarget {
  readonly url: string;
  readonly headers: (credential: string) => Record<string, string>;
}

/** Cheapest authenticated endpoint per provider */
const VERIFY_TARGETS: Partial<Record<ProviderKind, VerifyTarget>> = {
  anthropic: {
    url: "https://api.anthropic.com/v1/models",
    headers: (credential) => ({ "x-api-key": credential, "anthropic-version": "2023-06-01" }),
  },
  openai: {
    url: "https://api.openai.com/v1/models",
    headers: (credential) => ({ authorization: `Bearer ${credential}` }),
  },
};

export const DEFAULT_VERIFY_TIMEOUT_MS = 10_000;

export interface HttpCredentialVerifierOptions {
  /** Abort the request after this many milliseconds (default: 10000) */
  timeoutMs?: number;
  /** undici dispatcher, e.g. a pooled Agent or a MockAgent in tests */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * Verifies hosted-provider keys by listing models. Only HTTP 200 counts as
 * valid; timeouts, network errors and other statuses are logged and count
 * as invalid. Providers without a credential always verify.
 */
export class HttpCredentialVerifier implements CredentialVerifier {
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly logger: Logger;

  constructor(options: HttpCredentialVerifierOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_VERIFY_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
    this.logger = options.logger ?? createSilentLogger();
  }

  async verify(kind: ProviderKind, credential: string): Promise<boolean> {
    const target = VERIFY_TARGETS[kind];
    if (!target) {
      return true;
    }

    try {
      const response = await undiciFetch(target.url, {
        method: "GET",
        headers: target.headers(credential),
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      await response.arrayBuffer();

      if (response.status !== 200) {
        this.logger.warn(`${kind} rejected the credential`, { status: response.status });
        return false;
      }
      return true;
    } catch (error) {
      this.logger.warn(`Could not verify the ${kind} credential`, { error: describeError(error) });
      return false;
    }
  }
}
