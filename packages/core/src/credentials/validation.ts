/**
 * Credential format validation
 *
 * Pure checks of a raw value against the shape a provider issues. Nothing
 * here talks to the network; see verifier.ts for live checks.
 *
 * @module credentials/validation
 */

import { getProvider, type ProviderKind } from "../providers/catalog.js";
import type { CredentialInspection } from "./types.js";

/**
 * Classify a raw credential value for a provider.
 *
 * Blank or whitespace-only input is absent. Anthropic keys must start with
 * `sk-ant-`; OpenAI keys must start with `sk-` but not `sk-ant-`. Any other
 * non-blank value is accepted for providers without a known format.
 *
 * @example
 * ```typescript
 * inspectCredential("sk-ant-x", "openai");
 * // { status: "invalid", reason: "OpenAI keys must not start with sk-ant-" }
 * ```
 */
export function inspectCredential(raw: string | undefined | null, kind: ProviderKind): CredentialInspection {
  const value = raw?.trim() ?? "";
  if (value === "") {
    return { status: "absent" };
  }

  const provider = getProvider(kind);
  if (provider?.rejectedPrefix && value.startsWith(provider.rejectedPrefix)) {
    return {
      status: "invalid",
      reason: `${provider.displayName} keys must not start with ${provider.rejectedPrefix}`,
    };
  }
  if (provider?.credentialPrefix && !value.startsWith(provider.credentialPrefix)) {
    return {
      status: "invalid",
      reason: `${provider.displayName} keys start with ${provider.credentialPrefix}`,
    };
  }

  return { status: "valid", value };
}

/**
 * Whether a raw value is a well-formed credential for the provider
 */
export function isValidCredential(raw: string | undefined | null, kind: ProviderKind): boolean {
  return inspectCredential(raw, kind).status === "valid";
}
