/**
 * Provider Catalog
 *
 * Static facts about every AI backend tern can configure: which credential
 * it needs, what that credential looks like, and how to install the local
 * runner.
 *
 * @module providers/catalog
 */

import { z } from "zod";

// =============================================================================
// Provider Kinds
// =============================================================================

/**
 * Schema for the provider discriminator.
 *
 * - anthropic: hosted Claude API
 * - openai: hosted OpenAI API
 * - ollama: local model runner
 * - none: nothing configured yet (never offered in a menu)
 */
export const ProviderKindSchema = z.enum(["anthropic", "openai", "ollama", "none"]);

export type ProviderKind = z.infer<typeof ProviderKindSchema>;

/** Every kind except the `none` sentinel */
export type KnownProviderKind = Exclude<ProviderKind, "none">;

/**
 * Canonical order for menus and non-interactive selection
 */
export const PROVIDER_ORDER: readonly KnownProviderKind[] = ["anthropic", "openai", "ollama"];

// =============================================================================
// Descriptors
// =============================================================================

/**
 * Static description of a provider
 */
export interface ProviderDescriptor {
  readonly kind: KnownProviderKind;
  /** Label shown in menus */
  readonly displayName: string;
  /** Environment-style name of the credential; absent for the local runner */
  readonly credentialName?: string;
  /** Required prefix of a well-formed credential */
  readonly credentialPrefix?: string;
  /** Prefix a well-formed credential must NOT start with */
  readonly rejectedPrefix?: string;
  /** Where users obtain a key */
  readonly keyUrl?: string;
  /** Executable that must be on PATH */
  readonly executable?: string;
  /** Shown when the executable is missing */
  readonly installHint?: string;
}

export const PROVIDERS: Readonly<Record<KnownProviderKind, ProviderDescriptor>> = {
  anthropic: {
    kind: "anthropic",
    displayName: "Anthropic (Claude)",
    credentialName: "ANTHROPIC_API_KEY",
    credentialPrefix: "sk-ant-",
    keyUrl: "https://console.anthropic.com/settings/keys",
  },
  openai: {
    kind: "openai",
    displayName: "OpenAI",
    credentialName: "OPENAI_API_KEY",
    credentialPrefix: "sk-",
    // Anthropic keys also start with sk-
    rejectedPrefix: "sk-ant-",
    keyUrl: "https://platform.openai.com/api-keys",
  },
  ollama: {
    kind: "ollama",
    displayName: "Ollama (local)",
    executable: "ollama",
    installHint:
      "Install Ollama from https://ollama.com/download (Linux: curl -fsSL https://ollama.com/install.sh | sh), then run `ollama pull llama3.2`.",
  },
};

/**
 * Check whether a value names a known, menu-eligible provider
 */
export function isKnownProviderKind(value: string): value is KnownProviderKind {
  return value === "anthropic" || value === "openai" || value === "ollama";
}

/**
 * Look up a provider descriptor; undefined for `none`
 */
export function getProvider(kind: ProviderKind): ProviderDescriptor | undefined {
  return kind === "none" ? undefined : PROVIDERS[kind];
}

/**
 * The credential name a provider needs, or undefined when it needs none
 */
export function credentialNameFor(kind: ProviderKind): string | undefined {
  return getProvider(kind)?.credentialName;
}

/**
 * Whether the provider is usable only with a credential
 */
export function requiresCredential(kind: ProviderKind): boolean {
  return credentialNameFor(kind) !== undefined;
}

/**
 * Reverse lookup: which provider a credential name belongs to (`none` when unknown)
 */
export function providerKindForCredential(name: string): ProviderKind {
  return PROVIDER_ORDER.find((kind) => PROVIDERS[kind].credentialName === name) ?? "none";
}
