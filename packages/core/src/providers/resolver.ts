/**
 * Provider Resolver
 *
 * Picks the provider for this run from the reachable set.
 *
 * @module providers/resolver
 */

import type { Prompter, WizardOutput } from "../onboarding/prompter.js";
import { type KnownProviderKind, PROVIDER_ORDER, PROVIDERS, type ProviderKind } from "./catalog.js";

export interface ResolveRequest {
  readonly available: ReadonlySet<KnownProviderKind>;
  /** Provider chosen by an earlier run, if any */
  readonly previous?: ProviderKind;
  readonly interactive: boolean;
}

/**
 * How a provider was chosen
 *
 * - auto: it was the only one available
 * - first-available: non-interactive run took the first in canonical order
 * - menu: the user picked it
 */
export type SelectionVia = "auto" | "first-available" | "menu";

export type Resolution =
  | { readonly kind: "selected"; readonly provider: KnownProviderKind; readonly via: SelectionVia }
  | { readonly kind: "keep-current"; readonly provider: KnownProviderKind }
  | { readonly kind: "no-provider" }
  | { readonly kind: "invalid-choice"; readonly input: string };

type MenuEntry =
  | { readonly type: "keep"; readonly provider: KnownProviderKind }
  | { readonly type: "provider"; readonly provider: KnownProviderKind; readonly available: boolean };

export interface ProviderResolverIO {
  prompter: Prompter;
  output: WizardOutput;
}

/**
 * Provider Resolver
 *
 * Order of checks: exactly one available, none available, non-interactive,
 * then a numbered menu. "Keep current" heads the menu only when an earlier
 * run chose a provider; the default entry is the first one that is kept or
 * available.
 */
export class ProviderResolver {
  constructor(private readonly io: ProviderResolverIO) {}

  async resolve(request: ResolveRequest): Promise<Resolution> {
    const available = PROVIDER_ORDER.filter((kind) => request.available.has(kind));

    const [first] = available;
    if (first === undefined) {
      return { kind: "no-provider" };
    }
    if (available.length === 1) {
      return { kind: "selected", provider: first, via: "auto" };
    }
    if (!request.interactive) {
      return { kind: "selected", provider: first, via: "first-available" };
    }

    const entries = buildMenu(request);
    const defaultIndex = entries.findIndex((entry) => entry.type === "keep" || entry.available);

    this.io.output.info("Available providers:");
    entries.forEach((entry, index) => {
      this.io.output.info(`  ${index + 1}. ${describeEntry(entry)}`);
    });

    const input = await this.io.prompter.input(`Choose a provider [1-${entries.length}]`, String(defaultIndex + 1));
    const trimmed = input.trim();
    const entry = /^\d+$/.test(trimmed) ? entries[Number(trimmed) - 1] : undefined;

    if (!entry) {
      return { kind: "invalid-choice", input };
    }
    if (entry.type === "keep") {
      return { kind: "keep-current", provider: entry.provider };
    }
    return { kind: "selected", provider: entry.provider, via: "menu" };
  }
}

function buildMenu(request: ResolveRequest): MenuEntry[] {
  const entries: MenuEntry[] = [];
  if (request.previous !== undefined && request.previous !== "none") {
    entries.push({ type: "keep", provider: request.previous });
  }
  for (const kind of PROVIDER_ORDER) {
    entries.push({ type: "provider", provider: kind, available: request.available.has(kind) });
  }
  return entries;
}

function describeEntry(entry: MenuEntry): string {
  const name = PROVIDERS[entry.provider].displayName;
  if (entry.type === "keep") {
    return `Keep current (${name})`;
  }
  return entry.available ? `${name} (ready)` : `${name} (not configured)`;
}
