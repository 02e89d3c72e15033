import { describe, expect, it } from "vitest";

import { RecordingOutput, ScriptedPrompter } from "../../__tests__/helpers/io.js";
import type { KnownProviderKind } from "../catalog.js";
import { ProviderResolver } from "../resolver.js";

function setup(answers: string[] = []) {
  const prompter = new ScriptedPrompter(answers);
  const output = new RecordingOutput();
  return { prompter, output, resolver: new ProviderResolver({ prompter, output }) };
}

const both: ReadonlySet<KnownProviderKind> = new Set(["anthropic", "openai"]);

describe("ProviderResolver", () => {
  it("should auto-select the only available provider without prompting", async () => {
    const { prompter, resolver } = setup();

    const resolution = await resolver.resolve({ available: new Set(["openai"]), interactive: true });

    expect(resolution).toEqual({ kind: "selected", provider: "openai", via: "auto" });
    expect(prompter.asked).toEqual([]);
  });

  it("should report no provider when nothing is reachable", async () => {
    const { resolver } = setup();
    expect(await resolver.resolve({ available: new Set(), interactive: true })).toEqual({ kind: "no-provider" });
  });

  it("should take the first available in canonical order when non-interactive", async () => {
    const { resolver } = setup();

    const resolution = await resolver.resolve({ available: new Set(["ollama", "openai"]), interactive: false });

    expect(resolution).toEqual({ kind: "selected", provider: "openai", via: "first-available" });
  });

  it("should number every provider and annotate availability", async () => {
    const { output, prompter, resolver } = setup(["2"]);

    const resolution = await resolver.resolve({ available: both, interactive: true });

    expect(output.texts("info")).toEqual([
      "Available providers:",
      "  1. Anthropic (Claude) (ready)",
      "  2. OpenAI (ready)",
      "  3. Ollama (local) (not configured)",
    ]);
    expect(prompter.asked).toEqual(["Choose a provider [1-3]"]);
    expect(resolution).toEqual({ kind: "selected", provider: "openai", via: "menu" });
  });

  it("should offer keep-current first when a provider was chosen before", async () => {
    const { output, resolver } = setup(["1"]);

    const resolution = await resolver.resolve({ available: both, previous: "openai", interactive: true });

    expect(output.texts("info")[1]).toBe("  1. Keep current (OpenAI)");
    expect(resolution).toEqual({ kind: "keep-current", provider: "openai" });
  });

  it("should not offer keep-current when the previous provider is none", async () => {
    const { output, resolver } = setup(["1"]);

    const resolution = await resolver.resolve({ available: both, previous: "none", interactive: true });

    expect(output.texts("info")).toHaveLength(4);
    expect(resolution).toEqual({ kind: "selected", provider: "anthropic", via: "menu" });
  });

  it("should default to the first available entry on cancellation", async () => {
    const { resolver } = setup();

    const resolution = await resolver.resolve({ available: new Set(["openai", "ollama"]), interactive: true });

    expect(resolution).toEqual({ kind: "selected", provider: "openai", via: "menu" });
  });

  it.each(["7", "0", "two", ""])("should reject the menu entry %j", async (input) => {
    const { resolver } = setup([input]);

    expect(await resolver.resolve({ available: both, interactive: true })).toEqual({ kind: "invalid-choice", input });
  });
});
