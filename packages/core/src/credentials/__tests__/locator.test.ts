/**
 * Unit tests for CredentialLocator and the default source chain
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { Err, Ok } from "@tern/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ErrorCode, TernError } from "../../errors/types.js";
import { CredentialCache } from "../cache.js";
import { CredentialLocator } from "../locator.js";
import {
  CanonicalFileSource,
  EnvironmentSource,
  ProjectFileSource,
  ProviderCliSource,
  SecondaryStoreSource,
} from "../sources.js";
import type { EnvironmentMap, SecondaryStore } from "../types.js";

describe("CredentialLocator", () => {
  let root: string;
  let credentialFile: string;
  let cache: CredentialCache;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "tern-locator-"));
    credentialFile = join(root, "home", ".env");
    await mkdir(join(root, "home"));
    cache = new CredentialCache();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function createLocator(env: EnvironmentMap, exportToEnvironment = false): CredentialLocator {
    return new CredentialLocator({
      sources: [new CanonicalFileSource(credentialFile), new EnvironmentSource(env)],
      cache,
      env,
      exportToEnvironment,
    });
  }

  it("should prefer the canonical file over the environment", async () => {
    await writeFile(credentialFile, 'ANTHROPIC_API_KEY="sk-ant-from-file"\n');
    const env: EnvironmentMap = { ANTHROPIC_API_KEY: "sk-ant-from-env" };

    const credential = await createLocator(env).locate("ANTHROPIC_API_KEY", "anthropic");

    expect(credential).toEqual({
      name: "ANTHROPIC_API_KEY",
      value: "sk-ant-from-file",
      providerKind: "anthropic",
      provenance: "canonical-file",
    });
    expect(cache.get("ANTHROPIC_API_KEY")?.value).toBe("sk-ant-from-file");
    expect(env.ANTHROPIC_API_KEY).toBe("sk-ant-from-env");
  });

  it("should treat a blank canonical entry as absent and clear the environment", async () => {
    await writeFile(credentialFile, "OPENAI_API_KEY=\n");
    const env: EnvironmentMap = { OPENAI_API_KEY: "sk-from-env" };
    cache.set({ name: "OPENAI_API_KEY", value: "sk-cached", providerKind: "openai", provenance: "process-env" });

    const result = await createLocator(env).inspect("OPENAI_API_KEY", "openai");

    expect(result.credential).toBeUndefined();
    expect(result.diagnostics).toEqual([{ provenance: "canonical-file", status: "blank", location: credentialFile }]);
    expect("OPENAI_API_KEY" in env).toBe(false);
    expect(cache.has("OPENAI_API_KEY")).toBe(false);
  });

  it("should skip a malformed value and continue down the chain", async () => {
    await writeFile(credentialFile, "OPENAI_API_KEY=sk-ant-wrong-provider\n");
    const env: EnvironmentMap = { OPENAI_API_KEY: "sk-from-env" };

    const result = await createLocator(env).inspect("OPENAI_API_KEY", "openai");

    expect(result.credential?.provenance).toBe("process-env");
    expect(result.credential?.value).toBe("sk-from-env");
    expect(result.diagnostics).toEqual([
      {
        provenance: "canonical-file",
        status: "invalid",
        location: credentialFile,
        reason: "OpenAI keys must not start with sk-ant-",
      },
      { provenance: "process-env", status: "valid", location: "$OPENAI_API_KEY" },
    ]);
  });

  it("should report absent when no source has the name", async () => {
    const result = await createLocator({}).inspect("ANTHROPIC_API_KEY", "anthropic");

    expect(result.credential).toBeUndefined();
    expect(result.diagnostics.map((d) => d.status)).toEqual(["absent", "absent"]);
  });

  it("should export hits to the environment when asked", async () => {
    await writeFile(credentialFile, 'ANTHROPIC_API_KEY="sk-ant-test-secret"\n');
    const env: EnvironmentMap = {};

    await createLocator(env, true).locate("ANTHROPIC_API_KEY", "anthropic");

    expect(env.ANTHROPIC_API_KEY).toBe("sk-ant-test-secret");
  });

  it("should fall back to a value cached earlier in the run", async () => {
    cache.set({ name: "OPENAI_API_KEY", value: "sk-run-only", providerKind: "openai", provenance: "process-env" });

    const credential = await createLocator({}).locate("OPENAI_API_KEY", "openai");

    expect(credential?.value).toBe("sk-run-only");
  });

  describe("sources", () => {
    it("should read the OpenAI key from the provider CLI auth file", async () => {
      const authFile = join(root, ".codex", "auth.json");
      await mkdir(join(root, ".codex"));
      await writeFile(authFile, JSON.stringify({ OPENAI_API_KEY: "sk-from-cli", tokens: null }));

      const source = new ProviderCliSource({ OPENAI_API_KEY: [authFile] });

      expect(await source.lookup("OPENAI_API_KEY")).toEqual({
        status: "found",
        value: "sk-from-cli",
        location: authFile,
      });
      expect(await source.lookup("ANTHROPIC_API_KEY")).toEqual({ status: "absent" });
    });

    it("should read .env at the nearest project root", async () => {
      const project = join(root, "project");
      const nested = join(project, "src", "deep");
      await mkdir(nested, { recursive: true });
      await writeFile(join(project, "package.json"), "{}");
      await writeFile(join(project, ".env"), "ANTHROPIC_API_KEY=sk-ant-project\n");

      const lookup = await new ProjectFileSource(nested).lookup("ANTHROPIC_API_KEY");

      expect(lookup).toEqual({
        status: "found",
        value: "sk-ant-project",
        location: join(project, ".env"),
      });
    });

    it("should treat an unreadable secondary store as absent", async () => {
      const failing: SecondaryStore = {
        location: "memory",
        get: async () => Err(new TernError("locked", ErrorCode.SYSTEM_IO_ERROR)),
        set: async () => Ok(undefined),
      };
      const lookup = await new SecondaryStoreSource(failing).lookup("OPENAI_API_KEY");
      expect(lookup).toEqual({ status: "absent", location: "memory" });
    });
  });
});
