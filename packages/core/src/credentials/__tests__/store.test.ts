/**
 * Unit tests for CredentialStore
 */

import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { Err, Ok, type Result } from "@tern/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ErrorCode, TernError } from "../../errors/types.js";
import type { AppendExportOptions } from "../../shell/profile.js";
import { CredentialCache } from "../cache.js";
import { CredentialStore, type CredentialStoreOptions } from "../store.js";
import type { EnvironmentMap, SecondaryStore } from "../types.js";

// =============================================================================
// Test Helpers
// =============================================================================

class MemorySecondaryStore implements SecondaryStore {
  readonly location = "memory";
  readonly values = new Map<string, string>();

  constructor(private readonly failWrites = false) {}

  async get(name: string): Promise<Result<string | undefined, TernError>> {
    return Ok(this.values.get(name));
  }

  async set(name: string, value: string): Promise<Result<void, TernError>> {
    if (this.failWrites) {
      return Err(new TernError("disk full", ErrorCode.SYSTEM_IO_ERROR));
    }
    this.values.set(name, value);
    return Ok(undefined);
  }
}

describe("CredentialStore", () => {
  let root: string;
  let credentialFile: string;
  let cache: CredentialCache;
  let env: EnvironmentMap;
  let bashProfile: AppendExportOptions;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "tern-store-"));
    credentialFile = join(root, "home", ".env");
    cache = new CredentialCache();
    env = {};
    bashProfile = { env: { SHELL: "/bin/bash" }, home: join(root, "user"), platform: "linux" };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function createStore(overrides: Partial<CredentialStoreOptions> = {}): CredentialStore {
    return new CredentialStore({ credentialFile, cache, env, profile: bashProfile, ...overrides });
  }

  it("should leave exactly one line after two upserts of the same name", async () => {
    const store = createStore();

    await store.upsert("OPENAI_API_KEY", "sk-first");
    await store.upsert("OPENAI_API_KEY", "sk-second");

    expect(await readFile(credentialFile, "utf-8")).toBe('OPENAI_API_KEY="sk-second"\n');
  });

  it("should keep unrelated lines and their order", async () => {
    const store = createStore();
    await store.upsert("FOO", "bar");
    await store.upsert("ANTHROPIC_API_KEY", "sk-ant-old");
    await store.upsert("BAZ", "qux");

    await store.upsert("ANTHROPIC_API_KEY", "sk-ant-new");

    expect(await readFile(credentialFile, "utf-8")).toBe('FOO="bar"\nANTHROPIC_API_KEY="sk-ant-new"\nBAZ="qux"\n');
  });

  it("should write the canonical file owner-only", async () => {
    const result = await createStore().upsert("OPENAI_API_KEY", "sk-test");

    expect(result).toEqual({
      ok: true,
      value: { persisted: true, location: "canonical-file", path: credentialFile, secondary: "disabled" },
    });
    expect((await stat(credentialFile)).mode & 0o777).toBe(0o600);
  });

  it("should record the value in the cache and optionally the environment", async () => {
    await createStore({ exportToEnvironment: true }).upsert("ANTHROPIC_API_KEY", "sk-ant-test-secret");

    expect(cache.get("ANTHROPIC_API_KEY")).toEqual({
      name: "ANTHROPIC_API_KEY",
      value: "sk-ant-test-secret",
      providerKind: "anthropic",
      provenance: "canonical-file",
    });
    expect(env.ANTHROPIC_API_KEY).toBe("sk-ant-test-secret");
  });

  it("should not touch the environment by default", async () => {
    await createStore().upsert("ANTHROPIC_API_KEY", "sk-ant-test-secret");
    expect(env.ANTHROPIC_API_KEY).toBeUndefined();
  });

  it.each(["", "   ", 'sk-"quoted"', "sk-'quoted'", "sk-line\nbreak"])("should reject %j", async (value) => {
    const result = await createStore().upsert("OPENAI_API_KEY", value);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.CREDENTIAL_INVALID_FORMAT);
    }
    expect(cache.size).toBe(0);
  });

  describe("fallbacks", () => {
    beforeEach(async () => {
      // A regular file where the home directory should be makes every write fail
      await writeFile(join(root, "blocker"), "");
      credentialFile = join(root, "blocker", ".env");
    });

    it("should append an export line to the shell profile", async () => {
      const result = await createStore().upsert("OPENAI_API_KEY", "sk-test");

      const rcFile = join(root, "user", ".bashrc");
      expect(result.ok && result.value.location).toBe("shell-profile");
      expect(result.ok && result.value.path).toBe(rcFile);
      expect(result.ok && result.value.persisted).toBe(true);
      expect(await readFile(rcFile, "utf-8")).toBe('\n# Added by tern setup\nexport OPENAI_API_KEY="sk-test"\n');
      expect(cache.get("OPENAI_API_KEY")?.provenance).toBe("shell-profile");
    });

    it("should keep the value for this run only when the profile also fails", async () => {
      const store = createStore({
        profile: { env: { ComSpec: "C:\\Windows\\system32\\cmd.exe" }, home: root, platform: "win32" },
      });

      const result = await store.upsert("OPENAI_API_KEY", "sk-test");

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.persisted).toBe(false);
        expect(result.value.location).toBe("process-env");
        expect(result.value.error?.code).toBe(ErrorCode.CREDENTIAL_PERSIST_FAILED);
      }
      expect(cache.get("OPENAI_API_KEY")?.value).toBe("sk-test");
    });
  });

  describe("secondary store", () => {
    it("should copy the value to the secondary store", async () => {
      const secondary = new MemorySecondaryStore();
      const result = await createStore({ secondary }).upsert("OPENAI_API_KEY", "sk-test");

      expect(result.ok && result.value.secondary).toBe("stored");
      expect(secondary.values.get("OPENAI_API_KEY")).toBe("sk-test");
    });

    it("should not let a secondary failure change the primary outcome", async () => {
      const result = await createStore({ secondary: new MemorySecondaryStore(true) }).upsert(
        "OPENAI_API_KEY",
        "sk-test"
      );

      expect(result.ok && result.value.secondary).toBe("failed");
      expect(result.ok && result.value.persisted).toBe(true);
      expect(await readFile(credentialFile, "utf-8")).toBe('OPENAI_API_KEY="sk-test"\n');
    });
  });
});
