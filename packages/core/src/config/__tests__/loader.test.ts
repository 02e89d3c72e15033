import * as path from "node:path";
import { describe, expect, it } from "vitest";

import { ErrorCode } from "../../errors/types.js";
import { defaultTernHome, loadRuntimeConfig } from "../loader.js";
import { resolveTernPaths } from "../paths.js";

describe("loadRuntimeConfig", () => {
  it("should apply defaults when no TERN_* variables are set", () => {
    const result = loadRuntimeConfig({ env: {}, homeDir: "/home/tester" });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      home: path.join("/home/tester", ".tern"),
      logLevel: "warn",
      jsonLogs: false,
      verifyTimeoutMs: 10_000,
      skipVerify: false,
      maxCredentialAttempts: 3,
    });
  });

  it("should read and coerce environment values", () => {
    const result = loadRuntimeConfig({
      env: {
        TERN_HOME: "/srv/tern",
        TERN_LOG_LEVEL: "debug",
        TERN_LOG_JSON: "1",
        TERN_VERIFY_TIMEOUT_MS: "2500",
        TERN_SKIP_VERIFY: "yes",
        TERN_SECRET_PASSPHRASE: "test-secret",
        TERN_MAX_KEY_ATTEMPTS: "5",
      },
      homeDir: "/home/tester",
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      home: "/srv/tern",
      logLevel: "debug",
      jsonLogs: true,
      verifyTimeoutMs: 2500,
      skipVerify: true,
      secretPassphrase: "test-secret",
      maxCredentialAttempts: 5,
    });
  });

  it("should let overrides win over the environment", () => {
    const result = loadRuntimeConfig({
      env: { TERN_LOG_LEVEL: "debug" },
      homeDir: "/home/tester",
      overrides: { logLevel: "error", jsonLogs: undefined },
    });

    expect(result.ok && result.value.logLevel).toBe("error");
  });

  it("should reject invalid values with CONFIG_INVALID", () => {
    const result = loadRuntimeConfig({
      env: { TERN_VERIFY_TIMEOUT_MS: "soon", TERN_LOG_LEVEL: "loud" },
      homeDir: "/home/tester",
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(result.error.message).toContain("verifyTimeoutMs");
    expect(result.error.message).toContain("logLevel");
  });
});

describe("resolveTernPaths", () => {
  it("should place every file under the tern home", () => {
    const home = defaultTernHome("/home/tester");
    const paths = resolveTernPaths(home);

    expect(paths.credentialFile).toBe(path.join("/home/tester", ".tern", ".env"));
    expect(paths.stateFile).toBe(path.join(home, "wizard_state.json"));
    expect(paths.configFile).toBe(path.join(home, "config.json"));
    expect(paths.markerFile).toBe(path.join(home, ".setup_complete"));
    expect(paths.secondaryStoreFile).toBe(path.join(home, "credentials.enc"));
  });
});
