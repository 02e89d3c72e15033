/**
 * tern setup command tests, driven through the commander program
 */

import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { createSilentLogger, type EnvironmentMap, type Prompter } from "@tern/core";
import { Chalk } from "chalk";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { TerminalOutput } from "../../output/terminal-output.js";
import { type CliDependencies, runCli } from "../../program.js";
import { EXIT_CODES } from "../exit-codes.js";

class StepAborted extends Error {
  override name = "AbortError";
}

const unreachablePrompter: Prompter = {
  input: async () => {
    throw new Error("unexpected prompt");
  },
  secret: async () => {
    throw new Error("unexpected prompt");
  },
  confirm: async () => {
    throw new Error("unexpected prompt");
  },
  select: async () => {
    throw new Error("unexpected prompt");
  },
};

const exists = (path: string) =>
  stat(path).then(
    () => true,
    () => false
  );

describe("tern setup", () => {
  let root: string;
  let home: string;
  let env: EnvironmentMap;
  let stdout: string[];
  let stderr: string[];
  let commanderErr: string[];

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "tern-cli-"));
    home = join(root, ".tern");
    await mkdir(join(root, "project", ".git"), { recursive: true });
    env = {};
    stdout = [];
    stderr = [];
    commanderErr = [];
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function run(args: string[], overrides: Partial<CliDependencies> = {}) {
    return runCli(["node", "tern", ...args], {
      env,
      homeDir: root,
      cwd: join(root, "project"),
      prompter: unreachablePrompter,
      output: new TerminalOutput({
        chalk: new Chalk({ level: 0 }),
        write: (line) => stdout.push(line),
        writeError: (line) => stderr.push(line),
      }),
      canPrompt: false,
      createLogger: () => createSilentLogger(),
      onboarding: { findExecutable: async () => undefined },
      writeOut: () => undefined,
      writeErr: (text) => commanderErr.push(text),
      ...overrides,
    });
  }

  async function addAnthropicKey(): Promise<void> {
    await mkdir(home, { recursive: true });
    await writeFile(join(home, ".env"), 'ANTHROPIC_API_KEY="sk-ant-test-secret"\n');
    env.TERN_SKIP_VERIFY = "1";
  }

  it("should exit 1 without touching credentials when no provider is reachable", async () => {
    const code = await run(["setup", "--non-interactive"]);

    expect(code).toBe(EXIT_CODES.ERROR);
    expect(stderr).toEqual(["✗ AI Provider: No AI provider is reachable"]);
    expect(await exists(join(home, ".env"))).toBe(false);
    expect(await exists(join(home, "config.json"))).toBe(false);
    expect(await exists(join(home, ".setup_complete"))).toBe(false);
  });

  it("should complete with the only configured provider", async () => {
    await addAnthropicKey();

    const code = await run(["setup"]);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(stdout).toContain("✓ Setup complete. Run `tern setup --force` to change these settings later.");
    const saved: unknown = JSON.parse(await readFile(join(home, "config.json"), "utf-8"));
    expect(saved).toMatchObject({ provider: "anthropic", credentialConfigured: true });
    expect(await exists(join(home, ".setup_complete"))).toBe(true);
  });

  it("should exit 0 without running steps once setup is complete", async () => {
    await addAnthropicKey();
    await run(["setup"]);
    stdout.length = 0;

    const code = await run(["setup"]);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(stdout).toEqual(["✓ tern is already set up. Run `tern setup --force` to change your settings."]);
  });

  it("should report progress and provider availability", async () => {
    await addAnthropicKey();
    await run(["setup"]);
    stdout.length = 0;

    const code = await run(["setup", "status"]);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(stdout).toContain("Setup:     complete");
    expect(stdout).toContain("Provider:  anthropic");
    expect(stdout).toContain("  Anthropic (Claude): ready (canonical-file) sk-...ret");
    expect(stdout).toContain("  OpenAI: not configured");
    expect(stdout).toContain("  Ollama (local): not configured");
  });

  it("should point at a malformed credential in status", async () => {
    env.OPENAI_API_KEY = "sk-ant-wrong-provider";

    await run(["setup", "status"]);

    expect(stdout).toContain("Setup:     not complete");
    expect(stdout).toContain("  OpenAI: malformed value in $OPENAI_API_KEY");
  });

  it("should rerun the wizard after a reset", async () => {
    await addAnthropicKey();
    await run(["setup"]);

    expect(await run(["setup", "reset"])).toBe(EXIT_CODES.SUCCESS);

    expect(await exists(join(home, ".setup_complete"))).toBe(false);
    expect(await exists(join(home, "wizard_state.json"))).toBe(false);
    expect(await exists(join(home, ".env"))).toBe(true);
    expect(await exists(join(home, "config.json"))).toBe(true);
  });

  it("should exit 130 when a step is aborted", async () => {
    await addAnthropicKey();
    const interrupted: Prompter = {
      ...unreachablePrompter,
      confirm: async () => {
        throw new StepAborted("This operation was aborted");
      },
    };

    const code = await run(["setup"], { prompter: interrupted, canPrompt: true });

    expect(code).toBe(EXIT_CODES.INTERRUPTED);
    expect(stderr).toEqual(["⚠ Setup interrupted. Run `tern setup` to continue where you left off."]);
    expect(await exists(join(home, ".setup_complete"))).toBe(false);
  });

  it("should exit 2 on usage errors", async () => {
    expect(await run(["setup", "--bogus"])).toBe(EXIT_CODES.USAGE_ERROR);
    expect(await run(["--log-level", "loud", "setup"])).toBe(EXIT_CODES.USAGE_ERROR);
    expect(commanderErr).toHaveLength(2);
  });

  it("should exit 2 when the environment holds an invalid setting", async () => {
    env.TERN_MAX_KEY_ATTEMPTS = "zero";

    expect(await run(["setup"])).toBe(EXIT_CODES.USAGE_ERROR);
    expect(stderr).toHaveLength(1);
  });
});
