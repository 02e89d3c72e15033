/**
 * tern command-line program
 *
 * @module cli/program
 */

import * as os from "node:os";

import {
  createLogger,
  type CreateOnboardingOptions,
  type EnvironmentMap,
  loadRuntimeConfig,
  type Logger,
  LogLevelSchema,
  type Prompter,
  type RuntimeConfig,
  type WizardOutput,
} from "@tern/core";
import { Command, CommanderError, Option } from "commander";

import { EXIT_CODES, type ExitCode } from "./commands/exit-codes.js";
import { runSetup, runSetupReset, runSetupStatus, type SetupContext } from "./commands/setup.js";
import { TerminalOutput } from "./output/terminal-output.js";
import { InquirerPrompter } from "./prompts/inquirer-prompter.js";
import { version } from "./version.js";

/**
 * Process-level collaborators; every field defaults to the real process.
 */
export interface CliDependencies {
  env?: EnvironmentMap;
  homeDir?: string;
  cwd?: string;
  prompter?: Prompter;
  output?: WizardOutput;
  /** Whether stdin is a terminal (default: process.stdin.isTTY) */
  canPrompt?: boolean;
  createLogger?: (config: RuntimeConfig) => Logger;
  onboarding?: Partial<CreateOnboardingOptions>;
  /** Where commander writes help and usage errors */
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
}

type GlobalOptions = {
  logLevel?: string;
  jsonLogs?: boolean;
};

/**
 * Parse `argv` (including the node and script entries) and run the command.
 * Resolves to the process exit code instead of exiting.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_CODES.SUCCESS;
  const output = deps.output ?? new TerminalOutput();

  function resolveContext(command: Command): SetupContext | undefined {
    const globals: GlobalOptions = command.optsWithGlobals();
    const env = deps.env ?? process.env;
    const loaded = loadRuntimeConfig({
      env,
      homeDir: deps.homeDir,
      overrides: {
        logLevel: LogLevelSchema.optional().parse(globals.logLevel),
        jsonLogs: globals.jsonLogs,
      },
    });
    if (!loaded.ok) {
      output.error(loaded.error.message);
      exitCode = EXIT_CODES.USAGE_ERROR;
      return undefined;
    }

    const config = loaded.value;
    const logger =
      deps.createLogger?.(config) ?? createLogger({ name: "tern", level: config.logLevel, json: config.jsonLogs });
    return {
      config,
      env,
      userHome: deps.homeDir ?? os.homedir(),
      cwd: deps.cwd ?? process.cwd(),
      prompter: deps.prompter ?? new InquirerPrompter({ logger: logger.child({ component: "prompt" }) }),
      output,
      logger,
      canPrompt: deps.canPrompt ?? process.stdin.isTTY === true,
      onboarding: deps.onboarding,
    };
  }

  const program = new Command();
  program.exitOverride();
  program.configureOutput({
    writeOut: deps.writeOut ?? ((text) => process.stdout.write(text)),
    writeErr: deps.writeErr ?? ((text) => process.stderr.write(text)),
  });

  program
    .name("tern")
    .description("Turn plain-language requests into shell commands")
    .version(version)
    .addOption(new Option("--log-level <level>", "minimum log level").choices(LogLevelSchema.options))
    .option("--json-logs", "write logs as JSON lines");

  const setup = program
    .command("setup")
    .description("Connect tern to an AI provider and choose your preferences")
    .option("-f, --force", "run the wizard even if setup already completed")
    .option("--non-interactive", "never prompt; use defaults and the first available provider")
    .action(async (options: { force?: boolean; nonInteractive?: boolean }, command: Command) => {
      const context = resolveContext(command);
      if (context) {
        exitCode = (await runSetup(options, context)).exitCode;
      }
    });

  setup
    .command("status")
    .description("Show setup progress and which providers are reachable")
    .action(async (_options: unknown, command: Command) => {
      const context = resolveContext(command);
      if (context) {
        exitCode = (await runSetupStatus(context)).exitCode;
      }
    });

  setup
    .command("reset")
    .description("Forget setup progress so the wizard runs again")
    .action(async (_options: unknown, command: Command) => {
      const context = resolveContext(command);
      if (context) {
        exitCode = (await runSetupReset(context)).exitCode;
      }
    });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
    }
    throw error;
  }
  return exitCode;
}
