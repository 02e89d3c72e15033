/**
 * Wiring for a complete onboarding run
 *
 * @module onboarding/create
 */

import * as os from "node:os";

import { resolveTernPaths, type TernPaths } from "../config/paths.js";
import type { RuntimeConfig } from "../config/schema.js";
import { CredentialCache } from "../credentials/cache.js";
import { CredentialLocator } from "../credentials/locator.js";
import { createDefaultSources } from "../credentials/sources.js";
import { CredentialStore } from "../credentials/store.js";
import { EncryptedFileStore } from "../credentials/stores/encrypted-file-store.js";
import type { EnvironmentMap } from "../credentials/types.js";
import { type CredentialVerifier, HttpCredentialVerifier } from "../credentials/verifier.js";
import type { HardwareInfo } from "../hardware/detector.js";
import { createSilentLogger, type Logger } from "../logger/logger.js";
import { ProviderAvailability } from "../providers/availability.js";
import { findExecutable } from "../providers/executable.js";
import { SetupConfigStore } from "./config-store.js";
import { OnboardingStateMachine } from "./machine.js";
import { SetupMarker } from "./marker.js";
import { NULL_OUTPUT, type Prompter, type WizardOutput } from "./prompter.js";
import { WizardStateStore } from "./state-store.js";
import {
  createCompleteStep,
  createHardwareDetectionStep,
  createPreferencesStep,
  createProviderSetupStep,
  createShellIntegrationStep,
  createTestCommandStep,
  createWelcomeStep,
  type ShellIntegrator,
  type TestCommandRunner,
} from "./steps/index.js";

export interface CreateOnboardingOptions {
  config: RuntimeConfig;
  prompter: Prompter;
  output?: WizardOutput;
  logger?: Logger;
  interactive: boolean;
  /** Environment credentials are read from and exported to (default: process.env) */
  env?: EnvironmentMap;
  /** Mirror found and saved credentials into `env` (default: false) */
  exportToEnvironment?: boolean;
  /** The user's home directory (default: os.homedir()) */
  userHome?: string;
  /** Directory used to find the project `.env` (default: process.cwd()) */
  cwd?: string;
  /** Replaces the HTTP verifier; ignored when verification is disabled */
  verifier?: CredentialVerifier;
  findExecutable?: (name: string) => Promise<string | undefined>;
  detectHardware?: () => HardwareInfo;
  shellIntegrator?: ShellIntegrator;
  testRunner?: TestCommandRunner;
  pickExample?: (examples: readonly string[]) => string;
  now?: () => Date;
}

/**
 * The collaborators of one run, exposed for commands that need more than
 * the state machine (e.g. `tern setup status`).
 */
export interface Onboarding {
  readonly machine: OnboardingStateMachine;
  readonly paths: TernPaths;
  readonly cache: CredentialCache;
  readonly locator: CredentialLocator;
  readonly store: CredentialStore;
  readonly availability: ProviderAvailability;
}

/**
 * Build the credential stack, the steps and the state machine for one run.
 */
export function createOnboarding(options: CreateOnboardingOptions): Onboarding {
  const { config } = options;
  const logger = options.logger ?? createSilentLogger();
  const env = options.env ?? process.env;
  const userHome = options.userHome ?? os.homedir();
  const paths = resolveTernPaths(config.home);
  const exportToEnvironment = options.exportToEnvironment ?? false;

  const secondary = config.secretPassphrase
    ? new EncryptedFileStore({ filePath: paths.secondaryStoreFile, passphrase: config.secretPassphrase })
    : undefined;

  const cache = new CredentialCache();
  const locator = new CredentialLocator({
    sources: createDefaultSources({
      credentialFile: paths.credentialFile,
      env,
      userHome,
      cwd: options.cwd ?? process.cwd(),
      secondary,
      logger: logger.child({ component: "locator" }),
    }),
    cache,
    env,
    exportToEnvironment,
    logger: logger.child({ component: "locator" }),
  });
  const store = new CredentialStore({
    credentialFile: paths.credentialFile,
    cache,
    env,
    exportToEnvironment,
    secondary,
    profile: { env, home: userHome },
    logger: logger.child({ component: "store" }),
  });
  const availability = new ProviderAvailability({
    locator,
    findExecutable: options.findExecutable ?? ((name) => findExecutable(name, { env })),
  });

  const verifier = config.skipVerify
    ? undefined
    : (options.verifier ?? new HttpCredentialVerifier({ timeoutMs: config.verifyTimeoutMs, logger }));

  const configStore = new SetupConfigStore(paths.configFile);
  const marker = new SetupMarker(paths.markerFile);

  const machine = new OnboardingStateMachine({
    steps: [
      createWelcomeStep(),
      createProviderSetupStep({
        availability,
        locator,
        store,
        verifier,
        maxCredentialAttempts: config.maxCredentialAttempts,
        credentialFile: paths.credentialFile,
      }),
      createHardwareDetectionStep({ detect: options.detectHardware }),
      createPreferencesStep(),
      createShellIntegrationStep({ integrator: options.shellIntegrator, env }),
      createTestCommandStep({ runner: options.testRunner, pickExample: options.pickExample }),
      createCompleteStep({ configStore, marker }),
    ],
    stateStore: new WizardStateStore(paths.stateFile),
    configStore,
    marker,
    prompter: options.prompter,
    output: options.output ?? NULL_OUTPUT,
    logger,
    interactive: options.interactive,
    now: options.now,
  });

  return { machine, paths, cache, locator, store, availability };
}
