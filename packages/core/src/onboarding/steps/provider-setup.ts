/**
 * Provider Setup Step
 *
 * Picks the AI backend and makes sure it is usable: hosted providers need a
 * well-formed, persisted and (optionally) verified credential; the local
 * runner needs its executable on PATH.
 *
 * @module onboarding/steps/provider-setup
 */

import type { CredentialLocator } from "../../credentials/locator.js";
import type { CredentialStore } from "../../credentials/store.js";
import type { CredentialVerifier } from "../../credentials/verifier.js";
import { inspectCredential } from "../../credentials/validation.js";
import { ErrorCode, TernError } from "../../errors/types.js";
import type { ProviderAvailability } from "../../providers/availability.js";
import { type KnownProviderKind, PROVIDERS, ProviderKindSchema } from "../../providers/catalog.js";
import { ProviderResolver } from "../../providers/resolver.js";
import type { StepContext, StepHandler, StepOutcome } from "../types.js";

export interface ProviderSetupStepOptions {
  availability: ProviderAvailability;
  locator: CredentialLocator;
  store: CredentialStore;
  /** Live check after the credential is known; omitted to skip verification */
  verifier?: CredentialVerifier;
  /** Format-checked tries before giving up on a typed credential */
  maxCredentialAttempts: number;
  /** Shown in instructions, e.g. ~/.tern/.env */
  credentialFile: string;
}

function fail(message: string, code: ErrorCode, hint?: string): StepOutcome {
  return { status: "failed", message, error: new TernError(message, code, { hint }) };
}

/**
 * Create the provider setup step
 */
export function createProviderSetupStep(options: ProviderSetupStepOptions): StepHandler {
  const noProviderHint = [
    "Set one of the following and run `tern setup` again:",
    `  - ANTHROPIC_API_KEY or OPENAI_API_KEY in ${options.credentialFile} or your environment`,
    `  - ${PROVIDERS.ollama.installHint ?? "Install Ollama"}`,
  ].join("\n");

  /**
   * Ask for a credential until a well-formed one is saved
   */
  async function promptForCredential(
    kind: KnownProviderKind,
    name: string,
    context: StepContext
  ): Promise<string | StepOutcome> {
    const provider = PROVIDERS[kind];
    const where = provider.keyUrl ? ` (get one at ${provider.keyUrl})` : "";

    for (let attempt = 1; attempt <= options.maxCredentialAttempts; attempt++) {
      const inspection = inspectCredential(await context.prompter.secret(`Enter your ${provider.displayName} API key${where}`), kind);
      if (inspection.status !== "valid") {
        context.output.warn(inspection.status === "invalid" ? inspection.reason : "No key entered");
        continue;
      }

      const saved = await options.store.upsert(name, inspection.value);
      if (!saved.ok) {
        context.output.warn(saved.error.message);
        continue;
      }

      const report = saved.value;
      if (!report.persisted) {
        context.output.warn(`${name} could not be saved; it is only available for this session`);
      } else if (report.location === "shell-profile") {
        context.output.warn(`Could not write ${options.credentialFile}; added ${name} to ${report.path ?? "your shell profile"}`);
      } else {
        context.output.success(`Saved ${name} to ${report.path ?? options.credentialFile}`);
      }
      return inspection.value;
    }

    return fail(
      `No valid ${provider.displayName} key after ${options.maxCredentialAttempts} attempts`,
      ErrorCode.CREDENTIAL_INVALID_FORMAT,
      provider.credentialPrefix ? `${provider.displayName} keys start with ${provider.credentialPrefix}` : undefined
    );
  }

  async function configureHosted(kind: KnownProviderKind, name: string, context: StepContext): Promise<StepOutcome> {
    const provider = PROVIDERS[kind];
    let value = (await options.locator.locate(name, kind))?.value;

    if (value === undefined) {
      if (!context.interactive) {
        return fail(`${name} is not set`, ErrorCode.CREDENTIAL_NOT_FOUND, `Add ${name}="..." to ${options.credentialFile}`);
      }
      const prompted = await promptForCredential(kind, name, context);
      if (typeof prompted !== "string") {
        return prompted;
      }
      value = prompted;
    }

    if (options.verifier) {
      context.output.info(`Verifying your ${provider.displayName} key...`);
      if (!(await options.verifier.verify(kind, value))) {
        return fail(
          `${provider.displayName} did not accept the key`,
          ErrorCode.CREDENTIAL_VERIFICATION_FAILED,
          `The key is still saved. Check it${provider.keyUrl ? ` at ${provider.keyUrl}` : ""} and run \`tern setup\` again.`
        );
      }
      context.output.success("Key verified");
    }

    return {
      status: "completed",
      message: `Using ${provider.displayName}`,
      data: { provider: kind, credentialConfigured: true },
    };
  }

  async function configureLocal(kind: KnownProviderKind): Promise<StepOutcome> {
    const provider = PROVIDERS[kind];
    const status = await options.availability.check(kind);
    if (!status.available) {
      return fail(`${provider.displayName} is not installed`, ErrorCode.LOCAL_RUNTIME_MISSING, provider.installHint);
    }
    return {
      status: "completed",
      message: `Using ${provider.displayName} at ${status.executablePath ?? provider.executable ?? kind}`,
      data: { provider: kind, credentialConfigured: true },
    };
  }

  return {
    id: "provider-setup",
    touchesConfig: true,
    async execute(context) {
      const previous = ProviderKindSchema.safeParse(context.state.collectedData.provider);
      const resolver = new ProviderResolver({ prompter: context.prompter, output: context.output });

      const resolution = await resolver.resolve({
        available: await options.availability.detect(),
        previous: previous.success ? previous.data : undefined,
        interactive: context.interactive,
      });

      switch (resolution.kind) {
        case "no-provider":
          return fail("No AI provider is reachable", ErrorCode.PROVIDER_UNAVAILABLE, noProviderHint);
        case "invalid-choice":
          return fail(`Invalid selection: ${resolution.input}`, ErrorCode.PROVIDER_CHOICE_INVALID);
        case "keep-current":
          return {
            status: "completed",
            message: `Keeping ${PROVIDERS[resolution.provider].displayName}`,
            next: "complete",
          };
        case "selected": {
          const { credentialName } = PROVIDERS[resolution.provider];
          context.logger.debug(`Selected ${resolution.provider}`, { via: resolution.via });
          return credentialName
            ? configureHosted(resolution.provider, credentialName, context)
            : configureLocal(resolution.provider);
        }
      }
    },
  };
}
