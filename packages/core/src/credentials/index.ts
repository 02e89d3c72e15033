/**
 * Credential lookup, persistence and verification
 *
 * @module credentials
 */

export { CredentialCache } from "./cache.js";
export {
  formatEnvLine,
  isValidEnvName,
  parseEnvDocument,
  readEnvDocument,
  upsertEnvDocument,
} from "./env-document.js";
export { CredentialLocator, type CredentialLocatorOptions } from "./locator.js";
export {
  CanonicalFileSource,
  type CredentialSource,
  createDefaultSources,
  type DefaultSourcesOptions,
  defaultProviderCliFiles,
  EnvironmentSource,
  findProjectRoot,
  PROJECT_MARKERS,
  ProjectFileSource,
  ProviderCliSource,
  SecondaryStoreSource,
} from "./sources.js";
export { CredentialStore, type CredentialStoreOptions, type UpsertReport } from "./store.js";
export { EncryptedFileStore, type EncryptedFileStoreOptions } from "./stores/index.js";
export type {
  Credential,
  CredentialInspection,
  EnvironmentMap,
  LocateResult,
  Provenance,
  SecondaryStore,
  SourceDiagnostic,
  SourceLookup,
} from "./types.js";
export { ProvenanceSchema } from "./types.js";
export { inspectCredential, isValidCredential } from "./validation.js";
export {
  type CredentialVerifier,
  DEFAULT_VERIFY_TIMEOUT_MS,
  HttpCredentialVerifier,
  type HttpCredentialVerifierOptions,
} from "./verifier.js";
