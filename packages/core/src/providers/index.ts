export { type ProviderAvailabilityOptions, ProviderAvailability, type ProviderStatus } from "./availability.js";
export {
  credentialNameFor,
  getProvider,
  isKnownProviderKind,
  type KnownProviderKind,
  PROVIDER_ORDER,
  PROVIDERS,
  type ProviderDescriptor,
  type ProviderKind,
  ProviderKindSchema,
  providerKindForCredential,
  requiresCredential,
} from "./catalog.js";
export { type FindExecutableOptions, findExecutable } from "./executable.js";
export {
  type ProviderResolverIO,
  type Resolution,
  type ResolveRequest,
  ProviderResolver,
  type SelectionVia,
} from "./resolver.js";
