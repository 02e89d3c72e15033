export { defaultTernHome, type LoadRuntimeConfigOptions, loadRuntimeConfig } from "./loader.js";
export { resolveTernPaths, type TernPaths } from "./paths.js";
export {
  EnvFlagSchema,
  LogLevelSchema,
  type RuntimeConfig,
  RuntimeConfigSchema,
} from "./schema.js";
