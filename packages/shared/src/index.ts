// ============================================
// tern Shared Utilities
// ============================================

export type { Result } from "./types/result.js";
// Result type (shared between core and cli)
export { Err, isErr, isOk, Ok, tryCatchAsync, unwrapOr } from "./types/result.js";
export { maskSecret } from "./utils/mask.js";
