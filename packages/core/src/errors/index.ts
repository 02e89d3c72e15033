// ============================================
// tern Errors - Barrel Export
// ============================================

export {
  describeError,
  ErrorCode,
  ErrorSeverity,
  inferSeverity,
  TernError,
  type TernErrorOptions,
} from "./types.js";
