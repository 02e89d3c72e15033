// ============================================
// tern Core
// ============================================

/**
 * @module @tern/core
 *
 * Setup and credential handling for the tern command-line assistant:
 * provider detection, credential lookup and storage, and the onboarding
 * wizard that ties them together.
 */

// ============================================
// Errors
// ============================================
export * from "./errors/index.js";

// ============================================
// Logging
// ============================================
export * from "./logger/index.js";

// ============================================
// Configuration
// ============================================
export * from "./config/index.js";

// ============================================
// Shell
// ============================================
export * from "./shell/index.js";

// ============================================
// Credentials
// ============================================
export * from "./credentials/index.js";

// ============================================
// Providers
// ============================================
export * from "./providers/index.js";

// ============================================
// Hardware
// ============================================
export * from "./hardware/index.js";

// ============================================
// Onboarding
// ============================================
export * from "./onboarding/index.js";
