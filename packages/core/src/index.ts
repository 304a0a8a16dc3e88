// ============================================
// MCPML Core
// ============================================

/**
 * @module @mcpml/core
 *
 * Configuration loading and validation, the tool registry, agents,
 * logging and errors for MCPML.
 */

export * from "./agents/index.js";
export * from "./config/index.js";
export * from "./errors/index.js";
export * from "./logger/index.js";
export * from "./tool/index.js";
