// ============================================
// Tool Module Barrel Export
// ============================================

export { type DefinedTool, defineTool, isDefinedTool } from "./define.js";
export {
  type ImplementationReference,
  importReference,
  MODULE_EXTENSIONS,
  moduleCandidates,
  parseReference,
  type ResolvedImplementation,
  resolveImplementation,
} from "./implementation.js";
export { type OutputSchema, resolveOutputSchema, toOutputSchema } from "./output-schema.js";
export {
  AGENT_INPUT_SCHEMA,
  applyDefaults,
  buildInputSchema,
  coerceArgument,
  validateRequired,
} from "./parameters.js";
export { ToolRegistry, type ToolRegistryOptions } from "./registry.js";
export type {
  ExecuteOptions,
  JsonObjectSchema,
  JsonSchema,
  ToolArgs,
  ToolContext,
  ToolDescription,
  ToolHandler,
} from "./types.js";
