import type { ToolType } from "../config/index.js";
import type { Logger } from "../logger/index.js";

/**
 * Arguments passed to a tool, keyed by parameter name.
 */
export type ToolArgs = Record<string, unknown>;

/**
 * A JSON Schema document. Kept loose: schemas come from configuration,
 * from zod, or straight from user modules.
 */
export type JsonSchema = Record<string, unknown>;

/**
 * The object schema every tool exposes as its input.
 */
export interface JsonObjectSchema extends JsonSchema {
  type: "object";
  properties: Record<string, JsonSchema>;
  required?: string[];
}

/**
 * Per-call information handed to tool handlers.
 */
export interface ToolContext {
  toolName: string;
  logger: Logger;
  signal?: AbortSignal;
}

export type ToolHandler<TArgs = ToolArgs> = (args: TArgs, context: ToolContext) => unknown;

/**
 * How a tool is presented to MCP clients, the REST surface and agents.
 */
export interface ToolDescription {
  name: string;
  description: string;
  type: ToolType;
  inputSchema: JsonObjectSchema;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}
