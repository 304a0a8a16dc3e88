import { z } from "zod";
import type { ToolHandler } from "./types.js";

/**
 * A tool implementation that declares its own argument schema.
 */
export interface DefinedTool<T extends z.ZodObject = z.ZodObject> {
  readonly kind: "mcpml.tool";
  description?: string;
  parameters: T;
  handler: ToolHandler<z.infer<T>>;
}

/**
 * Declare a function tool with a zod argument schema. Arguments are validated
 * before the handler runs, and the tool's input schema is derived from `parameters`.
 *
 * @example
 * ```typescript
 * export const add = defineTool({
 *   description: "Add two numbers",
 *   parameters: z.object({ a: z.number(), b: z.number() }),
 *   handler: ({ a, b }) => a + b,
 * });
 * ```
 */
export function defineTool<T extends z.ZodObject>(config: {
  description?: string;
  parameters: T;
  handler: ToolHandler<z.infer<T>>;
}): DefinedTool<T> {
  return { kind: "mcpml.tool", ...config };
}

export function isDefinedTool(value: unknown): value is DefinedTool {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "mcpml.tool" &&
    "parameters" in value &&
    value.parameters instanceof z.ZodObject &&
    "handler" in value &&
    typeof value.handler === "function"
  );
}
