import { Err, Ok, type Result } from "@mcpml/shared";
import type { ToolParameter } from "../config/index.js";
import { errorMessage } from "../errors/index.js";
import type { JsonObjectSchema, JsonSchema, ToolArgs } from "./types.js";

// ============================================
// Input Schemas
// ============================================

/**
 * Input schema of every agent tool: a single required `input` string.
 */
export const AGENT_INPUT_SCHEMA: JsonObjectSchema = {
  type: "object",
  properties: {
    input: { type: "string", description: "Input for the agent" },
  },
  required: ["input"],
};

/**
 * Build a JSON Schema object from configured parameters. Parameters with a
 * default are never required.
 */
export function buildInputSchema(parameters: ToolParameter[]): JsonObjectSchema {
  if (parameters.length === 0) {
    return { type: "object", properties: {}, additionalProperties: true };
  }

  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const param of parameters) {
    const property: JsonSchema = { type: param.type };
    if (param.description) {
      property.description = param.description;
    }
    if (param.default !== undefined) {
      property.default = param.default;
    }
    properties[param.name] = property;

    if (param.required && param.default === undefined) {
      required.push(param.name);
    }
  }

  return { type: "object", properties, required };
}

// ============================================
// Argument Handling
// ============================================

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);

/**
 * Convert a command-line string into the parameter's declared type.
 */
export function coerceArgument(param: ToolParameter, raw: string): Result<unknown, string> {
  switch (param.type) {
    case "string":
      return Ok(raw);

    case "integer":
    case "number": {
      const value = Number(raw.trim());
      if (raw.trim() === "" || Number.isNaN(value)) {
        return Err(`Parameter '${param.name}' expects a ${param.type}, got '${raw}'`);
      }
      if (param.type === "integer" && !Number.isInteger(value)) {
        return Err(`Parameter '${param.name}' expects an integer, got '${raw}'`);
      }
      return Ok(value);
    }

    case "boolean": {
      const normalized = raw.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) {
        return Ok(true);
      }
      if (FALSE_VALUES.has(normalized)) {
        return Ok(false);
      }
      return Err(`Parameter '${param.name}' expects true/false, got '${raw}'`);
    }

    case "object":
    case "array": {
      let value: unknown;
      try {
        value = JSON.parse(raw);
      } catch (error) {
        return Err(`Parameter '${param.name}' expects JSON: ${errorMessage(error)}`);
      }
      const isArray = Array.isArray(value);
      const matches =
        param.type === "array" ? isArray : typeof value === "object" && value !== null && !isArray;
      return matches ? Ok(value) : Err(`Parameter '${param.name}' expects a JSON ${param.type}`);
    }
  }
}

/**
 * Copy of `args` with defaults filled in for missing parameters.
 */
export function applyDefaults(parameters: ToolParameter[], args: ToolArgs): ToolArgs {
  const result: ToolArgs = { ...args };
  for (const param of parameters) {
    if (result[param.name] === undefined && param.default !== undefined) {
      result[param.name] = param.default;
    }
  }
  return result;
}

/**
 * @returns One message per required parameter missing from `args`
 */
export function validateRequired(parameters: ToolParameter[], args: ToolArgs): string[] {
  return parameters
    .filter((param) => param.required && args[param.name] === undefined)
    .map((param) => `missing required parameter '${param.name}'`);
}
