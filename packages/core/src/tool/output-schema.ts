import { Err, Ok, type Result } from "@mcpml/shared";
import { z } from "zod";
import { ToolResolutionError } from "../errors/index.js";
import { importReference } from "./implementation.js";
import type { JsonSchema } from "./types.js";

/**
 * A resolved `output_schema` reference.
 */
export interface OutputSchema {
  reference: string;
  /** Schema name used for structured model output */
  name: string;
  jsonSchema: JsonSchema;
  /** Parse a value against the schema; plain JSON Schema documents accept any value */
  validate(value: unknown): Result<unknown, string[]>;
}

function isJsonSchemaDocument(value: unknown): value is JsonSchema {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    ("type" in value || "properties" in value || "$schema" in value)
  );
}

/**
 * Build an OutputSchema from a zod schema or a JSON Schema object.
 */
export function toOutputSchema(reference: string, value: unknown): OutputSchema {
  const name = reference.slice(reference.lastIndexOf(".") + 1).replace(/[^A-Za-z0-9_-]/g, "_");

  if (value instanceof z.ZodType) {
    const schema = value;
    return {
      reference,
      name,
      jsonSchema: z.toJSONSchema(schema, { unrepresentable: "any" }),
      validate(candidate) {
        const result = schema.safeParse(candidate);
        if (result.success) {
          return Ok(result.data);
        }
        return Err(
          result.error.issues.map((issue) => {
            const location = issue.path.map(String).join(".");
            return location ? `${location}: ${issue.message}` : issue.message;
          })
        );
      },
    };
  }

  if (isJsonSchemaDocument(value)) {
    return { reference, name, jsonSchema: value, validate: (candidate) => Ok(candidate) };
  }

  throw new ToolResolutionError(
    `Output schema '${reference}' is neither a zod schema nor a JSON Schema object`,
    reference
  );
}

export async function resolveOutputSchema(
  reference: string,
  configDir: string
): Promise<OutputSchema> {
  return toOutputSchema(reference, await importReference(reference, configDir));
}
