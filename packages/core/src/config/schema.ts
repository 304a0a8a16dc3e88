import { z } from "zod";
import { parseLogLevel } from "../logger/types.js";

// ============================================
// Settings
// ============================================

export const ServerSettingsSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: z.number().int().min(1).max(65535).default(8000),
});

export const SettingsSchema = z.object({
  server: ServerSettingsSchema.prefault({}),
  log_level: z
    .string()
    .default("INFO")
    .refine((value) => parseLogLevel(value) !== undefined, {
      message: "Unknown log level (expected DEBUG, INFO, WARNING, ERROR or CRITICAL)",
    }),
  /** Environment file, relative to the config directory; null disables loading */
  env_file: z.string().nullable().default(".env"),
});

export type ServerSettings = z.infer<typeof ServerSettingsSchema>;
export type Settings = z.infer<typeof SettingsSchema>;

// ============================================
// MCP Server Definitions
// ============================================

export const McpTransportTypeSchema = z.enum(["stdio", "sse", "streamableHttp"]);

export type McpTransportType = z.infer<typeof McpTransportTypeSchema>;

/**
 * An external MCP server, launched as a subprocess (`command`) or reached by `url`.
 */
export const McpServerDefinitionSchema = z
  .object({
    name: z.string().min(1, "Server name is required"),
    description: z.string().optional(),
    command: z.string().min(1).optional(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string(), z.string()).optional(),
    cwd: z.string().optional(),
    // Placeholders are expanded at connection time, so only literal URLs are checked here
    url: z
      .string()
      .refine((value) => value.includes("${env:") || URL.canParse(value), "URL must be a valid URL")
      .optional(),
    headers: z.record(z.string(), z.string()).optional(),
    transport: McpTransportTypeSchema.optional(),
    timeout: z.number().int().min(1, "Timeout must be at least 1 second").default(60),
    disabled: z.boolean().default(false),
  })
  .superRefine((server, ctx) => {
    if (server.command === undefined && server.url === undefined) {
      ctx.addIssue({ code: "custom", message: "Either command or url is required" });
    }
    if (server.command !== undefined && server.url !== undefined) {
      ctx.addIssue({ code: "custom", message: "Use either command or url, not both" });
    }
    if (server.transport === "stdio" && server.command === undefined) {
      ctx.addIssue({
        code: "custom",
        path: ["transport"],
        message: "stdio transport requires a command",
      });
    }
    if (
      (server.transport === "sse" || server.transport === "streamableHttp") &&
      server.url === undefined
    ) {
      ctx.addIssue({
        code: "custom",
        path: ["transport"],
        message: `${server.transport} transport requires a url`,
      });
    }
  });

export type McpServerDefinition = z.infer<typeof McpServerDefinitionSchema>;

// ============================================
// Tool Definitions
// ============================================

export const ParameterTypeSchema = z.enum([
  "string",
  "integer",
  "number",
  "boolean",
  "object",
  "array",
]);

export type ParameterType = z.infer<typeof ParameterTypeSchema>;

export const ToolParameterSchema = z.object({
  name: z.string().min(1),
  type: ParameterTypeSchema.default("string"),
  description: z.string().default(""),
  required: z.boolean().default(true),
  default: z.unknown().optional(),
});

export type ToolParameter = z.infer<typeof ToolParameterSchema>;

/** Tool names double as OpenAI function names and CLI subcommands. */
const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/** YAML `key:` with no value parses as null; treat it like an absent key. */
const NameListSchema = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? undefined);

const BaseToolSchema = z.object({
  name: z
    .string()
    .regex(TOOL_NAME_PATTERN, "Tool name must be 1-64 letters, digits, '_' or '-'"),
  description: z.string(),
  parameters: z.array(ToolParameterSchema).default([]),
  output_schema: z.string().min(1).optional(),
});

export const FunctionToolSchema = BaseToolSchema.extend({
  type: z.literal("function"),
  implementation: z.string().min(1, "Function tools require an implementation"),
});

export const AgentToolSchema = BaseToolSchema.extend({
  type: z.literal("agent"),
  agent_type: z.string().min(1).default("simple"),
  instructions: z.string().default("You are a helpful AI assistant."),
  model: z.string().min(1).default("gpt-4o"),
  tools: NameListSchema,
  mcp_servers: NameListSchema,
  max_turns: z.number().int().min(1).default(10),
});

export const ToolDefinitionSchema = z.preprocess(
  (value) =>
    typeof value === "object" && value !== null && !("type" in value)
      ? { ...value, type: "function" }
      : value,
  z.discriminatedUnion("type", [FunctionToolSchema, AgentToolSchema])
);

export type FunctionToolDefinition = z.infer<typeof FunctionToolSchema>;
export type AgentToolDefinition = z.infer<typeof AgentToolSchema>;
export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;
export type ToolType = ToolDefinition["type"];

// ============================================
// Top-level Configuration
// ============================================

export const McpmlConfigSchema = z.object({
  name: z.string().min(1, "Configuration name is required"),
  settings: SettingsSchema.prefault({}),
  mcpServers: z.array(McpServerDefinitionSchema).nullish().transform((v) => v ?? []),
  tools: z.array(ToolDefinitionSchema).nullish().transform((v) => v ?? []),
});

export type McpmlConfig = z.infer<typeof McpmlConfigSchema>;

// ============================================
// Reference Validation
// ============================================

function findDuplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      duplicates.add(name);
    }
    seen.add(name);
  }
  return [...duplicates];
}

/**
 * Check the references between entries that the schema cannot see.
 *
 * @returns One message per problem, empty when the configuration is consistent
 */
export function validateReferences(config: McpmlConfig): string[] {
  const issues: string[] = [];
  const toolNames = new Set(config.tools.map((t) => t.name));
  const serverNames = new Set(config.mcpServers.map((s) => s.name));

  for (const name of findDuplicates(config.tools.map((t) => t.name))) {
    issues.push(`tools: duplicate tool name '${name}'`);
  }
  for (const name of findDuplicates(config.mcpServers.map((s) => s.name))) {
    issues.push(`mcpServers: duplicate server name '${name}'`);
  }

  config.tools.forEach((tool, index) => {
    if (tool.type !== "agent") {
      return;
    }
    for (const ref of tool.tools ?? []) {
      if (ref === tool.name) {
        issues.push(`tools.${index}.tools: agent '${tool.name}' cannot use itself`);
      } else if (!toolNames.has(ref)) {
        issues.push(`tools.${index}.tools: unknown tool '${ref}'`);
      }
    }
    for (const ref of tool.mcp_servers ?? []) {
      if (!serverNames.has(ref)) {
        issues.push(`tools.${index}.mcp_servers: unknown MCP server '${ref}'`);
      }
    }
  });

  return issues;
}
