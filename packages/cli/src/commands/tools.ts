/**
 * `mcpml tools`: list tools, run one from JSON, or run one through its own
 * generated subcommand (`mcpml tools <name> run --<param> <value>`).
 *
 * @module cli/commands/tools
 */

import {
  coerceArgument,
  type JsonSchema,
  type ToolArgs,
  type ToolDefinition,
  type ToolDescription,
  type ToolParameter,
} from "@mcpml/core";
import { isRecord } from "@mcpml/shared";
import { type Command, Option } from "commander";
import yaml from "js-yaml";
import { table } from "table";
import type { CliContext, GlobalOptions } from "../context.js";
import { createChalk, formatOutput } from "../output.js";
import { usageError } from "./exit-codes.js";

// =============================================================================
// Listing
// =============================================================================

export type ListFormat = "table" | "json" | "yaml";

export interface ParameterSummary {
  name: string;
  type: string;
  required: boolean;
  description?: string;
  default?: unknown;
}

/** Subcommand names of `tools` that a tool name cannot shadow */
const RESERVED_NAMES = new Set(["list", "run", "help"]);

/**
 * Parameters as they appear in a tool's input schema.
 */
export function summarizeParameters(tool: ToolDescription): ParameterSummary[] {
  const required = new Set(tool.inputSchema.required ?? []);
  return Object.entries(tool.inputSchema.properties).map(([name, schema]: [string, JsonSchema]) => {
    const summary: ParameterSummary = {
      name,
      type: typeof schema.type === "string" ? schema.type : "any",
      required: required.has(name),
    };
    if (typeof schema.description === "string" && schema.description) {
      summary.description = schema.description;
    }
    if (schema.default !== undefined) {
      summary.default = schema.default;
    }
    return summary;
  });
}

/**
 * Render tool descriptions. Required parameters are marked with `*` in tables.
 */
export function formatToolList(tools: ToolDescription[], format: ListFormat): string {
  const records = tools.map((tool) => ({
    name: tool.name,
    type: tool.type,
    description: tool.description,
    parameters: summarizeParameters(tool),
  }));

  if (format === "json") {
    return JSON.stringify({ tools: records }, null, 2);
  }
  if (format === "yaml") {
    return yaml.dump({ tools: records }, { noRefs: true }).trimEnd();
  }

  if (records.length === 0) {
    return "No tools configured.";
  }
  const chalk = createChalk();
  const rows = records.map((tool) => [
    tool.name,
    tool.type,
    tool.description,
    tool.parameters.map((p) => `${p.name}${p.required ? "*" : ""}: ${p.type}`).join("\n") || "-",
  ]);
  const header = ["Name", "Type", "Description", "Parameters"].map((h) => chalk.bold(h));
  return table([header, ...rows]).trimEnd();
}

// =============================================================================
// Argument Parsing
// =============================================================================

/**
 * Parse the JSON object given to `tools run <name> [json]`.
 */
export function parseJsonArguments(json: string | undefined): ToolArgs {
  if (json === undefined || json.trim() === "") {
    return {};
  }
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw usageError(
      `Invalid JSON parameters: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!isRecord(value)) {
    throw usageError("Parameters must be a JSON object");
  }
  return value;
}

/**
 * Collect `--<param> <value>` options into typed arguments.
 */
export function collectOptionArguments(
  options: Record<string, unknown>,
  parameters: Map<string, ToolParameter>
): ToolArgs {
  const args: ToolArgs = {};
  for (const [attribute, param] of parameters) {
    const raw = options[attribute];
    if (typeof raw !== "string") {
      continue;
    }
    const coerced = coerceArgument(param, raw);
    if (!coerced.ok) {
      throw usageError(coerced.error);
    }
    args[param.name] = coerced.value;
  }
  return args;
}

async function executeAndPrint(
  ctx: CliContext,
  globals: GlobalOptions,
  name: string,
  args: ToolArgs
): Promise<void> {
  const project = await ctx.openProject(globals);
  try {
    const result = await project.registry.execute(name, args);
    ctx.print(formatOutput(result));
  } finally {
    await project.dispose();
  }
}

// =============================================================================
// Generated Subcommands
// =============================================================================

function registerFunctionTool(tools: Command, ctx: CliContext, definition: ToolDefinition): void {
  const runCommand = tools
    .command(definition.name)
    .description(definition.description)
    .command("run")
    .description(`Run ${definition.name}`)
    .argument("[json]", "Parameters as a JSON object, merged under the options");

  const parameters = new Map<string, ToolParameter>();
  for (const param of definition.parameters) {
    const notes = [
      param.description,
      `(${param.type}${param.required && param.default === undefined ? ", required" : ""})`,
      param.default === undefined ? "" : `(default: ${JSON.stringify(param.default)})`,
    ].filter(Boolean);
    const option = new Option(`--${param.name} <value>`, notes.join(" "));
    runCommand.addOption(option);
    parameters.set(option.attributeName(), param);
  }

  runCommand.action(async (json: string | undefined, _options: unknown, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const args = {
      ...parseJsonArguments(json),
      ...collectOptionArguments(command.opts(), parameters),
    };
    await executeAndPrint(ctx, globals, definition.name, args);
  });
}

function registerAgentTool(tools: Command, ctx: CliContext, definition: ToolDefinition): void {
  tools
    .command(definition.name)
    .description(definition.description)
    .command("run")
    .description(`Run the ${definition.name} agent`)
    .argument("[text...]", "Input for the agent")
    .option("-i, --input <text>", "Input for the agent")
    .action(async (text: string[], options: { input?: string }, command: Command) => {
      const input = options.input ?? text.join(" ");
      if (!input.trim()) {
        throw usageError(`Agent tool '${definition.name}' needs --input or a text argument`);
      }
      await executeAndPrint(ctx, command.optsWithGlobals<GlobalOptions>(), definition.name, {
        input,
      });
    });
}

// =============================================================================
// Command Registration
// =============================================================================

/**
 * Add `tools` with its `list` and `run` subcommands, plus one subcommand per
 * configured tool when the definitions are known up front.
 */
export function registerToolsCommand(
  program: Command,
  ctx: CliContext,
  definitions: ToolDefinition[] = []
): void {
  const tools = program.command("tools").description("List and run configured tools");

  tools
    .command("list")
    .description("List configured tools")
    .addOption(
      new Option("-f, --format <format>", "Output format")
        .choices(["table", "json", "yaml"])
        .default("table")
    )
    .action(async (options: { format: ListFormat }, command: Command) => {
      const project = await ctx.openProject(command.optsWithGlobals<GlobalOptions>());
      try {
        ctx.print(formatToolList(project.registry.list(), options.format));
      } finally {
        await project.dispose();
      }
    });

  tools
    .command("run")
    .description("Run a tool with parameters given as a JSON object")
    .argument("<name>", "Tool name")
    .argument("[json]", "Parameters, e.g. '{\"a\": 1}'")
    .action(async (name: string, json: string | undefined, _options: unknown, command: Command) => {
      const args = parseJsonArguments(json);
      await executeAndPrint(ctx, command.optsWithGlobals<GlobalOptions>(), name, args);
    });

  for (const definition of definitions) {
    if (RESERVED_NAMES.has(definition.name)) {
      ctx.logger.debug(`Tool '${definition.name}' has no generated subcommand; use tools run`);
      continue;
    }
    if (definition.type === "agent") {
      registerAgentTool(tools, ctx, definition);
    } else {
      registerFunctionTool(tools, ctx, definition);
    }
  }
}
