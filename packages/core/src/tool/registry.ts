// ============================================
// Tool Registry
// ============================================

import { z } from "zod";
import { AgentFactory } from "../agents/factory.js";
import type { McpToolProvider } from "../agents/types.js";
import {
  type AgentToolDefinition,
  type FunctionToolDefinition,
  type McpmlConfig,
  selectAgentServers,
  selectAgentTools,
  type ToolDefinition,
} from "../config/index.js";
import { ToolExecutionError, ToolNotFoundError, ToolValidationError } from "../errors/index.js";
import { createLogger, type Logger } from "../logger/index.js";
import { resolveImplementation } from "./implementation.js";
import { type OutputSchema, resolveOutputSchema } from "./output-schema.js";
import {
  AGENT_INPUT_SCHEMA,
  applyDefaults,
  buildInputSchema,
  validateRequired,
} from "./parameters.js";
import type {
  ExecuteOptions,
  JsonObjectSchema,
  ToolArgs,
  ToolDescription,
  ToolHandler,
} from "./types.js";

export interface ToolRegistryOptions {
  /** Directory implementation references resolve against */
  configDir: string;
  logger?: Logger;
  agentFactory?: AgentFactory;
  /** Access to external MCP servers for agent tools */
  mcp?: McpToolProvider;
}

interface RegisteredFunctionTool {
  type: "function";
  definition: FunctionToolDefinition;
  handler: ToolHandler;
  schema?: z.ZodObject;
  inputSchema: JsonObjectSchema;
  outputSchema?: OutputSchema;
}

interface RegisteredAgentTool {
  type: "agent";
  definition: AgentToolDefinition;
  inputSchema: JsonObjectSchema;
  outputSchema?: OutputSchema;
}

type RegisteredTool = RegisteredFunctionTool | RegisteredAgentTool;

function zodInputSchema(schema: z.ZodObject): JsonObjectSchema {
  const json = z.toJSONSchema(schema, { unrepresentable: "any" });
  const properties: JsonObjectSchema["properties"] = {};
  if (typeof json.properties === "object") {
    for (const [key, value] of Object.entries(json.properties)) {
      if (typeof value === "object") {
        properties[key] = { ...value };
      }
    }
  }
  const { $schema: _schema, ...rest } = json;
  return { ...rest, type: "object", properties };
}

/**
 * The configured tools, resolved and ready to run.
 *
 * Function implementations and output schemas are imported when the registry
 * is created, so a broken reference fails at startup rather than on first call.
 *
 * @example
 * ```typescript
 * const registry = await ToolRegistry.create(config, { configDir, logger });
 * const sum = await registry.execute("add", { a: 1, b: 2 });
 * ```
 */
export class ToolRegistry {
  private readonly config: McpmlConfig;
  private readonly tools: Map<string, RegisteredTool>;
  private readonly logger: Logger;
  private readonly agentFactory: AgentFactory;
  private readonly mcp: McpToolProvider | undefined;

  private constructor(
    config: McpmlConfig,
    tools: Map<string, RegisteredTool>,
    logger: Logger,
    agentFactory: AgentFactory,
    mcp: McpToolProvider | undefined
  ) {
    this.config = config;
    this.tools = tools;
    this.logger = logger;
    this.agentFactory = agentFactory;
    this.mcp = mcp;
  }

  static async create(config: McpmlConfig, options: ToolRegistryOptions): Promise<ToolRegistry> {
    const logger = (options.logger ?? createLogger()).child({ component: "tool-registry" });
    const tools = new Map<string, RegisteredTool>();

    for (const definition of config.tools) {
      const outputSchema = definition.output_schema
        ? await resolveOutputSchema(definition.output_schema, options.configDir)
        : undefined;

      if (definition.type === "agent") {
        tools.set(definition.name, {
          type: "agent",
          definition,
          inputSchema: AGENT_INPUT_SCHEMA,
          outputSchema,
        });
        logger.debug(`Registered agent tool '${definition.name}'`);
        continue;
      }

      const resolved = await resolveImplementation(definition.implementation, options.configDir);
      // Configured parameters win over a schema declared in code
      const inputSchema =
        resolved.schema && definition.parameters.length === 0
          ? zodInputSchema(resolved.schema)
          : buildInputSchema(definition.parameters);
      tools.set(definition.name, {
        type: "function",
        definition,
        handler: resolved.handler,
        schema: resolved.schema,
        inputSchema,
        outputSchema,
      });
      logger.debug(`Registered function tool '${definition.name}'`, {
        implementation: definition.implementation,
      });
    }

    const agentFactory =
      options.agentFactory ?? new AgentFactory({ configDir: options.configDir, logger });
    logger.info(`Loaded ${tools.size} tool(s) for '${config.name}'`);
    return new ToolRegistry(config, tools, logger, agentFactory, options.mcp);
  }

  /** Configuration name, used as the MCP server name */
  get name(): string {
    return this.config.name;
  }

  get size(): number {
    return this.tools.size;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name)?.definition;
  }

  describe(name: string): ToolDescription | undefined {
    const tool = this.tools.get(name);
    return tool ? this.toDescription(tool) : undefined;
  }

  /**
   * Descriptions of every tool, in configuration order.
   */
  list(): ToolDescription[] {
    return [...this.tools.values()].map((tool) => this.toDescription(tool));
  }

  /**
   * Run a tool by name.
   *
   * @throws ToolNotFoundError for an unknown name
   * @throws ToolValidationError when required arguments are missing or invalid
   * @throws ToolExecutionError wrapping any failure inside the tool
   */
  async execute(
    name: string,
    args: ToolArgs = {},
    options: ExecuteOptions = {}
  ): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }

    const started = Date.now();
    this.logger.debug(`Executing tool '${name}'`, { type: tool.type });
    const result =
      tool.type === "function"
        ? await this.executeFunction(tool, args, options)
        : await this.executeAgent(tool, args, options);
    this.logger.debug(`Tool '${name}' finished`, { durationMs: Date.now() - started });
    return result;
  }

  private toDescription(tool: RegisteredTool): ToolDescription {
    const { definition } = tool;
    return {
      name: definition.name,
      description: definition.description,
      type: definition.type,
      inputSchema: tool.inputSchema,
    };
  }

  private async executeFunction(
    tool: RegisteredFunctionTool,
    rawArgs: ToolArgs,
    options: ExecuteOptions
  ): Promise<unknown> {
    const { definition } = tool;
    let args = applyDefaults(definition.parameters, rawArgs);
    const missing = validateRequired(definition.parameters, args);
    if (missing.length > 0) {
      throw new ToolValidationError(definition.name, missing);
    }

    if (tool.schema) {
      const parsed = tool.schema.safeParse(args);
      if (!parsed.success) {
        throw new ToolValidationError(
          definition.name,
          parsed.error.issues.map((issue) => {
            const location = issue.path.map(String).join(".");
            return location ? `${location}: ${issue.message}` : issue.message;
          })
        );
      }
      args = parsed.data;
    }

    let result: unknown;
    try {
      result = await tool.handler(args, {
        toolName: definition.name,
        logger: this.logger.child({ tool: definition.name }),
        signal: options.signal,
      });
    } catch (error) {
      throw new ToolExecutionError(definition.name, error);
    }

    if (tool.outputSchema) {
      const checked = tool.outputSchema.validate(result);
      if (!checked.ok) {
        throw new ToolExecutionError(
          definition.name,
          new Error(
            `Output does not match '${tool.outputSchema.reference}': ${checked.error.join("; ")}`
          )
        );
      }
      return checked.value;
    }
    return result;
  }

  private async executeAgent(
    tool: RegisteredAgentTool,
    args: ToolArgs,
    options: ExecuteOptions
  ): Promise<unknown> {
    const { definition } = tool;
    const rawInput = args.input;
    if (rawInput === undefined || rawInput === null) {
      throw new ToolValidationError(definition.name, ["missing required parameter 'input'"]);
    }
    const input = typeof rawInput === "string" ? rawInput : JSON.stringify(rawInput);

    try {
      const agent = await this.agentFactory.create(definition, {
        tools: selectAgentTools(this.config, definition).flatMap((selected) => {
          const description = this.describe(selected.name);
          return description ? [description] : [];
        }),
        servers: selectAgentServers(this.config, definition).map((server) => server.name),
        executeTool: (toolName, toolArgs, toolOptions) =>
          this.execute(toolName, toolArgs, toolOptions),
        mcp: this.mcp,
        logger: this.logger.child({ tool: definition.name }),
        outputSchema: tool.outputSchema,
      });
      return await agent.run(input, { maxTurns: definition.max_turns, signal: options.signal });
    } catch (error) {
      throw new ToolExecutionError(definition.name, error);
    }
  }
}
