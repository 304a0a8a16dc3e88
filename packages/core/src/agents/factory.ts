/**
 * Agent construction.
 *
 * `simple` is built in. Other agent types are modules in the configuration
 * directory whose default export (or an export named after the type) is an
 * agent class or a factory function.
 *
 * @module agents/factory
 */

import * as fs from "node:fs";
import { pathToFileURL } from "node:url";
import type { AgentToolDefinition } from "../config/index.js";
import { AgentConfigurationError, errorMessage } from "../errors/index.js";
import type { Logger } from "../logger/index.js";
import { moduleCandidates } from "../tool/implementation.js";
import { createModelClient } from "./model-client.js";
import { SimpleAgent } from "./simple-agent.js";
import type { AgentContext, AgentDependencies, AgentTool, ChatClient, McpmlAgent } from "./types.js";

export const SIMPLE_AGENT_TYPE = "simple";

const FUNCTION_NAME_MAX = 64;

/**
 * Module paths searched, in order, for a custom agent type.
 */
export function agentModuleNames(agentType: string): string[] {
  return [
    `${agentType}_agent`,
    `agent_${agentType}`,
    agentType,
    `agents/${agentType}`,
    `agent_types/${agentType}`,
  ];
}

/**
 * Model-facing name for an external tool.
 */
function functionName(name: string): string {
  return name.replace(/[^A-Za-z0-9_-]/g, "_").slice(0, FUNCTION_NAME_MAX);
}

/**
 * Gather the functions an agent may call: the selected configured tools, then
 * the tools of the selected MCP servers. The first tool with a given name wins.
 */
export async function collectAgentTools(deps: AgentDependencies): Promise<AgentTool[]> {
  const candidates: AgentTool[] = deps.tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    parameters: tool.inputSchema,
    source: "configured",
    invoke: (args, options) => deps.executeTool(tool.name, args, options),
  }));

  if (deps.servers.length > 0) {
    const mcp = deps.mcp;
    if (mcp) {
      for (const tool of await mcp.listTools(deps.servers)) {
        candidates.push({
          name: functionName(tool.name),
          description: tool.description,
          parameters: tool.inputSchema,
          source: `MCP server '${tool.server}'`,
          invoke: (args, options) => mcp.callTool(tool.server, tool.name, args, options),
        });
      }
    } else {
      deps.logger.warn(
        `MCP servers ${deps.servers.join(", ")} selected but no MCP client is available`
      );
    }
  }

  const seen = new Set<string>();
  const tools: AgentTool[] = [];
  for (const tool of candidates) {
    if (seen.has(tool.name)) {
      deps.logger.warn(`Duplicate tool name '${tool.name}' from ${tool.source} ignored`);
      continue;
    }
    seen.add(tool.name);
    tools.push(tool);
  }
  return tools;
}

function hasRun(value: unknown): value is McpmlAgent {
  return (
    typeof value === "object" && value !== null && "run" in value && typeof value.run === "function"
  );
}

function isAgentClass(value: Function): boolean {
  const prototype: unknown = value.prototype;
  return (
    typeof prototype === "object" &&
    prototype !== null &&
    "run" in prototype &&
    typeof prototype.run === "function"
  );
}

export interface AgentFactoryOptions {
  configDir: string;
  logger: Logger;
  /** Model client factory (default: from the environment) */
  createClient?: () => ChatClient;
}

export class AgentFactory {
  private readonly configDir: string;
  private readonly logger: Logger;
  private readonly createClient: () => ChatClient;
  /** Loaded custom agent exports by type; `null` means not found */
  private readonly customTypes = new Map<string, Promise<unknown>>();

  constructor(options: AgentFactoryOptions) {
    this.configDir = options.configDir;
    this.logger = options.logger.child({ component: "agent-factory" });
    this.createClient = options.createClient ?? (() => createModelClient());
  }

  async create(definition: AgentToolDefinition, deps: AgentDependencies): Promise<McpmlAgent> {
    const context: AgentContext = {
      definition,
      tools: await collectAgentTools(deps),
      logger: deps.logger,
      outputSchema: deps.outputSchema,
      createClient: this.createClient,
    };

    if (definition.agent_type === SIMPLE_AGENT_TYPE) {
      return new SimpleAgent(context);
    }

    const exported = await this.loadCustomType(definition.agent_type);
    if (exported === null) {
      this.logger.warn(
        `Unknown agent type '${definition.agent_type}' for '${definition.name}', using simple`
      );
      return new SimpleAgent(context);
    }
    return this.instantiate(definition.agent_type, exported, context);
  }

  private loadCustomType(agentType: string): Promise<unknown> {
    let pending = this.customTypes.get(agentType);
    if (!pending) {
      pending = this.importCustomType(agentType);
      this.customTypes.set(agentType, pending);
    }
    return pending;
  }

  private async importCustomType(agentType: string): Promise<unknown> {
    for (const moduleName of agentModuleNames(agentType)) {
      const file = moduleCandidates(this.configDir, moduleName).find((candidate) =>
        fs.existsSync(candidate)
      );
      if (!file) {
        continue;
      }

      this.logger.debug(`Loading agent type '${agentType}' from ${file}`);
      let loaded: unknown;
      try {
        loaded = await import(pathToFileURL(file).href);
      } catch (error) {
        throw new AgentConfigurationError(
          `Failed to load agent type '${agentType}' from ${file}: ${errorMessage(error)}`,
          { agentType, file }
        );
      }

      if (typeof loaded === "object" && loaded !== null) {
        const exported: unknown =
          Reflect.get(loaded, "default") ?? Reflect.get(loaded, agentType);
        if (exported !== undefined) {
          return exported;
        }
      }
      throw new AgentConfigurationError(
        `Agent module ${file} has no default export or export named '${agentType}'`,
        { agentType, file }
      );
    }
    return null;
  }

  private instantiate(agentType: string, exported: unknown, context: AgentContext): McpmlAgent {
    if (typeof exported === "function") {
      const agent: unknown = isAgentClass(exported)
        ? Reflect.construct(exported, [context])
        : Reflect.apply(exported, undefined, [context]);
      if (hasRun(agent)) {
        return agent;
      }
    } else if (hasRun(exported)) {
      return exported;
    }
    throw new AgentConfigurationError(
      `Agent type '${agentType}' must export a class or factory producing an object with run()`,
      { agentType }
    );
  }
}
