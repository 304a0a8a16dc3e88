import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import type { AgentToolDefinition } from "../config/index.js";
import type { Logger } from "../logger/index.js";
import type { OutputSchema } from "../tool/output-schema.js";
import type { ExecuteOptions, JsonSchema, ToolArgs, ToolDescription } from "../tool/types.js";

// ============================================
// Model Client
// ============================================

/**
 * The slice of the OpenAI client an agent talks to. Both `OpenAI` and
 * `AzureOpenAI` satisfy it.
 */
export interface ChatClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<ChatCompletion>;
    };
  };
}

// ============================================
// External MCP Tools
// ============================================

export interface McpToolInfo {
  /** Configured server name */
  server: string;
  name: string;
  description: string;
  inputSchema: JsonSchema;
}

/**
 * Access to tools on external MCP servers. Implemented by the MCP hub.
 */
export interface McpToolProvider {
  listTools(serverNames: string[]): Promise<McpToolInfo[]>;
  /** @returns The tool's content flattened to text */
  callTool(
    serverName: string,
    toolName: string,
    args: ToolArgs,
    options?: ExecuteOptions
  ): Promise<string>;
  dispose(): Promise<void>;
}

// ============================================
// Agents
// ============================================

export interface AgentRunOptions {
  /** Overrides the definition's max_turns */
  maxTurns?: number;
  signal?: AbortSignal;
}

export interface McpmlAgent {
  run(input: string, options?: AgentRunOptions): Promise<unknown>;
}

/**
 * A function the model may call during an agent run.
 */
export interface AgentTool {
  name: string;
  description: string;
  parameters: JsonSchema;
  /** Where the tool comes from, for log messages */
  source: string;
  invoke(args: ToolArgs, options?: ExecuteOptions): Promise<unknown>;
}

/**
 * What the registry hands the factory when an agent tool runs.
 */
export interface AgentDependencies {
  /** Configured tools the agent may call */
  tools: ToolDescription[];
  /** External MCP servers the agent may use */
  servers: string[];
  executeTool(name: string, args: ToolArgs, options?: ExecuteOptions): Promise<unknown>;
  mcp?: McpToolProvider;
  logger: Logger;
  outputSchema?: OutputSchema;
}

/**
 * Everything an agent implementation is constructed with.
 */
export interface AgentContext {
  definition: AgentToolDefinition;
  tools: AgentTool[];
  logger: Logger;
  outputSchema?: OutputSchema;
  /** Creates the model client; throws when no credentials are configured */
  createClient(): ChatClient;
}
