// ============================================
// MCP Hub
// ============================================

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  type CallToolResult,
  CallToolResultSchema,
  ErrorCode,
  McpError as ProtocolError,
} from "@modelcontextprotocol/sdk/types.js";
import {
  createLogger,
  errorMessage,
  type ExecuteOptions,
  type Logger,
  type McpServerDefinition,
  type McpToolInfo,
  type McpToolProvider,
  type McpTransportType,
  type ToolArgs,
} from "@mcpml/core";
import { isRecord } from "@mcpml/shared";
import { MCP_CLIENT_NAME } from "./constants.js";
import { type Environment, expandServerDefinition, findMissingVariables } from "./env-expansion.js";
import { McpConnectionError, McpTimeoutError, McpToolError } from "./errors.js";
import { connectRemote } from "./transports/FallbackTransport.js";
import { createStdioTransport } from "./transports/StdioAdapter.js";

export interface McpHubOptions {
  servers: McpServerDefinition[];
  logger?: Logger;
  /** Version reported in the initialize handshake */
  clientVersion?: string;
  /** Source for `${env:VAR}` placeholders (default: process.env) */
  env?: Environment;
}

interface McpConnection {
  client: Client;
  transport: Transport;
  transportType: McpTransportType;
}

type ContentBlock = CallToolResult["content"][number];

function flattenBlock(block: ContentBlock): string {
  switch (block.type) {
    case "text":
      return block.text;
    case "image":
      return `[image: ${block.mimeType}]`;
    case "resource": {
      const { resource } = block;
      if ("text" in resource && typeof resource.text === "string") {
        return resource.text;
      }
      return `[resource: ${resource.uri}]`;
    }
    default:
      return JSON.stringify(block);
  }
}

/**
 * Join a tool result's content into the text handed to the model.
 */
export function flattenContent(content: CallToolResult["content"]): string {
  return content.map(flattenBlock).join("\n");
}

/**
 * Connections to the external MCP servers named in the configuration.
 *
 * Servers are connected on first use and the connection is shared afterwards;
 * concurrent first uses wait on the same attempt. A failed attempt is forgotten
 * so a later call tries again.
 *
 * @example
 * ```typescript
 * const hub = new McpHub({ servers: config.mcpServers, logger });
 * const tools = await hub.listTools(["filesystem"]);
 * const text = await hub.callTool("filesystem", "read_file", { path: "README.md" });
 * await hub.dispose();
 * ```
 */
export class McpHub implements McpToolProvider {
  private readonly servers: Map<string, McpServerDefinition>;
  private readonly connections = new Map<string, Promise<McpConnection>>();
  private readonly logger: Logger;
  private readonly clientVersion: string;
  private readonly env: Environment;

  constructor(options: McpHubOptions) {
    this.servers = new Map(options.servers.map((server) => [server.name, server]));
    this.logger = (options.logger ?? createLogger()).child({ component: "mcp-hub" });
    this.clientVersion = options.clientVersion ?? "0.0.0";
    this.env = options.env ?? process.env;
  }

  /**
   * Tools offered by the given servers. Servers that are unknown, disabled or
   * unreachable are skipped with a warning, so one bad server does not take an
   * agent's other tools with it.
   */
  async listTools(serverNames: string[]): Promise<McpToolInfo[]> {
    const tools: McpToolInfo[] = [];
    for (const serverName of serverNames) {
      const server = this.servers.get(serverName);
      if (!server) {
        this.logger.warn(`Server "${serverName}" not found`);
        continue;
      }
      if (server.disabled) {
        this.logger.debug(`Server "${serverName}" is disabled, skipping its tools`);
        continue;
      }
      try {
        tools.push(...(await this.fetchTools(server)));
      } catch (error) {
        this.logger.warn(`Could not list tools of server "${serverName}"`, {
          error: errorMessage(error),
        });
      }
    }
    return tools;
  }

  /**
   * Call a tool on a server and flatten its content to text.
   *
   * @throws McpToolError if the server is unknown or disabled, the call fails,
   *   or the tool reports an error
   * @throws McpTimeoutError if the call exceeds the server's timeout
   */
  async callTool(
    serverName: string,
    toolName: string,
    args: ToolArgs,
    options: ExecuteOptions = {}
  ): Promise<string> {
    const server = this.servers.get(serverName);
    if (!server) {
      throw new McpToolError(`Server "${serverName}" not found`, serverName, toolName);
    }
    if (server.disabled) {
      throw new McpToolError(`Server "${serverName}" is disabled`, serverName, toolName);
    }

    const timeoutSeconds = server.timeout;
    const timeoutMs = timeoutSeconds * 1000;
    const startTime = Date.now();
    let timer: ReturnType<typeof setTimeout> | undefined;

    let response: unknown;
    try {
      const connection = await this.connect(server);
      const toolCallPromise = connection.client.callTool(
        { name: toolName, arguments: args },
        undefined,
        { signal: options.signal, timeout: timeoutMs }
      );
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(
            new McpTimeoutError(
              `Tool call "${toolName}" timed out after ${timeoutSeconds}s`,
              serverName,
              timeoutMs
            )
          );
        }, timeoutMs);
      });
      response = await Promise.race([toolCallPromise, timeoutPromise]);
    } catch (error) {
      if (error instanceof McpTimeoutError) {
        throw error;
      }
      if (error instanceof ProtocolError && error.code === ErrorCode.RequestTimeout) {
        throw new McpTimeoutError(
          `Tool call "${toolName}" timed out after ${timeoutSeconds}s`,
          serverName,
          timeoutMs,
          { cause: error }
        );
      }
      throw new McpToolError(`Tool call failed: ${errorMessage(error)}`, serverName, toolName, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }

    this.logger.debug(`Called "${toolName}" on "${serverName}"`, {
      durationMs: Date.now() - startTime,
    });

    // Servers on the oldest protocol revision answer with { toolResult }
    if (isRecord(response) && "toolResult" in response && !("content" in response)) {
      return JSON.stringify(response.toolResult);
    }
    const parsed = CallToolResultSchema.safeParse(response);
    if (!parsed.success) {
      throw new McpToolError(
        `Tool "${toolName}" returned a malformed result`,
        serverName,
        toolName,
        { cause: parsed.error }
      );
    }
    const { content, structuredContent, isError } = parsed.data;
    const text =
      content.length === 0 && structuredContent
        ? JSON.stringify(structuredContent)
        : flattenContent(content);
    if (isError) {
      throw new McpToolError(
        `Tool "${toolName}" reported an error: ${text || "no details"}`,
        serverName,
        toolName
      );
    }
    return text;
  }

  /**
   * Close every open connection. Safe to call more than once.
   */
  async dispose(): Promise<void> {
    const pending = [...this.connections.entries()];
    this.connections.clear();
    await Promise.all(
      pending.map(async ([name, promise]) => {
        try {
          const connection = await promise;
          await connection.client.close();
          this.logger.debug(`Disconnected from "${name}"`);
        } catch (error) {
          this.logger.debug(`Closing "${name}" failed`, { error: errorMessage(error) });
        }
      })
    );
  }

  private async fetchTools(server: McpServerDefinition): Promise<McpToolInfo[]> {
    const connection = await this.connect(server);
    const tools: McpToolInfo[] = [];
    let cursor: string | undefined;
    do {
      const page = await connection.client.listTools(cursor ? { cursor } : undefined);
      for (const tool of page.tools) {
        tools.push({
          server: server.name,
          name: tool.name,
          description: tool.description ?? "",
          inputSchema: { ...tool.inputSchema },
        });
      }
      cursor = page.nextCursor;
    } while (cursor);
    return tools;
  }

  private connect(server: McpServerDefinition): Promise<McpConnection> {
    const existing = this.connections.get(server.name);
    if (existing) {
      return existing;
    }
    const attempt = this.openConnection(server);
    this.connections.set(server.name, attempt);
    void attempt.catch(() => {
      if (this.connections.get(server.name) === attempt) {
        this.connections.delete(server.name);
      }
    });
    return attempt;
  }

  private async openConnection(server: McpServerDefinition): Promise<McpConnection> {
    const missing = findMissingVariables(server, this.env);
    if (missing.length > 0) {
      this.logger.warn(`Server "${server.name}" references unset variables`, { missing });
    }
    const expanded = expandServerDefinition(server, this.env);
    const serverLogger = this.logger.child({ server: server.name });

    if (expanded.command !== undefined) {
      const transport = createStdioTransport(expanded, {
        onStderr: (line) => serverLogger.debug(line),
      });
      const client = this.createClient();
      try {
        await client.connect(transport);
      } catch (error) {
        throw new McpConnectionError(
          `Failed to connect to MCP server "${server.name}": ${errorMessage(error)}`,
          server.name,
          { cause: error }
        );
      }
      serverLogger.info(`Connected to "${server.name}" over stdio`);
      return { client, transport, transportType: "stdio" };
    }

    const connection = await connectRemote(expanded, {
      createClient: () => this.createClient(),
      logger: serverLogger,
    });
    serverLogger.info(`Connected to "${server.name}" over ${connection.transportType}`);
    return connection;
  }

  private createClient(): Client {
    return new Client({ name: MCP_CLIENT_NAME, version: this.clientVersion }, { capabilities: {} });
  }
}
