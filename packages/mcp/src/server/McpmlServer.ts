// ============================================
// MCP Server Exposure
// ============================================

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  type CallToolResult,
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { createLogger, errorMessage, type Logger, type ToolRegistry } from "@mcpml/core";

export interface McpServerInfo {
  /** Version reported to clients */
  version: string;
  logger?: Logger;
}

/**
 * Text sent back for a tool's return value: strings as they are, anything
 * else as indented JSON.
 */
export function formatToolResult(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value ?? null, null, 2);
}

function textResult(text: string, isError = false): CallToolResult {
  const result: CallToolResult = { content: [{ type: "text", text }] };
  if (isError) {
    result.isError = true;
  }
  return result;
}

/**
 * An MCP server that lists and runs the registry's tools.
 *
 * Tool failures are reported in the result with `isError`, not as protocol
 * errors, so the calling model sees the message.
 */
export function createMcpServer(registry: ToolRegistry, info: McpServerInfo): Server {
  const logger = (info.logger ?? createLogger()).child({ component: "mcp-server" });
  const server = new Server(
    { name: registry.name, version: info.version },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args = {} } = request.params;
    logger.debug(`tools/call ${name}`);
    try {
      const result = await registry.execute(name, args, { signal: extra.signal });
      return textResult(formatToolResult(result));
    } catch (error) {
      logger.warn(`Tool '${name}' failed`, { error: errorMessage(error) });
      return textResult(errorMessage(error), true);
    }
  });

  return server;
}

/**
 * Serve the registry over stdin/stdout. Resolves once the transport is up;
 * the returned server's `onclose` fires when the client goes away.
 */
export async function runStdio(registry: ToolRegistry, info: McpServerInfo): Promise<Server> {
  const server = createMcpServer(registry, info);
  await server.connect(new StdioServerTransport());
  info.logger?.info(`Serving ${registry.size} tool(s) over stdio`);
  return server;
}
