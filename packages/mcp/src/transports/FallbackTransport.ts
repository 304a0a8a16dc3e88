// ============================================
// Fallback Connection for Remote Servers
// ============================================

import type { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { errorMessage, type Logger, type McpServerDefinition } from "@mcpml/core";
import { McpConnectionError } from "../errors.js";
import { createRemoteTransport, type RemoteTransportType } from "./RemoteAdapter.js";

export interface RemoteConnection {
  client: Client;
  transport: Transport;
  transportType: RemoteTransportType;
}

export interface ConnectRemoteOptions {
  /** A fresh client per attempt: a client cannot reconnect after a failed handshake */
  createClient: () => Client;
  logger: Logger;
}

/**
 * Connects to a server by URL.
 *
 * Without a pinned `transport`, Streamable HTTP is tried first and SSE second.
 * The fallback is decided by the initialize handshake, since creating a
 * transport never touches the network.
 *
 * @throws McpConnectionError when every attempt fails
 */
export async function connectRemote(
  server: McpServerDefinition,
  options: ConnectRemoteOptions
): Promise<RemoteConnection> {
  const { createClient, logger } = options;
  const attempts: RemoteTransportType[] =
    server.transport === "sse" || server.transport === "streamableHttp"
      ? [server.transport]
      : ["streamableHttp", "sse"];

  const failures: string[] = [];
  for (const [index, transportType] of attempts.entries()) {
    const transport = createRemoteTransport(server, transportType);
    const client = createClient();
    try {
      logger.debug(`[${server.name}] Connecting with ${transportType}`);
      await client.connect(transport);
      if (index > 0) {
        logger.warn(
          `[${server.name}] Connected using SSE fallback. Server may not support Streamable HTTP.`
        );
      }
      return { client, transport, transportType };
    } catch (error) {
      failures.push(`${transportType}: ${errorMessage(error)}`);
      await client.close().catch((closeError: unknown) => {
        logger.debug(`[${server.name}] Closing failed client: ${errorMessage(closeError)}`);
      });
    }
  }

  throw new McpConnectionError(
    `Failed to connect to MCP server "${server.name}" (${failures.join("; ")})`,
    server.name
  );
}
