// ============================================
// Remote Transport Adapters
// ============================================

import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { McpServerDefinition } from "@mcpml/core";
import { McpTransportError } from "../errors.js";

export type RemoteTransportType = "streamableHttp" | "sse";

function requireUrl(server: McpServerDefinition, transportType: RemoteTransportType): URL {
  if (server.url === undefined) {
    throw new McpTransportError(
      `Server "${server.name}" has no url`,
      server.name,
      transportType
    );
  }
  try {
    return new URL(server.url);
  } catch (error) {
    throw new McpTransportError(
      `Server "${server.name}" has an invalid url: ${server.url}`,
      server.name,
      transportType,
      { cause: error }
    );
  }
}

function requestInit(server: McpServerDefinition): RequestInit | undefined {
  return server.headers && Object.keys(server.headers).length > 0
    ? { headers: server.headers }
    : undefined;
}

export function createStreamableHttpTransport(
  server: McpServerDefinition
): StreamableHTTPClientTransport {
  return new StreamableHTTPClientTransport(requireUrl(server, "streamableHttp"), {
    requestInit: requestInit(server),
  });
}

/**
 * SSE is the older remote transport, kept for servers without Streamable HTTP.
 * Headers apply to the messages posted to the server.
 */
export function createSSETransport(server: McpServerDefinition): SSEClientTransport {
  return new SSEClientTransport(requireUrl(server, "sse"), {
    requestInit: requestInit(server),
  });
}

export function createRemoteTransport(
  server: McpServerDefinition,
  transportType: RemoteTransportType
): StreamableHTTPClientTransport | SSEClientTransport {
  return transportType === "sse"
    ? createSSETransport(server)
    : createStreamableHttpTransport(server);
}
