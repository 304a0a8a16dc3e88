// ============================================
// MCP Constants
// ============================================

/** Grace period for closing server connections in milliseconds */
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

/** Client name for MCP protocol handshake */
export const MCP_CLIENT_NAME = "mcpml";

/** Path of the stateless Streamable HTTP endpoint */
export const STREAMABLE_HTTP_PATH = "/mcp";

/** Path a client opens to start an SSE session */
export const SSE_PATH = "/sse";

/** Path SSE clients post their messages to */
export const SSE_MESSAGES_PATH = "/messages/";
