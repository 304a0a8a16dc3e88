// ============================================
// @mcpml/mcp
// ============================================

export {
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  MCP_CLIENT_NAME,
  SSE_MESSAGES_PATH,
  SSE_PATH,
  STREAMABLE_HTTP_PATH,
} from "./constants.js";
export type { Environment } from "./env-expansion.js";
export {
  expandRecord,
  expandServerDefinition,
  expandString,
  extractEnvironmentVariables,
  findMissingVariables,
} from "./env-expansion.js";
export type { McpErrorCode, McpErrorOptions } from "./errors.js";
export {
  McpConnectionError,
  McpError,
  McpTimeoutError,
  McpToolError,
  McpTransportError,
} from "./errors.js";
export type { McpHubOptions } from "./McpHub.js";
export { flattenContent, McpHub } from "./McpHub.js";
export type { HttpApp, HttpAppOptions } from "./server/http.js";
export { createHttpApp, listen } from "./server/http.js";
export type { McpServerInfo } from "./server/McpmlServer.js";
export { createMcpServer, formatToolResult, runStdio } from "./server/McpmlServer.js";
export type { ConnectRemoteOptions, RemoteConnection } from "./transports/FallbackTransport.js";
export { connectRemote } from "./transports/FallbackTransport.js";
export type { RemoteTransportType } from "./transports/RemoteAdapter.js";
export {
  createRemoteTransport,
  createSSETransport,
  createStreamableHttpTransport,
} from "./transports/RemoteAdapter.js";
export type { StdioTransportOptions } from "./transports/StdioAdapter.js";
export { createStdioTransport } from "./transports/StdioAdapter.js";
