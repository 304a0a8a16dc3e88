// ============================================
// External MCP Server Errors
// ============================================

import { ErrorCode, McpmlError, type McpmlErrorOptions } from "@mcpml/core";

export type McpErrorCode =
  | ErrorCode.MCP_CONNECTION
  | ErrorCode.MCP_TIMEOUT
  | ErrorCode.MCP_TOOL_FAILED
  | ErrorCode.MCP_TRANSPORT;

export type McpErrorOptions = Omit<McpmlErrorOptions, "context">;

/**
 * A failure talking to one of the configured MCP servers. Every subclass
 * names the server, and keeps its other details in `context` as well so that
 * they survive `toJSON()`.
 */
export class McpError extends McpmlError {
  public readonly serverName: string;

  constructor(
    message: string,
    code: McpErrorCode,
    serverName: string,
    details: Record<string, unknown> = {},
    options?: McpErrorOptions
  ) {
    super(message, code, { ...options, context: { serverName, ...details } });
    this.name = "McpError";
    this.serverName = serverName;
  }
}

/**
 * The process did not start, the URL did not answer, or the server rejected
 * the initialize handshake.
 */
export class McpConnectionError extends McpError {
  constructor(message: string, serverName: string, options?: McpErrorOptions) {
    super(message, ErrorCode.MCP_CONNECTION, serverName, {}, options);
    this.name = "McpConnectionError";
  }
}

export class McpTimeoutError extends McpError {
  public readonly timeoutMs: number;

  constructor(message: string, serverName: string, timeoutMs: number, options?: McpErrorOptions) {
    super(message, ErrorCode.MCP_TIMEOUT, serverName, { timeoutMs }, options);
    this.name = "McpTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** A tool call the server rejected, failed, or answered with `isError`. */
export class McpToolError extends McpError {
  public readonly toolName: string;

  constructor(message: string, serverName: string, toolName: string, options?: McpErrorOptions) {
    super(message, ErrorCode.MCP_TOOL_FAILED, serverName, { toolName }, options);
    this.name = "McpToolError";
    this.toolName = toolName;
  }
}

/** The server definition cannot produce a transport, e.g. a missing command or a bad URL. */
export class McpTransportError extends McpError {
  public readonly transportType: string;

  constructor(
    message: string,
    serverName: string,
    transportType: string,
    options?: McpErrorOptions
  ) {
    super(message, ErrorCode.MCP_TRANSPORT, serverName, { transportType }, options);
    this.name = "McpTransportError";
    this.transportType = transportType;
  }
}
