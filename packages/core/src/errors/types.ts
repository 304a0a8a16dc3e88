// ============================================
// MCPML Error Types
// ============================================

/**
 * Categorized error codes.
 *
 * Categories:
 * - 2xxx: Agent/LLM errors
 * - 3xxx: Tool errors (38xx: external MCP servers)
 *
 * Configuration problems are not thrown; the loader returns them as
 * `ConfigError` results.
 */
export enum ErrorCode {
  // 2xxx - Agent/LLM errors
  AGENT_CONFIGURATION = 2001,
  AGENT_MAX_TURNS = 2002,
  AGENT_INVALID_OUTPUT = 2003,
  LLM_REQUEST_FAILED = 2004,

  // 3xxx - Tool errors
  TOOL_NOT_FOUND = 3001,
  TOOL_VALIDATION_FAILED = 3002,
  TOOL_EXECUTION_FAILED = 3003,
  TOOL_RESOLUTION_FAILED = 3004,

  // 38xx - External MCP server errors
  MCP_CONNECTION = 3800,
  MCP_TIMEOUT = 3801,
  MCP_TOOL_FAILED = 3802,
  MCP_TRANSPORT = 3803,
}

/**
 * Error severity levels that determine handling strategy.
 */
export enum ErrorSeverity {
  /** Can retry automatically */
  RECOVERABLE = "recoverable",
  /** User needs to fix something */
  USER_ACTION = "user_action",
}

/**
 * Infers the appropriate severity level from an error code.
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.LLM_REQUEST_FAILED:
    case ErrorCode.MCP_CONNECTION:
    case ErrorCode.MCP_TIMEOUT:
      return ErrorSeverity.RECOVERABLE;

    case ErrorCode.AGENT_CONFIGURATION:
    case ErrorCode.AGENT_MAX_TURNS:
    case ErrorCode.AGENT_INVALID_OUTPUT:
    case ErrorCode.TOOL_NOT_FOUND:
    case ErrorCode.TOOL_VALIDATION_FAILED:
    case ErrorCode.TOOL_EXECUTION_FAILED:
    case ErrorCode.TOOL_RESOLUTION_FAILED:
    case ErrorCode.MCP_TOOL_FAILED:
    case ErrorCode.MCP_TRANSPORT:
      return ErrorSeverity.USER_ACTION;
  }
}

export interface McpmlErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
  /** Overrides the retryability inferred from severity */
  isRetryable?: boolean;
}

/**
 * Base error class for all MCPML errors.
 */
export class McpmlError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  private readonly _isRetryable?: boolean;

  constructor(message: string, code: ErrorCode, options?: McpmlErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "McpmlError";
    this.code = code;
    this.context = options?.context;
    this._isRetryable = options?.isRetryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  get isRetryable(): boolean {
    return this._isRetryable ?? this.severity === ErrorSeverity.RECOVERABLE;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      isRetryable: this.isRetryable,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * A configured tool name that does not exist.
 */
export class ToolNotFoundError extends McpmlError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool not found: ${toolName}`, ErrorCode.TOOL_NOT_FOUND, { context: { toolName } });
    this.name = "ToolNotFoundError";
    this.toolName = toolName;
  }
}

/**
 * Arguments or results that do not match a tool's declared shape.
 */
export class ToolValidationError extends McpmlError {
  public readonly toolName: string;
  public readonly issues: string[];

  constructor(toolName: string, issues: string[], options?: Omit<McpmlErrorOptions, "context">) {
    super(
      `Invalid input for tool '${toolName}': ${issues.join("; ")}`,
      ErrorCode.TOOL_VALIDATION_FAILED,
      { ...options, context: { toolName, issues } }
    );
    this.name = "ToolValidationError";
    this.toolName = toolName;
    this.issues = issues;
  }
}

/**
 * An implementation or schema reference that cannot be loaded.
 */
export class ToolResolutionError extends McpmlError {
  public readonly reference: string;

  constructor(message: string, reference: string, options?: Omit<McpmlErrorOptions, "context">) {
    super(message, ErrorCode.TOOL_RESOLUTION_FAILED, { ...options, context: { reference } });
    this.name = "ToolResolutionError";
    this.reference = reference;
  }
}

/**
 * A failure raised by user code while a tool was running.
 */
export class ToolExecutionError extends McpmlError {
  public readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Error executing tool '${toolName}': ${reason}`, ErrorCode.TOOL_EXECUTION_FAILED, {
      cause,
      context: { toolName },
    });
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

/**
 * Missing credentials or an agent definition that cannot be built.
 */
export class AgentConfigurationError extends McpmlError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.AGENT_CONFIGURATION, { context });
    this.name = "AgentConfigurationError";
  }
}

export class MaxTurnsExceededError extends McpmlError {
  public readonly maxTurns: number;

  constructor(maxTurns: number) {
    super(`Agent did not finish within ${maxTurns} turns`, ErrorCode.AGENT_MAX_TURNS, {
      context: { maxTurns },
    });
    this.name = "MaxTurnsExceededError";
    this.maxTurns = maxTurns;
  }
}

/**
 * Final agent output that does not satisfy the tool's output schema.
 */
export class AgentOutputError extends McpmlError {
  constructor(message: string, options?: McpmlErrorOptions) {
    super(message, ErrorCode.AGENT_INVALID_OUTPUT, options);
    this.name = "AgentOutputError";
  }
}

/**
 * Message text for any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
