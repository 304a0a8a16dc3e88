// ============================================
// MCPML Errors - Barrel Export
// ============================================

export {
  AgentConfigurationError,
  AgentOutputError,
  ErrorCode,
  ErrorSeverity,
  errorMessage,
  inferSeverity,
  MaxTurnsExceededError,
  McpmlError,
  type McpmlErrorOptions,
  ToolExecutionError,
  ToolNotFoundError,
  ToolResolutionError,
  ToolValidationError,
} from "./types.js";
