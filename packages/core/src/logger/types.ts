/**
 * Log severity levels in ascending order of importance.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Numeric priority for log levels (higher = more severe).
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

/**
 * Level names accepted from configuration files and the environment.
 * WARNING and CRITICAL are accepted alongside warn and fatal.
 */
const LEVEL_ALIASES: Record<string, LogLevel> = {
  trace: "trace",
  debug: "debug",
  info: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
  critical: "fatal",
  fatal: "fatal",
};

/**
 * Map a configured level name onto a LogLevel, case-insensitively.
 *
 * @returns The level, or undefined when the name is not recognised
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_ALIASES[name.trim().toLowerCase()];
}

/**
 * A single log entry with metadata.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  /** Structured context inherited from the logger and its parents */
  context?: Record<string, unknown>;
  data?: unknown;
  /** OpenTelemetry trace ID (when within an active span) */
  traceId?: string;
  /** OpenTelemetry span ID (when within an active span) */
  spanId?: string;
}

/** Where entries go once they pass the level filter. */
export interface LogTransport {
  log(entry: LogEntry): void;
}

export interface LoggerOptions {
  /** Minimum level to log (default: 'info') */
  level?: LogLevel;
  context?: Record<string, unknown>;
  transports?: readonly LogTransport[];
}
