import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel, LogTransport } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name, attached to every entry as `context.logger` (default: 'mcpml') */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Emit one JSON object per line instead of human-readable output */
  json?: boolean;
  /** Force colors on or off for human-readable output */
  colors?: boolean;
  /** Replace the default stderr transport */
  transports?: LogTransport[];
}

/**
 * Factory function to create a Logger with the standard transport set.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "mcpml-cli", level: "debug" });
 * const json = createLogger({ json: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const transports =
    options.transports ??
    (options.json ? [new JsonTransport()] : [new ConsoleTransport({ colors: options.colors })]);

  return new Logger({
    level: options.level ?? "info",
    context: { logger: options.name ?? "mcpml" },
    transports,
  });
}
