import { context, trace } from "@opentelemetry/api";
import type { LogEntry, LoggerOptions, LogLevel, LogTransport } from "./types.js";
import { LOG_LEVEL_PRIORITY } from "./types.js";

/**
 * Leveled logger shared by the loader, the tool registry, agents and the MCP
 * layer. Each component takes a child so its entries carry `component`.
 *
 * Children read the level through their root, so `--verbose` and
 * `MCPML_LOG_LEVEL` applied after startup reach loggers created earlier.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "mcpml-cli" });
 * const registryLogger = logger.child({ component: "registry" });
 * registryLogger.debug("Registered tool", { tool: "add", type: "function" });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly root: Logger | undefined;
  private readonly context: Record<string, unknown>;
  private readonly transports: readonly LogTransport[];

  constructor(options: LoggerOptions = {}, root?: Logger) {
    this.level = options.level ?? "info";
    this.root = root;
    this.context = options.context ?? {};
    this.transports = options.transports ?? [];
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.write("error", message, data);
  }

  setLevel(level: LogLevel): void {
    if (this.root) {
      this.root.setLevel(level);
      return;
    }
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.root ? this.root.getLevel() : this.level;
  }

  child(context: Record<string, unknown>): Logger {
    return new Logger(
      { context: { ...this.context, ...context }, transports: this.transports },
      this.root ?? this
    );
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.getLevel()]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      // Error fields are not enumerable and would serialize as {}
      data:
        data instanceof Error
          ? { name: data.name, message: data.message, stack: data.stack }
          : data,
      ...activeSpanIds(),
    };
    for (const transport of this.transports) {
      transport.log(entry);
    }
  }
}

/** Ids of the active OpenTelemetry span, when a tracer has one open. */
function activeSpanIds(): Pick<LogEntry, "traceId" | "spanId"> {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }
  const { traceId, spanId } = span.spanContext();
  return { traceId, spanId };
}
