import { Chalk, type ChalkInstance } from "chalk";
import type { LogEntry, LogLevel, LogTransport } from "../types.js";

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Line sink (default: process.stderr) */
  write?: (line: string) => void;
}

const LEVEL_STYLES: Record<LogLevel, (c: ChalkInstance, text: string) => string> = {
  trace: (c, text) => c.gray(text),
  debug: (c, text) => c.cyan(text),
  info: (c, text) => c.green(text),
  warn: (c, text) => c.yellow(text),
  error: (c, text) => c.red(text),
  fatal: (c, text) => c.magenta.bold(text),
};

/**
 * Colors are off when NO_COLOR is set (https://no-color.org/), in CI,
 * or when stderr is not a terminal.
 */
function shouldEnableColors(): boolean {
  if (process.env.NO_COLOR !== undefined || process.env.CI) {
    return false;
  }
  return Boolean(process.stderr.isTTY);
}

function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Human-readable transport.
 *
 * Writes to stderr: when serving MCP over stdio, stdout carries protocol frames.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ transports: [new ConsoleTransport({ colors: false })] });
 * logger.info("Serving", { port: 8000 });
 * // [2025-01-01 10:00:00] [INFO ] mcpml: Serving {"port":8000}
 * ```
 */
export class ConsoleTransport implements LogTransport {
  private readonly chalk: ChalkInstance;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    const colors = options.colors ?? shouldEnableColors();
    this.chalk = new Chalk({ level: colors ? 1 : 0 });
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  log(entry: LogEntry): void {
    const timestamp = formatTimestamp(entry.timestamp);
    const level = LEVEL_STYLES[entry.level](this.chalk, `[${entry.level.toUpperCase().padEnd(5)}]`);
    const scope = typeof entry.context?.logger === "string" ? ` ${entry.context.logger}:` : "";

    let output = `[${timestamp}] ${level}${scope} ${entry.message}`;

    if (entry.data !== undefined) {
      output += ` ${typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data)}`;
    }

    this.write(output);
  }
}
