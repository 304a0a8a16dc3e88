import type { LogEntry, LogTransport } from "../types.js";

export interface JsonTransportOptions {
  /** Receives each serialized line (default: written to stderr) */
  output?: (line: string) => void;
}

/**
 * One JSON object per line, selected with `MCPML_LOG_FORMAT=json`.
 * Keys that would be empty are left out.
 *
 * @example
 * ```text
 * {"time":"2025-01-02T03:04:05.000Z","level":"debug","logger":"mcpml","component":"tool-registry","message":"Registered tool","data":{"tool":"add"}}
 * ```
 */
export class JsonTransport implements LogTransport {
  private readonly output: (line: string) => void;

  constructor(options: JsonTransportOptions = {}) {
    this.output = options.output ?? ((line) => process.stderr.write(`${line}\n`));
  }

  log({ timestamp, level, context, message, data, traceId, spanId }: LogEntry): void {
    const record = {
      time: timestamp.toISOString(),
      level,
      ...context,
      message,
      ...(data === undefined ? {} : { data }),
      ...(traceId ? { traceId, spanId } : {}),
    };
    this.output(JSON.stringify(record));
  }
}
