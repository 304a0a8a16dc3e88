import { Chalk, type ChalkInstance } from "chalk";

/**
 * Text printed for a tool result: objects and arrays as indented JSON,
 * everything else through String().
 */
export function formatOutput(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

/**
 * Colors for output on stdout. Off when NO_COLOR is set or stdout is not a terminal.
 */
export function createChalk(env: NodeJS.ProcessEnv = process.env): ChalkInstance {
  const enabled = env.NO_COLOR === undefined && Boolean(process.stdout.isTTY);
  return new Chalk({ level: enabled ? 1 : 0 });
}
