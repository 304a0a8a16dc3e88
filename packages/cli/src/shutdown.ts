/**
 * Waiting for the end of a long-running command.
 */

import { DEFAULT_SHUTDOWN_TIMEOUT_MS } from "@mcpml/mcp";
import type { Logger } from "@mcpml/core";

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Resolve with the first of SIGINT, SIGTERM or `closed` (when the caller's
 * `onClose` hook fires). Signal handlers are removed afterwards.
 */
export function waitForShutdown(onClose?: (close: () => void) => void): Promise<string> {
  return new Promise((resolve) => {
    const handlers = new Map<NodeJS.Signals, () => void>();
    const finish = (reason: string): void => {
      for (const [signal, handler] of handlers) {
        process.off(signal, handler);
      }
      handlers.clear();
      resolve(reason);
    };
    for (const signal of SHUTDOWN_SIGNALS) {
      const handler = (): void => finish(signal);
      handlers.set(signal, handler);
      process.once(signal, handler);
    }
    onClose?.(() => finish("closed"));
  });
}

/**
 * Run a cleanup step, giving up after the shutdown grace period.
 */
export async function closeWithin(
  what: string,
  closing: Promise<void>,
  logger: Logger,
  timeoutMs = DEFAULT_SHUTDOWN_TIMEOUT_MS
): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), timeoutMs);
  });
  try {
    const outcome = await Promise.race([closing.then(() => "closed" as const), timeout]);
    if (outcome === "timeout") {
      logger.warn(`Closing ${what} took longer than ${timeoutMs}ms, continuing`);
    }
  } finally {
    clearTimeout(timer);
  }
}
