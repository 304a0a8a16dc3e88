import { createLogger, type LogEntry } from "@mcpml/core";
import { afterEach, describe, expect, it, vi } from "vitest";
import { closeWithin, waitForShutdown } from "../shutdown.js";

function recordingLogger() {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    transports: [
      {
        log: (entry) => {
          entries.push(entry);
        },
      },
    ],
  });
  return { logger, entries };
}

describe("waitForShutdown", () => {
  it("resolves when the close hook fires and removes its signal handlers", async () => {
    const before = process.listenerCount("SIGTERM");

    const reason = await waitForShutdown((close) => close());

    expect(reason).toBe("closed");
    expect(process.listenerCount("SIGTERM")).toBe(before);
  });
});

describe("closeWithin", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns once the step finishes", async () => {
    const { logger, entries } = recordingLogger();

    await closeWithin("server", Promise.resolve(), logger, 1000);

    expect(entries).toEqual([]);
  });

  it("warns and moves on when the step hangs", async () => {
    vi.useFakeTimers();
    const { logger, entries } = recordingLogger();

    const pending = closeWithin("server", new Promise<void>(() => undefined), logger, 50);
    await vi.advanceTimersByTimeAsync(50);
    await pending;

    expect(entries.map((entry) => entry.message)).toEqual([
      "Closing server took longer than 50ms, continuing",
    ]);
  });
});
