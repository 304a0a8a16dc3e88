import { ToolExecutionError, ToolNotFoundError, ToolValidationError } from "@mcpml/core";
import { describe, expect, it } from "vitest";
import { CliError, EXIT_CODES, exitCodeFor, usageError } from "../commands/exit-codes.js";

describe("exitCodeFor", () => {
  it("uses the code a CliError carries", () => {
    expect(exitCodeFor(new CliError("boom"))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeFor(usageError("bad flag"))).toBe(EXIT_CODES.USAGE_ERROR);
  });

  it("treats bad tool input as a usage error", () => {
    expect(exitCodeFor(new ToolNotFoundError("nope"))).toBe(2);
    expect(exitCodeFor(new ToolValidationError("add", ["missing required parameter 'a'"]))).toBe(2);
  });

  it("maps aborts to 130", () => {
    const error = new Error("aborted");
    error.name = "AbortError";

    expect(exitCodeFor(error)).toBe(130);
  });

  it("maps everything else to 1", () => {
    expect(exitCodeFor(new ToolExecutionError("add", new Error("kaboom")))).toBe(1);
    expect(exitCodeFor("string failure")).toBe(1);
  });
});
