import { fileURLToPath } from "node:url";
import { describe, expect, it, vi } from "vitest";
import { AgentFactory } from "../../agents/factory.js";
import type { AgentDependencies, McpmlAgent } from "../../agents/types.js";
import { type AgentToolDefinition, McpmlConfigSchema } from "../../config/index.js";
import {
  ToolExecutionError,
  ToolNotFoundError,
  ToolResolutionError,
  ToolValidationError,
} from "../../errors/index.js";
import { createLogger } from "../../logger/index.js";
import { ToolRegistry } from "../registry.js";

const configDir = fileURLToPath(new URL("./fixtures", import.meta.url));
const logger = createLogger({ transports: [] });

const config = McpmlConfigSchema.parse({
  name: "calculator",
  mcpServers: [
    { name: "files", command: "npx", args: ["-y", "files-server"] },
    { name: "search", url: "http://localhost:9000/mcp" },
  ],
  tools: [
    {
      name: "add",
      description: "Add two numbers",
      implementation: "tools.math.add",
      output_schema: "schemas.results.SumResult",
      parameters: [
        { name: "a", type: "number" },
        { name: "b", type: "number", default: 10 },
      ],
    },
    {
      name: "greet",
      description: "Greet someone",
      implementation: "tools.math.greet",
      parameters: [{ name: "name" }, { name: "greeting", default: "Hello" }],
    },
    { name: "multiply", description: "Multiply", implementation: "tools.math.multiply" },
    { name: "fail", description: "Always fails", implementation: "tools.math.fail" },
    {
      name: "bad_sum",
      description: "Returns the wrong type",
      implementation: "tools.math.badSum",
      output_schema: "schemas.results.SumResult",
    },
    {
      name: "assistant",
      description: "Answers questions",
      type: "agent",
      tools: ["add"],
      mcp_servers: ["search"],
      max_turns: 3,
    },
  ],
});

class RecordingFactory extends AgentFactory {
  readonly calls: Array<{ definition: AgentToolDefinition; deps: AgentDependencies }> = [];
  run = vi.fn(async (input: string) => `answered: ${input}`);

  constructor() {
    super({ configDir, logger });
  }

  override async create(
    definition: AgentToolDefinition,
    deps: AgentDependencies
  ): Promise<McpmlAgent> {
    this.calls.push({ definition, deps });
    return { run: this.run };
  }
}

async function createRegistry(factory = new RecordingFactory()) {
  return ToolRegistry.create(config, { configDir, logger, agentFactory: factory });
}

describe("ToolRegistry.create", () => {
  it("fails on an unresolvable implementation", async () => {
    const broken = McpmlConfigSchema.parse({
      name: "broken",
      tools: [{ name: "x", description: "x", implementation: "tools.math.missing" }],
    });

    await expect(ToolRegistry.create(broken, { configDir, logger })).rejects.toBeInstanceOf(
      ToolResolutionError
    );
  });

  it("fails on an unresolvable output schema", async () => {
    const broken = McpmlConfigSchema.parse({
      name: "broken",
      tools: [
        {
          name: "x",
          description: "x",
          implementation: "tools.math.add",
          output_schema: "schemas.results.notASchema",
        },
      ],
    });

    await expect(ToolRegistry.create(broken, { configDir, logger })).rejects.toThrow(
      "Output schema 'schemas.results.notASchema' is neither a zod schema nor a JSON Schema object"
    );
  });
});

describe("ToolRegistry", () => {
  it("lists tools in configuration order", async () => {
    const registry = await createRegistry();

    expect(registry.name).toBe("calculator");
    expect(registry.list().map((tool) => [tool.name, tool.type])).toEqual([
      ["add", "function"],
      ["greet", "function"],
      ["multiply", "function"],
      ["fail", "function"],
      ["bad_sum", "function"],
      ["assistant", "agent"],
    ]);
  });

  it("describes configured parameters", async () => {
    const registry = await createRegistry();

    expect(registry.describe("add")?.inputSchema).toEqual({
      type: "object",
      properties: { a: { type: "number" }, b: { type: "number", default: 10 } },
      required: ["a"],
    });
    expect(registry.describe("assistant")?.inputSchema.required).toEqual(["input"]);
  });

  it("derives the input schema of a defineTool export", async () => {
    const registry = await createRegistry();

    expect(registry.describe("multiply")?.inputSchema).toMatchObject({
      type: "object",
      properties: { a: { type: "number" }, b: { type: "number" } },
      required: ["a", "b"],
    });
  });

  it("executes function tools with defaults applied", async () => {
    const registry = await createRegistry();

    await expect(registry.execute("add", { a: 5 })).resolves.toBe(15);
    await expect(registry.execute("greet", { name: "Ada" })).resolves.toBe("Hello, Ada!");
  });

  it("rejects unknown tools", async () => {
    const registry = await createRegistry();

    await expect(registry.execute("nope")).rejects.toBeInstanceOf(ToolNotFoundError);
    expect(registry.has("nope")).toBe(false);
    expect(registry.get("add")?.type).toBe("function");
  });

  it("rejects missing required arguments", async () => {
    const registry = await createRegistry();

    await expect(registry.execute("greet", {})).rejects.toThrow(
      "Invalid input for tool 'greet': missing required parameter 'name'"
    );
  });

  it("validates arguments against a zod schema", async () => {
    const registry = await createRegistry();

    await expect(registry.execute("multiply", { a: 3, b: 4 })).resolves.toBe(12);
    await expect(registry.execute("multiply", { a: "3", b: 4 })).rejects.toBeInstanceOf(
      ToolValidationError
    );
  });

  it("wraps errors thrown by the implementation", async () => {
    const registry = await createRegistry();

    const error = await registry.execute("fail").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ToolExecutionError);
    if (error instanceof ToolExecutionError) {
      expect(error.message).toBe("Error executing tool 'fail': division by zero");
      expect(error.cause).toBeInstanceOf(Error);
    }
  });

  it("checks results against the output schema", async () => {
    const registry = await createRegistry();

    await expect(registry.execute("bad_sum")).rejects.toThrow(
      "Error executing tool 'bad_sum': Output does not match 'schemas.results.SumResult': " +
        "Invalid input: expected number, received string"
    );
  });

  it("runs agent tools with their selected tools and servers", async () => {
    const factory = new RecordingFactory();
    const registry = await createRegistry(factory);

    await expect(registry.execute("assistant", { input: "what is 2+2?" })).resolves.toBe(
      "answered: what is 2+2?"
    );

    const call = factory.calls[0];
    expect(call?.definition.name).toBe("assistant");
    expect(call?.deps.tools.map((tool) => tool.name)).toEqual(["add"]);
    expect(call?.deps.servers).toEqual(["search"]);
    expect(factory.run).toHaveBeenCalledWith("what is 2+2?", { maxTurns: 3, signal: undefined });
  });

  it("lets agents call configured tools through the registry", async () => {
    const factory = new RecordingFactory();
    const registry = await createRegistry(factory);
    await registry.execute("assistant", { input: "hi" });

    await expect(factory.calls[0]?.deps.executeTool("add", { a: 1, b: 2 })).resolves.toBe(3);
  });

  it("encodes non-string agent input as JSON", async () => {
    const factory = new RecordingFactory();
    const registry = await createRegistry(factory);

    await registry.execute("assistant", { input: { question: "why" } });

    expect(factory.run).toHaveBeenCalledWith('{"question":"why"}', {
      maxTurns: 3,
      signal: undefined,
    });
  });

  it("requires input for agent tools", async () => {
    const registry = await createRegistry();

    await expect(registry.execute("assistant", {})).rejects.toThrow(
      "Invalid input for tool 'assistant': missing required parameter 'input'"
    );
  });

  it("wraps agent failures", async () => {
    const factory = new RecordingFactory();
    factory.run.mockRejectedValueOnce(new Error("model unavailable"));
    const registry = await createRegistry(factory);

    await expect(registry.execute("assistant", { input: "hi" })).rejects.toThrow(
      "Error executing tool 'assistant': model unavailable"
    );
  });
});
