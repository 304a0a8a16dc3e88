import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { ToolRegistry } from "@mcpml/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createMcpServer, formatToolResult } from "../server/McpmlServer.js";
import { createFixtureRegistry, silentLogger } from "./helpers.js";

describe("formatToolResult", () => {
  it("should pass strings through", () => {
    expect(formatToolResult("plain text")).toBe("plain text");
  });

  it("should encode other values as indented JSON", () => {
    expect(formatToolResult({ a: 1 })).toBe('{\n  "a": 1\n}');
    expect(formatToolResult(42)).toBe("42");
    expect(formatToolResult(undefined)).toBe("null");
  });
});

describe("createMcpServer", () => {
  let registry: ToolRegistry;
  let server: Server;
  let client: Client;

  beforeEach(async () => {
    registry = await createFixtureRegistry();
    server = createMcpServer(registry, { version: "9.9.9", logger: silentLogger });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("should report the configuration name as the server name", () => {
    expect(client.getServerVersion()).toEqual({ name: "fixture-tools", version: "9.9.9" });
    expect(client.getServerCapabilities()?.tools).toEqual({});
  });

  it("should list every configured tool with its input schema", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name)).toEqual(["add", "echo", "profile", "explode"]);
    expect(tools[1]).toEqual({
      name: "echo",
      description: "Echo text back",
      inputSchema: {
        type: "object",
        properties: { text: { type: "string", description: "Text to echo" } },
        required: ["text"],
      },
    });
  });

  it("should return a string result as a single text item", async () => {
    const result = await client.callTool({ name: "echo", arguments: { text: "hi" } });

    expect(result.content).toEqual([{ type: "text", text: "hi" }]);
    expect(result.isError).toBeUndefined();
  });

  it("should encode other results as JSON", async () => {
    const sum = await client.callTool({ name: "add", arguments: { a: 2, b: 3 } });
    const profile = await client.callTool({ name: "profile", arguments: { name: "Ada" } });

    expect(sum.content).toEqual([{ type: "text", text: "5" }]);
    expect(profile.content).toEqual([
      { type: "text", text: '{\n  "name": "Ada",\n  "tags": [\n    "fixture"\n  ]\n}' },
    ]);
  });

  it("should flag a failing tool with isError", async () => {
    const result = await client.callTool({ name: "explode", arguments: {} });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      { type: "text", text: "Error executing tool 'explode': kaboom" },
    ]);
  });

  it("should flag missing arguments and unknown tools with isError", async () => {
    const missing = await client.callTool({ name: "add", arguments: { b: 1 } });
    const unknown = await client.callTool({ name: "nope", arguments: {} });

    expect(missing).toEqual({
      content: [
        { type: "text", text: "Invalid input for tool 'add': missing required parameter 'a'" },
      ],
      isError: true,
    });
    expect(unknown.content).toEqual([{ type: "text", text: "Tool not found: nope" }]);
  });
});
