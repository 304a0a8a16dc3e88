import { fileURLToPath } from "node:url";
import { describe, expect, it, vi } from "vitest";
import { AgentConfigurationError } from "../../errors/index.js";
import type { ToolDescription } from "../../tool/types.js";
import { AgentFactory, agentModuleNames, collectAgentTools } from "../factory.js";
import { SimpleAgent } from "../simple-agent.js";
import type { AgentDependencies, McpToolProvider } from "../types.js";
import { agentDefinition, fakeChatClient, recordingLogger } from "./helpers.js";

const fixturesDir = fileURLToPath(new URL("./fixtures", import.meta.url));

const addDescription: ToolDescription = {
  name: "add",
  description: "Add two numbers",
  type: "function",
  inputSchema: { type: "object", properties: {}, additionalProperties: true },
};

function fakeMcp() {
  const listTools = vi.fn<McpToolProvider["listTools"]>(async (servers) =>
    servers.includes("search")
      ? [
          {
            server: "search",
            name: "web.search",
            description: "Search the web",
            inputSchema: { type: "object" },
          },
          { server: "search", name: "add", description: "Shadowed", inputSchema: {} },
        ]
      : []
  );
  const callTool = vi.fn<McpToolProvider["callTool"]>(async () => "3 results");
  const dispose = vi.fn<McpToolProvider["dispose"]>(async () => undefined);
  return { listTools, callTool, dispose };
}

function deps(overrides: Partial<AgentDependencies> = {}): AgentDependencies {
  return {
    tools: [addDescription],
    servers: [],
    executeTool: vi.fn(async () => 3),
    logger: recordingLogger().logger,
    ...overrides,
  };
}

describe("agentModuleNames", () => {
  it("lists lookup locations in order", () => {
    expect(agentModuleNames("research")).toEqual([
      "research_agent",
      "agent_research",
      "research",
      "agents/research",
      "agent_types/research",
    ]);
  });
});

describe("collectAgentTools", () => {
  it("routes configured tools through the registry", async () => {
    const executeTool = vi.fn(async () => 3);
    const tools = await collectAgentTools(deps({ executeTool }));

    expect(tools.map((tool) => tool.name)).toEqual(["add"]);
    await expect(tools[0]?.invoke({ a: 1, b: 2 })).resolves.toBe(3);
    expect(executeTool).toHaveBeenCalledWith("add", { a: 1, b: 2 }, undefined);
  });

  it("adds MCP tools and keeps the first of duplicate names", async () => {
    const mcp = fakeMcp();
    const { logger, entries } = recordingLogger();
    const tools = await collectAgentTools(deps({ servers: ["search"], mcp, logger }));

    expect(tools.map((tool) => tool.name)).toEqual(["add", "web_search"]);
    expect(tools[0]?.description).toBe("Add two numbers");
    expect(entries.map((entry) => entry.message)).toContain(
      "Duplicate tool name 'add' from MCP server 'search' ignored"
    );

    await expect(tools[1]?.invoke({ q: "mcp" })).resolves.toBe("3 results");
    expect(mcp.callTool).toHaveBeenCalledWith("search", "web.search", { q: "mcp" }, undefined);
  });

  it("warns when servers are selected without an MCP client", async () => {
    const { logger, entries } = recordingLogger();
    const tools = await collectAgentTools(deps({ servers: ["search"], logger }));

    expect(tools).toHaveLength(1);
    expect(entries[0]?.message).toBe(
      "MCP servers search selected but no MCP client is available"
    );
  });
});

describe("AgentFactory", () => {
  function factory() {
    const { logger, entries } = recordingLogger();
    const fake = fakeChatClient([]);
    return {
      factory: new AgentFactory({
        configDir: fixturesDir,
        logger,
        createClient: () => fake.client,
      }),
      entries,
    };
  }

  it("builds the simple agent", async () => {
    const { factory: agents } = factory();

    const agent = await agents.create(agentDefinition(), deps());

    expect(agent).toBeInstanceOf(SimpleAgent);
  });

  it("constructs a custom agent class", async () => {
    const { factory: agents } = factory();

    const agent = await agents.create(agentDefinition({ agent_type: "echo" }), deps());

    await expect(agent.run("hello", { maxTurns: 4 })).resolves.toBe(
      "assistant heard 'hello' (4 turns)"
    );
  });

  it("calls a custom agent factory function", async () => {
    const { factory: agents } = factory();

    const agent = await agents.create(agentDefinition({ agent_type: "shout" }), deps());

    await expect(agent.run("hello")).resolves.toBe("HELLO (1 tools)");
  });

  it("falls back to the simple agent for unknown types", async () => {
    const { factory: agents, entries } = factory();

    const agent = await agents.create(agentDefinition({ agent_type: "mystery" }), deps());

    expect(agent).toBeInstanceOf(SimpleAgent);
    expect(entries.map((entry) => entry.message)).toContain(
      "Unknown agent type 'mystery' for 'assistant', using simple"
    );
  });

  it("rejects a custom module without an agent export", async () => {
    const { factory: agents } = factory();

    await expect(
      agents.create(agentDefinition({ agent_type: "broken" }), deps())
    ).rejects.toBeInstanceOf(AgentConfigurationError);
  });
});
