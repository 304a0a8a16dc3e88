import type {
  AgentToolDefinition,
  McpmlConfig,
  McpServerDefinition,
  ToolDefinition,
} from "./schema.js";

/**
 * Tools an agent may call.
 *
 * - `tools` absent: every other configured tool
 * - `tools: []`: none
 * - `tools: [a, b]`: those tools, in configuration order
 */
export function selectAgentTools(
  config: McpmlConfig,
  agent: AgentToolDefinition
): ToolDefinition[] {
  if (agent.tools === undefined) {
    return config.tools.filter((tool) => tool.name !== agent.name);
  }
  const wanted = new Set(agent.tools);
  return config.tools.filter((tool) => wanted.has(tool.name) && tool.name !== agent.name);
}

/**
 * MCP servers an agent may use. Disabled servers are never selected.
 *
 * - `mcp_servers` absent: every configured server
 * - `mcp_servers: []`: none
 * - `mcp_servers: [a, b]`: those servers, in configuration order
 */
export function selectAgentServers(
  config: McpmlConfig,
  agent: AgentToolDefinition
): McpServerDefinition[] {
  const enabled = config.mcpServers.filter((server) => !server.disabled);
  if (agent.mcp_servers === undefined) {
    return enabled;
  }
  const wanted = new Set(agent.mcp_servers);
  return enabled.filter((server) => wanted.has(server.name));
}
