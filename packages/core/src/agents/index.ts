export {
  AgentFactory,
  type AgentFactoryOptions,
  agentModuleNames,
  collectAgentTools,
  SIMPLE_AGENT_TYPE,
} from "./factory.js";
export { createModelClient } from "./model-client.js";
export { SimpleAgent, stringifyToolResult } from "./simple-agent.js";
export type {
  AgentContext,
  AgentDependencies,
  AgentRunOptions,
  AgentTool,
  ChatClient,
  McpmlAgent,
  McpToolInfo,
  McpToolProvider,
} from "./types.js";
