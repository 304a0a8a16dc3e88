export {
  DEFAULT_CONFIG_FILE,
  type LoadConfigOptions,
  type LoadedConfig,
  loadConfigFile,
  loadConfigFromSource,
  loadEnvironment,
  parseConfig,
} from "./loader.js";
export {
  type AgentToolDefinition,
  AgentToolSchema,
  type FunctionToolDefinition,
  FunctionToolSchema,
  type McpmlConfig,
  McpmlConfigSchema,
  type McpServerDefinition,
  McpServerDefinitionSchema,
  type McpTransportType,
  type ParameterType,
  type ServerSettings,
  type Settings,
  type ToolDefinition,
  ToolDefinitionSchema,
  type ToolParameter,
  ToolParameterSchema,
  type ToolType,
  validateReferences,
} from "./schema.js";
export { selectAgentServers, selectAgentTools } from "./selection.js";
export {
  type CommandRunner,
  type GitClient,
  cacheKeyForUrl,
  getCacheDir,
  isGitHubUrl,
  type RemoteSourceOptions,
  resolveRemoteSource,
  runInstallationSteps,
} from "./source.js";
export type { ConfigError, ConfigErrorCode } from "./types.js";
