/**
 * What every command needs: where to print, how to log, and how to turn the
 * `--config` source into a loaded project.
 *
 * @module cli/context
 */

import {
  type ConfigError,
  createLogger,
  type LoadedConfig,
  type LoadConfigOptions,
  loadConfigFromSource,
  type Logger,
  type LogLevel,
  type LogTransport,
  parseLogLevel,
  ToolRegistry,
} from "@mcpml/core";
import { McpHub } from "@mcpml/mcp";
import { CliError, usageError } from "./commands/exit-codes.js";
import { version } from "./version.js";

// =============================================================================
// Types
// =============================================================================

export interface CliIO {
  /** Raw write to stdout */
  stdout(text: string): void;
  /** Raw write to stderr */
  stderr(text: string): void;
}

/** Options every command accepts; a type alias so it satisfies commander's `OptionValues` */
export type GlobalOptions = {
  config?: string;
  logLevel?: string;
};

export interface CliContextOptions {
  io?: CliIO;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Replace the stderr log transport */
  logTransports?: LogTransport[];
  /** Passed through to configuration loading, e.g. a git client in tests */
  loadOptions?: Omit<LoadConfigOptions, "cwd" | "logger">;
}

/**
 * A loaded configuration with its tools resolved and MCP servers ready to
 * connect on first use.
 */
export interface Project {
  loaded: LoadedConfig;
  registry: ToolRegistry;
  hub: McpHub;
  logger: Logger;
  /** Closes MCP connections */
  dispose(): Promise<void>;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Render a configuration error with one indented line per issue.
 */
export function configErrorToCliError(error: ConfigError): CliError {
  return new CliError(error.message, undefined, (error.issues ?? []).map((i) => `  - ${i}`));
}

// =============================================================================
// Context
// =============================================================================

export class CliContext {
  readonly io: CliIO;
  readonly cwd: string;
  readonly env: NodeJS.ProcessEnv;
  readonly logger: Logger;
  private readonly loadOptions: CliContextOptions["loadOptions"];
  private readonly configs = new Map<string, Promise<LoadedConfig>>();

  constructor(options: CliContextOptions = {}) {
    this.io = options.io ?? processIO;
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env ?? process.env;
    this.loadOptions = options.loadOptions;
    this.logger = createLogger({
      name: "mcpml-cli",
      level: this.envLogLevel() ?? "info",
      json: this.env.MCPML_LOG_FORMAT === "json",
      transports: options.logTransports,
    });
  }

  print(text: string): void {
    this.io.stdout(`${text}\n`);
  }

  printError(text: string): void {
    this.io.stderr(`${text}\n`);
  }

  /**
   * Apply the log level: `--log-level` flag, then MCPML_LOG_LEVEL, then the
   * configuration's `settings.log_level`.
   */
  applyLogLevel(flag: string | undefined, settingsLevel?: string): LogLevel {
    let level: LogLevel | undefined;
    if (flag !== undefined) {
      level = parseLogLevel(flag);
      if (level === undefined) {
        throw usageError(
          `Unknown log level '${flag}' (expected DEBUG, INFO, WARNING, ERROR or CRITICAL)`
        );
      }
    }
    level ??= this.envLogLevel();
    level ??= settingsLevel === undefined ? undefined : parseLogLevel(settingsLevel);
    level ??= "info";
    this.logger.setLevel(level);
    return level;
  }

  /**
   * Load the configuration named by `--config`, once per source.
   *
   * @throws CliError listing every problem in the configuration
   */
  async loadConfig(options: GlobalOptions): Promise<LoadedConfig> {
    // Anything set before the config loads (the flag) takes effect for loading itself
    this.applyLogLevel(options.logLevel);
    const key = options.config ?? "";
    let pending = this.configs.get(key);
    if (!pending) {
      pending = loadConfigFromSource(options.config, {
        ...this.loadOptions,
        cwd: this.cwd,
        logger: this.logger,
      }).then((result) => {
        if (!result.ok) {
          throw configErrorToCliError(result.error);
        }
        return result.value;
      });
      this.configs.set(key, pending);
    }
    const loaded = await pending;
    this.applyLogLevel(options.logLevel, loaded.config.settings.log_level);
    return loaded;
  }

  /**
   * Load the configuration and resolve its tools. MCP servers are not
   * contacted until a tool needs them.
   */
  async openProject(options: GlobalOptions): Promise<Project> {
    const loaded = await this.loadConfig(options);
    const hub = new McpHub({
      servers: loaded.config.mcpServers,
      logger: this.logger,
      clientVersion: version,
      env: this.env,
    });
    const registry = await ToolRegistry.create(loaded.config, {
      configDir: loaded.configDir,
      logger: this.logger,
      mcp: hub,
    });
    return {
      loaded,
      registry,
      hub,
      logger: this.logger,
      dispose: () => hub.dispose(),
    };
  }

  private envLogLevel(): LogLevel | undefined {
    const value = this.env.MCPML_LOG_LEVEL;
    return value === undefined ? undefined : parseLogLevel(value);
  }
}
