import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Err, Ok, type Result } from "@mcpml/shared";
import dotenv from "dotenv";
import yaml from "js-yaml";
import { errorMessage } from "../errors/index.js";
import type { Logger } from "../logger/index.js";
import { type McpmlConfig, McpmlConfigSchema, validateReferences } from "./schema.js";
import { isGitHubUrl, type RemoteSourceOptions, resolveRemoteSource } from "./source.js";
import type { ConfigError } from "./types.js";

// ============================================
// Configuration Loader
// ============================================

/** File name looked up in directories and remote checkouts */
export const DEFAULT_CONFIG_FILE = "mcpml.yaml";

export interface LoadedConfig {
  config: McpmlConfig;
  /** Directory that implementation references and the env file resolve against */
  configDir: string;
  configPath: string;
}

export interface LoadConfigOptions extends RemoteSourceOptions {
  /** Base for relative sources (default: process.cwd()) */
  cwd?: string;
  /** Skip reading the env file named in settings */
  skipEnv?: boolean;
}

/**
 * Parse and validate YAML configuration text.
 *
 * @param content - Raw YAML
 * @param filePath - Used in error messages only
 *
 * @example
 * ```typescript
 * const result = parseConfig("name: demo\ntools: []\n");
 * if (result.ok) {
 *   console.log(result.value.settings.server.port); // 8000
 * }
 * ```
 */
export function parseConfig(
  content: string,
  filePath = "<string>"
): Result<McpmlConfig, ConfigError> {
  if (!content.trim()) {
    return Err({
      code: "PARSE_ERROR",
      message: `Configuration file is empty: ${filePath}`,
      path: filePath,
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: filePath });
  } catch (error) {
    return Err({
      code: "PARSE_ERROR",
      message: `YAML parse error in ${filePath}: ${errorMessage(error)}`,
      path: filePath,
      cause: error,
    });
  }

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    return Err({
      code: "PARSE_ERROR",
      message: `Configuration must be a YAML mapping: ${filePath}`,
      path: filePath,
    });
  }

  const result = McpmlConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const location = issue.path.join(".");
      return location ? `${location}: ${issue.message}` : issue.message;
    });
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration in ${filePath}: ${issues.join("; ")}`,
      path: filePath,
      issues,
      cause: result.error,
    });
  }

  const referenceIssues = validateReferences(result.data);
  if (referenceIssues.length > 0) {
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration in ${filePath}: ${referenceIssues.join("; ")}`,
      path: filePath,
      issues: referenceIssues,
    });
  }

  return Ok(result.data);
}

/**
 * Read and parse a configuration file.
 */
export async function loadConfigFile(filePath: string): Promise<Result<McpmlConfig, ConfigError>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    const notFound = error instanceof Error && "code" in error && error.code === "ENOENT";
    return Err({
      code: notFound ? "FILE_NOT_FOUND" : "READ_ERROR",
      message: notFound
        ? `Configuration file not found: ${filePath}`
        : `Failed to read configuration file ${filePath}: ${errorMessage(error)}`,
      path: filePath,
      cause: error,
    });
  }
  return parseConfig(content, filePath);
}

async function statOrUndefined(target: string): Promise<import("node:fs").Stats | undefined> {
  try {
    return await fs.stat(target);
  } catch {
    return undefined;
  }
}

/**
 * Turn a source argument into the path of a config file.
 */
async function resolveConfigPath(
  source: string | undefined,
  options: LoadConfigOptions
): Promise<Result<string, ConfigError>> {
  const cwd = options.cwd ?? process.cwd();

  if (source === undefined) {
    return Ok(path.join(cwd, DEFAULT_CONFIG_FILE));
  }

  if (isGitHubUrl(source)) {
    const checkout = await resolveRemoteSource(source, options);
    return checkout.ok ? Ok(path.join(checkout.value, DEFAULT_CONFIG_FILE)) : checkout;
  }

  const localPath = path.resolve(cwd, source);
  const stats = await statOrUndefined(localPath);
  if (stats?.isDirectory()) {
    return Ok(path.join(localPath, DEFAULT_CONFIG_FILE));
  }
  if (stats?.isFile()) {
    return Ok(localPath);
  }
  return Err({
    code: "FILE_NOT_FOUND",
    message: `Local configuration source not found: ${source}`,
    path: localPath,
  });
}

/**
 * Load environment variables from the configured env file, then from the
 * working directory's `.env`. Variables that are already set win.
 *
 * @returns Paths of the files that were loaded
 */
export async function loadEnvironment(
  loaded: LoadedConfig,
  options: { cwd?: string; logger?: Logger } = {}
): Promise<string[]> {
  const candidates: string[] = [];
  const envFile = loaded.config.settings.env_file;
  if (envFile !== null) {
    candidates.push(path.resolve(loaded.configDir, envFile));
  }
  candidates.push(path.resolve(options.cwd ?? process.cwd(), ".env"));

  const loadedFiles: string[] = [];
  for (const candidate of new Set(candidates)) {
    const stats = await statOrUndefined(candidate);
    if (!stats?.isFile()) {
      if (candidate === candidates[0] && envFile !== null) {
        // The default .env is usually absent; a file the config names is not
        if (envFile === ".env") {
          options.logger?.debug(`Environment file not found: ${candidate}`);
        } else {
          options.logger?.warn(`Environment file not found: ${candidate}`);
        }
      }
      continue;
    }
    const result = dotenv.config({ path: candidate, override: false });
    if (result.error) {
      options.logger?.warn(`Failed to load environment file ${candidate}`, {
        error: result.error.message,
      });
      continue;
    }
    options.logger?.debug(`Loaded environment variables from ${candidate}`);
    loadedFiles.push(candidate);
  }
  return loadedFiles;
}

/**
 * Load configuration from a local file, a local directory, a GitHub URL,
 * or `./mcpml.yaml` when no source is given.
 *
 * @example
 * ```typescript
 * const result = await loadConfigFromSource("https://github.com/acme/mcp-tools");
 * if (!result.ok) {
 *   logger.error(result.error.message);
 *   process.exit(1);
 * }
 * const { config, configDir } = result.value;
 * ```
 */
export async function loadConfigFromSource(
  source?: string,
  options: LoadConfigOptions = {}
): Promise<Result<LoadedConfig, ConfigError>> {
  const configPath = await resolveConfigPath(source, options);
  if (!configPath.ok) {
    return configPath;
  }

  options.logger?.debug(`Loading configuration from ${configPath.value}`);
  const config = await loadConfigFile(configPath.value);
  if (!config.ok) {
    return config;
  }

  const loaded: LoadedConfig = {
    config: config.value,
    configDir: path.dirname(configPath.value),
    configPath: configPath.value,
  };

  if (!options.skipEnv) {
    await loadEnvironment(loaded, { cwd: options.cwd, logger: options.logger });
  }

  options.logger?.info(`Loaded configuration '${loaded.config.name}' from ${loaded.configPath}`);
  return Ok(loaded);
}
