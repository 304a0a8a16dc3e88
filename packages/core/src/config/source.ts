/**
 * Remote configuration sources.
 *
 * A GitHub URL given as the config source is cloned into a cache directory
 * (or pulled when already cached), and the checkout's installation steps run
 * before the configuration inside it is loaded.
 *
 * @module config/source
 */

import { execFile } from "node:child_process";
import { createHash } from "node:crypto";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { promisify } from "node:util";
import { Err, Ok, type Result } from "@mcpml/shared";
import { simpleGit } from "simple-git";
import { errorMessage } from "../errors/index.js";
import type { Logger } from "../logger/index.js";
import type { ConfigError } from "./types.js";

const execFileAsync = promisify(execFile);

/**
 * Runs an external command in a directory; rejects when the command fails.
 */
export type CommandRunner = (command: string, args: string[], cwd: string) => Promise<void>;

/**
 * The git operations a remote source needs; satisfied by a simple-git instance.
 */
export interface GitClient {
  clone(repoPath: string, localPath: string): Promise<unknown>;
  pull(): Promise<unknown>;
}

export interface RemoteSourceOptions {
  /** Override the checkout cache (default: MCPML_CACHE_DIR or ~/.cache/mcpml/repos) */
  cacheDir?: string;
  /** simple-git factory, replaced in tests */
  git?: (baseDir?: string) => GitClient;
  runCommand?: CommandRunner;
  platform?: NodeJS.Platform;
  logger?: Logger;
}

const defaultRunCommand: CommandRunner = async (command, args, cwd) => {
  await execFileAsync(command, args, { cwd, windowsHide: true });
};

export function isGitHubUrl(source: string): boolean {
  return source.startsWith("https://github.com/") || source.startsWith("git@github.com:");
}

export function getCacheDir(): string {
  return process.env.MCPML_CACHE_DIR ?? path.join(os.homedir(), ".cache", "mcpml", "repos");
}

/**
 * Directory name for a cached checkout: `<repo>-<sha256(url) prefix>`.
 *
 * @example
 * ```typescript
 * cacheKeyForUrl("git@github.com:acme/tools.git"); // "tools-3f2a..." (16 hex chars)
 * ```
 */
export function cacheKeyForUrl(url: string): string {
  const hash = createHash("sha256").update(url).digest("hex").slice(0, 16);
  const lastSegment = url.split(":").at(-1) ?? "";
  const repoName = path.posix.basename(lastSegment.replace(/\.git$/, ""));
  return repoName ? `${repoName}-${hash}` : hash;
}

/**
 * Run the checkout's dependency installation: `install-deps.sh` / `install-deps.cmd`,
 * then `npm install` when a package.json is present. Failures are logged, not thrown.
 */
export async function runInstallationSteps(
  repoPath: string,
  options: RemoteSourceOptions = {}
): Promise<void> {
  const runCommand = options.runCommand ?? defaultRunCommand;
  const isWindows = (options.platform ?? process.platform) === "win32";
  const logger = options.logger;

  const script = path.join(repoPath, isWindows ? "install-deps.cmd" : "install-deps.sh");
  if (fs.existsSync(script)) {
    logger?.info(`Running installation script ${script}`);
    try {
      if (isWindows) {
        await runCommand(script, [], repoPath);
      } else {
        fs.chmodSync(script, 0o755);
        await runCommand("bash", [script], repoPath);
      }
      logger?.info(`Installation script ${script} completed`);
    } catch (error) {
      logger?.warn(`Installation script ${script} failed`, { error: errorMessage(error) });
    }
  }

  if (fs.existsSync(path.join(repoPath, "package.json"))) {
    logger?.info("Installing npm dependencies");
    try {
      await runCommand(isWindows ? "npm.cmd" : "npm", ["install"], repoPath);
    } catch (error) {
      logger?.warn("npm install failed", { error: errorMessage(error) });
    }
  }
}

/**
 * Clone or update a GitHub repository in the cache.
 *
 * @returns The local checkout directory
 */
export async function resolveRemoteSource(
  url: string,
  options: RemoteSourceOptions = {}
): Promise<Result<string, ConfigError>> {
  const git =
    options.git ?? ((baseDir?: string): GitClient => (baseDir ? simpleGit(baseDir) : simpleGit()));
  const logger = options.logger;
  const cacheDir = options.cacheDir ?? getCacheDir();
  const localPath = path.join(cacheDir, cacheKeyForUrl(url));

  logger?.info(`Resolving remote config: ${url} -> ${localPath}`);

  if (fs.existsSync(localPath)) {
    try {
      await git(localPath).pull();
      await runInstallationSteps(localPath, options);
    } catch (error) {
      logger?.warn(`Failed to update ${localPath}, using cached version`, {
        error: errorMessage(error),
      });
    }
    return Ok(localPath);
  }

  try {
    fs.mkdirSync(cacheDir, { recursive: true });
    await git().clone(url, localPath);
  } catch (error) {
    return Err({
      code: "SOURCE_ERROR",
      message: `Failed to clone repository ${url}: ${errorMessage(error)}`,
      path: url,
      cause: error,
    });
  }

  await runInstallationSteps(localPath, options);
  return Ok(localPath);
}
