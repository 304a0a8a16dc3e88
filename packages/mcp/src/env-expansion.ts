// ============================================
// Environment Variable Expansion
// ============================================

import type { McpServerDefinition } from "@mcpml/core";

/** Matches `${env:VAR_NAME}` and captures the name */
const ENV_VAR_PATTERN = /\$\{env:(\w+)\}/g;

export type Environment = Record<string, string | undefined>;

/**
 * Replace `${env:VAR}` placeholders in a string. Unset variables expand to "".
 *
 * @example
 * ```typescript
 * expandString("Bearer ${env:API_TOKEN}", { API_TOKEN: "test-token" });
 * // "Bearer test-token"
 * ```
 */
export function expandString(value: string, env: Environment = process.env): string {
  return value.replace(ENV_VAR_PATTERN, (_, name: string) => env[name] ?? "");
}

export function expandRecord(
  record: Record<string, string>,
  env: Environment = process.env
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = expandString(value, env);
  }
  return result;
}

/**
 * Names of all `${env:...}` placeholders in a string, in order of appearance.
 */
export function extractEnvironmentVariables(value: string): string[] {
  return [...value.matchAll(ENV_VAR_PATTERN)].flatMap((match) =>
    match[1] === undefined ? [] : [match[1]]
  );
}

function definitionStrings(server: McpServerDefinition): string[] {
  return [
    server.command ?? "",
    ...server.args,
    server.cwd ?? "",
    server.url ?? "",
    ...Object.values(server.env ?? {}),
    ...Object.values(server.headers ?? {}),
  ];
}

/**
 * Variables a server definition references but the environment does not set.
 */
export function findMissingVariables(
  server: McpServerDefinition,
  env: Environment = process.env
): string[] {
  const names = definitionStrings(server).flatMap(extractEnvironmentVariables);
  return [...new Set(names)].filter((name) => env[name] === undefined);
}

/**
 * Expand placeholders in every string field a connection uses.
 */
export function expandServerDefinition(
  server: McpServerDefinition,
  env: Environment = process.env
): McpServerDefinition {
  return {
    ...server,
    command: server.command === undefined ? undefined : expandString(server.command, env),
    args: server.args.map((arg) => expandString(arg, env)),
    cwd: server.cwd === undefined ? undefined : expandString(server.cwd, env),
    url: server.url === undefined ? undefined : expandString(server.url, env),
    env: server.env === undefined ? undefined : expandRecord(server.env, env),
    headers: server.headers === undefined ? undefined : expandRecord(server.headers, env),
  };
}
