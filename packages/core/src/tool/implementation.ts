/**
 * Importable references: `module.path.export` or `path/to/module.export`.
 *
 * Modules resolve against the configuration directory first, then as
 * packages installed next to it.
 *
 * @module tool/implementation
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { resolve as resolveEsm } from "import-meta-resolve";
import type { z } from "zod";
import { errorMessage, ToolResolutionError } from "../errors/index.js";
import { isDefinedTool } from "./define.js";
import type { ToolArgs, ToolHandler } from "./types.js";

export const MODULE_EXTENSIONS = [".js", ".mjs", ".cjs", ".ts", ".mts"] as const;

export interface ImplementationReference {
  modulePath: string;
  exportName: string;
}

/**
 * A loaded function tool: the handler plus, for `defineTool` exports, its schema.
 */
export interface ResolvedImplementation {
  handler: ToolHandler;
  schema?: z.ZodObject;
  description?: string;
}

/**
 * Split a reference at its last `.`. Dots in the module part become path
 * separators unless the module part is already a path.
 *
 * @example
 * ```typescript
 * parseReference("tools.math.add"); // { modulePath: "tools/math", exportName: "add" }
 * parseReference("./lib/tools.add"); // { modulePath: "./lib/tools", exportName: "add" }
 * ```
 */
export function parseReference(reference: string): ImplementationReference {
  const trimmed = reference.trim();
  const splitAt = trimmed.lastIndexOf(".");
  const modulePart = splitAt > 0 ? trimmed.slice(0, splitAt) : "";
  const exportName = splitAt > 0 ? trimmed.slice(splitAt + 1) : "";

  if (!modulePart || !exportName || modulePart.endsWith("/") || modulePart.endsWith(".")) {
    throw new ToolResolutionError(
      `Invalid reference '${reference}': expected 'module.export' or 'path/to/module.export'`,
      reference
    );
  }

  const modulePath = modulePart.includes("/") ? modulePart : modulePart.replaceAll(".", "/");
  return { modulePath, exportName };
}

/**
 * Files a module path may live in, in lookup order.
 */
export function moduleCandidates(configDir: string, modulePath: string): string[] {
  const base = path.resolve(configDir, modulePath);
  return [
    ...MODULE_EXTENSIONS.map((ext) => `${base}${ext}`),
    ...MODULE_EXTENSIONS.map((ext) => path.join(base, `index${ext}`)),
  ];
}

function isFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

/**
 * URL of the module to import: a file under the config directory, or a
 * package resolved with ESM `import` conditions from that directory.
 */
function resolveModuleUrl(reference: string, modulePath: string, configDir: string): string {
  const candidates = moduleCandidates(configDir, modulePath);
  const local = candidates.find(isFile);
  if (local) {
    return pathToFileURL(local).href;
  }

  // Relative paths never fall through to package lookup
  if (modulePath.startsWith(".") || path.isAbsolute(modulePath)) {
    throw new ToolResolutionError(
      `Cannot find module '${modulePath}' for '${reference}' (looked in ${configDir})`,
      reference
    );
  }

  try {
    return resolveEsm(modulePath, pathToFileURL(path.join(configDir, "package.json")).href);
  } catch (error) {
    throw new ToolResolutionError(
      `Cannot find module '${modulePath}' for '${reference}': not a file under ${configDir} ` +
        "and not an installed package",
      reference,
      { cause: error }
    );
  }
}

/**
 * Import the module a reference names and return the referenced export.
 */
export async function importReference(reference: string, configDir: string): Promise<unknown> {
  const { modulePath, exportName } = parseReference(reference);
  const url = resolveModuleUrl(reference, modulePath, configDir);

  let loaded: unknown;
  try {
    loaded = await import(url);
  } catch (error) {
    throw new ToolResolutionError(
      `Failed to import '${url}' for '${reference}': ${errorMessage(error)}`,
      reference,
      { cause: error }
    );
  }

  if (typeof loaded !== "object" || loaded === null || !(exportName in loaded)) {
    throw new ToolResolutionError(
      `Module '${modulePath}' has no export '${exportName}'`,
      reference
    );
  }
  const value: unknown = Reflect.get(loaded, exportName);
  return value;
}

/**
 * Load a function tool implementation: a plain function or a `defineTool` export.
 */
export async function resolveImplementation(
  reference: string,
  configDir: string
): Promise<ResolvedImplementation> {
  const value = await importReference(reference, configDir);

  if (isDefinedTool(value)) {
    return { handler: value.handler, schema: value.parameters, description: value.description };
  }
  if (typeof value === "function") {
    return {
      handler: (args: ToolArgs, context) => {
        const result: unknown = Reflect.apply(value, undefined, [args, context]);
        return result;
      },
    };
  }
  throw new ToolResolutionError(
    `Export '${reference}' is not a function or a defineTool() definition`,
    reference
  );
}
