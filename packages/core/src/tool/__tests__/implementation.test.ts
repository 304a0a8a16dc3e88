import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { ToolResolutionError } from "../../errors/index.js";
import { createLogger } from "../../logger/index.js";
import {
  importReference,
  moduleCandidates,
  parseReference,
  resolveImplementation,
} from "../implementation.js";

const fixturesDir = fileURLToPath(new URL("./fixtures", import.meta.url));
const context = { toolName: "test", logger: createLogger({ transports: [] }) };

describe("parseReference", () => {
  it("maps dotted module paths to directories", () => {
    expect(parseReference("tools.math.add")).toEqual({
      modulePath: "tools/math",
      exportName: "add",
    });
  });

  it("keeps slash paths as written", () => {
    expect(parseReference("./lib/tools.add")).toEqual({
      modulePath: "./lib/tools",
      exportName: "add",
    });
    expect(parseReference("path/to/module.run")).toEqual({
      modulePath: "path/to/module",
      exportName: "run",
    });
  });

  it.each(["add", ".add", "tools.", "tools/.add"])("rejects '%s'", (reference) => {
    expect(() => parseReference(reference)).toThrow(ToolResolutionError);
  });
});

describe("moduleCandidates", () => {
  it("tries each extension before index files", () => {
    const candidates = moduleCandidates("/cfg", "tools/math");

    expect(candidates.slice(0, 5)).toEqual([
      "/cfg/tools/math.js",
      "/cfg/tools/math.mjs",
      "/cfg/tools/math.cjs",
      "/cfg/tools/math.ts",
      "/cfg/tools/math.mts",
    ]);
    expect(candidates[5]).toBe(path.join("/cfg/tools/math", "index.js"));
    expect(candidates).toHaveLength(10);
  });
});

describe("importReference", () => {
  it("returns the named export", async () => {
    await expect(importReference("tools.math.answer", fixturesDir)).resolves.toBe(42);
  });

  it("finds index modules", async () => {
    const ping = await importReference("tools.ping", fixturesDir);

    expect(typeof ping).toBe("function");
  });

  it("reports a missing export", async () => {
    await expect(importReference("tools.math.missing", fixturesDir)).rejects.toThrow(
      "Module 'tools/math' has no export 'missing'"
    );
  });

  it("reports a module that is neither a file nor a package", async () => {
    await expect(importReference("nowhere.fn", fixturesDir)).rejects.toBeInstanceOf(
      ToolResolutionError
    );
  });

  it("does not look up packages for relative paths", async () => {
    await expect(importReference("./nowhere.fn", fixturesDir)).rejects.toThrow(
      `Cannot find module './nowhere' for './nowhere.fn' (looked in ${fixturesDir})`
    );
  });
});

describe("importReference from installed packages", () => {
  let projectDir: string;

  // A package with only an `import` export condition, as ESM-only libraries publish
  beforeAll(async () => {
    projectDir = await fs.mkdtemp(path.join(os.tmpdir(), "mcpml-esm-"));
    const packageDir = path.join(projectDir, "node_modules", "esm-only-tools");
    await fs.mkdir(packageDir, { recursive: true });
    await fs.writeFile(
      path.join(packageDir, "package.json"),
      JSON.stringify({
        name: "esm-only-tools",
        version: "1.0.0",
        type: "module",
        exports: { ".": { import: "./index.js" } },
      })
    );
    await fs.writeFile(
      path.join(packageDir, "index.js"),
      "export function greet(name) {\n  return `Hello, ${name}!`;\n}\n"
    );
  });

  afterAll(async () => {
    await fs.rm(projectDir, { recursive: true, force: true });
  });

  it("imports a package that only exports an import condition", async () => {
    const greet = await importReference("esm-only-tools.greet", projectDir);

    expect(typeof greet).toBe("function");
    if (typeof greet === "function") {
      expect(greet("Ada")).toBe("Hello, Ada!");
    }
  });

  it("reports a package export that does not exist", async () => {
    await expect(importReference("esm-only-tools.farewell", projectDir)).rejects.toThrow(
      "Module 'esm-only-tools' has no export 'farewell'"
    );
  });
});

describe("resolveImplementation", () => {
  it("wraps a plain function", async () => {
    const resolved = await resolveImplementation("tools.math.add", fixturesDir);

    expect(resolved.schema).toBeUndefined();
    expect(resolved.handler({ a: 2, b: 3 }, context)).toBe(5);
  });

  it("keeps the schema of a defineTool export", async () => {
    const resolved = await resolveImplementation("tools.math.multiply", fixturesDir);

    expect(resolved.description).toBe("Multiply two numbers");
    expect(resolved.schema?.safeParse({ a: 2, b: 4 }).success).toBe(true);
    expect(resolved.handler({ a: 2, b: 4 }, context)).toBe(8);
  });

  it("rejects exports that cannot be called", async () => {
    await expect(resolveImplementation("tools.math.answer", fixturesDir)).rejects.toThrow(
      "Export 'tools.math.answer' is not a function or a defineTool() definition"
    );
  });
});
