// ============================================
// Unit Tests for Environment Variable Expansion
// ============================================
// biome-ignore-all lint/suspicious/noTemplateCurlyInString: Test file for environment variable expansion patterns like ${env:VAR}

import type { McpServerDefinition } from "@mcpml/core";
import { describe, expect, it } from "vitest";
import {
  expandServerDefinition,
  expandString,
  extractEnvironmentVariables,
  findMissingVariables,
} from "../env-expansion.js";

const env = {
  TEST_VAR: "test-value",
  API_KEY: "test-key",
  EMPTY_VAR: "",
};

function server(fields: Partial<McpServerDefinition>): McpServerDefinition {
  return { name: "files", args: [], timeout: 60, disabled: false, ...fields };
}

describe("expandString", () => {
  it("should expand a single variable", () => {
    expect(expandString("${env:TEST_VAR}", env)).toBe("test-value");
  });

  it("should expand several variables with surrounding text", () => {
    expect(expandString("Bearer ${env:API_KEY}/${env:TEST_VAR}", env)).toBe(
      "Bearer test-key/test-value"
    );
  });

  it("should return empty string for an unset variable", () => {
    expect(expandString("x${env:UNDEFINED_VAR}y", env)).toBe("xy");
  });

  it("should preserve an empty variable value", () => {
    expect(expandString("prefix-${env:EMPTY_VAR}-suffix", env)).toBe("prefix--suffix");
  });

  it("should leave other dollar syntax alone", () => {
    expect(expandString("${TEST_VAR} $TEST_VAR", env)).toBe("${TEST_VAR} $TEST_VAR");
  });

  it("should read process.env by default", () => {
    process.env.MCPML_TEST_EXPAND = "from-process";
    try {
      expect(expandString("${env:MCPML_TEST_EXPAND}")).toBe("from-process");
    } finally {
      delete process.env.MCPML_TEST_EXPAND;
    }
  });
});

describe("extractEnvironmentVariables", () => {
  it("should list names in order of appearance", () => {
    expect(extractEnvironmentVariables("${env:B} and ${env:A} and ${env:B}")).toEqual([
      "B",
      "A",
      "B",
    ]);
  });

  it("should return an empty list without placeholders", () => {
    expect(extractEnvironmentVariables("static-value")).toEqual([]);
  });
});

describe("expandServerDefinition", () => {
  it("should expand command, args, cwd, env and headers", () => {
    const expanded = expandServerDefinition(
      server({
        command: "${env:TEST_VAR}-server",
        args: ["--key", "${env:API_KEY}"],
        cwd: "/srv/${env:TEST_VAR}",
        env: { TOKEN: "${env:API_KEY}" },
      }),
      env
    );

    expect(expanded.command).toBe("test-value-server");
    expect(expanded.args).toEqual(["--key", "test-key"]);
    expect(expanded.cwd).toBe("/srv/test-value");
    expect(expanded.env).toEqual({ TOKEN: "test-key" });
  });

  it("should expand url and headers of remote servers", () => {
    const expanded = expandServerDefinition(
      server({
        url: "https://${env:TEST_VAR}.example.com/mcp",
        headers: { Authorization: "Bearer ${env:API_KEY}" },
      }),
      env
    );

    expect(expanded.url).toBe("https://test-value.example.com/mcp");
    expect(expanded.headers).toEqual({ Authorization: "Bearer test-key" });
    expect(expanded.command).toBeUndefined();
  });
});

describe("findMissingVariables", () => {
  it("should report each unset variable once", () => {
    const missing = findMissingVariables(
      server({
        command: "${env:MISSING_BIN}",
        args: ["${env:TEST_VAR}", "${env:MISSING_ARG}"],
        env: { A: "${env:MISSING_ARG}", B: "${env:EMPTY_VAR}" },
      }),
      env
    );

    expect(missing).toEqual(["MISSING_BIN", "MISSING_ARG"]);
  });

  it("should return an empty list when everything is set", () => {
    expect(findMissingVariables(server({ command: "${env:TEST_VAR}" }), env)).toEqual([]);
  });
});
