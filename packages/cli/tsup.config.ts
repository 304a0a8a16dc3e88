import { readFileSync } from "node:fs";
import { defineConfig } from "tsup";

// Read version from package.json at build time
const pkg: { version: string } = JSON.parse(
  readFileSync(new URL("./package.json", import.meta.url), "utf-8")
);

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  target: "node20",
  platform: "node",
  splitting: false,
  sourcemap: false,
  minify: false,
  treeshake: true,
  outExtension() {
    return { js: ".mjs" };
  },
  banner: {
    // Provide CJS compatibility for bundled dependencies that use require()
    js: `import { createRequire } from 'module';const require = createRequire(import.meta.url);`,
  },

  // Bundle the workspace packages into the CLI
  noExternal: ["@mcpml/core", "@mcpml/mcp", "@mcpml/shared"],

  // Keep SDKs and libraries with their own dependency trees external
  external: [
    /^node:/,
    "@modelcontextprotocol/sdk",
    "@opentelemetry/api",
    "chalk",
    "commander",
    "dotenv",
    "express",
    "import-meta-resolve",
    "js-yaml",
    "openai",
    "simple-git",
    "table",
    "zod",
  ],

  esbuildOptions(options) {
    // Inject version from package.json at build time
    options.define = {
      ...options.define,
      __VERSION__: JSON.stringify(pkg.version),
    };
  },
});
