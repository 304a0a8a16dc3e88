import { fileURLToPath } from "node:url";
import { createLogger, McpmlConfigSchema, ToolRegistry } from "@mcpml/core";

const configDir = fileURLToPath(new URL("./fixtures", import.meta.url));

export const silentLogger = createLogger({ transports: [] });

/**
 * A registry over the function tools in ./fixtures/tools.ts.
 */
export function createFixtureRegistry(): Promise<ToolRegistry> {
  const config = McpmlConfigSchema.parse({
    name: "fixture-tools",
    tools: [
      {
        name: "add",
        description: "Add two numbers",
        implementation: "tools.add",
        parameters: [
          { name: "a", type: "number" },
          { name: "b", type: "number" },
        ],
      },
      {
        name: "echo",
        description: "Echo text back",
        implementation: "tools.echo",
        parameters: [{ name: "text", description: "Text to echo" }],
      },
      {
        name: "profile",
        description: "Build a profile",
        implementation: "tools.profile",
        parameters: [{ name: "name" }],
      },
      { name: "explode", description: "Always fails", implementation: "tools.explode" },
    ],
  });
  return ToolRegistry.create(config, { configDir, logger: silentLogger });
}
