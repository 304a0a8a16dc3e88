/**
 * `mcpml run`: serve every configured tool as an MCP server.
 *
 * @module cli/commands/run
 */

import { type Command, InvalidArgumentError, Option } from "commander";
import { createHttpApp, listen, runStdio } from "@mcpml/mcp";
import type { CliContext, GlobalOptions } from "../context.js";
import { closeWithin, waitForShutdown } from "../shutdown.js";
import { version } from "../version.js";

export type ServeTransport = "stdio" | "sse" | "http";

type RunOptions = {
  transport: ServeTransport;
  host?: string;
  port?: number;
};

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 0 and 65535.");
  }
  return port;
}

export function registerRunCommand(program: Command, ctx: CliContext): void {
  program
    .command("run")
    .description("Serve the configured tools as an MCP server")
    .addOption(
      new Option("-t, --transport <transport>", "MCP transport")
        .choices(["stdio", "sse", "http"])
        .default("stdio")
    )
    .option("--host <host>", "Host to bind (default: settings.server.host)")
    .option("-p, --port <port>", "Port to bind (default: settings.server.port)", parsePort)
    .action(async (_options: RunOptions, command: Command) => {
      const options = command.optsWithGlobals<RunOptions & GlobalOptions>();
      const project = await ctx.openProject(options);
      const { registry, logger } = project;

      try {
        if (options.transport === "stdio") {
          const server = await runStdio(registry, { version, logger });
          const reason = await waitForShutdown((close) => {
            server.onclose = close;
          });
          logger.info(`Shutting down (${reason})`);
          await closeWithin("MCP server", server.close(), logger);
          return;
        }

        const { server: settings } = project.loaded.config.settings;
        const host = options.host ?? settings.host;
        const port = options.port ?? settings.port;
        const app = createHttpApp(registry, { version, logger });
        const address = await listen(app, host, port);
        const base = `http://${host}:${address.port}`;
        logger.info(
          options.transport === "sse"
            ? `Serving ${registry.size} tool(s) over SSE at ${base}/sse`
            : `Serving ${registry.size} tool(s) over Streamable HTTP at ${base}/mcp`
        );
        logger.info(`REST endpoints at ${base}/tools`);

        const reason = await waitForShutdown();
        logger.info(`Shutting down (${reason})`);
        await closeWithin("HTTP server", app.close(), logger);
      } finally {
        await project.dispose();
      }
    });
}
