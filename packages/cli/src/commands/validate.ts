/**
 * `mcpml validate`: load the configuration, import every implementation and
 * output schema, and print a summary. MCP servers are not contacted.
 *
 * @module cli/commands/validate
 */

import type { Command } from "commander";
import type { CliContext, GlobalOptions } from "../context.js";
import { createChalk } from "../output.js";

export function registerValidateCommand(program: Command, ctx: CliContext): void {
  program
    .command("validate")
    .description("Check the configuration and resolve every tool")
    .action(async (_options: unknown, command: Command) => {
      const project = await ctx.openProject(command.optsWithGlobals<GlobalOptions>());
      try {
        const { config, configPath } = project.loaded;
        const agents = config.tools.filter((tool) => tool.type === "agent").length;
        const disabled = config.mcpServers.filter((server) => server.disabled).length;
        const chalk = createChalk(ctx.env);

        ctx.print(chalk.green(`✓ Configuration '${config.name}' is valid`));
        ctx.print(`  File: ${configPath}`);
        ctx.print(
          `  Tools: ${config.tools.length} (${config.tools.length - agents} function, ${agents} agent)`
        );
        ctx.print(`  MCP servers: ${config.mcpServers.length} (${disabled} disabled)`);
      } finally {
        await project.dispose();
      }
    });
}
