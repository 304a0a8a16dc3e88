/**
 * Command-line program assembly and entry point.
 *
 * @module cli/program
 */

import { errorMessage, type ToolDefinition } from "@mcpml/core";
import { Command, CommanderError } from "commander";
import { CliError, EXIT_CODES, type ExitCode, exitCodeFor } from "./commands/exit-codes.js";
import { registerRunCommand } from "./commands/run.js";
import { registerToolsCommand } from "./commands/tools.js";
import { registerValidateCommand } from "./commands/validate.js";
import { CliContext } from "./context.js";
import { version } from "./version.js";

// =============================================================================
// Argument Pre-scan
// =============================================================================

const VALUE_OPTIONS = new Set(["-c", "--config", "--log-level"]);
const TOOLS_SUBCOMMANDS = new Set(["list", "run", "help"]);

/**
 * The `--config` value, read before commander runs so that per-tool
 * subcommands can be generated from the configuration.
 */
export function prescanConfig(args: string[]): string | undefined {
  for (const [index, arg] of args.entries()) {
    if (arg === "--") {
      return undefined;
    }
    if (arg === "-c" || arg === "--config") {
      return args[index + 1];
    }
    if (arg.startsWith("--config=")) {
      return arg.slice("--config=".length);
    }
    if (arg.startsWith("-c") && !arg.startsWith("--") && arg.length > 2) {
      return arg.slice(2);
    }
  }
  return undefined;
}

function positionals(args: string[]): string[] {
  const result: string[] = [];
  for (let index = 0; index < args.length; index++) {
    const arg = args[index];
    if (arg === undefined || arg === "--") {
      break;
    }
    if (VALUE_OPTIONS.has(arg)) {
      index++;
    } else if (!arg.startsWith("-")) {
      result.push(arg);
    }
  }
  return result;
}

/**
 * True for `tools <name> ...` where `<name>` is not a built-in subcommand.
 */
export function wantsToolSubcommand(args: string[]): boolean {
  const [first, second] = positionals(args);
  return first === "tools" && second !== undefined && !TOOLS_SUBCOMMANDS.has(second);
}

// =============================================================================
// Program
// =============================================================================

export function createProgram(ctx: CliContext, definitions: ToolDefinition[] = []): Command {
  const program = new Command();

  program
    .name("mcpml")
    .description("Serve and run tools declared in an MCPML configuration")
    .version(version)
    .option("-c, --config <source>", "Config file, directory or GitHub URL (default: ./mcpml.yaml)")
    .option("--log-level <level>", "DEBUG, INFO, WARNING, ERROR or CRITICAL")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.io.stdout(text),
      writeErr: (text) => ctx.io.stderr(text),
    })
    .showHelpAfterError();

  registerRunCommand(program, ctx);
  registerToolsCommand(program, ctx, definitions);
  registerValidateCommand(program, ctx);
  return program;
}

function report(ctx: CliContext, error: unknown): void {
  ctx.printError(`Error: ${errorMessage(error)}`);
  if (error instanceof CliError) {
    for (const line of error.details) {
      ctx.printError(line);
    }
  } else if (error instanceof Error && error.stack) {
    ctx.logger.debug(error.stack);
  }
}

/**
 * Run the CLI with the arguments after the executable and script.
 *
 * @returns The exit code; the caller decides whether to exit the process
 */
export async function runCli(args: string[], ctx = new CliContext()): Promise<ExitCode> {
  let definitions: ToolDefinition[] = [];
  if (wantsToolSubcommand(args)) {
    try {
      const loaded = await ctx.loadConfig({ config: prescanConfig(args) });
      definitions = loaded.config.tools;
    } catch (error) {
      report(ctx, error);
      return exitCodeFor(error);
    }
  }

  const program = createProgram(ctx, definitions);
  try {
    await program.parseAsync(args, { from: "user" });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and --version exit with 0; commander has already printed the message
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
    }
    report(ctx, error);
    return exitCodeFor(error);
  }
}
