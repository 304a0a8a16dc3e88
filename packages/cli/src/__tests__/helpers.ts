import { fileURLToPath } from "node:url";
import { CliContext } from "../context.js";
import { runCli } from "../program.js";

export const fixturesDir = fileURLToPath(new URL("./fixtures", import.meta.url));

export interface CliRun {
  code: number;
  stdout: string;
  stderr: string;
}

export function createTestContext(overrides: NodeJS.ProcessEnv = {}): {
  ctx: CliContext;
  stdout: () => string;
  stderr: () => string;
} {
  let stdout = "";
  let stderr = "";
  const ctx = new CliContext({
    io: {
      stdout: (text) => {
        stdout += text;
      },
      stderr: (text) => {
        stderr += text;
      },
    },
    cwd: fixturesDir,
    env: { NO_COLOR: "1", ...overrides },
    logTransports: [],
  });
  return { ctx, stdout: () => stdout, stderr: () => stderr };
}

/**
 * Run the CLI against the fixtures directory and capture its output.
 */
export async function cli(...args: string[]): Promise<CliRun> {
  const test = createTestContext();
  const code = await runCli(args, test.ctx);
  return { code, stdout: test.stdout(), stderr: test.stderr() };
}
