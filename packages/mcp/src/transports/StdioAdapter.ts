// ============================================
// Stdio Transport Adapter
// ============================================

import {
  getDefaultEnvironment,
  StdioClientTransport,
} from "@modelcontextprotocol/sdk/client/stdio.js";
import type { McpServerDefinition } from "@mcpml/core";
import { McpTransportError } from "../errors.js";

export interface StdioTransportOptions {
  /** Receives each non-empty line the server writes to stderr */
  onStderr?: (line: string) => void;
}

/**
 * Creates the transport for a server launched as a subprocess.
 *
 * The child gets the SDK's default environment (PATH, HOME and the like)
 * with the definition's `env` on top. Placeholders must already be expanded.
 *
 * @example
 * ```typescript
 * const transport = createStdioTransport(
 *   { name: "files", command: "npx", args: ["-y", "@modelcontextprotocol/server-filesystem"] },
 *   { onStderr: (line) => logger.debug(line) }
 * );
 * await client.connect(transport);
 * ```
 */
export function createStdioTransport(
  server: McpServerDefinition,
  options: StdioTransportOptions = {}
): StdioClientTransport {
  if (server.command === undefined) {
    throw new McpTransportError(
      `Server "${server.name}" has no command to launch`,
      server.name,
      "stdio"
    );
  }

  const transport = new StdioClientTransport({
    command: server.command,
    args: server.args,
    cwd: server.cwd,
    env: { ...getDefaultEnvironment(), ...server.env },
    stderr: "pipe",
  });

  const { onStderr } = options;
  if (onStderr) {
    // With stderr piped the stream exists before the process starts
    transport.stderr?.on("data", (chunk: Buffer | string) => {
      for (const line of chunk.toString().split(/\r?\n/)) {
        if (line.trim()) {
          onStderr(line);
        }
      }
    });
  }

  return transport;
}
