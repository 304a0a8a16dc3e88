/**
 * Vitest Global Setup
 *
 * Keeps credentials and log settings from the developer's shell out of the tests.
 */
import { beforeEach } from "vitest";

const ISOLATED_ENV = [
  "OPENAI_API_KEY",
  "AZURE_OPENAI_API_KEY",
  "AZURE_OPENAI_ENDPOINT",
  "OPENAI_API_VERSION",
  "MCPML_LOG_LEVEL",
  "MCPML_LOG_FORMAT",
  "MCPML_CACHE_DIR",
];

process.setMaxListeners(0);

beforeEach(() => {
  for (const key of ISOLATED_ENV) {
    delete process.env[key];
  }
});
