import OpenAI, { AzureOpenAI } from "openai";
import { AgentConfigurationError } from "../errors/index.js";
import type { ChatClient } from "./types.js";

/**
 * Create the chat client from the environment: Azure OpenAI when
 * `AZURE_OPENAI_API_KEY` is set, OpenAI otherwise.
 */
export function createModelClient(env: NodeJS.ProcessEnv = process.env): ChatClient {
  const azureKey = env.AZURE_OPENAI_API_KEY;
  if (azureKey) {
    const endpoint = env.AZURE_OPENAI_ENDPOINT;
    const apiVersion = env.OPENAI_API_VERSION;
    if (!endpoint || !apiVersion) {
      throw new AgentConfigurationError(
        "AZURE_OPENAI_API_KEY is set but AZURE_OPENAI_ENDPOINT or OPENAI_API_VERSION is missing",
        { provider: "azure" }
      );
    }
    return new AzureOpenAI({ apiKey: azureKey, endpoint, apiVersion });
  }

  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new AgentConfigurationError(
      "No model credentials: set OPENAI_API_KEY, or AZURE_OPENAI_API_KEY with " +
        "AZURE_OPENAI_ENDPOINT and OPENAI_API_VERSION",
      { provider: "openai" }
    );
  }
  return new OpenAI({ apiKey });
}
