import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessage,
} from "openai/resources/chat/completions";
import { vi } from "vitest";
import { type AgentToolDefinition, AgentToolSchema } from "../../config/index.js";
import type { LogEntry } from "../../logger/index.js";
import { Logger } from "../../logger/index.js";
import type { ChatClient } from "../types.js";

export function textReply(content: string): ChatCompletionMessage {
  return { role: "assistant", content, refusal: null };
}

export function toolCallReply(
  calls: Array<{ id: string; name: string; args: Record<string, unknown> | string }>
): ChatCompletionMessage {
  return {
    role: "assistant",
    content: null,
    refusal: null,
    tool_calls: calls.map((call) => ({
      id: call.id,
      type: "function",
      function: {
        name: call.name,
        arguments: typeof call.args === "string" ? call.args : JSON.stringify(call.args),
      },
    })),
  };
}

function completion(message: ChatCompletionMessage): ChatCompletion {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 0,
    model: "gpt-4o",
    choices: [
      {
        index: 0,
        finish_reason: message.tool_calls ? "tool_calls" : "stop",
        logprobs: null,
        message,
      },
    ],
  };
}

/**
 * A chat client that answers with scripted replies, in order.
 */
export function fakeChatClient(replies: ChatCompletionMessage[]) {
  const queue = [...replies];
  const requests: ChatCompletionCreateParamsNonStreaming[] = [];
  const create = vi.fn(async (body: ChatCompletionCreateParamsNonStreaming) => {
    requests.push(body);
    const next = queue.shift();
    if (!next) {
      throw new Error("no scripted reply left");
    }
    return completion(next);
  });
  const client: ChatClient = { chat: { completions: { create } } };
  return { client, create, requests };
}

export function agentDefinition(fields: Record<string, unknown> = {}): AgentToolDefinition {
  return AgentToolSchema.parse({
    name: "assistant",
    description: "Answers questions",
    type: "agent",
    instructions: "Be brief.",
    ...fields,
  });
}

/**
 * Logger that keeps its entries for assertions.
 */
export function recordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({
    level: "trace",
    transports: [{ log: (entry) => entries.push(entry) }],
  });
  return { logger, entries };
}
