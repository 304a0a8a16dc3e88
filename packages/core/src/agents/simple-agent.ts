// ============================================
// Simple Agent
// ============================================

import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import {
  AgentOutputError,
  ErrorCode,
  errorMessage,
  MaxTurnsExceededError,
  McpmlError,
} from "../errors/index.js";
import type { Logger } from "../logger/index.js";
import type { AgentContext, AgentRunOptions, AgentTool, ChatClient, McpmlAgent } from "./types.js";

/**
 * Encode a tool result for a `tool` message.
 */
export function stringifyToolResult(result: unknown): string {
  if (typeof result === "string") {
    return result;
  }
  if (result === undefined) {
    return "";
  }
  return JSON.stringify(result);
}

/**
 * Chat-completions tool loop.
 *
 * Each turn sends the conversation to the model. Tool calls in the reply are
 * executed in order and their results appended; a reply without tool calls
 * ends the run. With an output schema the model is asked for JSON matching
 * it, and the final reply is parsed and validated.
 */
export class SimpleAgent implements McpmlAgent {
  private readonly context: AgentContext;
  private readonly logger: Logger;
  private readonly toolsByName = new Map<string, AgentTool>();
  private client: ChatClient | undefined;

  constructor(context: AgentContext) {
    this.context = context;
    this.logger = context.logger.child({ agent: context.definition.name });
    for (const tool of context.tools) {
      this.toolsByName.set(tool.name, tool);
    }
  }

  async run(input: string, options: AgentRunOptions = {}): Promise<unknown> {
    const { definition } = this.context;
    const maxTurns = options.maxTurns ?? definition.max_turns;
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: definition.instructions },
      { role: "user", content: input },
    ];

    for (let turn = 1; turn <= maxTurns; turn++) {
      this.logger.debug(`Turn ${turn}/${maxTurns}`);
      const reply = await this.complete(messages, options.signal);
      const toolCalls = reply.tool_calls ?? [];

      if (toolCalls.length === 0) {
        return this.finish(reply.content ?? "");
      }

      messages.push({ role: "assistant", content: reply.content, tool_calls: toolCalls });
      for (const call of toolCalls) {
        messages.push({
          role: "tool",
          tool_call_id: call.id,
          content: await this.invokeTool(call, options.signal),
        });
      }
    }

    throw new MaxTurnsExceededError(maxTurns);
  }

  private getClient(): ChatClient {
    if (!this.client) {
      this.client = this.context.createClient();
    }
    return this.client;
  }

  private buildRequest(
    messages: ChatCompletionMessageParam[]
  ): ChatCompletionCreateParamsNonStreaming {
    const { definition, outputSchema } = this.context;
    const tools: ChatCompletionTool[] = [...this.toolsByName.values()].map((tool) => ({
      type: "function",
      function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    }));

    const request: ChatCompletionCreateParamsNonStreaming = {
      model: definition.model,
      messages,
    };
    if (tools.length > 0) {
      request.tools = tools;
    }
    if (outputSchema) {
      request.response_format = {
        type: "json_schema",
        json_schema: { name: outputSchema.name, schema: outputSchema.jsonSchema },
      };
    }
    return request;
  }

  private async complete(messages: ChatCompletionMessageParam[], signal?: AbortSignal) {
    const client = this.getClient();
    let completion: ChatCompletion;
    try {
      // Messages are copied so later turns don't mutate a recorded request
      completion = await client.chat.completions.create(this.buildRequest([...messages]), {
        signal,
      });
    } catch (error) {
      throw new McpmlError(
        `Model request failed: ${errorMessage(error)}`,
        ErrorCode.LLM_REQUEST_FAILED,
        { cause: error, isRetryable: true, context: { model: this.context.definition.model } }
      );
    }

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new AgentOutputError("Model returned no choices");
    }
    return message;
  }

  private async invokeTool(
    call: ChatCompletionMessageToolCall,
    signal?: AbortSignal
  ): Promise<string> {
    const name = call.function.name;
    const tool = this.toolsByName.get(name);
    if (!tool) {
      this.logger.warn(`Model called unknown tool '${name}'`);
      return `Error: unknown tool '${name}'`;
    }

    let args: unknown;
    try {
      args = call.function.arguments.trim() ? JSON.parse(call.function.arguments) : {};
    } catch (error) {
      return `Error: invalid JSON arguments for '${name}': ${errorMessage(error)}`;
    }
    if (typeof args !== "object" || args === null || Array.isArray(args)) {
      return `Error: arguments for '${name}' must be a JSON object`;
    }

    this.logger.debug(`Calling ${tool.source} tool '${name}'`);
    try {
      return stringifyToolResult(await tool.invoke({ ...args }, { signal }));
    } catch (error) {
      this.logger.warn(`Tool '${name}' failed`, { error: errorMessage(error) });
      return `Error: ${errorMessage(error)}`;
    }
  }

  private finish(content: string): unknown {
    const { outputSchema } = this.context;
    if (!outputSchema) {
      return content;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new AgentOutputError(
        `Agent output is not valid JSON for '${outputSchema.reference}': ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const result = outputSchema.validate(parsed);
    if (!result.ok) {
      throw new AgentOutputError(
        `Agent output does not match '${outputSchema.reference}': ${result.error.join("; ")}`,
        { context: { issues: result.error } }
      );
    }
    return result.value;
  }
}
