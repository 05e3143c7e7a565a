// pattern: Imperative Shell

import Anthropic from "@anthropic-ai/sdk";
import type { ModelConfig } from "../config/schema.ts";
import type {
  ChatMessage,
  FinishReason,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  ToolCall,
  ToolDefinition,
} from "./types.ts";
import { ContextWindowExceededError, ModelError } from "./types.ts";
import { looksLikeContextOverflow } from "./overflow.ts";
import { callWithRetry } from "./retry.ts";
import type { AdapterOptions } from "./openai-compat.ts";

type AnthropicTurn = {
  role: "user" | "assistant";
  content: Array<Anthropic.Messages.ContentBlockParam>;
};

function isRetryableError(error: unknown): boolean {
  return error instanceof ModelError && error.retryable;
}

export function mapAnthropicError(error: unknown): unknown {
  if (error instanceof Anthropic.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof Anthropic.APIError) {
    if (looksLikeContextOverflow(error.message)) {
      return new ContextWindowExceededError(error.message, { cause: error });
    }
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

function parseToolInput(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return {};
  }
}

/**
 * System-role messages are lifted into the system parameter; everything else becomes
 * alternating user/assistant turns. Tool results travel as user-turn tool_result blocks.
 */
export function buildAnthropicConversation(messages: ReadonlyArray<ChatMessage>): {
  system: string | undefined;
  turns: Array<AnthropicTurn>;
} {
  const systemParts: Array<string> = [];
  const turns: Array<AnthropicTurn> = [];

  const push = (role: "user" | "assistant", blocks: Array<Anthropic.Messages.ContentBlockParam>) => {
    if (blocks.length === 0) {
      return;
    }
    const previous = turns[turns.length - 1];
    if (previous && previous.role === role) {
      previous.content.push(...blocks);
    } else {
      turns.push({ role, content: blocks });
    }
  };

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        if (msg.content) {
          systemParts.push(msg.content);
        }
        break;
      case "user":
        push("user", msg.content ? [{ type: "text", text: msg.content }] : []);
        break;
      case "tool":
        push("user", [
          {
            type: "tool_result",
            tool_use_id: msg.tool_call_id ?? "",
            content: msg.content ?? "",
          },
        ]);
        break;
      case "assistant": {
        const blocks: Array<Anthropic.Messages.ContentBlockParam> = [];
        if (msg.content) {
          blocks.push({ type: "text", text: msg.content });
        }
        for (const call of msg.tool_calls ?? []) {
          blocks.push({ type: "tool_use", id: call.id, name: call.name, input: parseToolInput(call.arguments) });
        }
        push("assistant", blocks);
        break;
      }
    }
  }

  return {
    system: systemParts.length > 0 ? systemParts.join("\n\n") : undefined,
    turns,
  };
}

function normalizeToolDefinitions(
  tools: ReadonlyArray<ToolDefinition>
): Array<Anthropic.Messages.Tool> {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: {
      type: tool.input_schema.type,
      properties: tool.input_schema.properties,
      required: tool.input_schema.required,
    },
  }));
}

export function buildAnthropicToolChoice(
  request: ModelRequest
): Anthropic.Messages.ToolChoice | undefined {
  if (!request.tools || request.tools.length === 0) {
    return undefined;
  }
  if (request.forced_tool) {
    return { type: "tool", name: request.forced_tool };
  }
  return { type: "auto" };
}

function normalizeStopReason(reason: string | null): FinishReason | null {
  switch (reason) {
    case "end_turn":
    case "stop_sequence":
      return "stop";
    case "tool_use":
      return "tool_calls";
    case "max_tokens":
      return "length";
    default:
      return reason;
  }
}

export function normalizeAnthropicMessage(response: Anthropic.Messages.Message): ModelResponse {
  const texts: Array<string> = [];
  const toolCalls: Array<ToolCall> = [];

  for (const block of response.content) {
    if (block.type === "text") {
      texts.push(block.text);
    } else if (block.type === "tool_use") {
      toolCalls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.input) });
    }
  }

  const message: ChatMessage = {
    role: "assistant",
    content: texts.length > 0 ? texts.join("\n") : null,
  };
  if (toolCalls.length > 0) {
    message.tool_calls = toolCalls;
  }

  const inputTokens = response.usage.input_tokens;
  const outputTokens = response.usage.output_tokens;
  return {
    id: response.id,
    choices: [{ message, finish_reason: normalizeStopReason(response.stop_reason) }],
    usage: {
      prompt_tokens: inputTokens,
      completion_tokens: outputTokens,
      total_tokens: inputTokens + outputTokens,
    },
  };
}

export function createAnthropicAdapter(config: ModelConfig, options: AdapterOptions = {}): ModelProvider {
  const apiKey = config.api_key || process.env["ANTHROPIC_API_KEY"];

  if (!apiKey) {
    throw new Error(
      "anthropic adapter requires api_key in config or ANTHROPIC_API_KEY environment variable"
    );
  }

  const client = new Anthropic({
    apiKey,
    baseURL: config.base_url,
    maxRetries: 0,
  });

  return {
    async complete(request: ModelRequest): Promise<ModelResponse> {
      const { system, turns } = buildAnthropicConversation(request.messages);

      const response = await callWithRetry(
        async () => {
          try {
            return await client.messages.create({
              model: request.model,
              max_tokens: request.max_tokens ?? config.max_tokens,
              system,
              tools: request.tools ? normalizeToolDefinitions(request.tools) : undefined,
              tool_choice: buildAnthropicToolChoice(request),
              temperature: request.temperature,
              messages: turns,
            });
          } catch (error) {
            throw mapAnthropicError(error);
          }
        },
        isRetryableError,
        {
          ...options.retry,
          onError: (error, attempt) => {
            options.logger?.warn({ attempt, provider: "anthropic", err: error }, "provider request failed");
          },
        }
      );

      return normalizeAnthropicMessage(response);
    },
  };
}
