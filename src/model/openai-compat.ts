// pattern: Imperative Shell

import OpenAI from "openai";
import type { ModelConfig } from "../config/schema.ts";
import type { Logger } from "../logging/logger.ts";
import type {
  ChatMessage,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  ToolCall,
  ToolDefinition,
} from "./types.ts";
import { ContextWindowExceededError, ModelError } from "./types.ts";
import { looksLikeContextOverflow } from "./overflow.ts";
import { callWithRetry } from "./retry.ts";
import type { RetryOptions } from "./retry.ts";

export type AdapterOptions = {
  retry?: Partial<RetryOptions>;
  logger?: Logger;
};

function isRetryableError(error: unknown): boolean {
  return error instanceof ModelError && error.retryable;
}

/**
 * Translate SDK errors into the port's error types.
 * Returns the error to throw; unknown errors pass through unchanged.
 */
export function mapOpenAIError(error: unknown): unknown {
  if (error instanceof OpenAI.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof OpenAI.APIError) {
    if (error.code === "context_length_exceeded" || looksLikeContextOverflow(error.message)) {
      return new ContextWindowExceededError(error.message, { cause: error });
    }
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

function normalizeToolDefinitions(
  tools: ReadonlyArray<ToolDefinition>
): Array<OpenAI.Chat.ChatCompletionTool> {
  return tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: tool.input_schema.type,
        properties: tool.input_schema.properties,
        required: tool.input_schema.required,
      },
    },
  }));
}

export function normalizeMessage(msg: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (msg.role) {
    case "system":
      return { role: "system", content: msg.content ?? "" };
    case "user":
      return { role: "user", content: msg.content ?? "" };
    case "tool":
      return { role: "tool", content: msg.content ?? "", tool_call_id: msg.tool_call_id ?? "" };
    case "assistant": {
      const toolCalls = msg.tool_calls ?? [];
      if (toolCalls.length === 0) {
        return { role: "assistant", content: msg.content };
      }
      return {
        role: "assistant",
        content: msg.content,
        tool_calls: toolCalls.map((call) => ({
          id: call.id,
          type: "function",
          function: { name: call.name, arguments: call.arguments },
        })),
      };
    }
  }
}

export function buildOpenAIToolChoice(
  request: ModelRequest
): OpenAI.Chat.ChatCompletionToolChoiceOption | undefined {
  if (!request.tools || request.tools.length === 0) {
    return undefined;
  }
  if (request.forced_tool) {
    return { type: "function", function: { name: request.forced_tool } };
  }
  return "auto";
}

/**
 * The parts of a chat completion this adapter reads.
 */
export type CompletionShape = {
  id: string;
  choices: ReadonlyArray<{
    finish_reason: string | null;
    message: {
      content: string | null;
      tool_calls?: ReadonlyArray<{ id: string; function: { name: string; arguments: string } }>;
    };
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
};

export function normalizeCompletion(completion: CompletionShape): ModelResponse {
  const usage = completion.usage;
  return {
    id: completion.id,
    choices: completion.choices.map((choice) => {
      const toolCalls: Array<ToolCall> = (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      }));
      const message: ChatMessage = { role: "assistant", content: choice.message.content };
      if (toolCalls.length > 0) {
        message.tool_calls = toolCalls;
      }
      return { message, finish_reason: choice.finish_reason };
    }),
    usage: {
      prompt_tokens: usage?.prompt_tokens ?? 0,
      completion_tokens: usage?.completion_tokens ?? 0,
      total_tokens: usage?.total_tokens ?? 0,
    },
  };
}

export function createOpenAICompatAdapter(
  config: ModelConfig,
  options: AdapterOptions = {}
): ModelProvider {
  const apiKey = config.api_key || process.env["OPENAI_API_KEY"];

  if (!apiKey) {
    throw new Error(
      "OpenAI-compatible adapter requires api_key in config or OPENAI_API_KEY environment variable"
    );
  }

  const client = new OpenAI({
    apiKey,
    baseURL: config.base_url,
    maxRetries: 0,
  });

  return {
    async complete(request: ModelRequest): Promise<ModelResponse> {
      const completion = await callWithRetry(
        async () => {
          try {
            return await client.chat.completions.create({
              model: request.model,
              max_tokens: request.max_tokens ?? config.max_tokens,
              tools: request.tools ? normalizeToolDefinitions(request.tools) : undefined,
              tool_choice: buildOpenAIToolChoice(request),
              temperature: request.temperature,
              messages: request.messages.map(normalizeMessage),
            });
          } catch (error) {
            throw mapOpenAIError(error);
          }
        },
        isRetryableError,
        {
          ...options.retry,
          onError: (error, attempt) => {
            options.logger?.warn({ attempt, provider: "openai-compat", err: error }, "provider request failed");
          },
        }
      );

      return normalizeCompletion(completion);
    },
  };
}
