// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import OpenAI from "openai";
import { ModelConfigSchema } from "../config/schema.ts";
import {
  buildOpenAIToolChoice,
  createOpenAICompatAdapter,
  mapOpenAIError,
  normalizeCompletion,
  normalizeMessage,
} from "./openai-compat.ts";
import type { CompletionShape } from "./openai-compat.ts";
import { ContextWindowExceededError, ModelError } from "./types.ts";
import type { ModelRequest, ToolDefinition } from "./types.ts";

const sendMessageTool: ToolDefinition = {
  name: "send_message",
  description: "Send a message to the user",
  input_schema: {
    type: "object",
    properties: { message: { type: "string", description: "Message contents" } },
    required: ["message"],
  },
};

describe("createOpenAICompatAdapter", () => {
  it("should throw if no api key is configured or in environment", () => {
    const saved = process.env["OPENAI_API_KEY"];
    delete process.env["OPENAI_API_KEY"];
    try {
      const config = ModelConfigSchema.parse({ provider: "openai-compat", name: "gpt-4" });
      expect(() => createOpenAICompatAdapter(config)).toThrow(/requires api_key/);
    } finally {
      if (saved !== undefined) {
        process.env["OPENAI_API_KEY"] = saved;
      }
    }
  });

  it("should accept custom baseURL from config", () => {
    const config = ModelConfigSchema.parse({
      provider: "openai-compat",
      name: "local-model",
      api_key: "test-key",
      base_url: "http://localhost:11434/v1",
    });
    expect(() => createOpenAICompatAdapter(config)).not.toThrow();
  });
});

describe("normalizeMessage", () => {
  it("maps tool results to tool-role params", () => {
    expect(normalizeMessage({ role: "tool", content: "{\"status\":\"OK\"}", tool_call_id: "call-1", name: "x" })).toEqual({
      role: "tool",
      content: "{\"status\":\"OK\"}",
      tool_call_id: "call-1",
    });
  });

  it("keeps assistant tool calls as function calls", () => {
    expect(
      normalizeMessage({
        role: "assistant",
        content: "thinking",
        tool_calls: [{ id: "call-1", name: "send_message", arguments: "{\"message\":\"hi\"}" }],
      })
    ).toEqual({
      role: "assistant",
      content: "thinking",
      tool_calls: [
        { id: "call-1", type: "function", function: { name: "send_message", arguments: "{\"message\":\"hi\"}" } },
      ],
    });
  });

  it("omits an empty tool_calls list", () => {
    expect(normalizeMessage({ role: "assistant", content: "hello", tool_calls: [] })).toEqual({
      role: "assistant",
      content: "hello",
    });
  });
});

describe("buildOpenAIToolChoice", () => {
  const base: ModelRequest = { model: "gpt-4o", messages: [] };

  it("is absent without tools", () => {
    expect(buildOpenAIToolChoice(base)).toBeUndefined();
  });

  it("is auto when no tool is forced", () => {
    expect(buildOpenAIToolChoice({ ...base, tools: [sendMessageTool] })).toBe("auto");
  });

  it("names the forced tool", () => {
    expect(buildOpenAIToolChoice({ ...base, tools: [sendMessageTool], forced_tool: "send_message" })).toEqual({
      type: "function",
      function: { name: "send_message" },
    });
  });
});

describe("normalizeCompletion", () => {
  it("maps choices, tool calls and usage", () => {
    const completion: CompletionShape = {
      id: "chatcmpl-1",
      choices: [
        {
          finish_reason: "tool_calls",
          message: {
            content: "inner thoughts",
            tool_calls: [
              { id: "call-9", function: { name: "send_message", arguments: "{}" } },
            ],
          },
        },
      ],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    };

    expect(normalizeCompletion(completion)).toEqual({
      id: "chatcmpl-1",
      choices: [
        {
          finish_reason: "tool_calls",
          message: {
            role: "assistant",
            content: "inner thoughts",
            tool_calls: [{ id: "call-9", name: "send_message", arguments: "{}" }],
          },
        },
      ],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    });
  });
});

describe("mapOpenAIError", () => {
  it("maps rate limits to a retryable ModelError", () => {
    const mapped = mapOpenAIError(new OpenAI.RateLimitError(429, undefined, "slow down", undefined));

    expect(mapped).toBeInstanceOf(ModelError);
    expect(mapped).toMatchObject({ code: "rate_limit", retryable: true });
  });

  it("maps authentication failures to a fatal ModelError", () => {
    const mapped = mapOpenAIError(new OpenAI.AuthenticationError(401, undefined, "bad key", undefined));

    expect(mapped).toMatchObject({ code: "auth", retryable: false });
  });

  it("recognises context overflow by error code", () => {
    const mapped = mapOpenAIError(
      new OpenAI.BadRequestError(400, { code: "context_length_exceeded" }, "request too large", undefined)
    );

    expect(mapped).toBeInstanceOf(ContextWindowExceededError);
  });

  it("recognises context overflow by message", () => {
    const mapped = mapOpenAIError(
      new OpenAI.BadRequestError(400, undefined, "This model's maximum context length is 8192 tokens", undefined)
    );

    expect(mapped).toBeInstanceOf(ContextWindowExceededError);
  });

  it("passes unknown errors through", () => {
    const original = new TypeError("boom");

    expect(mapOpenAIError(original)).toBe(original);
  });
});
