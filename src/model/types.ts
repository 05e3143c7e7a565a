// pattern: Functional Core

/**
 * Shared types for model providers.
 * These types define the port interface that all model adapters normalize to:
 * a chat-completion shaped request and response with tool calls.
 */

export type ChatRole = "system" | "user" | "assistant" | "tool";

export type ToolCall = {
  id: string;
  name: string;
  /**
   * Raw JSON text as produced by the model. Parsing is the dispatcher's job.
   */
  arguments: string;
};

export type ChatMessage = {
  role: ChatRole;
  content: string | null;
  name?: string;
  tool_calls?: ReadonlyArray<ToolCall>;
  tool_call_id?: string;
};

export type JsonSchemaProperty = {
  type: string;
  description: string;
  enum?: ReadonlyArray<string>;
};

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: Array<string>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
};

export type ModelRequest = {
  model: string;
  messages: ReadonlyArray<ChatMessage>;
  tools?: ReadonlyArray<ToolDefinition>;
  /**
   * When set, the provider must call exactly this tool.
   */
  forced_tool?: string | null;
  max_tokens?: number;
  temperature?: number;
};

export type FinishReason = "stop" | "tool_calls" | "function_call" | "length" | (string & {});

export type Choice = {
  message: ChatMessage;
  finish_reason: FinishReason | null;
};

export type UsageStats = {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
};

export type ModelResponse = {
  id: string;
  choices: ReadonlyArray<Choice | null>;
  usage: UsageStats;
};

export interface ModelProvider {
  complete(request: ModelRequest): Promise<ModelResponse>;
}

export type ModelErrorCode = "auth" | "rate_limit" | "timeout" | "api_error";

export class ModelError extends Error {
  constructor(
    public code: ModelErrorCode,
    public retryable: boolean = false,
    message: string = ""
  ) {
    super(message);
    this.name = "ModelError";
  }
}

/**
 * The provider rejected the request because the prompt does not fit its context window.
 * The step engine recovers from this one fault by compacting and retrying.
 */
export class ContextWindowExceededError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ContextWindowExceededError";
  }
}

/**
 * Malformed response shape. Retried in place.
 */
export class InvalidResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidResponseError";
  }
}

/**
 * finish_reason == "length". Never retried: the context has to shrink first.
 */
export class LengthFinishError extends Error {
  constructor(message: string = "model stopped on the output token limit (finish_reason=length)") {
    super(message);
    this.name = "LengthFinishError";
  }
}

export class RetriesExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(`retries exhausted after ${attempts} attempts: ${detail}`, { cause: lastError });
    this.name = "RetriesExhaustedError";
  }
}
