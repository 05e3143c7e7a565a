// pattern: Functional Core

export type {
  ChatRole,
  ToolCall,
  ChatMessage,
  JsonSchemaProperty,
  ToolInputSchema,
  ToolDefinition,
  ModelRequest,
  FinishReason,
  Choice,
  UsageStats,
  ModelResponse,
  ModelProvider,
  ModelErrorCode,
} from "./types.ts";

export {
  ModelError,
  ContextWindowExceededError,
  InvalidResponseError,
  LengthFinishError,
  RetriesExhaustedError,
} from "./types.ts";
export type { RetryOptions } from "./retry.ts";
export { callWithRetry, retryDelay } from "./retry.ts";
export { isContextOverflowError, looksLikeContextOverflow } from "./overflow.ts";
export type { ValidatedResponse, GetAiReplyOptions } from "./response.ts";
export { validateModelResponse, getAiReply } from "./response.ts";
export type { AdapterOptions } from "./openai-compat.ts";
export { createAnthropicAdapter } from "./anthropic.ts";
export { createOpenAICompatAdapter } from "./openai-compat.ts";
export { createModelProvider, supportsStructuredOutput } from "./factory.ts";
