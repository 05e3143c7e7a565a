// pattern: Imperative Shell

import type { ModelConfig } from "../config/schema.ts";
import type { ModelProvider } from "./types.ts";
import { createAnthropicAdapter } from "./anthropic.ts";
import { createOpenAICompatAdapter } from "./openai-compat.ts";
import type { AdapterOptions } from "./openai-compat.ts";

const STRUCTURED_OUTPUT_MODELS: ReadonlySet<string> = new Set(["gpt-4o", "gpt-4o-mini"]);

/**
 * Whether the model honours a JSON-schema constrained response. Only these models
 * may start a conversation with more than one run_first rule.
 */
export function supportsStructuredOutput(config: Pick<ModelConfig, "name" | "structured_output">): boolean {
  return config.structured_output ?? STRUCTURED_OUTPUT_MODELS.has(config.name);
}

export function createModelProvider(config: ModelConfig, options: AdapterOptions = {}): ModelProvider {
  switch (config.provider) {
    case "anthropic":
      return createAnthropicAdapter(config, options);
    case "openai-compat":
      return createOpenAICompatAdapter(config, options);
    default:
      throw new Error(
        `Unknown model provider: ${String(config.provider)}. Valid providers are: 'anthropic', 'openai-compat'`
      );
  }
}
