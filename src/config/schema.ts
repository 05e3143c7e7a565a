// pattern: Functional Core
import { z } from "zod";

const AgentConfigSchema = z.object({
  chaining: z.boolean().default(true),
  max_chaining_steps: z.number().int().positive().optional(),
  first_message_retry_limit: z.number().int().nonnegative().default(10),
  first_message_verify_monologue: z.boolean().default(true),
  warning_fraction: z.number().gt(0).max(1).default(0.75),
  include_initial_boot_message: z.boolean().default(true),
  agent_id: z.string().optional(),
  name: z.string().default("lodestar"),
  system_path: z.string().default("system.md"),
  persona_path: z.string().default("persona.md"),
  human_path: z.string().default("human.md"),
});

const ModelConfigSchema = z.object({
  provider: z.enum(["anthropic", "openai-compat"]),
  name: z.string(),
  api_key: z.string().optional(),
  base_url: z.string().url().optional(),
  context_window: z.number().int().positive().default(8192),
  max_tokens: z.number().int().positive().default(4096),
  structured_output: z.boolean().optional(),
});

const RetryConfigSchema = z.object({
  max_attempts: z.number().int().positive().default(3),
  backoff_base_ms: z.number().int().nonnegative().default(500),
  max_delay_ms: z.number().int().nonnegative().default(10000),
});

const SummarizationConfigSchema = z.object({
  trunc_token_fraction: z.number().gt(0).max(1).default(0.75),
  keep_last_n: z.number().int().nonnegative().default(3),
  max_summary_tokens: z.number().int().positive().default(1024),
  prompt: z.string().optional(),
  model: ModelConfigSchema.optional(),
});

const ToolsConfigSchema = z.object({
  return_char_limit: z.number().int().positive().default(6000),
  sandbox_timeout_ms: z.number().int().positive().default(5000),
});

const DatabaseConfigSchema = z.object({
  url: z.string().url(),
});

const LoggingConfigSchema = z.object({
  level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  file: z.string().optional(),
});

const AppConfigSchema = z.object({
  agent: AgentConfigSchema.default({}),
  model: ModelConfigSchema,
  retry: RetryConfigSchema.default({}),
  summarization: SummarizationConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  database: DatabaseConfigSchema,
  logging: LoggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type SummarizationConfig = z.infer<typeof SummarizationConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export {
  AppConfigSchema,
  AgentConfigSchema,
  ModelConfigSchema,
  RetryConfigSchema,
  SummarizationConfigSchema,
  ToolsConfigSchema,
  DatabaseConfigSchema,
  LoggingConfigSchema,
};
