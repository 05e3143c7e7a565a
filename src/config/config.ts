// pattern: Imperative Shell
import TOML from "@iarna/toml";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema } from "./schema.ts";
import type { AppConfig } from "./schema.ts";

export type {
  AppConfig,
  AgentConfig,
  ModelConfig,
  RetryConfig,
  SummarizationConfig,
  ToolsConfig,
  DatabaseConfig,
  LoggingConfig,
} from "./schema.ts";

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

/**
 * Merge secrets and deployment settings from the environment over the parsed TOML.
 * Pure with respect to its inputs so tests can pass a fake environment.
 */
export function applyEnvOverrides(
  parsed: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...parsed };

  const apiKey = env["ANTHROPIC_API_KEY"] ?? env["OPENAI_COMPAT_API_KEY"];
  if (apiKey) {
    const modelObj = asRecord(parsed["model"]);
    modelObj["api_key"] = apiKey;
    merged["model"] = modelObj;
  }

  if (env["DATABASE_URL"]) {
    merged["database"] = { url: env["DATABASE_URL"] };
  }

  if (env["LOG_LEVEL"]) {
    const loggingObj = asRecord(parsed["logging"]);
    loggingObj["level"] = env["LOG_LEVEL"];
    merged["logging"] = loggingObj;
  }

  return merged;
}

export function parseConfig(raw: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = TOML.parse(raw);
  return AppConfigSchema.parse(applyEnvOverrides(parsed, env));
}

export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? "config.toml");
  const raw = readFileSync(resolvedPath, "utf-8");
  return parseConfig(raw);
}
