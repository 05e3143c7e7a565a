// pattern: Functional Core

/**
 * Agent types for the step engine.
 * These types define the persisted agent record, message format, dependencies,
 * and the public interface for the agent.
 */

import type { AppConfig } from '../config/schema.ts';
import type { Compactor, CompactionResult } from '../compaction/types.ts';
import type { ContextWindowOverview } from '../context/types.ts';
import type { Logger } from '../logging/logger.ts';
import type { Memory } from '../memory/types.ts';
import type { ModelProvider, ToolCall } from '../model/types.ts';
import type { Actor, AgentStore } from '../store/types.ts';
import type { ToolDispatcher, ToolRegistry } from '../tool/types.ts';
import type { ToolRule } from '../tool-rules/types.ts';
import type { KeyedMutex } from './lock.ts';

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export type Message = {
  id: string;
  agent_id: string;
  role: MessageRole;
  /**
   * User/system text, assistant inner monologue, or the packaged tool response.
   */
  text: string | null;
  /**
   * Tool name on tool-role messages.
   */
  name?: string;
  tool_calls?: ReadonlyArray<ToolCall>;
  tool_call_id?: string;
  model?: string;
  created_at: Date;
};

/**
 * Input to a step before it becomes a Message.
 */
export type MessageCreate = {
  role: 'user' | 'system';
  text: string;
  name?: string;
};

export type AgentState = {
  id: string;
  name: string;
  model: string;
  tools: ReadonlyArray<string>;
  tool_rules: ReadonlyArray<ToolRule>;
  memory: Memory;
  /**
   * System prompt template; `{CORE_MEMORY}` marks where memory is rendered.
   */
  system: string;
  context_window: number;
  message_ids: ReadonlyArray<string> | null;
  created_by_id: string;
};

export type UsageStatistics = {
  completion_tokens: number;
  prompt_tokens: number;
  total_tokens: number;
  step_count: number;
};

export type StepResult = {
  messages: ReadonlyArray<Message>;
  heartbeat_requested: boolean;
  tool_failed: boolean;
  token_warning: boolean;
  usage: UsageStatistics;
};

export type InnerStepOptions = {
  firstMessage?: boolean;
  skipVerify?: boolean;
  /**
   * Position within the outer loop; drives forced tool selection. null disables forcing.
   */
  stepCount?: number | null;
};

export type StepOptions = {
  skipVerify?: boolean;
  chaining?: boolean;
  maxChainingSteps?: number;
  signal?: AbortSignal;
};

export type StopReason = 'yield' | 'no_chaining' | 'max_steps' | 'cancelled';

export type StepResponse = {
  messages: ReadonlyArray<Message>;
  step_count: number;
  usage: UsageStatistics;
  stop_reason: StopReason;
};

export type AgentRuntimeConfig = Pick<AppConfig, 'agent' | 'model' | 'retry' | 'tools'>;

export type AgentDependencies = {
  store: AgentStore;
  actor: Actor;
  model: ModelProvider;
  compactor: Compactor;
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
  logger: Logger;
  config: AgentRuntimeConfig;
  lock?: KeyedMutex;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  generateId?: () => string;
};

export type CreateAgentOptions = {
  /**
   * Replaces the boot messages and login event of a brand-new conversation.
   */
  initialMessageSequence?: ReadonlyArray<MessageCreate>;
  /**
   * All-time message count, when the caller knows it. Defaults to the in-context count.
   */
  messagesTotal?: number;
};

export type Agent = {
  readonly id: string;
  innerStep(input: ReadonlyArray<MessageCreate>, options?: InnerStepOptions): Promise<StepResult>;
  step(input: ReadonlyArray<MessageCreate>, options?: StepOptions): Promise<StepResponse>;
  stepUserMessage(text: string, options?: InnerStepOptions): Promise<StepResult>;
  rewriteLastAssistantMessage(text: string): Promise<Message>;
  rethinkLastAssistantMessage(text: string): Promise<Message>;
  popMessages(count: number): Promise<Array<Message>>;
  popUntilLastUserMessage(): Promise<Array<Message>>;
  retryLastMessage(): Promise<StepResult>;
  updateSystemPrompt(template: string): Promise<boolean>;
  rebuildSystemPrompt(options?: { force?: boolean; updateTimestamp?: boolean }): Promise<boolean>;
  summarizeMessagesInPlace(): Promise<CompactionResult>;
  getContextWindowOverview(): Promise<ContextWindowOverview>;
  countTokens(): number;
  messages(): ReadonlyArray<Message>;
  /**
   * `message` field of the last tool response, or null when there is none.
   */
  lastFunctionResponse(): string | null;
  getState(): AgentState;
};
