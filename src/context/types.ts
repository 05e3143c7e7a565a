// pattern: Functional Core

/**
 * Context window port: the ordered in-context message buffer and its accounting.
 * buffer[0] is always the system message.
 */

import type { AgentState, Message } from '../agent/types.ts';
import type { Memory } from '../memory/types.ts';
import type { ToolDefinition } from '../model/types.ts';

export type ContextWindowOverview = {
  context_window_size_max: number;
  context_window_size_current: number;
  num_messages: number;
  num_archival_memory: number;
  num_recall_memory: number;
  num_tokens_external_memory_summary: number;
  external_memory_summary: string;
  num_tokens_system: number;
  system_prompt: string;
  num_tokens_core_memory: number;
  core_memory: string;
  num_tokens_summary_memory: number;
  summary_memory: string | null;
  num_tokens_messages: number;
  num_tokens_functions_definitions: number;
};

export type RebuildOptions = {
  template: string;
  memory: Memory;
  force?: boolean;
  updateTimestamp?: boolean;
};

export interface ContextWindow {
  readonly agentId: string;
  messages(): ReadonlyArray<Message>;
  messageIds(): Array<string>;
  getMessagesTotal(): number;
  setMessagesTotal(total: number): void;

  /**
   * Persist a fresh sequence and make it the buffer. The first message must be a system message.
   */
  initialize(sequence: ReadonlyArray<Message>): Promise<void>;
  /**
   * Resolve persisted ids into the buffer; ids the store no longer has are skipped.
   */
  load(messageIds: ReadonlyArray<string>): Promise<void>;
  append(messages: ReadonlyArray<Message>): Promise<Array<Message>>;
  prepend(messages: ReadonlyArray<Message>): Promise<Array<Message>>;
  trim(cutoff: number): void;
  /**
   * Replace the message at index with an already-persisted version of it.
   */
  replace(index: number, message: Message): void;
  /**
   * Delete the last message from the store, then from the buffer.
   * A store failure leaves the buffer untouched and rethrows.
   */
  deleteLast(): Promise<Message>;
  swapSystemMessage(text: string): Promise<Message>;
  rebuildSystemMessage(options: RebuildOptions): Promise<boolean>;
  validateUTC(): void;
  syncMessageIds(): Promise<void>;

  countTokens(): number;
  getOverview(agentState: AgentState, tools: ReadonlyArray<ToolDefinition>): Promise<ContextWindowOverview>;
}
