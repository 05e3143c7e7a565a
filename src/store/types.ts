// pattern: Functional Core

/**
 * Persistence port for agents, messages, memory blocks and archival passages.
 * Every call carries the acting identity; the store decides what it may touch.
 * Single calls are atomic. Nothing here spans more than one call.
 */

import type { AgentState, Message } from '../agent/types.ts';
import type { MemoryBlock } from '../memory/types.ts';
import type { ToolCall } from '../model/types.ts';
import type { ToolRule } from '../tool-rules/types.ts';

export type Actor = {
  readonly id: string;
};

export type MessageUpdate = {
  text?: string | null;
  tool_calls?: ReadonlyArray<ToolCall>;
};

export type BlockUpdate = {
  value?: string;
  limit?: number;
};

export type AgentUpdate = {
  message_ids?: ReadonlyArray<string>;
  system?: string;
  tool_rules?: ReadonlyArray<ToolRule>;
  tools?: ReadonlyArray<string>;
};

export type Passage = {
  id: string;
  agent_id: string;
  text: string;
  created_at: Date;
};

export type PageRequest = {
  limit: number;
  offset: number;
};

export type SearchPage<T> = {
  items: Array<T>;
  total: number;
};

export interface AgentStore {
  createAgent(state: AgentState, actor: Actor): Promise<AgentState>;
  getAgent(agentId: string, actor: Actor): Promise<AgentState | null>;
  updateAgent(agentId: string, patch: AgentUpdate, actor: Actor): Promise<void>;

  createMessages(messages: ReadonlyArray<Message>, actor: Actor): Promise<Array<Message>>;
  getMessage(messageId: string, actor: Actor): Promise<Message | null>;
  updateMessage(messageId: string, patch: MessageUpdate, actor: Actor): Promise<Message>;
  deleteMessage(messageId: string, actor: Actor): Promise<void>;
  countMessages(agentId: string, actor: Actor): Promise<number>;
  /**
   * Case-insensitive text match over user and assistant messages, oldest first.
   */
  searchMessages(agentId: string, query: string, page: PageRequest, actor: Actor): Promise<SearchPage<Message>>;
  /**
   * User and assistant messages created in [start, end), oldest first.
   */
  searchMessagesByDate(
    agentId: string,
    start: Date,
    end: Date,
    page: PageRequest,
    actor: Actor,
  ): Promise<SearchPage<Message>>;

  getBlock(blockId: string, actor: Actor): Promise<MemoryBlock | null>;
  updateBlock(blockId: string, patch: BlockUpdate, actor: Actor): Promise<MemoryBlock>;

  insertPassage(agentId: string, text: string, actor: Actor): Promise<Passage>;
  countPassages(agentId: string, actor: Actor): Promise<number>;
  searchPassages(agentId: string, query: string, page: PageRequest, actor: Actor): Promise<SearchPage<Passage>>;
}
