// pattern: Functional Core

/**
 * Compaction types define the domain model for context compression.
 * These types represent the port interfaces for the compaction pipeline and the
 * result value produced by one pass.
 */

import type { AgentState, Message } from '../agent/types.ts';
import type { ContextWindow } from '../context/types.ts';

export type CompactionResult = {
  readonly summary: string;
  /**
   * Messages folded into this summary.
   */
  readonly summarized_count: number;
  /**
   * All-time messages no longer in context after this pass.
   */
  readonly hidden_count: number;
  readonly total_count: number;
  readonly cutoff: number;
  readonly tokens_before: number;
  readonly tokens_after: number;
};

export type Summarizer = {
  summarize(agentState: AgentState, messages: ReadonlyArray<Message>): Promise<string>;
};

export type Compactor = {
  compact(window: ContextWindow, agentState: AgentState): Promise<CompactionResult>;
};

export type CutoffOptions = {
  /**
   * Token count per message, index-aligned with the buffer (system message included).
   */
  readonly tokenCounts: ReadonlyArray<number>;
  readonly truncTokenFraction: number;
  readonly keepLastN: number;
};

export type InsufficientMessagesDetails = {
  readonly num_candidate_messages: number;
  readonly num_total_messages: number;
  readonly preserve_n: number;
};

export class InsufficientMessagesError extends Error {
  constructor(
    message: string,
    public readonly details: InsufficientMessagesDetails,
  ) {
    super(message);
    this.name = 'InsufficientMessagesError';
  }
}
