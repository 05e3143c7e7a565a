// pattern: Imperative Shell

/**
 * Core compaction pipeline.
 * Picks a cutoff that retires roughly a fixed fraction of the buffer's tokens, summarizes
 * the retired messages, then replaces them in context with one summary message.
 * Dependencies: Summarizer (LLM summarization), ContextWindow (buffer and persistence).
 */

import type { AgentState, Message } from '../agent/types.ts';
import type { SummarizationConfig } from '../config/schema.ts';
import { formatTimestamp } from '../context/timestamps.ts';
import { countMessageTokens } from '../context/tokens.ts';
import type { ContextWindow } from '../context/types.ts';
import type { Logger } from '../logging/logger.ts';
import { InsufficientMessagesError } from './types.ts';
import type { CompactionResult, Compactor, CutoffOptions, Summarizer } from './types.ts';

export type CreateCompactorOptions = {
  readonly summarizer: Summarizer;
  readonly config: Pick<SummarizationConfig, 'trunc_token_fraction' | 'keep_last_n'>;
  readonly logger: Logger;
  readonly generateId: () => string;
  readonly clock?: () => Date;
};

/**
 * Index of the first message that stays in context. Everything in [1, cutoff) is summarized.
 *
 * The walk stops on the first candidate that pushes the running total past the target.
 * The cutoff then moves one past a user message so an assistant turn follows the summary,
 * and past any tool messages so no tool result is left without its call.
 */
export function selectSummaryCutoff(messages: ReadonlyArray<Message>, options: CutoffOptions): number {
  const { tokenCounts, truncTokenFraction, keepLastN } = options;
  if (messages[0]?.role !== 'system') {
    throw new Error('buffer must start with a system message');
  }
  if (tokenCounts.length !== messages.length) {
    throw new Error(`expected ${messages.length} token counts, got ${tokenCounts.length}`);
  }

  const bufferTokens = tokenCounts.slice(1).reduce((sum, n) => sum + n, 0);
  const desired = Math.floor(bufferTokens * truncTokenFraction);
  const candidateCounts = tokenCounts.slice(1, Math.max(1, messages.length - keepLastN));

  if (candidateCounts.length === 0) {
    throw new InsufficientMessagesError('Not enough messages to compress for summarization', {
      num_candidate_messages: 0,
      num_total_messages: messages.length,
      preserve_n: keepLastN,
    });
  }

  let tokensSoFar = 0;
  let cutoff = 0;
  for (const [i, count] of candidateCounts.entries()) {
    cutoff = i;
    tokensSoFar += count;
    if (tokensSoFar > desired) {
      break;
    }
  }
  // skip the system message
  cutoff += 1;

  if (messages[cutoff]?.role === 'user' && cutoff + 1 < messages.length) {
    cutoff += 1;
  }
  while (cutoff < messages.length && messages[cutoff]?.role === 'tool') {
    cutoff += 1;
  }

  const retired = cutoff - 1;
  if (retired <= 1) {
    throw new InsufficientMessagesError('Not enough messages to compress for summarization after determining cutoff', {
      num_candidate_messages: Math.max(retired, 0),
      num_total_messages: messages.length,
      preserve_n: keepLastN,
    });
  }
  return cutoff;
}

export function packageSummaryMessage(
  summary: string,
  summarizedCount: number,
  hiddenCount: number,
  totalCount: number,
  now: Date,
): string {
  const message =
    `Note: prior messages (${hiddenCount} of ${totalCount} total messages) have been hidden from view due to conversation memory constraints.\n` +
    `The following is a summary of the previous ${summarizedCount} messages:\n ${summary}`;
  return JSON.stringify({ type: 'system_alert', message, time: formatTimestamp(now) });
}

export function createCompactor(options: CreateCompactorOptions): Compactor {
  const { summarizer, config, logger, generateId } = options;
  const clock = options.clock ?? (() => new Date());

  return {
    async compact(window: ContextWindow, agentState: AgentState): Promise<CompactionResult> {
      const messages = window.messages();
      const tokensBefore = window.countTokens();

      const cutoff = selectSummaryCutoff(messages, {
        tokenCounts: messages.map(countMessageTokens),
        truncTokenFraction: config.trunc_token_fraction,
        keepLastN: config.keep_last_n,
      });
      const retired = messages.slice(1, cutoff);

      logger.info(
        { agentId: agentState.id, cutoff, retired: retired.length, total: messages.length },
        'summarizing messages to free context',
      );
      const summary = await summarizer.summarize(agentState, retired);

      const totalCount = window.getMessagesTotal();
      const hiddenCount = totalCount - (messages.length - cutoff);
      const now = clock();
      const text = packageSummaryMessage(summary, retired.length, hiddenCount, totalCount, now);

      window.trim(cutoff);
      await window.prepend([{ id: generateId(), agent_id: agentState.id, role: 'user', text, created_at: now }]);

      const tokensAfter = window.countTokens();
      logger.info({ agentId: agentState.id, tokensBefore, tokensAfter }, 'compaction complete');

      return {
        summary,
        summarized_count: retired.length,
        hidden_count: hiddenCount,
        total_count: totalCount,
        cutoff,
        tokens_before: tokensBefore,
        tokens_after: tokensAfter,
      };
    },
  };
}
