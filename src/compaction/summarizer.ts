// pattern: Imperative Shell

/**
 * Summarizer port backed by a model provider.
 * Input that would not fit the summarizing model's window is folded in two passes:
 * the oldest part is summarized first and stands in for itself in the second call.
 */

import type { AgentState, Message } from '../agent/types.ts';
import { countMessagesTokens } from '../context/tokens.ts';
import type { Logger } from '../logging/logger.ts';
import { getAiReply } from '../model/response.ts';
import type { RetryOptions } from '../model/retry.ts';
import type { ModelProvider } from '../model/types.ts';
import { buildSummarizationRequest } from './prompt.ts';
import type { Summarizer } from './types.ts';

export const SUMMARY_INPUT_WINDOW_FRACTION = 0.75;

export type CreateSummarizerOptions = {
  readonly model: ModelProvider;
  readonly modelName: string;
  readonly maxSummaryTokens: number;
  readonly prompt: string | null;
  readonly logger: Logger;
  readonly retry?: Partial<RetryOptions>;
  readonly clock?: () => Date;
};

export function createSummarizer(options: CreateSummarizerOptions): Summarizer {
  const { model, modelName, maxSummaryTokens, prompt, logger, retry } = options;
  const clock = options.clock ?? (() => new Date());

  async function summarize(agentState: AgentState, messages: ReadonlyArray<Message>): Promise<string> {
    const budget = SUMMARY_INPUT_WINDOW_FRACTION * agentState.context_window;
    const inputTokens = countMessagesTokens(messages);
    let input = messages;

    if (inputTokens > budget && messages.length > 1) {
      const ratio = (budget / inputTokens) * 0.8;
      const cutoff = Math.min(messages.length - 1, Math.max(1, Math.floor(messages.length * ratio)));
      logger.debug({ inputTokens, budget, cutoff }, 'summary input too large, folding oldest messages first');
      const head = await summarize(agentState, messages.slice(0, cutoff));
      const folded: Message = {
        id: 'folded-summary',
        agent_id: agentState.id,
        role: 'user',
        text: `Summary of earlier messages: ${head}`,
        created_at: clock(),
      };
      input = [folded, ...messages.slice(cutoff)];
    }

    const request = buildSummarizationRequest({
      systemPrompt: prompt,
      messages: input,
      modelName,
      maxTokens: maxSummaryTokens,
    });
    const { choice } = await getAiReply({ provider: model, request, retry, logger });
    const summary = choice.message.content?.trim() ?? '';
    if (summary.length === 0) {
      throw new Error('summarizer returned an empty summary');
    }
    return summary;
  }

  return { summarize };
}
