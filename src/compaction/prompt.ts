// pattern: Functional Core

/**
 * Structured message builders for summarization LLM calls.
 * The summarizer sees a system instruction, the messages being retired with their
 * roles preserved, and a closing directive.
 */

import type { Message } from '../agent/types.ts';
import type { ChatMessage, ModelRequest } from '../model/types.ts';

export const DEFAULT_SYSTEM_PROMPT = `Your job is to summarize a history of previous messages in a conversation between an AI persona and a human.
The conversation you are given is a from a fixed context window and may not be complete.
Messages sent by the AI are marked with the 'assistant' role.
The AI 'assistant' can also make calls to functions, whose outputs can be seen in messages with the 'tool' role.
Things the AI says in the message content are considered inner monologue and are not seen by the user.
The only AI messages seen by the user are from when the AI uses 'send_message'.
Messages the user sends are in the 'user' role.
The 'user' role is also used for important system events, such as login events and heartbeat events (heartbeats run the AI's program without user action, allowing the AI to act without prompting from the user sending them a message).`;

export const DEFAULT_DIRECTIVE = `Summarize the conversation above from the AI's perspective.
Keep the summary under the word limit, focusing on decisions, facts learned about the user, and unfinished tasks.
Only output the summary, do NOT include anything else in your output.`;

export type BuildSummarizationRequestOptions = {
  readonly systemPrompt: string | null;
  readonly messages: ReadonlyArray<Message>;
  readonly modelName: string;
  readonly maxTokens: number;
};

function describeToolCalls(message: Message): string {
  return (message.tool_calls ?? []).map((call) => `[called ${call.name}(${call.arguments})]`).join('\n');
}

/**
 * Render one retired message as plain chat content. Tool linkage is flattened so the
 * summarizer never needs the tool schemas.
 */
export function toSummaryInput(message: Message): ChatMessage | null {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: message.text ?? '' };
    case 'assistant': {
      const calls = describeToolCalls(message);
      const content = [message.text ?? '', calls].filter((part) => part.length > 0).join('\n');
      return { role: 'assistant', content };
    }
    case 'tool':
      return { role: 'user', content: `[Tool result from ${message.name ?? 'tool'}]: ${message.text ?? ''}` };
    case 'system':
      return null;
  }
}

export function buildSummarizationRequest(options: BuildSummarizationRequestOptions): ModelRequest {
  const messages: Array<ChatMessage> = [
    { role: 'system', content: options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT },
  ];

  for (const message of options.messages) {
    const input = toSummaryInput(message);
    if (input) {
      messages.push(input);
    }
  }

  messages.push({ role: 'user', content: DEFAULT_DIRECTIVE });

  return {
    model: options.modelName,
    messages,
    max_tokens: options.maxTokens,
    temperature: 0,
  };
}
