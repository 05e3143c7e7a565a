// pattern: Functional Core

/**
 * Token accounting and the chat form of persisted messages.
 */

import type { Message } from '../agent/types.ts';
import type { ChatMessage } from '../model/types.ts';

/**
 * Simple token estimation heuristic.
 * Rough approximation: 1 token ≈ 4 characters.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function toChatMessage(message: Message): ChatMessage {
  const chat: ChatMessage = { role: message.role, content: message.text };
  if (message.role === 'tool') {
    if (message.name !== undefined) {
      chat.name = message.name;
    }
    if (message.tool_call_id !== undefined) {
      chat.tool_call_id = message.tool_call_id;
    }
  }
  if (message.role === 'assistant' && message.tool_calls && message.tool_calls.length > 0) {
    chat.tool_calls = message.tool_calls;
  }
  return chat;
}

export function countMessageTokens(message: Message): number {
  return estimateTokens(JSON.stringify(toChatMessage(message)));
}

export function countMessagesTokens(messages: ReadonlyArray<Message>): number {
  return messages.reduce((total, message) => total + countMessageTokens(message), 0);
}
