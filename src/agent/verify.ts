// pattern: Functional Core

/**
 * Checks on the very first reply of a conversation, before it is committed.
 * A first reply that talks to the user outside send_message, or leaks call syntax into
 * its monologue, tends to set the pattern for everything after it.
 */

import type { ChatMessage } from '../model/types.ts';

const FIRST_MESSAGE_TOOLS: ReadonlySet<string> = new Set(['send_message', 'archival_memory_search']);

const SPECIAL_CHARACTERS = '(){}[]"';

const RESERVED_WORDS = ['functions', 'send_message'];

export type FirstMessageCheck = { ok: true } | { ok: false; reason: string };

export type VerifyFirstMessageOptions = {
  requireSendMessage: boolean;
  requireMonologue: boolean;
};

export function verifyFirstMessageCorrectness(
  message: ChatMessage,
  options: VerifyFirstMessageOptions,
): FirstMessageCheck {
  const call = message.tool_calls?.[0];

  if (options.requireSendMessage) {
    if (!call) {
      return { ok: false, reason: 'first message did not call a function' };
    }
    if (!FIRST_MESSAGE_TOOLS.has(call.name)) {
      return { ok: false, reason: `first message called ${call.name} instead of send_message` };
    }
  }

  const monologue = message.content ?? '';
  if (options.requireMonologue && monologue.length === 0) {
    return { ok: false, reason: 'first message is missing inner monologue' };
  }

  if (monologue.length > 0) {
    if ([...SPECIAL_CHARACTERS].some((char) => monologue.includes(char))) {
      return { ok: false, reason: 'first message monologue contains special characters' };
    }
    if (RESERVED_WORDS.some((word) => monologue.includes(word))) {
      return { ok: false, reason: 'first message monologue contains reserved words' };
    }
  }

  return { ok: true };
}
