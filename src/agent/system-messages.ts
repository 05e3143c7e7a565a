// pattern: Functional Core

/**
 * Synthetic messages the runtime injects into the conversation:
 * user envelopes, login and heartbeat events, memory-pressure alerts, boot sequence.
 * All of them are compact JSON strings carrying a `time` field.
 */

import { formatTimestamp } from '../context/timestamps.ts';
import type { Message } from './types.ts';

const HIDDEN_PREFIX = '[This is an automated system message hidden from the user]';

export const REQ_HEARTBEAT_MESSAGE = `${HIDDEN_PREFIX} request_heartbeat == true`;
export const FUNC_FAILED_HEARTBEAT_MESSAGE = `${HIDDEN_PREFIX} Function call failed, returning control`;
export const TOKEN_LIMIT_WARNING_MESSAGE =
  `${HIDDEN_PREFIX} The conversation history will soon reach its maximum length and be trimmed. ` +
  'Make sure to save any important information from the conversation to your memory before it is removed.';

export const BOOT_SEND_MESSAGE_TEXT = 'Bootup sequence complete. Persona activated. Testing messaging functionality.';

export function packageUserMessage(text: string, now: Date): string {
  return JSON.stringify({ type: 'user_message', message: text, time: formatTimestamp(now) });
}

export function getLoginEvent(now: Date, lastLogin: string = 'Never (first login)'): string {
  return JSON.stringify({ type: 'login', last_login: lastLogin, time: formatTimestamp(now) });
}

export function getHeartbeat(reason: string, now: Date): string {
  return JSON.stringify({ type: 'heartbeat', reason, time: formatTimestamp(now) });
}

export function getTokenLimitWarning(now: Date): string {
  return JSON.stringify({ type: 'system_alert', message: TOKEN_LIMIT_WARNING_MESSAGE, time: formatTimestamp(now) });
}

/**
 * Read the `message` field back out of a JSON user envelope.
 * Plain text that is not an envelope is returned as-is.
 */
export function unpackUserMessage(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && 'message' in parsed && typeof parsed.message === 'string') {
      return parsed.message;
    }
  } catch {
    // not an envelope
  }
  return text;
}

export type BootMessageOptions = {
  agentId: string;
  now: Date;
  generateId: () => string;
  /**
   * Packaged tool response for the boot send_message call.
   */
  sendMessageResponse: string;
};

/**
 * A worked send_message exchange placed before the first user event so the model
 * sees the calling convention once.
 */
export function getInitialBootMessages(options: BootMessageOptions): Array<Message> {
  const { agentId, now, generateId, sendMessageResponse } = options;
  const toolCallId = generateId();
  return [
    {
      id: generateId(),
      agent_id: agentId,
      role: 'assistant',
      text: '*inner thoughts* Still waiting on the user. Sending a message with function.',
      tool_calls: [
        {
          id: toolCallId,
          name: 'send_message',
          arguments: JSON.stringify({ message: BOOT_SEND_MESSAGE_TEXT }),
        },
      ],
      created_at: now,
    },
    {
      id: generateId(),
      agent_id: agentId,
      role: 'tool',
      name: 'send_message',
      text: sendMessageResponse,
      tool_call_id: toolCallId,
      created_at: now,
    },
  ];
}
