// pattern: Imperative Shell

/**
 * End-to-end tests for the step engine.
 * Full path: user message -> context window -> model -> tool dispatch -> memory -> store,
 * over the in-memory store and scripted models.
 */

import { describe, it, expect } from 'vitest';
import { getHeartbeat, packageUserMessage, REQ_HEARTBEAT_MESSAGE } from '../agent/system-messages.ts';
import type { MessageCreate } from '../agent/types.ts';
import { getBlock } from '../memory/memory.ts';
import { createTestRuntime, FIXED_NOW, testActor, textReply, toolCallReply } from './test-helpers.ts';

function userInput(text: string): Array<MessageCreate> {
  return [{ role: 'user', text: packageUserMessage(text, FIXED_NOW) }];
}

const greeting = toolCallReply('send_message', { message: 'Hi Sam' }, { thinking: 'Greeting the user', heartbeat: false });

const rememberTea = toolCallReply(
  'core_memory_append',
  { label: 'human', content: 'Likes tea' },
  { thinking: 'Saving a preference', heartbeat: true },
);

const acknowledge = toolCallReply(
  'send_message',
  { message: 'Noted, tea it is.' },
  { thinking: 'Confirming', heartbeat: false },
);

function toolResponse(text: string | null | undefined): { status: string; message: string } {
  const parsed: unknown = JSON.parse(text ?? '');
  if (typeof parsed !== 'object' || parsed === null || !('status' in parsed) || !('message' in parsed)) {
    throw new Error(`not a tool response: ${text}`);
  }
  return { status: String(parsed.status), message: String(parsed.message) };
}

describe('agent conversation', () => {
  it('greets, edits memory over a heartbeat chain and persists every message', async () => {
    const { agent, store, model } = await createTestRuntime([greeting, rememberTea, acknowledge]);

    const first = await agent.step(userInput('hello'));
    const second = await agent.step(userInput('I like tea'));

    expect(first.stop_reason).toBe('yield');
    expect(second.stop_reason).toBe('yield');
    expect(second.step_count).toBe(2);
    expect(second.usage.total_tokens).toBe(240);
    expect(lastRequestContent(model.requests[2]?.messages)).toBe(getHeartbeat(REQ_HEARTBEAT_MESSAGE, FIXED_NOW));

    expect(store.blocks.get('block-human')?.value).toBe('Name: Sam\nLikes tea');
    expect(getBlock(agent.getState().memory, 'human').value).toBe('Name: Sam\nLikes tea');
    expect(agent.messages()[0]?.text).toContain('Likes tea');

    const persistedIds = store.agents.get('agent-test')?.message_ids ?? [];
    expect(persistedIds).toEqual(agent.getState().message_ids);
    for (const id of persistedIds) {
      expect(store.messages.has(id)).toBe(true);
    }
    expect(agent.messages().map((m) => m.role)).toEqual([
      'system',
      'user',
      'user',
      'assistant',
      'tool',
      'user',
      'assistant',
      'tool',
      'user',
      'assistant',
      'tool',
    ]);
  });

  it('finds earlier messages in recall memory', async () => {
    const { agent } = await createTestRuntime([
      greeting,
      toolCallReply('conversation_search', { query: 'tea' }, { thinking: 'Checking what Sam likes', heartbeat: true }),
      acknowledge,
    ]);

    await agent.step(userInput('I like tea'));
    const response = await agent.step(userInput('what do I like?'));

    const search = response.messages.find((m) => m.role === 'tool' && m.name === 'conversation_search');
    const result = toolResponse(search?.text);
    expect(result.status).toBe('OK');
    expect(result.message).toContain('I like tea');
    expect(result.message.startsWith('Showing 1 of 1 results (page 0/0):')).toBe(true);
  });

  it('stores and retrieves archival passages', async () => {
    const { agent, store } = await createTestRuntime([
      greeting,
      toolCallReply('archival_memory_insert', { content: 'Sam was born in Lisbon.' }, { heartbeat: true }),
      toolCallReply('archival_memory_search', { query: 'lisbon' }, { heartbeat: true }),
      acknowledge,
    ]);

    await agent.step(userInput('hello'));
    const response = await agent.step(userInput('remember that I was born in Lisbon'));

    expect(response.step_count).toBe(3);
    expect(store.passages.map((p) => p.text)).toEqual(['Sam was born in Lisbon.']);
    const search = response.messages.find((m) => m.role === 'tool' && m.name === 'archival_memory_search');
    expect(toolResponse(search?.text).message).toContain('Sam was born in Lisbon.');
    expect(await store.countPassages('agent-test', testActor)).toBe(1);
  });

  it('resumes a stored conversation where it left off', async () => {
    const first = await createTestRuntime([greeting, rememberTea, acknowledge]);
    await first.agent.step(userInput('hello'));
    await first.agent.step(userInput('I like tea'));

    const stored = await first.store.getAgent('agent-test', testActor);
    if (!stored) {
      throw new Error('agent was not stored');
    }
    const { agent, model } = await createTestRuntime([textReply('Welcome back.')], {
      store: first.store,
      state: stored,
      idPrefix: 'resumed',
      options: { messagesTotal: await first.store.countMessages('agent-test', testActor) },
    });

    expect(agent.messages().map((m) => m.id)).toEqual(first.agent.messages().map((m) => m.id));
    expect(agent.lastFunctionResponse()).toBe('null');

    const response = await agent.step(userInput('hi again'), { skipVerify: true });

    expect(response.stop_reason).toBe('yield');
    expect(model.requests[0]?.messages).toHaveLength(first.agent.messages().length + 1);
  });
});

function lastRequestContent(messages: ReadonlyArray<{ content: string | null }> | undefined): string | null | undefined {
  return messages?.[messages.length - 1]?.content;
}
