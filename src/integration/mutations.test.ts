// pattern: Imperative Shell

/**
 * Integration tests for conversation and memory edits.
 * Each edit must leave the store agreeing with the context window: deleted messages gone,
 * rewritten calls updated in place, outside block edits picked up on the next step.
 */

import { describe, it, expect } from 'vitest';
import { packageUserMessage } from '../agent/system-messages.ts';
import type { MessageCreate } from '../agent/types.ts';
import { createTestRuntime, FIXED_NOW, testActor, toolCallReply } from './test-helpers.ts';

function userInput(text: string): Array<MessageCreate> {
  return [{ role: 'user', text: packageUserMessage(text, FIXED_NOW) }];
}

function greeting(message: string): ReturnType<typeof toolCallReply> {
  return toolCallReply('send_message', { message }, { thinking: 'Greeting the user', heartbeat: false });
}

describe('message edits', () => {
  it('deletes popped messages from the store', async () => {
    const { agent, store } = await createTestRuntime([greeting('Hi Sam')]);
    await agent.step(userInput('hello'));

    const popped = await agent.popMessages(2);

    expect(popped.map((m) => m.id)).toEqual(['msg-5', 'msg-4']);
    expect(store.messages.has('msg-4')).toBe(false);
    expect(store.messages.has('msg-5')).toBe(false);
    expect(store.agents.get('agent-test')?.message_ids).toEqual(['msg-1', 'msg-2', 'msg-3']);
  });

  it('replays the last user message on retry', async () => {
    const { agent, store, model } = await createTestRuntime([greeting('Hi Sam'), greeting('Hello again, Sam')]);
    await agent.step(userInput('hello'));

    const result = await agent.retryLastMessage();

    expect(result.messages.map((m) => m.id)).toEqual(['msg-6', 'msg-7', 'msg-8']);
    const replayed = model.requests[1]?.messages ?? [];
    expect(replayed[replayed.length - 1]?.content).toBe(packageUserMessage('hello', FIXED_NOW));
    expect(store.messages.has('msg-3')).toBe(false);
    expect(store.agents.get('agent-test')?.message_ids).toEqual(['msg-1', 'msg-2', 'msg-6', 'msg-7', 'msg-8']);
  });

  it('rewrites and rethinks the last assistant message in the store', async () => {
    const { agent, store } = await createTestRuntime([greeting('Hi Sam')]);
    await agent.step(userInput('hello'));

    await agent.rewriteLastAssistantMessage('Hello Sam, welcome back');
    await agent.rethinkLastAssistantMessage('Sam is a returning user');

    const stored = store.messages.get('msg-4');
    expect(stored?.tool_calls?.[0]?.arguments).toBe('{"message":"Hello Sam, welcome back","request_heartbeat":false}');
    expect(stored?.text).toBe('Sam is a returning user');
    expect(agent.messages()[3]).toEqual(stored);
  });
});

describe('memory edits', () => {
  it('picks up a block edited outside the agent on the next step', async () => {
    const { agent, store, model } = await createTestRuntime([greeting('Hi Sam'), greeting('Hi Samantha')]);
    await agent.step(userInput('hello'));

    await store.updateBlock('block-human', { value: 'Name: Samantha' }, testActor);
    await agent.step(userInput('I go by Samantha now'));

    expect(model.requests[1]?.messages[0]?.content).toContain('Name: Samantha');
    expect(agent.getState().memory.blocks.find((b) => b.label === 'human')?.value).toBe('Name: Samantha');
    expect(agent.messages()[0]?.text).toContain('Name: Samantha');
  });

  it('persists a new system prompt and renders memory into it', async () => {
    const { agent, store } = await createTestRuntime([]);

    expect(await agent.updateSystemPrompt('You are terse.\n{CORE_MEMORY}')).toBe(true);
    expect(await agent.updateSystemPrompt('You are terse.\n{CORE_MEMORY}')).toBe(false);

    expect(store.agents.get('agent-test')?.system).toBe('You are terse.\n{CORE_MEMORY}');
    const system = agent.messages()[0];
    expect(system?.text).toContain('You are terse.');
    expect(system?.text).toContain('Name: Sam');
    expect(store.agents.get('agent-test')?.message_ids?.[0]).toBe(system?.id);
  });
});
