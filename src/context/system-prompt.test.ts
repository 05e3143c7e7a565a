// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import { createMemory } from '../memory/memory.ts';
import { FIXED_NOW, sequentialIds } from '../integration/test-helpers.ts';
import {
  compileMemoryMetadataBlock,
  compileSystemMessage,
  initializeMessageSequence,
} from './system-prompt.ts';
import { formatTimestamp, toUtcDate } from './timestamps.ts';
import { countMessageTokens, estimateTokens, toChatMessage } from './tokens.ts';

const memory = createMemory([{ id: 'b1', label: 'human', value: 'Name: Sam', limit: 20 }]);

const expectedCoreMemory =
  '### Memory [last modified: 2024-03-05 01:07:09 PM UTC+0000]\n' +
  '4 previous messages between you and the user are stored in recall memory (use functions to access them)\n' +
  '2 total memories you created are stored in archival memory (use functions to access them)\n' +
  '\nCore memory shown below (limited in size, additional information stored in archival / recall memory):\n' +
  '<human characters="9/20">\nName: Sam\n</human>';

describe('compileMemoryMetadataBlock', () => {
  it('reports counts and the last edit time', () => {
    expect(compileMemoryMetadataBlock({ lastEdit: FIXED_NOW, recallCount: 0, archivalCount: 7 })).toBe(
      '### Memory [last modified: 2024-03-05 01:07:09 PM UTC+0000]\n' +
        '0 previous messages between you and the user are stored in recall memory (use functions to access them)\n' +
        '7 total memories you created are stored in archival memory (use functions to access them)\n' +
        '\nCore memory shown below (limited in size, additional information stored in archival / recall memory):',
    );
  });
});

describe('compileSystemMessage', () => {
  it('substitutes {CORE_MEMORY} in place', () => {
    const text = compileSystemMessage({
      systemPrompt: 'Before\n{CORE_MEMORY}\nAfter',
      memory,
      lastEdit: FIXED_NOW,
      recallCount: 4,
      archivalCount: 2,
    });

    expect(text).toBe(`Before\n${expectedCoreMemory}\nAfter`);
  });

  it('appends core memory when the template omits the variable', () => {
    const text = compileSystemMessage({
      systemPrompt: 'Base prompt',
      memory,
      lastEdit: FIXED_NOW,
      recallCount: 4,
      archivalCount: 2,
    });

    expect(text).toBe(`Base prompt\n${expectedCoreMemory}`);
  });

  it('rejects unknown template variables', () => {
    expect(() =>
      compileSystemMessage({ systemPrompt: 'Hello {NAME}', memory, lastEdit: FIXED_NOW, recallCount: 0, archivalCount: 0 }),
    ).toThrow('unknown system prompt variable: {NAME}');
  });

  it('leaves JSON braces alone', () => {
    const text = compileSystemMessage({
      systemPrompt: 'Reply as {"type": "json"}',
      memory,
      lastEdit: FIXED_NOW,
      recallCount: 4,
      archivalCount: 2,
    });

    expect(text.startsWith('Reply as {"type": "json"}\n### Memory')).toBe(true);
  });
});

describe('initializeMessageSequence', () => {
  it('orders system, boot messages, then the login event', () => {
    const boot = [{ id: 'boot-1', agent_id: 'a', role: 'assistant' as const, text: 'boot', created_at: FIXED_NOW }];

    const sequence = initializeMessageSequence({
      agentId: 'a',
      systemText: 'system text',
      loginEvent: '{"type":"login"}',
      bootMessages: boot,
      now: FIXED_NOW,
      generateId: sequentialIds('msg'),
    });

    expect(sequence.map((m) => [m.id, m.role, m.text])).toEqual([
      ['msg-1', 'system', 'system text'],
      ['boot-1', 'assistant', 'boot'],
      ['msg-2', 'user', '{"type":"login"}'],
    ]);
  });
});

describe('timestamps', () => {
  it('formats UTC time on a 12-hour clock', () => {
    expect(formatTimestamp(new Date('2024-01-01T00:05:00Z'))).toBe('2024-01-01 12:05:00 AM UTC+0000');
    expect(formatTimestamp(FIXED_NOW)).toBe('2024-03-05 01:07:09 PM UTC+0000');
  });

  it('reads zone-less strings as UTC wall-clock time', () => {
    expect(toUtcDate('2024-03-05 13:07:09').getTime()).toBe(FIXED_NOW.getTime());
    expect(toUtcDate('2024-03-05T15:07:09+02:00').getTime()).toBe(FIXED_NOW.getTime());
  });

  it('returns Date values unchanged', () => {
    expect(toUtcDate(FIXED_NOW)).toBe(FIXED_NOW);
  });
});

describe('tokens', () => {
  it('estimates four characters per token, rounding up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcde')).toBe(2);
  });

  it('counts a message over its serialized chat form', () => {
    const message = { id: 'm', agent_id: 'a', role: 'user' as const, text: 'hi', created_at: FIXED_NOW };

    expect(countMessageTokens(message)).toBe(8);
  });

  it('keeps tool linkage on tool-role messages', () => {
    expect(
      toChatMessage({
        id: 'm',
        agent_id: 'a',
        role: 'tool',
        text: 'ok',
        name: 'send_message',
        tool_call_id: 'call-1',
        created_at: FIXED_NOW,
      }),
    ).toEqual({ role: 'tool', content: 'ok', name: 'send_message', tool_call_id: 'call-1' });
  });
});
