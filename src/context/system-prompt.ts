// pattern: Functional Core

/**
 * System message compilation: template + memory metadata header + rendered core memory.
 */

import { compileMemory } from '../memory/memory.ts';
import type { Memory } from '../memory/types.ts';
import type { Message } from '../agent/types.ts';
import { formatTimestamp } from './timestamps.ts';

export const CORE_MEMORY_VARIABLE = 'CORE_MEMORY';

const TEMPLATE_VARIABLE = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export type MemoryMetadata = {
  lastEdit: Date;
  recallCount: number;
  archivalCount: number;
};

export function compileMemoryMetadataBlock(metadata: MemoryMetadata): string {
  return [
    `### Memory [last modified: ${formatTimestamp(metadata.lastEdit)}]`,
    `${metadata.recallCount} previous messages between you and the user are stored in recall memory (use functions to access them)`,
    `${metadata.archivalCount} total memories you created are stored in archival memory (use functions to access them)`,
    '\nCore memory shown below (limited in size, additional information stored in archival / recall memory):',
  ].join('\n');
}

export type CompileSystemMessageOptions = MemoryMetadata & {
  systemPrompt: string;
  memory: Memory;
};

/**
 * Render the system prompt template. `{CORE_MEMORY}` is appended when the template
 * omits it; any other `{VARIABLE}` is rejected.
 */
export function compileSystemMessage(options: CompileSystemMessageOptions): string {
  const { systemPrompt, memory, ...metadata } = options;
  const placeholder = `{${CORE_MEMORY_VARIABLE}}`;
  const template = systemPrompt.includes(placeholder) ? systemPrompt : `${systemPrompt}\n${placeholder}`;

  for (const match of template.matchAll(TEMPLATE_VARIABLE)) {
    if (match[1] !== CORE_MEMORY_VARIABLE) {
      throw new Error(`unknown system prompt variable: {${match[1] ?? ''}}`);
    }
  }

  const coreMemory = `${compileMemoryMetadataBlock(metadata)}\n${compileMemory(memory)}`;
  return template.split(placeholder).join(coreMemory);
}

export type InitialSequenceOptions = {
  agentId: string;
  systemText: string;
  loginEvent: string;
  bootMessages: ReadonlyArray<Message>;
  now: Date;
  generateId: () => string;
};

/**
 * `[system, ...boot messages, login event]` for a brand-new conversation.
 */
export function initializeMessageSequence(options: InitialSequenceOptions): Array<Message> {
  const { agentId, systemText, loginEvent, bootMessages, now, generateId } = options;
  return [
    { id: generateId(), agent_id: agentId, role: 'system', text: systemText, created_at: now },
    ...bootMessages,
    { id: generateId(), agent_id: agentId, role: 'user', text: loginEvent, created_at: now },
  ];
}
