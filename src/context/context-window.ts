// pattern: Imperative Shell

/**
 * The in-context message buffer for one agent.
 * Every mutation persists first and splices second, so the buffer never holds a
 * message the store does not have.
 */

import type { AgentState, Message } from '../agent/types.ts';
import type { Logger } from '../logging/logger.ts';
import { compileMemory } from '../memory/memory.ts';
import type { Actor, AgentStore } from '../store/types.ts';
import type { ToolDefinition } from '../model/types.ts';
import { compileMemoryMetadataBlock, compileSystemMessage } from './system-prompt.ts';
import { toUtcDate } from './timestamps.ts';
import { countMessagesTokens, countMessageTokens, estimateTokens } from './tokens.ts';
import type { ContextWindow, ContextWindowOverview, RebuildOptions } from './types.ts';

export const SUMMARY_MARKER = 'The following is a summary of the previous ';

export type ContextWindowDependencies = {
  store: AgentStore;
  actor: Actor;
  agentId: string;
  logger: Logger;
  clock?: () => Date;
  generateId: () => string;
};

export function createContextWindow(deps: ContextWindowDependencies): ContextWindow {
  const { store, actor, agentId, logger, generateId } = deps;
  const clock = deps.clock ?? (() => new Date());

  let buffer: Array<Message> = [];
  let messagesTotal = 0;

  function systemMessage(): Message {
    const first = buffer[0];
    if (!first || first.role !== 'system') {
      throw new Error(`context window for agent ${agentId} does not start with a system message`);
    }
    return first;
  }

  function validateUTC(): void {
    buffer = buffer.map((message) => {
      const created = toUtcDate(message.created_at);
      return created === message.created_at ? message : { ...message, created_at: created };
    });
  }

  async function swapSystemMessage(text: string): Promise<Message> {
    systemMessage();
    const [persisted] = await store.createMessages(
      [{ id: generateId(), agent_id: agentId, role: 'system', text, created_at: clock() }],
      actor,
    );
    if (!persisted) {
      throw new Error('store returned no system message');
    }
    buffer = [persisted, ...buffer.slice(1)];
    return persisted;
  }

  return {
    agentId,

    messages(): ReadonlyArray<Message> {
      return buffer;
    },

    messageIds(): Array<string> {
      return buffer.map((message) => message.id);
    },

    getMessagesTotal(): number {
      return messagesTotal;
    },

    setMessagesTotal(total: number): void {
      messagesTotal = total;
    },

    async initialize(sequence: ReadonlyArray<Message>): Promise<void> {
      if (sequence[0]?.role !== 'system') {
        throw new Error('initial message sequence must start with a system message');
      }
      buffer = await store.createMessages(sequence, actor);
      messagesTotal += buffer.length;
      validateUTC();
    },

    async load(messageIds: ReadonlyArray<string>): Promise<void> {
      const loaded: Array<Message> = [];
      for (const id of messageIds) {
        const message = await store.getMessage(id, actor);
        if (message) {
          loaded.push(message);
        } else {
          logger.warn({ agentId, messageId: id }, 'message in context not found in store, skipping');
        }
      }
      buffer = loaded;
      systemMessage();
      validateUTC();
    },

    async append(messages: ReadonlyArray<Message>): Promise<Array<Message>> {
      const persisted = await store.createMessages(messages, actor);
      buffer = [...buffer, ...persisted];
      messagesTotal += persisted.length;
      return persisted;
    },

    async prepend(messages: ReadonlyArray<Message>): Promise<Array<Message>> {
      const system = systemMessage();
      const persisted = await store.createMessages(messages, actor);
      buffer = [system, ...persisted, ...buffer.slice(1)];
      messagesTotal += persisted.length;
      return persisted;
    },

    trim(cutoff: number): void {
      if (cutoff < 1) {
        throw new Error(`trim cutoff must be at least 1 (got ${cutoff})`);
      }
      buffer = [systemMessage(), ...buffer.slice(cutoff)];
    },

    replace(index: number, message: Message): void {
      if (index < 1 || index >= buffer.length) {
        throw new Error(`cannot replace message at index ${index}`);
      }
      buffer = buffer.map((existing, i) => (i === index ? message : existing));
    },

    async deleteLast(): Promise<Message> {
      const last = buffer[buffer.length - 1];
      if (!last || buffer.length <= 1) {
        throw new Error('cannot delete the system message');
      }
      await store.deleteMessage(last.id, actor);
      buffer = buffer.slice(0, -1);
      return last;
    },

    swapSystemMessage,

    async rebuildSystemMessage(options: RebuildOptions): Promise<boolean> {
      const { template, memory, force = false, updateTimestamp = true } = options;
      const current = systemMessage();

      if (!force && current.text !== null && current.text.includes(compileMemory(memory))) {
        logger.debug({ agentId }, 'memory unchanged, skipping system message rebuild');
        return false;
      }

      const [recallCount, archivalCount] = await Promise.all([
        store.countMessages(agentId, actor),
        store.countPassages(agentId, actor),
      ]);
      const text = compileSystemMessage({
        systemPrompt: template,
        memory,
        lastEdit: updateTimestamp ? clock() : current.created_at,
        recallCount,
        archivalCount,
      });

      if (text === current.text) {
        return false;
      }
      await swapSystemMessage(text);
      logger.debug({ agentId, recallCount, archivalCount }, 'rebuilt system message');
      return true;
    },

    validateUTC,

    async syncMessageIds(): Promise<void> {
      await store.updateAgent(agentId, { message_ids: buffer.map((message) => message.id) }, actor);
    },

    countTokens(): number {
      return countMessagesTokens(buffer);
    },

    async getOverview(
      agentState: AgentState,
      tools: ReadonlyArray<ToolDefinition>,
    ): Promise<ContextWindowOverview> {
      const [recallCount, archivalCount] = await Promise.all([
        store.countMessages(agentId, actor),
        store.countPassages(agentId, actor),
      ]);

      const systemPrompt = agentState.system;
      const coreMemory = compileMemory(agentState.memory);
      const externalMemorySummary = compileMemoryMetadataBlock({
        lastEdit: systemMessage().created_at,
        recallCount,
        archivalCount,
      });

      const second = buffer[1];
      const summary =
        second && second.role === 'user' && (second.text ?? '').includes(SUMMARY_MARKER) ? second : null;
      const summaryMemory = summary ? summary.text : null;
      const numTokensSummary = summary ? countMessageTokens(summary) : 0;
      const numTokensMessages = countMessagesTokens(buffer.slice(summary ? 2 : 1));

      const numTokensSystem = estimateTokens(systemPrompt);
      const numTokensCoreMemory = estimateTokens(coreMemory);
      const numTokensExternal = estimateTokens(externalMemorySummary);
      const numTokensFunctions = tools.length > 0 ? estimateTokens(JSON.stringify(tools)) : 0;

      return {
        context_window_size_max: agentState.context_window,
        context_window_size_current:
          numTokensSystem +
          numTokensCoreMemory +
          numTokensExternal +
          numTokensSummary +
          numTokensMessages +
          numTokensFunctions,
        num_messages: buffer.length,
        num_archival_memory: archivalCount,
        num_recall_memory: recallCount,
        num_tokens_external_memory_summary: numTokensExternal,
        external_memory_summary: externalMemorySummary,
        num_tokens_system: numTokensSystem,
        system_prompt: systemPrompt,
        num_tokens_core_memory: numTokensCoreMemory,
        core_memory: coreMemory,
        num_tokens_summary_memory: numTokensSummary,
        summary_memory: summaryMemory,
        num_tokens_messages: numTokensMessages,
        num_tokens_functions_definitions: numTokensFunctions,
      };
    },
  };
}
