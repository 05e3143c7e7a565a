// pattern: Imperative Shell

/**
 * PostgreSQL implementation of the AgentStore port.
 * Core memory blocks live in their own table, ordered by position; JSONB columns are
 * validated on the way out.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { AgentState, Message, MessageRole } from '../agent/types.ts';
import { toUtcDate } from '../context/timestamps.ts';
import { createMemory } from '../memory/memory.ts';
import type { MemoryBlock } from '../memory/types.ts';
import type { ToolCall } from '../model/types.ts';
import type { PersistenceProvider, QueryFunction } from '../persistence/types.ts';
import { parseToolRules } from '../tool-rules/solver.ts';
import type {
  Actor,
  AgentStore,
  AgentUpdate,
  BlockUpdate,
  MessageUpdate,
  PageRequest,
  Passage,
  SearchPage,
} from './types.ts';

type AgentRow = {
  id: string;
  name: string;
  model: string;
  tools: unknown;
  tool_rules: unknown;
  system: string;
  context_window: number;
  message_ids: unknown;
  created_by_id: string;
};

type BlockRow = {
  id: string;
  label: string;
  value: string;
  char_limit: number;
};

type MessageRow = {
  id: string;
  agent_id: string;
  role: string;
  text: string | null;
  name: string | null;
  tool_calls: unknown;
  tool_call_id: string | null;
  model: string | null;
  created_at: Date | string;
};

type PassageRow = {
  id: string;
  agent_id: string;
  text: string;
  created_at: Date | string;
};

type CountRow = {
  count: number | string;
};

const StringListSchema = z.array(z.string());

const ToolCallListSchema = z.array(
  z.object({
    id: z.string(),
    name: z.string(),
    arguments: z.string(),
  }),
);

const MessageRoleSchema = z.enum(['system', 'user', 'assistant', 'tool']);

/**
 * JSONB arrives parsed from pg, but a text column or a driver override hands back the raw string.
 */
function fromJson(value: unknown): unknown {
  return typeof value === 'string' ? JSON.parse(value) : value;
}

export function parseBlock(row: BlockRow): MemoryBlock {
  return { id: row.id, label: row.label, value: row.value, limit: row.char_limit };
}

export function parseMessage(row: MessageRow): Message {
  const role: MessageRole = MessageRoleSchema.parse(row.role);
  const toolCalls: Array<ToolCall> | null = row.tool_calls === null ? null : ToolCallListSchema.parse(fromJson(row.tool_calls));
  return {
    id: row.id,
    agent_id: row.agent_id,
    role,
    text: row.text,
    ...(row.name !== null && { name: row.name }),
    ...(toolCalls !== null && toolCalls.length > 0 && { tool_calls: toolCalls }),
    ...(row.tool_call_id !== null && { tool_call_id: row.tool_call_id }),
    ...(row.model !== null && { model: row.model }),
    created_at: toUtcDate(row.created_at),
  };
}

export function parseAgent(row: AgentRow, blocks: ReadonlyArray<BlockRow>): AgentState {
  const rawRules = fromJson(row.tool_rules);
  return {
    id: row.id,
    name: row.name,
    model: row.model,
    tools: StringListSchema.parse(fromJson(row.tools)),
    tool_rules: parseToolRules(Array.isArray(rawRules) ? rawRules : []),
    memory: createMemory(blocks.map(parseBlock)),
    system: row.system,
    context_window: row.context_window,
    message_ids: row.message_ids === null ? null : StringListSchema.parse(fromJson(row.message_ids)),
    created_by_id: row.created_by_id,
  };
}

function parsePassage(row: PassageRow): Passage {
  return { id: row.id, agent_id: row.agent_id, text: row.text, created_at: toUtcDate(row.created_at) };
}

function toCount(rows: ReadonlyArray<CountRow>): number {
  return Number(rows[0]?.count ?? 0);
}

/**
 * `%`, `_` and `\` match literally inside the ILIKE pattern.
 */
export function likePattern(query: string): string {
  return `%${query.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

function firstRow<T>(rows: ReadonlyArray<T>, what: string): T {
  const row = rows[0];
  if (row === undefined) {
    throw new Error(`${what} not found`);
  }
  return row;
}

export function createPostgresAgentStore(persistence: PersistenceProvider): AgentStore {
  async function loadBlocks(query: QueryFunction, agentId: string): Promise<Array<BlockRow>> {
    return query<BlockRow>(
      'SELECT id, label, value, char_limit FROM blocks WHERE agent_id = $1 ORDER BY position ASC',
      [agentId],
    );
  }

  async function insertMessage(query: QueryFunction, message: Message, actor: Actor): Promise<Message> {
    const rows = await query<MessageRow>(
      `INSERT INTO messages
       (id, agent_id, role, text, name, tool_calls, tool_call_id, model, created_by_id, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING *`,
      [
        message.id,
        message.agent_id,
        message.role,
        message.text,
        message.name ?? null,
        message.tool_calls ? JSON.stringify(message.tool_calls) : null,
        message.tool_call_id ?? null,
        message.model ?? null,
        actor.id,
        message.created_at,
      ],
    );
    return parseMessage(firstRow(rows, `inserted message ${message.id}`));
  }

  async function searchPage<R extends Record<string, unknown>, T>(
    where: string,
    params: ReadonlyArray<unknown>,
    table: 'messages' | 'passages',
    page: PageRequest,
    parse: (row: R) => T,
  ): Promise<SearchPage<T>> {
    const next = params.length + 1;
    const [rows, counts] = await Promise.all([
      persistence.query<R>(
        `SELECT * FROM ${table} WHERE ${where} ORDER BY created_at ASC, id ASC LIMIT $${next} OFFSET $${next + 1}`,
        [...params, page.limit, page.offset],
      ),
      persistence.query<CountRow>(`SELECT COUNT(*)::int AS count FROM ${table} WHERE ${where}`, params),
    ]);
    return { items: rows.map(parse), total: toCount(counts) };
  }

  return {
    async createAgent(state: AgentState, actor: Actor): Promise<AgentState> {
      await persistence.withTransaction(async (query) => {
        await query(
          `INSERT INTO agents
           (id, name, model, tools, tool_rules, system, context_window, message_ids, created_by_id)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
          [
            state.id,
            state.name,
            state.model,
            JSON.stringify(state.tools),
            JSON.stringify(state.tool_rules),
            state.system,
            state.context_window,
            state.message_ids ? JSON.stringify(state.message_ids) : null,
            actor.id,
          ],
        );
        for (const [position, block] of state.memory.blocks.entries()) {
          await query(
            `INSERT INTO blocks (id, agent_id, label, value, char_limit, position, created_by_id)
             VALUES ($1, $2, $3, $4, $5, $6, $7)`,
            [block.id, state.id, block.label, block.value, block.limit, position, actor.id],
          );
        }
      });
      return state;
    },

    async getAgent(agentId: string, actor: Actor): Promise<AgentState | null> {
      const rows = await persistence.query<AgentRow>(
        'SELECT * FROM agents WHERE id = $1 AND created_by_id = $2',
        [agentId, actor.id],
      );
      const row = rows[0];
      if (!row) {
        return null;
      }
      return parseAgent(row, await loadBlocks(persistence.query, agentId));
    },

    async updateAgent(agentId: string, patch: AgentUpdate, actor: Actor): Promise<void> {
      const sets: Array<string> = [];
      const params: Array<unknown> = [];
      function set(column: string, value: unknown): void {
        params.push(value);
        sets.push(`${column} = $${params.length}`);
      }

      if (patch.message_ids !== undefined) set('message_ids', JSON.stringify(patch.message_ids));
      if (patch.system !== undefined) set('system', patch.system);
      if (patch.tool_rules !== undefined) set('tool_rules', JSON.stringify(patch.tool_rules));
      if (patch.tools !== undefined) set('tools', JSON.stringify(patch.tools));
      if (sets.length === 0) {
        return;
      }

      params.push(agentId, actor.id);
      const rows = await persistence.query<{ id: string }>(
        `UPDATE agents SET ${sets.join(', ')}, updated_at = NOW()
         WHERE id = $${params.length - 1} AND created_by_id = $${params.length}
         RETURNING id`,
        params,
      );
      firstRow(rows, `agent ${agentId}`);
    },

    async createMessages(messages: ReadonlyArray<Message>, actor: Actor): Promise<Array<Message>> {
      if (messages.length === 0) {
        return [];
      }
      return persistence.withTransaction(async (query) => {
        const created: Array<Message> = [];
        for (const message of messages) {
          created.push(await insertMessage(query, message, actor));
        }
        return created;
      });
    },

    async getMessage(messageId: string, actor: Actor): Promise<Message | null> {
      const rows = await persistence.query<MessageRow>(
        'SELECT * FROM messages WHERE id = $1 AND created_by_id = $2',
        [messageId, actor.id],
      );
      const row = rows[0];
      return row ? parseMessage(row) : null;
    },

    async updateMessage(messageId: string, patch: MessageUpdate, actor: Actor): Promise<Message> {
      const rows = await persistence.query<MessageRow>(
        `UPDATE messages SET
           text = CASE WHEN $1::boolean THEN $2 ELSE text END,
           tool_calls = CASE WHEN $3::boolean THEN $4::jsonb ELSE tool_calls END
         WHERE id = $5 AND created_by_id = $6
         RETURNING *`,
        [
          patch.text !== undefined,
          patch.text ?? null,
          patch.tool_calls !== undefined,
          patch.tool_calls ? JSON.stringify(patch.tool_calls) : null,
          messageId,
          actor.id,
        ],
      );
      return parseMessage(firstRow(rows, `message ${messageId}`));
    },

    async deleteMessage(messageId: string, actor: Actor): Promise<void> {
      const rows = await persistence.query<{ id: string }>(
        'DELETE FROM messages WHERE id = $1 AND created_by_id = $2 RETURNING id',
        [messageId, actor.id],
      );
      firstRow(rows, `message ${messageId}`);
    },

    async countMessages(agentId: string, actor: Actor): Promise<number> {
      const rows = await persistence.query<CountRow>(
        'SELECT COUNT(*)::int AS count FROM messages WHERE agent_id = $1 AND created_by_id = $2',
        [agentId, actor.id],
      );
      return toCount(rows);
    },

    async searchMessages(
      agentId: string,
      query: string,
      page: PageRequest,
      actor: Actor,
    ): Promise<SearchPage<Message>> {
      return searchPage<MessageRow, Message>(
        "agent_id = $1 AND created_by_id = $2 AND role IN ('user', 'assistant') AND text ILIKE $3",
        [agentId, actor.id, likePattern(query)],
        'messages',
        page,
        parseMessage,
      );
    },

    async searchMessagesByDate(
      agentId: string,
      start: Date,
      end: Date,
      page: PageRequest,
      actor: Actor,
    ): Promise<SearchPage<Message>> {
      return searchPage<MessageRow, Message>(
        "agent_id = $1 AND created_by_id = $2 AND role IN ('user', 'assistant') AND created_at >= $3 AND created_at < $4",
        [agentId, actor.id, start, end],
        'messages',
        page,
        parseMessage,
      );
    },

    async getBlock(blockId: string, actor: Actor): Promise<MemoryBlock | null> {
      const rows = await persistence.query<BlockRow>(
        'SELECT id, label, value, char_limit FROM blocks WHERE id = $1 AND created_by_id = $2',
        [blockId, actor.id],
      );
      const row = rows[0];
      return row ? parseBlock(row) : null;
    },

    async updateBlock(blockId: string, patch: BlockUpdate, actor: Actor): Promise<MemoryBlock> {
      const rows = await persistence.query<BlockRow>(
        `UPDATE blocks SET
           value = COALESCE($1, value),
           char_limit = COALESCE($2, char_limit),
           updated_at = NOW()
         WHERE id = $3 AND created_by_id = $4
         RETURNING id, label, value, char_limit`,
        [patch.value ?? null, patch.limit ?? null, blockId, actor.id],
      );
      return parseBlock(firstRow(rows, `block ${blockId}`));
    },

    async insertPassage(agentId: string, text: string, actor: Actor): Promise<Passage> {
      const rows = await persistence.query<PassageRow>(
        `INSERT INTO passages (id, agent_id, text, created_by_id)
         VALUES ($1, $2, $3, $4)
         RETURNING id, agent_id, text, created_at`,
        [`passage-${randomUUID()}`, agentId, text, actor.id],
      );
      return parsePassage(firstRow(rows, 'inserted passage'));
    },

    async countPassages(agentId: string, actor: Actor): Promise<number> {
      const rows = await persistence.query<CountRow>(
        'SELECT COUNT(*)::int AS count FROM passages WHERE agent_id = $1 AND created_by_id = $2',
        [agentId, actor.id],
      );
      return toCount(rows);
    },

    async searchPassages(
      agentId: string,
      query: string,
      page: PageRequest,
      actor: Actor,
    ): Promise<SearchPage<Passage>> {
      return searchPage<PassageRow, Passage>(
        'agent_id = $1 AND created_by_id = $2 AND text ILIKE $3',
        [agentId, actor.id, likePattern(query)],
        'passages',
        page,
        parsePassage,
      );
    },
  };
}
