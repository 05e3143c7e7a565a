// pattern: Imperative Shell

/**
 * Base tools: run in-process against the live agent and the store.
 * Memory edits go through the context's MemoryEditor; the step engine persists them.
 */

import { formatTimestamp } from '../../context/timestamps.ts';
import { getBlock, withBlockValue } from '../../memory/memory.ts';
import type { SearchPage } from '../../store/types.ts';
import type { BaseTool, ToolContext } from '../types.ts';

export const SEARCH_PAGE_SIZE = 5;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function requireString(args: Record<string, unknown>, name: string): string {
  const value = args[name];
  if (typeof value !== 'string') {
    throw new TypeError(`${name} must be a string`);
  }
  return value;
}

function pageNumber(args: Record<string, unknown>): number {
  const value = args['page'];
  return typeof value === 'number' && value > 0 ? Math.floor(value) : 0;
}

/**
 * `Showing n of total results (page p/last):` followed by the JSON list, or a fixed
 * line when nothing matched. Pages are zero-based.
 */
export function formatSearchPage<T>(result: SearchPage<T>, page: number, render: (item: T) => string): string {
  if (result.items.length === 0) {
    return 'No results found.';
  }
  const lastPage = Math.ceil(result.total / SEARCH_PAGE_SIZE) - 1;
  const prefix = `Showing ${result.items.length} of ${result.total} results (page ${page}/${lastPage}):`;
  return `${prefix} ${JSON.stringify(result.items.map(render))}`;
}

function parseDay(value: string, name: string): Date {
  if (!DATE_PATTERN.test(value)) {
    throw new RangeError(`${name} must be formatted as YYYY-MM-DD (got ${value})`);
  }
  const day = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(day.getTime())) {
    throw new RangeError(`${name} is not a valid date: ${value}`);
  }
  return day;
}

const sendMessage: BaseTool = {
  kind: 'base',
  definition: {
    name: 'send_message',
    description: 'Sends a message to the human user.',
    parameters: [
      {
        name: 'message',
        type: 'string',
        description: 'Message contents. All unicode (including emojis) are supported.',
        required: true,
      },
    ],
  },
  handler: async () => null,
};

const coreMemoryAppend: BaseTool = {
  kind: 'base',
  definition: {
    name: 'core_memory_append',
    description: 'Append to the contents of core memory.',
    parameters: [
      { name: 'label', type: 'string', description: 'Section of the memory to be edited.', required: true },
      {
        name: 'content',
        type: 'string',
        description: 'Content to write to the memory. All unicode (including emojis) are supported.',
        required: true,
      },
    ],
  },
  handler: async (args, context: ToolContext) => {
    const label = requireString(args, 'label');
    const content = requireString(args, 'content');
    const memory = context.memory.get();
    const current = getBlock(memory, label).value;
    context.memory.set(withBlockValue(memory, label, `${current}\n${content}`));
    return null;
  },
};

const coreMemoryReplace: BaseTool = {
  kind: 'base',
  definition: {
    name: 'core_memory_replace',
    description:
      'Replace the contents of core memory. To delete memories, use an empty string for new_content.',
    parameters: [
      { name: 'label', type: 'string', description: 'Section of the memory to be edited.', required: true },
      {
        name: 'old_content',
        type: 'string',
        description: 'String to replace. Must be an exact match.',
        required: true,
      },
      {
        name: 'new_content',
        type: 'string',
        description: 'Content to write to the memory. All unicode (including emojis) are supported.',
        required: true,
      },
    ],
  },
  handler: async (args, context) => {
    const label = requireString(args, 'label');
    const oldContent = requireString(args, 'old_content');
    const newContent = requireString(args, 'new_content');
    const memory = context.memory.get();
    const current = getBlock(memory, label).value;
    if (oldContent === '' || !current.includes(oldContent)) {
      throw new Error(`Old content '${oldContent}' not found in memory block '${label}'`);
    }
    context.memory.set(withBlockValue(memory, label, current.replaceAll(oldContent, newContent)));
    return null;
  },
};

const pageParameter = {
  name: 'page',
  type: 'integer',
  description: 'Allows you to page through results. Only use on a follow-up query. Defaults to 0 (first page).',
  required: false,
} as const;

const conversationSearch: BaseTool = {
  kind: 'base',
  definition: {
    name: 'conversation_search',
    description: 'Search prior conversation history using case-insensitive string matching.',
    parameters: [
      { name: 'query', type: 'string', description: 'String to search for.', required: true },
      pageParameter,
    ],
  },
  handler: async (args, { store, actor, agentState }) => {
    const query = requireString(args, 'query');
    const page = pageNumber(args);
    const result = await store.searchMessages(
      agentState.id,
      query,
      { limit: SEARCH_PAGE_SIZE, offset: page * SEARCH_PAGE_SIZE },
      actor,
    );
    return formatSearchPage(
      result,
      page,
      (message) => `timestamp: ${formatTimestamp(message.created_at)}, ${message.role} - ${message.text ?? ''}`,
    );
  },
};

const conversationSearchDate: BaseTool = {
  kind: 'base',
  definition: {
    name: 'conversation_search_date',
    description: 'Search prior conversation history using a date range.',
    parameters: [
      {
        name: 'start_date',
        type: 'string',
        description: "The start of the date range to search, in the format 'YYYY-MM-DD'.",
        required: true,
      },
      {
        name: 'end_date',
        type: 'string',
        description: "The end of the date range to search, in the format 'YYYY-MM-DD'.",
        required: true,
      },
      pageParameter,
    ],
  },
  handler: async (args, { store, actor, agentState }) => {
    const start = parseDay(requireString(args, 'start_date'), 'start_date');
    const endDay = parseDay(requireString(args, 'end_date'), 'end_date');
    // inclusive of the whole end day
    const end = new Date(endDay.getTime() + 24 * 60 * 60 * 1000);
    const page = pageNumber(args);
    const result = await store.searchMessagesByDate(
      agentState.id,
      start,
      end,
      { limit: SEARCH_PAGE_SIZE, offset: page * SEARCH_PAGE_SIZE },
      actor,
    );
    return formatSearchPage(
      result,
      page,
      (message) => `timestamp: ${formatTimestamp(message.created_at)}, ${message.role} - ${message.text ?? ''}`,
    );
  },
};

const archivalMemoryInsert: BaseTool = {
  kind: 'base',
  definition: {
    name: 'archival_memory_insert',
    description:
      'Add to archival memory. Make sure to phrase the memory contents such that it can be easily queried later.',
    parameters: [
      {
        name: 'content',
        type: 'string',
        description: 'Content to write to the memory. All unicode (including emojis) are supported.',
        required: true,
      },
    ],
  },
  handler: async (args, { store, actor, agentState }) => {
    await store.insertPassage(agentState.id, requireString(args, 'content'), actor);
    return null;
  },
};

const archivalMemorySearch: BaseTool = {
  kind: 'base',
  definition: {
    name: 'archival_memory_search',
    description: 'Search archival memory using case-insensitive string matching.',
    parameters: [
      { name: 'query', type: 'string', description: 'String to search for.', required: true },
      pageParameter,
    ],
  },
  handler: async (args, { store, actor, agentState }) => {
    const query = requireString(args, 'query');
    const page = pageNumber(args);
    const result = await store.searchPassages(
      agentState.id,
      query,
      { limit: SEARCH_PAGE_SIZE, offset: page * SEARCH_PAGE_SIZE },
      actor,
    );
    return formatSearchPage(
      result,
      page,
      (passage) => `timestamp: ${formatTimestamp(passage.created_at)}, memory: ${passage.text}`,
    );
  },
};

export const BASE_TOOL_NAMES = [
  'send_message',
  'conversation_search',
  'conversation_search_date',
  'archival_memory_insert',
  'archival_memory_search',
  'core_memory_append',
  'core_memory_replace',
] as const;

export function createBaseTools(): Array<BaseTool> {
  return [
    sendMessage,
    conversationSearch,
    conversationSearchDate,
    archivalMemoryInsert,
    archivalMemorySearch,
    coreMemoryAppend,
    coreMemoryReplace,
  ];
}
