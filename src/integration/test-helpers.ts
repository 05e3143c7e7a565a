// pattern: Functional Core

/**
 * Shared test utilities.
 * In-process stand-ins for the persistence port and the model provider, plus fixture builders.
 */

import { createAgent } from '../agent/agent.ts';
import type { Agent, AgentRuntimeConfig, AgentState, CreateAgentOptions, Message } from '../agent/types.ts';
import { createCompactor } from '../compaction/compactor.ts';
import { createSummarizer } from '../compaction/summarizer.ts';
import {
  AgentConfigSchema,
  ModelConfigSchema,
  RetryConfigSchema,
  SummarizationConfigSchema,
  ToolsConfigSchema,
} from '../config/schema.ts';
import type { AgentConfig, ModelConfig, SummarizationConfig } from '../config/schema.ts';
import { createSilentLogger } from '../logging/logger.ts';
import type { MemoryBlock } from '../memory/types.ts';
import { createMemory } from '../memory/memory.ts';
import type { ModelProvider, ModelRequest, ModelResponse, UsageStats } from '../model/types.ts';
import { createVmSandbox } from '../runtime/vm-sandbox.ts';
import type {
  Actor,
  AgentStore,
  AgentUpdate,
  BlockUpdate,
  MessageUpdate,
  PageRequest,
  Passage,
  SearchPage,
} from '../store/types.ts';
import { createBaseTools } from '../tool/builtin/base.ts';
import { createToolDispatcher } from '../tool/dispatcher.ts';
import { createToolRegistry } from '../tool/registry.ts';

export const testActor: Actor = { id: 'user-test' };

export const FIXED_NOW = new Date('2024-03-05T13:07:09.000Z');

export function fixedClock(now: Date = FIXED_NOW): () => Date {
  return () => now;
}

export function sequentialIds(prefix: string = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export type InMemoryAgentStore = AgentStore & {
  readonly agents: Map<string, AgentState>;
  readonly messages: Map<string, Message>;
  readonly blocks: Map<string, MemoryBlock>;
  readonly passages: Array<Passage>;
  /**
   * Message ids whose deletion fails, to exercise rollback paths.
   */
  readonly failingDeletes: Set<string>;
};

function page<T>(items: ReadonlyArray<T>, request: PageRequest): SearchPage<T> {
  return { items: items.slice(request.offset, request.offset + request.limit), total: items.length };
}

function isRecallMessage(message: Message): boolean {
  return message.role === 'user' || message.role === 'assistant';
}

export function createInMemoryAgentStore(): InMemoryAgentStore {
  const agents = new Map<string, AgentState>();
  const messages = new Map<string, Message>();
  const blocks = new Map<string, MemoryBlock>();
  const passages: Array<Passage> = [];
  const failingDeletes = new Set<string>();
  const nextPassageId = sequentialIds('passage');

  function agentMessages(agentId: string): Array<Message> {
    return Array.from(messages.values()).filter((message) => message.agent_id === agentId);
  }

  return {
    agents,
    messages,
    blocks,
    passages,
    failingDeletes,

    async createAgent(state: AgentState, _actor: Actor): Promise<AgentState> {
      for (const block of state.memory.blocks) {
        blocks.set(block.id, block);
      }
      agents.set(state.id, state);
      return state;
    },

    async getAgent(agentId: string, _actor: Actor): Promise<AgentState | null> {
      const agent = agents.get(agentId);
      if (!agent) {
        return null;
      }
      const current = agent.memory.blocks.map((block) => blocks.get(block.id) ?? block);
      return { ...agent, memory: createMemory(current) };
    },

    async updateAgent(agentId: string, patch: AgentUpdate, _actor: Actor): Promise<void> {
      const agent = agents.get(agentId);
      if (!agent) {
        throw new Error(`agent not found: ${agentId}`);
      }
      agents.set(agentId, { ...agent, ...patch });
    },

    async createMessages(created: ReadonlyArray<Message>, _actor: Actor): Promise<Array<Message>> {
      for (const message of created) {
        messages.set(message.id, message);
      }
      return [...created];
    },

    async getMessage(messageId: string, _actor: Actor): Promise<Message | null> {
      return messages.get(messageId) ?? null;
    },

    async updateMessage(messageId: string, patch: MessageUpdate, _actor: Actor): Promise<Message> {
      const message = messages.get(messageId);
      if (!message) {
        throw new Error(`message not found: ${messageId}`);
      }
      const updated = { ...message, ...patch };
      messages.set(messageId, updated);
      return updated;
    },

    async deleteMessage(messageId: string, _actor: Actor): Promise<void> {
      if (failingDeletes.has(messageId)) {
        throw new Error(`delete failed for ${messageId}`);
      }
      messages.delete(messageId);
    },

    async countMessages(agentId: string, _actor: Actor): Promise<number> {
      return agentMessages(agentId).length;
    },

    async searchMessages(
      agentId: string,
      query: string,
      request: PageRequest,
      _actor: Actor,
    ): Promise<SearchPage<Message>> {
      const needle = query.toLowerCase();
      return page(
        agentMessages(agentId).filter(
          (message) => isRecallMessage(message) && (message.text ?? '').toLowerCase().includes(needle),
        ),
        request,
      );
    },

    async searchMessagesByDate(
      agentId: string,
      start: Date,
      end: Date,
      request: PageRequest,
      _actor: Actor,
    ): Promise<SearchPage<Message>> {
      return page(
        agentMessages(agentId).filter(
          (message) =>
            isRecallMessage(message) &&
            message.created_at.getTime() >= start.getTime() &&
            message.created_at.getTime() < end.getTime(),
        ),
        request,
      );
    },

    async getBlock(blockId: string, _actor: Actor): Promise<MemoryBlock | null> {
      return blocks.get(blockId) ?? null;
    },

    async updateBlock(blockId: string, patch: BlockUpdate, _actor: Actor): Promise<MemoryBlock> {
      const block = blocks.get(blockId);
      if (!block) {
        throw new Error(`block not found: ${blockId}`);
      }
      const updated = { ...block, ...patch };
      blocks.set(blockId, updated);
      return updated;
    },

    async insertPassage(agentId: string, text: string, _actor: Actor): Promise<Passage> {
      const passage = { id: nextPassageId(), agent_id: agentId, text, created_at: FIXED_NOW };
      passages.push(passage);
      return passage;
    },

    async countPassages(agentId: string, _actor: Actor): Promise<number> {
      return passages.filter((passage) => passage.agent_id === agentId).length;
    },

    async searchPassages(
      agentId: string,
      query: string,
      request: PageRequest,
      _actor: Actor,
    ): Promise<SearchPage<Passage>> {
      const needle = query.toLowerCase();
      return page(
        passages.filter((passage) => passage.agent_id === agentId && passage.text.toLowerCase().includes(needle)),
        request,
      );
    },
  };
}

const DEFAULT_USAGE: UsageStats = { prompt_tokens: 100, completion_tokens: 20, total_tokens: 120 };

export type ScriptedReply = ModelResponse | Error | ((request: ModelRequest) => ModelResponse);

export type ScriptedModel = ModelProvider & {
  readonly requests: Array<ModelRequest>;
};

/**
 * A provider that answers from a fixed script, one entry per call.
 * Errors in the script are thrown. Running past the end throws.
 */
export function createScriptedModel(script: ReadonlyArray<ScriptedReply>): ScriptedModel {
  const requests: Array<ModelRequest> = [];
  let index = 0;

  return {
    requests,
    async complete(request: ModelRequest): Promise<ModelResponse> {
      requests.push(request);
      const entry = script[index];
      index++;
      if (entry === undefined) {
        throw new Error(`scripted model has no reply for call ${index}`);
      }
      if (entry instanceof Error) {
        throw entry;
      }
      return typeof entry === 'function' ? entry(request) : entry;
    },
  };
}

export type ToolCallReplyOptions = {
  thinking?: string | null;
  heartbeat?: boolean;
  usage?: Partial<UsageStats>;
  callId?: string;
};

export function toolCallReply(
  name: string,
  args: Record<string, unknown>,
  options: ToolCallReplyOptions = {},
): ModelResponse {
  const withHeartbeat = options.heartbeat === undefined ? args : { ...args, request_heartbeat: options.heartbeat };
  return {
    id: `resp-${name}`,
    choices: [
      {
        message: {
          role: 'assistant',
          content: options.thinking === undefined ? `thinking about ${name}` : options.thinking,
          tool_calls: [{ id: options.callId ?? `call-${name}`, name, arguments: JSON.stringify(withHeartbeat) }],
        },
        finish_reason: 'tool_calls',
      },
    ],
    usage: { ...DEFAULT_USAGE, ...options.usage },
  };
}

export function rawToolCallReply(name: string, rawArguments: string): ModelResponse {
  return {
    id: `resp-${name}`,
    choices: [
      {
        message: {
          role: 'assistant',
          content: 'raw call',
          tool_calls: [{ id: `call-${name}`, name, arguments: rawArguments }],
        },
        finish_reason: 'tool_calls',
      },
    ],
    usage: DEFAULT_USAGE,
  };
}

export function textReply(text: string, usage: Partial<UsageStats> = {}): ModelResponse {
  return {
    id: 'resp-text',
    choices: [{ message: { role: 'assistant', content: text }, finish_reason: 'stop' }],
    usage: { ...DEFAULT_USAGE, ...usage },
  };
}

export function testBlocks(): Array<MemoryBlock> {
  return [
    { id: 'block-persona', label: 'persona', value: 'I am a patient research assistant.', limit: 2000 },
    { id: 'block-human', label: 'human', value: 'Name: Sam', limit: 2000 },
  ];
}

export function createTestAgentState(overrides: Partial<AgentState> = {}): AgentState {
  return {
    id: 'agent-test',
    name: 'test-agent',
    model: 'gpt-4o-mini',
    tools: [
      'send_message',
      'core_memory_append',
      'core_memory_replace',
      'conversation_search',
      'archival_memory_insert',
      'archival_memory_search',
    ],
    tool_rules: [],
    memory: createMemory(testBlocks()),
    system: 'You are a test agent.\n{CORE_MEMORY}',
    context_window: 8192,
    message_ids: null,
    created_by_id: testActor.id,
    ...overrides,
  };
}

export function testMessage(
  id: string,
  role: Message['role'],
  text: string | null,
  extra: Partial<Message> = {},
): Message {
  return { id, agent_id: 'agent-test', role, text, created_at: FIXED_NOW, ...extra };
}

export type RuntimeConfigOverrides = {
  agent?: Partial<AgentConfig>;
  model?: Partial<ModelConfig>;
};

/**
 * Schema defaults, without boot messages so a fresh buffer is `[system, login]`.
 */
export function testRuntimeConfig(overrides: RuntimeConfigOverrides = {}): AgentRuntimeConfig {
  return {
    agent: AgentConfigSchema.parse({ include_initial_boot_message: false, ...overrides.agent }),
    model: ModelConfigSchema.parse({ provider: 'openai-compat', name: 'gpt-4o-mini', ...overrides.model }),
    retry: RetryConfigSchema.parse({ backoff_base_ms: 0 }),
    tools: ToolsConfigSchema.parse({}),
  };
}

export type TestRuntimeOptions = {
  /**
   * Replies of the summarizing model, one per summary.
   */
  summaries?: ReadonlyArray<ScriptedReply>;
  store?: InMemoryAgentStore;
  state?: AgentState;
  config?: RuntimeConfigOverrides;
  summarization?: Partial<SummarizationConfig>;
  options?: CreateAgentOptions;
  /**
   * Prefix of generated message ids. A runtime resuming another's store needs its own.
   */
  idPrefix?: string;
};

export type TestRuntime = {
  agent: Agent;
  store: InMemoryAgentStore;
  model: ScriptedModel;
  summaryModel: ScriptedModel;
};

/**
 * The whole engine wired the way the entry point wires it, over in-process stand-ins:
 * in-memory store, scripted models, real tools, sandbox, summarizer and compactor.
 * Ids default to `msg-N`; the clock is fixed at FIXED_NOW.
 */
export async function createTestRuntime(
  script: ReadonlyArray<ScriptedReply>,
  setup: TestRuntimeOptions = {},
): Promise<TestRuntime> {
  const store = setup.store ?? createInMemoryAgentStore();
  const model = createScriptedModel(script);
  const summaryModel = createScriptedModel(setup.summaries ?? []);
  const logger = createSilentLogger();
  const clock = fixedClock();
  const config = testRuntimeConfig(setup.config);
  const summarization = SummarizationConfigSchema.parse({ ...setup.summarization });

  const registry = createToolRegistry();
  for (const tool of createBaseTools()) {
    registry.register(tool);
  }
  const dispatcher = createToolDispatcher({
    registry,
    sandbox: createVmSandbox({ timeoutMs: 200, logger }),
    logger,
    config: config.tools,
    clock,
  });
  const summarizer = createSummarizer({
    model: summaryModel,
    modelName: config.model.name,
    maxSummaryTokens: summarization.max_summary_tokens,
    prompt: summarization.prompt ?? null,
    logger,
    retry: { maxAttempts: 1, sleep: async () => {} },
    clock,
  });
  const compactor = createCompactor({
    summarizer,
    config: summarization,
    logger,
    generateId: sequentialIds('summary'),
    clock,
  });

  const agent = await createAgent(
    {
      store,
      actor: testActor,
      model,
      compactor,
      registry,
      dispatcher,
      logger,
      config,
      clock,
      sleep: async () => {},
      generateId: sequentialIds(setup.idPrefix ?? 'msg'),
    },
    setup.state ?? createTestAgentState(),
    setup.options,
  );
  return { agent, store, model, summaryModel };
}
