// pattern: Imperative Shell

/**
 * lodestar entry point.
 * Composition root that wires all adapters and starts the interactive REPL.
 */

import * as readline from 'node:readline';
import { randomUUID } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig } from '@/config/config';
import type { AppConfig } from '@/config/config';
import { createLoggerFromConfig } from '@/logging/logger';
import type { Logger } from '@/logging/logger';
import { createPostgresProvider } from '@/persistence/postgres';
import type { PersistenceProvider } from '@/persistence/types';
import { createPostgresAgentStore } from '@/store/postgres-store';
import type { Actor, AgentStore } from '@/store/types';
import { createModelProvider } from '@/model/factory';
import type { ModelProvider } from '@/model/types';
import { createToolRegistry } from '@/tool/registry';
import { createToolDispatcher, parseToolArguments } from '@/tool/dispatcher';
import { BASE_TOOL_NAMES, createBaseTools } from '@/tool/builtin/base';
import { createVmSandbox } from '@/runtime/vm-sandbox';
import { createCompactor, createSummarizer } from '@/compaction';
import { createAgent } from '@/agent/agent';
import { createKeyedMutex } from '@/agent/lock';
import { packageUserMessage } from '@/agent/system-messages';
import type { Agent, AgentState, Message } from '@/agent/types';
import { compileMemory, createMemory } from '@/memory/memory';
import { DEFAULT_BLOCK_LIMIT } from '@/memory/types';

const PROJECT_ROOT = join(dirname(fileURLToPath(import.meta.url)), '..');
const LOCAL_ACTOR: Actor = { id: 'local-user' };
const DEFAULT_POP_COUNT = 3;

type InteractionLoopDeps = {
  agent: Agent;
  write: (line: string) => void;
  clock?: () => Date;
};

export type InitialAgentStateOptions = {
  agentId: string;
  name: string;
  model: string;
  contextWindow: number;
  system: string;
  persona: string;
  human: string;
  actor: Actor;
};

/**
 * A fresh agent: every base tool, send_message ends the chain, persona and human blocks.
 */
export function createInitialAgentState(options: InitialAgentStateOptions): AgentState {
  return {
    id: options.agentId,
    name: options.name,
    model: options.model,
    tools: [...BASE_TOOL_NAMES],
    tool_rules: [{ type: 'exit_loop', tool_name: 'send_message' }],
    memory: createMemory([
      { id: `block-${randomUUID()}`, label: 'persona', value: options.persona, limit: DEFAULT_BLOCK_LIMIT },
      { id: `block-${randomUUID()}`, label: 'human', value: options.human, limit: DEFAULT_BLOCK_LIMIT },
    ]),
    system: options.system,
    context_window: options.contextWindow,
    message_ids: null,
    created_by_id: options.actor.id,
  };
}

/**
 * Lines to show the user for one step's messages.
 * send_message calls print as the assistant's reply; other calls and failures print indented.
 */
export function renderStepMessages(messages: ReadonlyArray<Message>): Array<string> {
  const lines: Array<string> = [];
  for (const message of messages) {
    if (message.role === 'assistant') {
      const calls = message.tool_calls ?? [];
      if (calls.length === 0) {
        lines.push(`assistant: ${message.text ?? ''}`);
        continue;
      }
      if (message.text) {
        lines.push(`  (${message.text})`);
      }
      for (const call of calls) {
        const args = parseToolArguments(call.arguments);
        const reply = args?.['message'];
        if (call.name === 'send_message' && typeof reply === 'string') {
          lines.push(`assistant: ${reply}`);
        } else {
          lines.push(`  [${call.name}] ${call.arguments}`);
        }
      }
    } else if (message.role === 'tool' && message.text) {
      const response = parseToolArguments(message.text);
      if (response?.['status'] === 'Failed') {
        lines.push(`  [${message.name ?? 'tool'} failed] ${String(response['message'])}`);
      }
    }
  }
  return lines;
}

/**
 * Create an interaction loop that can be tested with mock dependencies.
 * Lines starting with `/` are commands; everything else is sent to the agent.
 */
export function createInteractionLoop(deps: InteractionLoopDeps): (input: string) => Promise<void> {
  const { agent, write } = deps;
  const clock = deps.clock ?? (() => new Date());

  function writeAll(lines: ReadonlyArray<string>): void {
    for (const line of lines) {
      write(line);
    }
  }

  return async (userInput: string) => {
    const [command, ...rest] = userInput.split(' ');
    const argument = rest.join(' ').trim();

    switch (command) {
      case '/pop': {
        const count = argument ? Number.parseInt(argument, 10) : DEFAULT_POP_COUNT;
        if (!Number.isInteger(count) || count < 1) {
          write(`invalid pop count: ${argument}`);
          return;
        }
        const popped = await agent.popMessages(count);
        write(`popped ${popped.length} messages`);
        return;
      }
      case '/retry': {
        const result = await agent.retryLastMessage();
        writeAll(renderStepMessages(result.messages));
        return;
      }
      case '/rethink':
      case '/rewrite': {
        if (!argument) {
          write(`usage: ${command} <text>`);
          return;
        }
        await (command === '/rethink'
          ? agent.rethinkLastAssistantMessage(argument)
          : agent.rewriteLastAssistantMessage(argument));
        write('updated last assistant message');
        return;
      }
      case '/summarize': {
        const result = await agent.summarizeMessagesInPlace();
        write(`summarized ${result.summarized_count} messages (${result.tokens_before} -> ${result.tokens_after} tokens)`);
        return;
      }
      case '/memory': {
        write(compileMemory(agent.getState().memory));
        return;
      }
      case '/context': {
        const overview = await agent.getContextWindowOverview();
        write(`${overview.context_window_size_current}/${overview.context_window_size_max} tokens`);
        write(`${overview.num_messages} messages in context`);
        write(`${overview.num_recall_memory} in recall memory, ${overview.num_archival_memory} in archival memory`);
        return;
      }
      default:
        break;
    }

    if (command?.startsWith('/')) {
      write(`unknown command: ${command}`);
      return;
    }

    const response = await agent.step([{ role: 'user', text: packageUserMessage(userInput, clock()) }]);
    writeAll(renderStepMessages(response.messages));
    if (response.stop_reason === 'max_steps') {
      write(`  (stopped after ${response.step_count} steps)`);
    }
  };
}

/**
 * Core shutdown logic without process.exit - for testability.
 */
export async function performShutdown(
  rl: readline.Interface,
  persistence: PersistenceProvider,
): Promise<void> {
  rl.close();
  await persistence.disconnect();
}

/**
 * Create a graceful shutdown handler that closes readline and disconnects persistence.
 */
export function createShutdownHandler(
  rl: readline.Interface,
  persistence: PersistenceProvider,
  logger: Logger,
): () => Promise<void> {
  return async (): Promise<void> => {
    logger.info('shutting down');
    try {
      await performShutdown(rl, persistence);
    } catch (error) {
      logger.error({ err: error }, 'error during shutdown');
      process.exitCode = 1;
    }
    process.exit();
  };
}

function readProjectFile(path: string): string {
  return readFileSync(resolve(PROJECT_ROOT, path), 'utf-8').trim();
}

async function loadOrCreateAgentState(
  config: AppConfig,
  store: AgentStore,
  logger: Logger,
): Promise<{ state: AgentState; messagesTotal?: number }> {
  const agentId = config.agent.agent_id;
  if (agentId) {
    const existing = await store.getAgent(agentId, LOCAL_ACTOR);
    if (existing) {
      logger.info({ agentId }, 'resuming agent');
      return { state: existing, messagesTotal: await store.countMessages(agentId, LOCAL_ACTOR) };
    }
  }

  const state = createInitialAgentState({
    agentId: agentId ?? `agent-${randomUUID()}`,
    name: config.agent.name,
    model: config.model.name,
    contextWindow: config.model.context_window,
    system: readProjectFile(config.agent.system_path),
    persona: readProjectFile(config.agent.persona_path),
    human: readProjectFile(config.agent.human_path),
    actor: LOCAL_ACTOR,
  });
  logger.info({ agentId: state.id }, 'created agent; set agent.agent_id to resume it');
  return { state };
}

/**
 * Main entry point: wires all components and starts the REPL.
 */
async function main(): Promise<void> {
  const config = loadConfig(process.env['LODESTAR_CONFIG']);
  const logger = createLoggerFromConfig(config.logging);

  const persistence = createPostgresProvider(config.database, logger);
  await persistence.connect();
  await persistence.runMigrations();
  const store = createPostgresAgentStore(persistence);

  const model = createModelProvider(config.model, { logger });
  const summarizationModelConfig = config.summarization.model ?? config.model;
  const summarizationModel: ModelProvider = config.summarization.model
    ? createModelProvider(config.summarization.model, { logger })
    : model;

  const retry = {
    maxAttempts: config.retry.max_attempts,
    backoffBaseMs: config.retry.backoff_base_ms,
    maxDelayMs: config.retry.max_delay_ms,
  };

  const registry = createToolRegistry();
  for (const tool of createBaseTools()) {
    registry.register(tool);
  }
  const dispatcher = createToolDispatcher({
    registry,
    sandbox: createVmSandbox({ timeoutMs: config.tools.sandbox_timeout_ms, logger }),
    logger,
    config: config.tools,
  });

  const summarizer = createSummarizer({
    model: summarizationModel,
    modelName: summarizationModelConfig.name,
    maxSummaryTokens: config.summarization.max_summary_tokens,
    prompt: config.summarization.prompt ?? null,
    logger,
    retry,
  });
  const compactor = createCompactor({
    summarizer,
    config: config.summarization,
    logger,
    generateId: () => `message-${randomUUID()}`,
  });

  const { state, messagesTotal } = await loadOrCreateAgentState(config, store, logger);
  const agent = await createAgent(
    {
      store,
      actor: LOCAL_ACTOR,
      model,
      compactor,
      registry,
      dispatcher,
      logger,
      config,
      lock: createKeyedMutex(),
    },
    state,
    messagesTotal === undefined ? {} : { messagesTotal },
  );

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const interactionHandler = createInteractionLoop({
    agent,
    write: (line) => process.stdout.write(`${line}\n`),
  });

  const shutdownHandler = createShutdownHandler(rl, persistence, logger);
  process.on('SIGINT', () => void shutdownHandler());
  process.on('SIGTERM', () => void shutdownHandler());

  process.stdout.write(`agent ${agent.id} ready. Type a message, /help for commands, Ctrl+C to exit.\n\n`);

  rl.setPrompt('> ');
  rl.on('line', (line: string) => {
    const trimmed = line.trim();
    if (trimmed === '/help') {
      process.stdout.write('/pop [n]  /retry  /rethink <text>  /rewrite <text>  /summarize  /memory  /context\n');
      rl.prompt();
      return;
    }
    if (!trimmed) {
      rl.prompt();
      return;
    }
    rl.pause();
    interactionHandler(trimmed)
      .catch((error: unknown) => {
        const errorMsg = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
        logger.error({ err: error }, 'interaction failed');
        process.stdout.write(`error: ${errorMsg}\n`);
      })
      .finally(() => {
        rl.resume();
        rl.prompt();
      });
  });

  rl.prompt();
}

// Run main entry point only when file is executed directly
const entryPath = process.argv[1];
if (entryPath !== undefined && resolve(entryPath) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    process.stderr.write(`Fatal error: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exit(1);
  });
}
