// pattern: Imperative Shell

/**
 * The step engine.
 * One inner step is one model call plus at most one tool execution; the outer loop
 * chains inner steps on heartbeats, failures and memory-pressure alerts until the
 * agent yields.
 */

import { randomUUID } from 'node:crypto';
import type { CompactionResult } from '../compaction/types.ts';
import { createContextWindow } from '../context/context-window.ts';
import { compileSystemMessage, initializeMessageSequence } from '../context/system-prompt.ts';
import { toChatMessage } from '../context/tokens.ts';
import type { ContextWindowOverview } from '../context/types.ts';
import { changedBlockLabels, compileMemory, createMemory, getBlock } from '../memory/memory.ts';
import type { Memory, MemoryBlock } from '../memory/types.ts';
import { supportsStructuredOutput } from '../model/factory.ts';
import { isContextOverflowError } from '../model/overflow.ts';
import { getAiReply } from '../model/response.ts';
import type { ValidatedResponse } from '../model/response.ts';
import type { ChatMessage, ModelResponse, ToolCall } from '../model/types.ts';
import { parseToolArguments } from '../tool/dispatcher.ts';
import { packageFunctionResponse } from '../tool/response.ts';
import type { MemoryEditor } from '../tool/types.ts';
import {
  createToolRulesSolver,
  resolveHeartbeat,
  selectForcedTool,
  validateToolRules,
} from '../tool-rules/solver.ts';
import { ConfigurationError, FirstMessageVerificationError, NoEligibleMessageError, PersistenceError } from './errors.ts';
import {
  FUNC_FAILED_HEARTBEAT_MESSAGE,
  getHeartbeat,
  getInitialBootMessages,
  getLoginEvent,
  getTokenLimitWarning,
  packageUserMessage,
  REQ_HEARTBEAT_MESSAGE,
  unpackUserMessage,
} from './system-messages.ts';
import type {
  Agent,
  AgentDependencies,
  AgentState,
  CreateAgentOptions,
  InnerStepOptions,
  Message,
  MessageCreate,
  StepOptions,
  StepResponse,
  StepResult,
  StopReason,
  UsageStatistics,
} from './types.ts';
import { verifyFirstMessageCorrectness } from './verify.ts';

/**
 * The system message and at least one other always stay in context.
 */
const MIN_MESSAGES_IN_CONTEXT = 2;

type HandledResponse = {
  messages: Array<Message>;
  heartbeat_requested: boolean;
  tool_failed: boolean;
};

function defaultGenerateId(): string {
  return `message-${randomUUID()}`;
}

function emptyUsage(): UsageStatistics {
  return { completion_tokens: 0, prompt_tokens: 0, total_tokens: 0, step_count: 0 };
}

/**
 * `message` field of the newest tool response in the buffer.
 */
export function findLastFunctionResponse(messages: ReadonlyArray<Message>): string | null {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (!message || message.role !== 'tool' || !message.text) {
      continue;
    }
    try {
      const parsed: unknown = JSON.parse(message.text);
      if (typeof parsed === 'object' && parsed !== null && 'message' in parsed && typeof parsed.message === 'string') {
        return parsed.message;
      }
    } catch {
      // unpackaged tool text carries no response field
    }
  }
  return null;
}

function createMemoryEditor(initial: Memory): MemoryEditor {
  let current = initial;
  return {
    get: () => current,
    set: (memory) => {
      current = memory;
    },
  };
}

export async function createAgent(
  deps: AgentDependencies,
  initialState: AgentState,
  options: CreateAgentOptions = {},
): Promise<Agent> {
  const { store, actor, model, compactor, registry, dispatcher, logger, config } = deps;
  const clock = deps.clock ?? (() => new Date());
  const generateId = deps.generateId ?? defaultGenerateId;
  const agentId = initialState.id;
  const log = logger.child({ agentId });

  let state: AgentState = initialState;
  let alertedAboutMemoryPressure = false;

  for (const name of state.tools) {
    if (!registry.get(name)) {
      throw new ConfigurationError(`agent ${agentId} lists unknown tool: ${name}`);
    }
  }

  const structuredOutput = supportsStructuredOutput({
    name: state.model,
    structured_output: config.model.structured_output,
  });
  if (state.tool_rules.some((rule) => rule.type !== 'exit_loop')) {
    log.warn('tool rules only work reliably for models that support structured outputs');
  }
  validateToolRules(state.tool_rules, structuredOutput);
  const solver = createToolRulesSolver(state.tool_rules);

  const window = createContextWindow({ store, actor, agentId, logger: log, clock, generateId });

  if (!(await store.getAgent(agentId, actor))) {
    await store.createAgent(state, actor);
  }

  if (state.message_ids) {
    await window.load(state.message_ids);
  } else {
    await window.initialize(await buildInitialSequence());
  }

  let lastFunctionResponse = findLastFunctionResponse(window.messages());
  const messagesTotalInit = window.messages().length - 1;
  window.setMessagesTotal(options.messagesTotal ?? messagesTotalInit);
  await window.syncMessageIds();

  async function buildInitialSequence(): Promise<Array<Message>> {
    const now = clock();
    const [recallCount, archivalCount] = await Promise.all([
      store.countMessages(agentId, actor),
      store.countPassages(agentId, actor),
    ]);
    const systemText = compileSystemMessage({
      systemPrompt: state.system,
      memory: state.memory,
      lastEdit: now,
      recallCount,
      archivalCount,
    });

    if (options.initialMessageSequence) {
      return [
        { id: generateId(), agent_id: agentId, role: 'system', text: systemText, created_at: now },
        ...options.initialMessageSequence.map(toMessage),
      ];
    }

    const bootMessages = config.agent.include_initial_boot_message
      ? getInitialBootMessages({
          agentId,
          now,
          generateId,
          sendMessageResponse: packageFunctionResponse(true, 'null', now),
        })
      : [];
    return initializeMessageSequence({
      agentId,
      systemText,
      loginEvent: getLoginEvent(now),
      bootMessages,
      now,
      generateId,
    });
  }

  function toMessage(input: MessageCreate): Message {
    return {
      id: generateId(),
      agent_id: agentId,
      role: input.role,
      text: input.text,
      ...(input.name !== undefined && { name: input.name }),
      created_at: clock(),
    };
  }

  async function rebuildSystemPrompt(rebuild: { force?: boolean; updateTimestamp?: boolean } = {}): Promise<boolean> {
    return window.rebuildSystemMessage({ template: state.system, memory: state.memory, ...rebuild });
  }

  /**
   * Persist every block whose value changed, re-read the blocks, and rebuild the
   * system message. Returns false when the rendered memory is identical.
   */
  async function updateMemoryIfChanged(next: Memory): Promise<boolean> {
    if (compileMemory(next) === compileMemory(state.memory)) {
      return false;
    }

    for (const label of changedBlockLabels(state.memory, next)) {
      const block = getBlock(next, label);
      await store.updateBlock(block.id, { value: block.value }, actor);
    }

    const refreshed: Array<MemoryBlock> = [];
    for (const block of next.blocks) {
      const stored = await store.getBlock(block.id, actor);
      if (!stored) {
        throw new PersistenceError(`memory block ${block.id} (${block.label}) disappeared from the store`);
      }
      refreshed.push(stored);
    }

    state = { ...state, memory: createMemory(refreshed) };
    await rebuildSystemPrompt();
    return true;
  }

  /**
   * Blocks may be shared or edited out of band; pick up whatever the store has now.
   */
  async function refreshMemoryFromStore(): Promise<void> {
    const blocks: Array<MemoryBlock> = [];
    for (const block of state.memory.blocks) {
      const stored = await store.getBlock(block.id, actor);
      if (!stored) {
        log.warn({ blockId: block.id, label: block.label }, 'memory block not found in store, keeping local copy');
      }
      blocks.push(stored ?? block);
    }
    await updateMemoryIfChanged(createMemory(blocks));
  }

  async function getReply(sequence: ReadonlyArray<Message>, stepCount: number | null): Promise<ValidatedResponse> {
    const allowed = solver.getAllowedToolNames();
    const names = allowed.length === 0 ? state.tools : state.tools.filter((name) => allowed.includes(name));
    const forcedTool = selectForcedTool({ stepCount, supportsStructuredOutput: structuredOutput, solver });

    return getAiReply({
      provider: model,
      request: {
        model: state.model,
        messages: sequence.map(toChatMessage),
        tools: registry.toModelTools(names),
        forced_tool: forcedTool,
        max_tokens: config.model.max_tokens,
      },
      retry: {
        maxAttempts: config.retry.max_attempts,
        backoffBaseMs: config.retry.backoff_base_ms,
        maxDelayMs: config.retry.max_delay_ms,
        ...(deps.sleep && { sleep: deps.sleep }),
      },
      logger: log,
    });
  }

  async function handleAiResponse(reply: ChatMessage): Promise<HandledResponse> {
    const now = clock();
    const calls = reply.tool_calls ?? [];
    const call: ToolCall | undefined = calls[0];

    if (!call) {
      const assistant: Message = {
        id: generateId(),
        agent_id: agentId,
        role: 'assistant',
        text: reply.content,
        model: state.model,
        created_at: now,
      };
      await rebuildSystemPrompt();
      solver.updateToolUsage(null);
      return {
        messages: [assistant],
        heartbeat_requested: resolveHeartbeat(solver, null, false),
        tool_failed: false,
      };
    }

    if (calls.length > 1) {
      log.warn({ count: calls.length }, 'model returned several tool calls, only the first is executed');
    }

    const memory = createMemoryEditor(state.memory);
    const result = await dispatcher.dispatch(call, { agentState: state, memory, store, actor });

    const assistant: Message = {
      id: generateId(),
      agent_id: agentId,
      role: 'assistant',
      text: result.inner_thoughts ?? reply.content,
      tool_calls: [call],
      model: state.model,
      created_at: now,
    };
    const packaged = result.outcome.ok ? result.outcome.value : result.outcome.message;
    const toolMessage: Message = {
      id: generateId(),
      agent_id: agentId,
      role: 'tool',
      name: call.name,
      text: packaged,
      tool_call_id: call.id,
      created_at: now,
    };
    if (result.executed) {
      lastFunctionResponse = findLastFunctionResponse([toolMessage]);
    }

    if (!result.outcome.ok) {
      return { messages: [assistant, toolMessage], heartbeat_requested: true, tool_failed: true };
    }

    await updateMemoryIfChanged(memory.get());
    await rebuildSystemPrompt();
    solver.updateToolUsage(call.name);

    return {
      messages: [assistant, toolMessage],
      heartbeat_requested: resolveHeartbeat(solver, call.name, result.request_heartbeat),
      tool_failed: false,
    };
  }

  async function verifiedReply(sequence: ReadonlyArray<Message>): Promise<ValidatedResponse> {
    const limit = config.agent.first_message_retry_limit;
    let attempts = 0;
    for (;;) {
      const reply = await getReply(sequence, null);
      const check = verifyFirstMessageCorrectness(reply.choice.message, {
        requireSendMessage: true,
        requireMonologue: config.agent.first_message_verify_monologue,
      });
      if (check.ok) {
        return reply;
      }
      attempts++;
      log.warn({ attempt: attempts, reason: check.reason }, 'first message failed verification');
      if (attempts > limit) {
        throw new FirstMessageVerificationError(limit);
      }
    }
  }

  async function runInnerStep(input: ReadonlyArray<Message>, stepOptions: InnerStepOptions): Promise<StepResult> {
    try {
      await refreshMemoryFromStore();

      const sequence = [...window.messages(), ...input];
      const verify =
        !stepOptions.skipVerify &&
        (stepOptions.firstMessage === true || window.getMessagesTotal() === messagesTotalInit);

      const { response, choice } = verify
        ? await verifiedReply(sequence)
        : await getReply(sequence, stepOptions.stepCount ?? null);

      const handled = await handleAiResponse(choice.message);
      const tokenWarning = checkMemoryPressure(response);

      const newMessages = [...input, ...handled.messages];
      const persisted = await window.append(newMessages);
      await window.syncMessageIds();

      return {
        messages: persisted,
        heartbeat_requested: handled.heartbeat_requested,
        tool_failed: handled.tool_failed,
        token_warning: tokenWarning,
        usage: { ...response.usage, step_count: 1 },
      };
    } catch (error) {
      if (!isContextOverflowError(error)) {
        throw error;
      }
      log.warn({ err: error }, 'context window exceeded, summarizing and retrying');
      await summarizeMessagesInPlace();
      return runInnerStep(input, stepOptions);
    }
  }

  /**
   * True at most once per summarization period.
   */
  function checkMemoryPressure(response: ModelResponse): boolean {
    const threshold = config.agent.warning_fraction * state.context_window;
    if (response.usage.total_tokens <= threshold) {
      return false;
    }
    log.warn(
      { totalTokens: response.usage.total_tokens, contextWindow: state.context_window },
      'context window close to its limit',
    );
    if (alertedAboutMemoryPressure) {
      return false;
    }
    alertedAboutMemoryPressure = true;
    return true;
  }

  async function innerStep(input: ReadonlyArray<MessageCreate>, stepOptions: InnerStepOptions = {}): Promise<StepResult> {
    return runInnerStep(input.map(toMessage), stepOptions);
  }

  async function summarizeMessagesInPlace(): Promise<CompactionResult> {
    const result = await compactor.compact(window, state);
    alertedAboutMemoryPressure = false;
    await window.syncMessageIds();
    log.info(
      { summarized: result.summarized_count, hidden: result.hidden_count, tokensAfter: result.tokens_after },
      'summarized messages in place',
    );
    return result;
  }

  async function runSteps(input: ReadonlyArray<MessageCreate>, stepOptions: StepOptions): Promise<StepResponse> {
    const chaining = stepOptions.chaining ?? config.agent.chaining;
    const maxChainingSteps = stepOptions.maxChainingSteps ?? config.agent.max_chaining_steps;
    const usage = emptyUsage();
    const messages: Array<Message> = [];
    let next = input;
    let stepCount = 0;
    let stopReason: StopReason;

    for (;;) {
      if (stepOptions.signal?.aborted) {
        stopReason = 'cancelled';
        break;
      }

      const result = await innerStep(next, {
        firstMessage: false,
        skipVerify: stepOptions.skipVerify,
        stepCount,
      });
      stepCount++;
      messages.push(...result.messages);
      usage.completion_tokens += result.usage.completion_tokens;
      usage.prompt_tokens += result.usage.prompt_tokens;
      usage.total_tokens += result.usage.total_tokens;

      if (!chaining) {
        stopReason = 'no_chaining';
        break;
      }
      if (maxChainingSteps !== undefined && stepCount > maxChainingSteps) {
        log.info({ stepCount, maxChainingSteps }, 'hit max chaining steps, stopping');
        stopReason = 'max_steps';
        break;
      }

      if (result.token_warning) {
        next = [{ role: 'user', text: getTokenLimitWarning(clock()) }];
      } else if (result.tool_failed) {
        next = [{ role: 'user', text: getHeartbeat(FUNC_FAILED_HEARTBEAT_MESSAGE, clock()) }];
      } else if (result.heartbeat_requested) {
        next = [{ role: 'user', text: getHeartbeat(REQ_HEARTBEAT_MESSAGE, clock()) }];
      } else {
        stopReason = 'yield';
        break;
      }
    }

    usage.step_count = stepCount;
    log.debug({ stepCount, stopReason }, 'step finished');
    return { messages, step_count: stepCount, usage, stop_reason: stopReason };
  }

  function lastIndexOfRole(role: Message['role']): number {
    const buffer = window.messages();
    for (let i = buffer.length - 1; i > 0; i--) {
      if (buffer[i]?.role === role) {
        return i;
      }
    }
    return -1;
  }

  async function popMessages(count: number): Promise<Array<Message>> {
    const total = window.messages().length;
    if (total <= MIN_MESSAGES_IN_CONTEXT) {
      throw new NoEligibleMessageError(`agent only has ${total} messages in context, none left to pop`);
    }
    if (total - count < MIN_MESSAGES_IN_CONTEXT) {
      throw new NoEligibleMessageError(
        `agent only has ${total} messages in context, cannot pop more than ${total - MIN_MESSAGES_IN_CONTEXT}`,
      );
    }

    const popped: Array<Message> = [];
    for (let i = 0; i < count; i++) {
      try {
        popped.push(await window.deleteLast());
      } catch (error) {
        log.warn({ err: error, popped: popped.length }, 'failed to delete message, stopping pop');
        break;
      }
    }
    await window.syncMessageIds();
    return popped;
  }

  async function popUntilLastUserMessage(): Promise<Array<Message>> {
    if (lastIndexOfRole('user') === -1) {
      throw new NoEligibleMessageError('no user message found in context');
    }
    const popped: Array<Message> = [];
    while (window.messages()[window.messages().length - 1]?.role !== 'user') {
      const [message] = await popMessages(1);
      if (!message) {
        throw new PersistenceError('could not pop back to the last user message');
      }
      popped.push(message);
    }
    return popped;
  }

  async function stepUserMessage(text: string, stepOptions: InnerStepOptions = {}): Promise<StepResult> {
    if (text.length === 0) {
      throw new TypeError('user message must be a non-empty string');
    }
    return innerStep([{ role: 'user', text: packageUserMessage(text, clock()) }], stepOptions);
  }

  async function retryLastMessage(): Promise<StepResult> {
    await popUntilLastUserMessage();
    const [userMessage] = await popMessages(1);
    if (!userMessage || userMessage.text === null) {
      throw new NoEligibleMessageError('last user message could not be removed for retry');
    }
    return stepUserMessage(unpackUserMessage(userMessage.text));
  }

  async function rewriteLastAssistantMessage(text: string): Promise<Message> {
    const buffer = window.messages();
    for (let i = buffer.length - 1; i > 0; i--) {
      const message = buffer[i];
      if (!message || message.role !== 'assistant' || !message.tool_calls || message.tool_calls.length === 0) {
        continue;
      }
      const [first, ...rest] = message.tool_calls;
      if (!first || first.name !== 'send_message') {
        throw new NoEligibleMessageError('last assistant message did not call send_message');
      }
      const args = parseToolArguments(first.arguments);
      if (!args || !('message' in args)) {
        throw new NoEligibleMessageError('last send_message call has no message argument');
      }
      const updated = await store.updateMessage(
        message.id,
        { tool_calls: [{ ...first, arguments: JSON.stringify({ ...args, message: text }) }, ...rest] },
        actor,
      );
      window.replace(i, updated);
      return updated;
    }
    throw new NoEligibleMessageError('no assistant message with a tool call found to update');
  }

  async function rethinkLastAssistantMessage(text: string): Promise<Message> {
    const index = lastIndexOfRole('assistant');
    const message = window.messages()[index];
    if (index === -1 || !message) {
      throw new NoEligibleMessageError('no assistant message found to update');
    }
    const updated = await store.updateMessage(message.id, { text }, actor);
    window.replace(index, updated);
    return updated;
  }

  async function updateSystemPrompt(template: string): Promise<boolean> {
    if (template === state.system) {
      return false;
    }
    state = { ...state, system: template };
    await store.updateAgent(agentId, { system: template }, actor);
    await rebuildSystemPrompt({ force: true, updateTimestamp: false });
    await window.syncMessageIds();
    return true;
  }

  async function rebuildAndSync(rebuild: { force?: boolean; updateTimestamp?: boolean }): Promise<boolean> {
    const changed = await rebuildSystemPrompt(rebuild);
    if (changed) {
      await window.syncMessageIds();
    }
    return changed;
  }

  // Every public operation that touches the window or the store runs under the agent's
  // lock. Internal callers use the unlocked functions: the mutex is not reentrant.
  function exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return deps.lock ? deps.lock.runExclusive(agentId, fn) : fn();
  }

  return {
    id: agentId,

    innerStep(input: ReadonlyArray<MessageCreate>, stepOptions?: InnerStepOptions): Promise<StepResult> {
      return exclusive(() => innerStep(input, stepOptions));
    },

    step(input: ReadonlyArray<MessageCreate>, stepOptions: StepOptions = {}): Promise<StepResponse> {
      return exclusive(() => runSteps(input, stepOptions));
    },

    stepUserMessage(text: string, stepOptions?: InnerStepOptions): Promise<StepResult> {
      return exclusive(() => stepUserMessage(text, stepOptions));
    },

    rewriteLastAssistantMessage(text: string): Promise<Message> {
      return exclusive(() => rewriteLastAssistantMessage(text));
    },

    rethinkLastAssistantMessage(text: string): Promise<Message> {
      return exclusive(() => rethinkLastAssistantMessage(text));
    },

    popMessages(count: number): Promise<Array<Message>> {
      return exclusive(() => popMessages(count));
    },

    popUntilLastUserMessage(): Promise<Array<Message>> {
      return exclusive(popUntilLastUserMessage);
    },

    retryLastMessage(): Promise<StepResult> {
      return exclusive(retryLastMessage);
    },

    updateSystemPrompt(template: string): Promise<boolean> {
      return exclusive(() => updateSystemPrompt(template));
    },

    rebuildSystemPrompt(rebuild: { force?: boolean; updateTimestamp?: boolean } = {}): Promise<boolean> {
      return exclusive(() => rebuildAndSync(rebuild));
    },

    summarizeMessagesInPlace(): Promise<CompactionResult> {
      return exclusive(summarizeMessagesInPlace);
    },

    async getContextWindowOverview(): Promise<ContextWindowOverview> {
      return window.getOverview(state, registry.toModelTools(state.tools));
    },

    countTokens(): number {
      return window.countTokens();
    },

    messages(): ReadonlyArray<Message> {
      return window.messages();
    },

    lastFunctionResponse(): string | null {
      return lastFunctionResponse;
    },

    getState(): AgentState {
      return { ...state, message_ids: window.messageIds() };
    },
  };
}
