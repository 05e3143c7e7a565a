// pattern: Imperative Shell

/**
 * Tool dispatch: resolve the model's tool call, parse its arguments, run the tool in
 * the right lane, and package the result for the tool-role message.
 * Expected failures come back as `{ ok: false }` outcomes; nothing a tool does throws past here.
 */

import { z } from 'zod';
import type { ToolsConfig } from '../config/schema.ts';
import type { Logger } from '../logging/logger.ts';
import { changedBlockLabels, compileMemory, createMemory, getBlock, withBlockValue } from '../memory/memory.ts';
import type { Memory } from '../memory/types.ts';
import type { ToolCall } from '../model/types.ts';
import type { ToolSandbox } from '../runtime/types.ts';
import {
  formatToolError,
  packageFunctionResponse,
  PAGED_TOOLS,
  validateFunctionResponse,
} from './response.ts';
import { REQUEST_HEARTBEAT_PARAMETER } from './registry.ts';
import type { DispatchResult, SandboxedTool, ToolContext, ToolDispatcher, ToolRegistry } from './types.ts';

const INNER_THOUGHTS_PARAMETER = 'inner_thoughts';

const SandboxStateSchema = z.object({
  memory: z.object({
    blocks: z.array(
      z.object({
        id: z.string(),
        label: z.string(),
        value: z.string(),
        limit: z.number(),
      }),
    ),
  }),
});

export type ToolDispatcherDependencies = {
  registry: ToolRegistry;
  sandbox: ToolSandbox;
  logger: Logger;
  config: Pick<ToolsConfig, 'return_char_limit'>;
  clock?: () => Date;
};

/**
 * `true`, or the string "true" in any case, counts as a request. Anything else does not.
 */
export function normalizeHeartbeatRequest(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  return typeof value === 'string' && value.trim().toLowerCase() === 'true';
}

export function parseToolArguments(raw: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Apply block values a sandboxed tool changed on its snapshot to the live memory.
 * Limits are enforced as if the tool had edited memory directly.
 */
export function reconcileSandboxMemory(current: Memory, returned: Memory): Memory {
  let next = current;
  for (const label of changedBlockLabels(current, returned)) {
    next = withBlockValue(next, label, getBlock(returned, label).value);
  }
  return next;
}

export function createToolDispatcher(deps: ToolDispatcherDependencies): ToolDispatcher {
  const { registry, sandbox, logger, config } = deps;
  const clock = deps.clock ?? (() => new Date());

  async function runSandboxed(
    tool: SandboxedTool,
    args: Record<string, unknown>,
    context: ToolContext,
  ): Promise<unknown> {
    const before = compileMemory(context.memory.get());
    const result = await sandbox.run({
      toolName: tool.definition.name,
      sourceCode: tool.source_code,
      args,
      agentState: { ...context.agentState, memory: context.memory.get() },
    });

    if (compileMemory(context.memory.get()) !== before) {
      throw new Error('memory should not be modified in a sandbox tool');
    }

    const returned = SandboxStateSchema.safeParse(result.agent_state);
    if (!returned.success) {
      throw new Error(`sandbox returned malformed agent state: ${returned.error.issues[0]?.message ?? 'unknown'}`);
    }
    context.memory.set(reconcileSandboxMemory(context.memory.get(), createMemory(returned.data.memory.blocks)));

    return result.return_value;
  }

  return {
    async dispatch(call: ToolCall, context: ToolContext): Promise<DispatchResult> {
      const { name } = call;
      let requestHeartbeat = false;
      let innerThoughts: string | null = null;

      function failed(message: string, executed = false): DispatchResult {
        logger.warn({ tool: name, error: message }, 'tool call failed');
        return {
          name,
          outcome: { ok: false, message: packageFunctionResponse(false, message, clock()) },
          request_heartbeat: requestHeartbeat,
          inner_thoughts: innerThoughts,
          executed,
        };
      }

      const tool = context.agentState.tools.includes(name) ? registry.get(name) : null;
      if (!tool) {
        return failed(`No function named ${name}`);
      }

      const args = parseToolArguments(call.arguments);
      if (!args) {
        return failed(`Error parsing JSON for function '${name}' arguments: ${call.arguments}`);
      }

      const thoughts = args[INNER_THOUGHTS_PARAMETER];
      if (typeof thoughts === 'string') {
        innerThoughts = thoughts;
      }
      delete args[INNER_THOUGHTS_PARAMETER];

      if (REQUEST_HEARTBEAT_PARAMETER in args) {
        const raw = args[REQUEST_HEARTBEAT_PARAMETER];
        requestHeartbeat = normalizeHeartbeatRequest(raw);
        if (typeof raw !== 'boolean') {
          logger.debug({ tool: name, value: raw }, 'request_heartbeat was not a boolean');
        }
        delete args[REQUEST_HEARTBEAT_PARAMETER];
      }

      const problem = registry.validateArguments(name, args);
      if (problem) {
        return failed(`Error calling function ${name}: ${formatToolError(new TypeError(problem))}`);
      }

      logger.debug({ tool: name, lane: tool.kind }, 'running tool');

      let value: unknown;
      try {
        value = tool.kind === 'base' ? await tool.handler(args, context) : await runSandboxed(tool, args, context);
      } catch (error) {
        return failed(`Error calling function ${name}: ${formatToolError(error)}`, true);
      }

      const text = validateFunctionResponse(value, {
        returnCharLimit: tool.definition.return_char_limit ?? config.return_char_limit,
        truncate: !PAGED_TOOLS.has(name),
      });

      return {
        name,
        outcome: { ok: true, value: packageFunctionResponse(true, text, clock()) },
        request_heartbeat: requestHeartbeat,
        inner_thoughts: innerThoughts,
        executed: true,
      };
    },
  };
}
