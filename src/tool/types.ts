// pattern: Functional Core

/**
 * Tool system types for registration, dispatch, and model integration.
 * A tool either runs in-process against the live agent (base) or as source code
 * inside the sandbox against a snapshot (sandboxed).
 */

import type { AgentState } from '../agent/types.ts';
import type { Memory } from '../memory/types.ts';
import type { ToolCall, ToolDefinition as ModelToolDefinition } from '../model/types.ts';
import type { Actor, AgentStore } from '../store/types.ts';

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';

export type ToolParameter = {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum_values?: ReadonlyArray<string>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ReadonlyArray<ToolParameter>;
  /**
   * Overrides the configured default for this tool's output.
   */
  return_char_limit?: number;
};

/**
 * Read/write handle on the agent's core memory for the duration of one call.
 */
export type MemoryEditor = {
  get(): Memory;
  set(memory: Memory): void;
};

export type ToolContext = {
  agentState: AgentState;
  memory: MemoryEditor;
  store: AgentStore;
  actor: Actor;
};

export type ToolHandler = (args: Record<string, unknown>, context: ToolContext) => Promise<unknown>;

export type BaseTool = {
  kind: 'base';
  definition: ToolDefinition;
  handler: ToolHandler;
};

export type SandboxedTool = {
  kind: 'sandboxed';
  definition: ToolDefinition;
  /**
   * Must define a function named after the tool taking `(args, agent_state)`.
   */
  source_code: string;
};

export type Tool = BaseTool | SandboxedTool;

export type ToolOutcome =
  | { ok: true; value: string }
  | { ok: false; message: string };

/**
 * What the dispatcher made of one model tool call.
 * `outcome.value` / `outcome.message` is already packaged for the tool-role message.
 */
export type DispatchResult = {
  name: string;
  outcome: ToolOutcome;
  /**
   * The model's own continuation request, normalized to a boolean.
   */
  request_heartbeat: boolean;
  /**
   * Inner monologue the model tucked into the arguments, if any.
   */
  inner_thoughts: string | null;
  /**
   * Whether the tool body ran. False when the call failed before execution:
   * unknown tool, unparseable JSON or invalid arguments.
   */
  executed: boolean;
};

export interface ToolRegistry {
  register(tool: Tool): void;
  get(name: string): Tool | null;
  getDefinitions(): Array<ToolDefinition>;
  toModelTools(names?: ReadonlyArray<string>): Array<ModelToolDefinition>;
  /**
   * Returns a description of the first problem found, or null when the arguments fit.
   */
  validateArguments(name: string, args: Record<string, unknown>): string | null;
}

export interface ToolDispatcher {
  dispatch(call: ToolCall, context: ToolContext): Promise<DispatchResult>;
}
