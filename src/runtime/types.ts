// pattern: Functional Core

/**
 * Sandbox runtime types.
 * Defines the port for running user-supplied tool source against a snapshot of agent state.
 * The sandbox never sees the live agent; whatever it changes comes back as a new snapshot.
 */

import type { AgentState } from '../agent/types.ts';

export type SandboxRunRequest = {
  toolName: string;
  sourceCode: string;
  args: Record<string, unknown>;
  /**
   * Copied before the tool sees it.
   */
  agentState: AgentState;
};

export type SandboxRunResult = {
  return_value: unknown;
  /**
   * The snapshot after the tool ran. Untrusted: validate before use.
   */
  agent_state: unknown;
};

/**
 * Port interface for sandboxed tool execution.
 */
export interface ToolSandbox {
  run(request: SandboxRunRequest): Promise<SandboxRunResult>;
}
