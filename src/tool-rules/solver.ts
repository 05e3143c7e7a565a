// pattern: Functional Core

/**
 * ToolRulesSolver: a small state machine over tool names.
 * The only state is the last tool invoked; every answer is a pure function of
 * the rule set and that name.
 *
 * Rules are not checked for cycles. A tool whose only child is itself chains
 * forever unless the outer loop's max_chaining_steps stops it.
 */

import { ConfigurationError } from '../agent/errors.ts';
import { ToolRuleSchema } from './types.ts';
import type {
  ChildToolRule,
  InitToolRule,
  TerminalToolRule,
  ToolRule,
  ToolRulesSolver,
} from './types.ts';

export function parseToolRules(raw: ReadonlyArray<unknown>): Array<ToolRule> {
  return raw.map((rule) => ToolRuleSchema.parse(rule));
}

/**
 * Reject rule sets the model cannot honour. Raised at agent construction, never at step time.
 */
export function validateToolRules(
  rules: ReadonlyArray<ToolRule>,
  supportsStructuredOutput: boolean,
): void {
  const initCount = rules.filter((rule) => rule.type === 'run_first').length;
  if (!supportsStructuredOutput && initCount > 1) {
    throw new ConfigurationError(
      'multiple initial tools are not supported for non-structured models; use only one run_first rule',
    );
  }
}

export function createToolRulesSolver(
  rules: ReadonlyArray<ToolRule>,
  lastToolName: string | null = null,
): ToolRulesSolver {
  const initToolRules: Array<InitToolRule> = [];
  const terminalToolRules: Array<TerminalToolRule> = [];
  const childToolRules: Array<ChildToolRule> = [];

  for (const rule of rules) {
    switch (rule.type) {
      case 'run_first':
        initToolRules.push(rule);
        break;
      case 'exit_loop':
        terminalToolRules.push(rule);
        break;
      case 'constrain_child_tools':
        childToolRules.push(rule);
        break;
    }
  }

  let last = lastToolName;

  return {
    initToolRules,
    terminalToolRules,
    childToolRules,

    lastToolName(): string | null {
      return last;
    },

    getAllowedToolNames(): Array<string> {
      if (last === null) {
        return initToolRules.map((rule) => rule.tool_name);
      }
      const children = childToolRules.find((rule) => rule.tool_name === last);
      return children ? [...children.children] : [];
    },

    updateToolUsage(toolName: string | null): void {
      last = toolName;
    },

    isTerminalTool(toolName: string): boolean {
      return terminalToolRules.some((rule) => rule.tool_name === toolName);
    },

    hasChildrenTools(toolName: string): boolean {
      return childToolRules.some((rule) => rule.tool_name === toolName);
    },
  };
}

export type ForcedToolOptions = {
  readonly stepCount: number | null;
  readonly supportsStructuredOutput: boolean;
  readonly solver: ToolRulesSolver;
};

/**
 * Decide whether the next model call must call a specific tool.
 * Step 0 on a non-structured model forces the first init tool; later steps force
 * the single remaining tool when the rules leave exactly one.
 */
export function selectForcedTool(options: ForcedToolOptions): string | null {
  const { stepCount, supportsStructuredOutput, solver } = options;
  if (stepCount === null) {
    return null;
  }
  const firstInit = solver.initToolRules[0];
  if (stepCount === 0 && !supportsStructuredOutput && firstInit) {
    return firstInit.tool_name;
  }
  if (stepCount > 0) {
    const allowed = solver.getAllowedToolNames();
    if (allowed.length === 1 && allowed[0] !== undefined) {
      return allowed[0];
    }
  }
  return null;
}

/**
 * Apply rule overrides to the model's own heartbeat request.
 * Children force a continuation; terminal tools force a stop.
 */
export function resolveHeartbeat(
  solver: ToolRulesSolver,
  toolName: string | null,
  requested: boolean,
): boolean {
  if (toolName === null) {
    return requested;
  }
  if (solver.hasChildrenTools(toolName)) {
    return true;
  }
  if (solver.isTerminalTool(toolName)) {
    return false;
  }
  return requested;
}
