// pattern: Functional Core

export type {
  InitToolRule,
  TerminalToolRule,
  ChildToolRule,
  ToolRule,
  ToolRulesSolver,
} from './types.ts';
export { ToolRuleSchema } from './types.ts';
export type { ForcedToolOptions } from './solver.ts';
export {
  createToolRulesSolver,
  parseToolRules,
  validateToolRules,
  selectForcedTool,
  resolveHeartbeat,
} from './solver.ts';
