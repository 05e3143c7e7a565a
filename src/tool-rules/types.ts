// pattern: Functional Core

/**
 * Tool rules constrain which tools the model may call next.
 * Rules are plain data, validated at the boundary by ToolRuleSchema.
 */

import { z } from 'zod';

export const InitToolRuleSchema = z.object({
  type: z.literal('run_first'),
  tool_name: z.string().min(1),
});

export const TerminalToolRuleSchema = z.object({
  type: z.literal('exit_loop'),
  tool_name: z.string().min(1),
});

export const ChildToolRuleSchema = z.object({
  type: z.literal('constrain_child_tools'),
  tool_name: z.string().min(1),
  children: z.array(z.string().min(1)).min(1),
});

export const ToolRuleSchema = z.discriminatedUnion('type', [
  InitToolRuleSchema,
  TerminalToolRuleSchema,
  ChildToolRuleSchema,
]);

export type InitToolRule = z.infer<typeof InitToolRuleSchema>;
export type TerminalToolRule = z.infer<typeof TerminalToolRuleSchema>;
export type ChildToolRule = z.infer<typeof ChildToolRuleSchema>;
export type ToolRule = z.infer<typeof ToolRuleSchema>;

export type ToolRulesSolver = {
  readonly initToolRules: ReadonlyArray<InitToolRule>;
  readonly terminalToolRules: ReadonlyArray<TerminalToolRule>;
  readonly childToolRules: ReadonlyArray<ChildToolRule>;
  lastToolName(): string | null;
  /**
   * Names the model may call next. An empty list means "no constraint".
   */
  getAllowedToolNames(): Array<string>;
  updateToolUsage(toolName: string | null): void;
  isTerminalTool(toolName: string): boolean;
  hasChildrenTools(toolName: string): boolean;
};
