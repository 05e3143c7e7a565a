// pattern: Functional Core

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  MemoryEditor,
  ToolContext,
  ToolHandler,
  BaseTool,
  SandboxedTool,
  Tool,
  ToolOutcome,
  DispatchResult,
  ToolRegistry,
  ToolDispatcher,
} from './types.ts';

export { createToolRegistry, REQUEST_HEARTBEAT_PARAMETER } from './registry.ts';
export type { ToolDispatcherDependencies } from './dispatcher.ts';
export { createToolDispatcher, normalizeHeartbeatRequest, parseToolArguments } from './dispatcher.ts';
export {
  PAGED_TOOLS,
  formatToolError,
  packageFunctionResponse,
  truncateFunctionResponse,
  validateFunctionResponse,
} from './response.ts';
export { BASE_TOOL_NAMES, SEARCH_PAGE_SIZE, createBaseTools } from './builtin/base.ts';
