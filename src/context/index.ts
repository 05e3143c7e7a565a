// pattern: Functional Core

export type { ContextWindow, ContextWindowOverview, RebuildOptions } from './types.ts';
export type { ContextWindowDependencies } from './context-window.ts';
export { createContextWindow, SUMMARY_MARKER } from './context-window.ts';
export type { MemoryMetadata, CompileSystemMessageOptions, InitialSequenceOptions } from './system-prompt.ts';
export {
  CORE_MEMORY_VARIABLE,
  compileMemoryMetadataBlock,
  compileSystemMessage,
  initializeMessageSequence,
} from './system-prompt.ts';
export { estimateTokens, toChatMessage, countMessageTokens, countMessagesTokens } from './tokens.ts';
export { toUtcDate, formatTimestamp } from './timestamps.ts';
