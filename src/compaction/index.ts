// pattern: Functional Core

/**
 * Compaction module barrel export.
 * Re-exports all public types and utilities for the context compression system.
 */

export type {
  CompactionResult,
  Compactor,
  CutoffOptions,
  InsufficientMessagesDetails,
  Summarizer,
} from './types.ts';
export { InsufficientMessagesError } from './types.ts';
export type { BuildSummarizationRequestOptions } from './prompt.ts';
export { DEFAULT_SYSTEM_PROMPT, DEFAULT_DIRECTIVE, buildSummarizationRequest, toSummaryInput } from './prompt.ts';
export type { CreateSummarizerOptions } from './summarizer.ts';
export { createSummarizer, SUMMARY_INPUT_WINDOW_FRACTION } from './summarizer.ts';
export type { CreateCompactorOptions } from './compactor.ts';
export { createCompactor, selectSummaryCutoff, packageSummaryMessage } from './compactor.ts';
