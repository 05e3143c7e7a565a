// pattern: Functional Core

/**
 * Context-overflow detection. Providers report overflow with a variety of
 * status codes and messages; this is the single place that recognises them.
 */

import { ContextWindowExceededError, LengthFinishError, RetriesExhaustedError } from "./types.ts";

const CONTEXT_OVERFLOW_HINTS: ReadonlyArray<string> = [
  "maximum context length",
  "context_length_exceeded",
  "context length exceeded",
  "exceeds the context window",
  "context window of this model",
  "prompt is too long",
  "input is too long",
  "too many tokens",
  "token limit exceeded",
];

export function looksLikeContextOverflow(message: string): boolean {
  const lower = message.toLowerCase();
  return CONTEXT_OVERFLOW_HINTS.some((hint) => lower.includes(hint));
}

/**
 * A reply cut off on the output token limit counts as overflow: the context has to shrink
 * before the call can succeed.
 */
export function isContextOverflowError(error: unknown): boolean {
  if (error instanceof ContextWindowExceededError || error instanceof LengthFinishError) {
    return true;
  }
  if (error instanceof RetriesExhaustedError) {
    return false;
  }
  if (error instanceof Error) {
    return looksLikeContextOverflow(error.message);
  }
  return false;
}
