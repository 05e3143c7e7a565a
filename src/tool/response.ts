// pattern: Functional Core

/**
 * Turning raw tool results into the text the model sees.
 */

import { formatTimestamp } from '../context/timestamps.ts';

/**
 * Tools that page their own output; truncating them would hide the paging footer.
 */
export const PAGED_TOOLS: ReadonlySet<string> = new Set([
  'conversation_search',
  'conversation_search_date',
  'archival_memory_search',
]);

export function stringifyToolValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? 'null';
}

export function truncateFunctionResponse(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  return (
    `${text.slice(0, limit)}... [NOTE: function output was truncated since it exceeded ` +
    `the character limit (${text.length} > ${limit})]`
  );
}

export function validateFunctionResponse(
  value: unknown,
  options: { returnCharLimit: number; truncate: boolean },
): string {
  const text = stringifyToolValue(value);
  return options.truncate ? truncateFunctionResponse(text, options.returnCharLimit) : text;
}

/**
 * `<ErrorName>: <message>`, never a stack.
 */
export function formatToolError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  // errors thrown inside the sandbox come from another realm
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    const name = 'name' in error && typeof error.name === 'string' ? error.name : 'Error';
    return `${name}: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

export function packageFunctionResponse(ok: boolean, text: string, now: Date): string {
  return JSON.stringify({ status: ok ? 'OK' : 'Failed', message: text, time: formatTimestamp(now) });
}
