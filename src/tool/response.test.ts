// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import { FIXED_NOW } from '../integration/test-helpers.ts';
import {
  formatToolError,
  packageFunctionResponse,
  stringifyToolValue,
  truncateFunctionResponse,
  validateFunctionResponse,
} from './response.ts';

describe('stringifyToolValue', () => {
  it('passes strings through and serializes everything else', () => {
    expect(stringifyToolValue('plain')).toBe('plain');
    expect(stringifyToolValue({ a: 1 })).toBe('{"a":1}');
    expect(stringifyToolValue(null)).toBe('null');
    expect(stringifyToolValue(undefined)).toBe('null');
  });
});

describe('truncateFunctionResponse', () => {
  it('leaves text at the limit alone', () => {
    expect(truncateFunctionResponse('abcde', 5)).toBe('abcde');
  });

  it('cuts text over the limit and says by how much', () => {
    expect(truncateFunctionResponse('abcdefgh', 3)).toBe(
      'abc... [NOTE: function output was truncated since it exceeded the character limit (8 > 3)]',
    );
  });
});

describe('validateFunctionResponse', () => {
  it('skips truncation when asked', () => {
    expect(validateFunctionResponse('abcdefgh', { returnCharLimit: 3, truncate: false })).toBe('abcdefgh');
  });

  it('truncates the serialized form', () => {
    expect(validateFunctionResponse([1, 2, 3], { returnCharLimit: 4, truncate: true })).toBe(
      '[1,2... [NOTE: function output was truncated since it exceeded the character limit (7 > 4)]',
    );
  });
});

describe('formatToolError', () => {
  it('reports the error class and message', () => {
    expect(formatToolError(new RangeError('out of range'))).toBe('RangeError: out of range');
  });

  it('handles error-shaped objects and thrown values', () => {
    expect(formatToolError({ name: 'TypeError', message: 'bad' })).toBe('TypeError: bad');
    expect(formatToolError('just a string')).toBe('Error: just a string');
  });
});

describe('packageFunctionResponse', () => {
  it('wraps the text with a status and timestamp', () => {
    expect(packageFunctionResponse(true, 'done', FIXED_NOW)).toBe(
      '{"status":"OK","message":"done","time":"2024-03-05 01:07:09 PM UTC+0000"}',
    );
    expect(JSON.parse(packageFunctionResponse(false, 'nope', FIXED_NOW))).toMatchObject({ status: 'Failed' });
  });
});
