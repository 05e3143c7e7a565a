// pattern: Functional Core

/**
 * Core memory types.
 * A Memory is a set of labeled, size-limited blocks rendered into the system message.
 * Values are plain data so snapshots survive structured cloning across the sandbox boundary.
 */

export type MemoryBlock = {
  readonly id: string;
  readonly label: string;
  readonly value: string;
  readonly limit: number;
};

export type Memory = {
  readonly blocks: ReadonlyArray<MemoryBlock>;
};

export const DEFAULT_BLOCK_LIMIT = 5000;
