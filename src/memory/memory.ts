// pattern: Functional Core

/**
 * Pure operations over core memory.
 * Every edit returns a new Memory; the input is never mutated.
 */

import type { Memory, MemoryBlock } from './types.ts';

export function createMemory(blocks: ReadonlyArray<MemoryBlock>): Memory {
  const seen = new Set<string>();
  for (const block of blocks) {
    if (seen.has(block.label)) {
      throw new Error(`duplicate memory block label: ${block.label}`);
    }
    seen.add(block.label);
  }
  return { blocks: [...blocks] };
}

/**
 * Render memory the way it appears inside the system message:
 * one tagged section per block with its character usage.
 */
export function compileMemory(memory: Memory): string {
  return memory.blocks
    .map(
      (block) =>
        `<${block.label} characters="${block.value.length}/${block.limit}">\n${block.value}\n</${block.label}>`,
    )
    .join('\n');
}

export function listBlockLabels(memory: Memory): Array<string> {
  return memory.blocks.map((block) => block.label);
}

export function findBlock(memory: Memory, label: string): MemoryBlock | null {
  return memory.blocks.find((block) => block.label === label) ?? null;
}

export function getBlock(memory: Memory, label: string): MemoryBlock {
  const block = findBlock(memory, label);
  if (!block) {
    const available = listBlockLabels(memory).join(', ');
    throw new Error(`block not found: ${label} (available: ${available})`);
  }
  return block;
}

export function withBlockValue(memory: Memory, label: string, value: string): Memory {
  const block = getBlock(memory, label);
  if (value.length > block.limit) {
    throw new Error(
      `edit failed: exceeds ${block.limit} character limit (requested ${value.length})`,
    );
  }
  return {
    blocks: memory.blocks.map((b) => (b.label === label ? { ...b, value } : b)),
  };
}

export function withBlock(memory: Memory, block: MemoryBlock): Memory {
  const exists = memory.blocks.some((b) => b.id === block.id);
  return {
    blocks: exists
      ? memory.blocks.map((b) => (b.id === block.id ? block : b))
      : [...memory.blocks, block],
  };
}

/**
 * Labels whose value differs between two memories that share the same block set.
 * Blocks missing from `next` are ignored.
 */
export function changedBlockLabels(current: Memory, next: Memory): Array<string> {
  const changed: Array<string> = [];
  for (const block of current.blocks) {
    const candidate = findBlock(next, block.label);
    if (candidate && candidate.value !== block.value) {
      changed.push(block.label);
    }
  }
  return changed;
}
