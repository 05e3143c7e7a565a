// pattern: Functional Core

export type { Memory, MemoryBlock } from './types.ts';
export { DEFAULT_BLOCK_LIMIT } from './types.ts';
export {
  createMemory,
  compileMemory,
  listBlockLabels,
  findBlock,
  getBlock,
  withBlockValue,
  withBlock,
  changedBlockLabels,
} from './memory.ts';
