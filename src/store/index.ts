// pattern: Functional Core

/**
 * Store module exports
 */

export type {
  Actor,
  AgentStore,
  AgentUpdate,
  BlockUpdate,
  MessageUpdate,
  PageRequest,
  Passage,
  SearchPage,
} from './types.ts';
export { createPostgresAgentStore, likePattern, parseAgent, parseBlock, parseMessage } from './postgres-store.ts';
