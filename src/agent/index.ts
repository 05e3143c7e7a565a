// pattern: Functional Core

/**
 * Step engine module exports
 */

export type {
  Agent,
  AgentDependencies,
  AgentRuntimeConfig,
  AgentState,
  CreateAgentOptions,
  InnerStepOptions,
  Message,
  MessageCreate,
  MessageRole,
  StepOptions,
  StepResponse,
  StepResult,
  StopReason,
  UsageStatistics,
} from './types.ts';
export { createAgent, findLastFunctionResponse } from './agent.ts';
export { ConfigurationError, FirstMessageVerificationError, NoEligibleMessageError, PersistenceError } from './errors.ts';
export type { KeyedMutex } from './lock.ts';
export { createKeyedMutex, LockTimeoutError } from './lock.ts';
export {
  FUNC_FAILED_HEARTBEAT_MESSAGE,
  REQ_HEARTBEAT_MESSAGE,
  TOKEN_LIMIT_WARNING_MESSAGE,
  getHeartbeat,
  getLoginEvent,
  getTokenLimitWarning,
  packageUserMessage,
  unpackUserMessage,
} from './system-messages.ts';
export type { FirstMessageCheck } from './verify.ts';
export { verifyFirstMessageCorrectness } from './verify.ts';
