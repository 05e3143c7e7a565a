// pattern: Functional Core

export type { Logger } from "./logger.ts";
export { createLogger, createLoggerFromConfig, createSilentLogger } from "./logger.ts";
