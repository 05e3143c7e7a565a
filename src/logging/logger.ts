// pattern: Imperative Shell

/**
 * Structured logging for the runtime.
 * Every module receives a Logger through its dependencies; nothing logs through a global.
 */

import fs from "node:fs";
import path from "node:path";
import pino, { multistream } from "pino";
import type { LoggingConfig } from "../config/schema.ts";

export type Logger = pino.Logger;

export function createLogger(level: string, filePath?: string): Logger {
  if (!filePath) {
    return pino({ level });
  }

  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new Error(`cannot create log directory: ${dir}`, { cause: err });
  }

  const streams = [
    { level, stream: process.stdout },
    { level, stream: pino.destination({ dest: filePath, sync: false }) },
  ];
  return pino({ level }, multistream(streams));
}

export function createLoggerFromConfig(config: LoggingConfig): Logger {
  return createLogger(config.level, config.file);
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
