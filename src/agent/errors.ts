// pattern: Functional Core

/**
 * Agent-level error taxonomy.
 * Recoverable tool failures never surface as these; they become tool-role messages.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class FirstMessageVerificationError extends Error {
  constructor(public readonly retryLimit: number) {
    super(`hit first message retry limit (${retryLimit})`);
    this.name = 'FirstMessageVerificationError';
  }
}

export class NoEligibleMessageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NoEligibleMessageError';
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}
