// Error taxonomy for the coverage engine.
//
// OracleUnavailableError is always recovered locally (degraded verdict);
// ConfigurationError is fatal at construction; SequenceGapError is only logged.

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class OracleUnavailableError extends Error {
  readonly oracle: string;

  constructor(oracle: string, message: string, options?: { cause?: unknown }) {
    super(`${oracle} unavailable: ${message}`, options);
    this.name = "OracleUnavailableError";
    this.oracle = oracle;
  }
}

export class SequenceGapError extends Error {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super(`Transcript fragment out of sequence: expected ${expected}, received ${received}`);
    this.name = "SequenceGapError";
    this.expected = expected;
    this.received = received;
  }
}

export class SessionFinalizedError extends Error {
  constructor(sessionId: string, operation: string) {
    super(`Cannot ${operation}: session ${sessionId} is already finalized`);
    this.name = "SessionFinalizedError";
  }
}

/** Normalizes an unknown thrown value into a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
