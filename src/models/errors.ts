export type DraftErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'INDEX_OUT_OF_RANGE'
  | 'INVARIANT_VIOLATION';

/**
 * Base for every error the simulation raises. Any of them aborts the run;
 * there is no per-round recovery.
 */
export class DraftSimulationError extends Error {
  constructor(
    message: string,
    public readonly code: DraftErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DraftSimulationError';
  }
}

/** Bad player records, budgets, counts or strategy parameters. */
export class ConfigurationError extends DraftSimulationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/** A player, arm or round index past the end of its collection. */
export class IndexOutOfRangeError extends DraftSimulationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INDEX_OUT_OF_RANGE', details);
    this.name = 'IndexOutOfRangeError';
  }
}

/** An acquisition that would break a roster cap or the enforced budget. */
export class InvariantViolationError extends DraftSimulationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVARIANT_VIOLATION', details);
    this.name = 'InvariantViolationError';
  }
}
