/**
 * Error classes for the advisory engine
 */

/**
 * Base error class. `statusCode` is what the HTTP layer answers with.
 */
export class AdvisorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AdvisorError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AdvisorError);
    }
  }
}

/**
 * Malformed board state at the oracle boundary. Never evaluated.
 */
export class InvalidPositionError extends AdvisorError {
  constructor(
    message: string,
    public readonly fen?: string,
  ) {
    super(message, 'INVALID_POSITION', 400, fen === undefined ? undefined : { fen });
    this.name = 'InvalidPositionError';
  }
}

/**
 * Move that is not legal in the given position
 */
export class IllegalMoveError extends AdvisorError {
  constructor(
    public readonly move: string,
    public readonly fen: string,
  ) {
    super(`Illegal move ${move} in position ${fen}`, 'ILLEGAL_MOVE', 400, { move, fen });
    this.name = 'IllegalMoveError';
  }
}

/**
 * Model artifact missing, unreadable or malformed.
 * Recovered inside the engine; callers only see a fallback source.
 */
export class ModelUnavailableError extends AdvisorError {
  constructor(
    message: string,
    public readonly modelPath?: string,
    cause?: Error,
  ) {
    super(`${message}${cause ? `: ${cause.message}` : ''}`, 'MODEL_UNAVAILABLE');
    this.name = 'ModelUnavailableError';
  }
}

/**
 * Feature vector disagrees with the model's expected inputs
 */
export class FeatureSchemaMismatchError extends AdvisorError {
  constructor(
    public readonly expected: readonly string[],
    public readonly received: readonly string[],
  ) {
    super(
      `Feature schema mismatch: model expects [${expected.join(', ')}], got [${received.join(', ')}]`,
      'FEATURE_SCHEMA_MISMATCH',
    );
    this.name = 'FeatureSchemaMismatchError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
