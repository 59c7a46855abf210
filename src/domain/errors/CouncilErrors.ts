import { AppError, ErrorCode } from './AppError';

/**
 * Malformed agent roster or council configuration. Fatal before any iteration starts.
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.CONFIG_ERROR, message, 500, details);
  }
}

/**
 * Reference to an agent id outside the registry; signals a caller bug.
 */
export class UnknownAgentError extends AppError {
  constructor(public readonly agentId: string) {
    super(ErrorCode.UNKNOWN_AGENT, `Unknown agent: ${agentId}`, 404, { agentId });
  }
}

/**
 * A single proposal or critique generation attempt failed. Stages recover from it locally.
 */
export class GenerationFailure extends AppError {
  constructor(message: string, public readonly agentId?: string, cause?: unknown) {
    super(ErrorCode.GENERATION_FAILURE, message, 502, {
      agentId,
      cause: cause instanceof Error ? cause.message : cause
    });
  }
}

export class DuplicateIterationError extends AppError {
  constructor(public readonly iterationIndex: number) {
    super(
      ErrorCode.DUPLICATE_ITERATION,
      `Weight history already contains iteration ${iterationIndex}`,
      409,
      { iterationIndex }
    );
  }
}

export class PersistenceWriteError extends AppError {
  constructor(target: string, cause?: unknown) {
    super(
      ErrorCode.PERSISTENCE_WRITE_ERROR,
      `Failed to write ${target}: ${cause instanceof Error ? cause.message : String(cause)}`,
      500,
      { target }
    );
  }
}

export class IterationCancelledError extends AppError {
  constructor(public readonly iterationIndex: number) {
    super(ErrorCode.ITERATION_CANCELLED, `Iteration ${iterationIndex} was cancelled`, 409, { iterationIndex });
  }
}

/**
 * The request does not fit the iteration state machine, e.g. starting a new iteration
 * while a previous one is still waiting for its outcome.
 */
export class IterationStateError extends AppError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.ITERATION_STATE, message, 409, details);
  }
}
