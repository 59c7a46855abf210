export enum ErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  CONFIG_ERROR = 'CONFIG_ERROR',
  UNKNOWN_AGENT = 'UNKNOWN_AGENT',
  GENERATION_FAILURE = 'GENERATION_FAILURE',
  DUPLICATE_ITERATION = 'DUPLICATE_ITERATION',
  PERSISTENCE_WRITE_ERROR = 'PERSISTENCE_WRITE_ERROR',
  ITERATION_CANCELLED = 'ITERATION_CANCELLED',
  ITERATION_STATE = 'ITERATION_STATE'
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  static notFound(message = 'Not found'): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }
}
