// ============================================================================
// Error Types
// ============================================================================

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public code: string = 'APP_ERROR',
    public isOperational: boolean = true,
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Bad input shape. Rejected before any side effect. */
export class ValidationError extends AppError {
  constructor(message: string, code = 'VALIDATION_ERROR') {
    super(400, message, code);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class PreparationError extends ValidationError {
  constructor(message: string) {
    super(message, 'PREPARATION_ERROR');
    this.name = 'PreparationError';
    Object.setPrototypeOf(this, PreparationError.prototype);
  }
}

export class InvalidQueryError extends ValidationError {
  constructor(queryType: string) {
    super(`Unknown schedule query type: ${queryType}`, 'INVALID_QUERY');
    this.name = 'InvalidQueryError';
    Object.setPrototypeOf(this, InvalidQueryError.prototype);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'You are not authorized to perform this action', statusCode = 403, code = 'UNAUTHORIZED') {
    super(statusCode, message, code);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, UnauthorizedError.prototype);
  }
}

/** No session token was presented at all. */
export class MissingTokenError extends UnauthorizedError {
  constructor() {
    super('Session token missing', 401, 'TOKEN_MISSING');
    this.name = 'MissingTokenError';
    Object.setPrototypeOf(this, MissingTokenError.prototype);
  }
}

/** A token was presented but could not be verified (bad signature, expired, malformed). */
export class InvalidTokenError extends UnauthorizedError {
  constructor(reason: string) {
    super(`Invalid session token: ${reason}`, 401, 'TOKEN_INVALID');
    this.name = 'InvalidTokenError';
    Object.setPrototypeOf(this, InvalidTokenError.prototype);
  }
}

export class AuthError extends UnauthorizedError {
  constructor(message = 'Invalid credentials') {
    super(message, 401, 'AUTH_FAILED');
    this.name = 'AuthError';
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(resource = 'Resource', code = 'NOT_FOUND') {
    super(404, `${resource} not found`, code);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ScheduleNotFoundError extends NotFoundError {
  constructor(scheduleId: string) {
    super(`Schedule ${scheduleId}`, 'SCHEDULE_NOT_FOUND');
    this.name = 'ScheduleNotFoundError';
    Object.setPrototypeOf(this, ScheduleNotFoundError.prototype);
  }
}

export class NoEligibleClusterError extends NotFoundError {
  constructor(jobId: string, required: string[]) {
    super(`Eligible cluster for job ${jobId} [${required.join(', ')}]`, 'NO_ELIGIBLE_CLUSTER');
    this.name = 'NoEligibleClusterError';
    Object.setPrototypeOf(this, NoEligibleClusterError.prototype);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = 'CONFLICT') {
    super(409, message, code);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export class DuplicateScheduleError extends ConflictError {
  constructor(jobId: string) {
    super(`Job ${jobId} already has an active schedule`, 'DUPLICATE_SCHEDULE');
    this.name = 'DuplicateScheduleError';
    Object.setPrototypeOf(this, DuplicateScheduleError.prototype);
  }
}

export class InvalidTransitionError extends ConflictError {
  constructor(from: string, to: string) {
    super(`Job status cannot move from ${from} to ${to}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

/** Retryable failure talking to a cluster backend (network, timeout, 5xx). */
export class TransientBackendError extends AppError {
  constructor(message: string, code = 'TRANSIENT_BACKEND_ERROR') {
    super(503, message, code);
    this.name = 'TransientBackendError';
    Object.setPrototypeOf(this, TransientBackendError.prototype);
  }
}

export class SubmissionError extends TransientBackendError {
  constructor(message: string) {
    super(message, 'SUBMISSION_ERROR');
    this.name = 'SubmissionError';
    Object.setPrototypeOf(this, SubmissionError.prototype);
  }
}

export class StatusQueryError extends TransientBackendError {
  constructor(message: string) {
    super(message, 'STATUS_QUERY_ERROR');
    this.name = 'StatusQueryError';
    Object.setPrototypeOf(this, StatusQueryError.prototype);
  }
}

export class PermanentBackendError extends AppError {
  constructor(message: string, code = 'PERMANENT_BACKEND_ERROR') {
    super(502, message, code);
    this.name = 'PermanentBackendError';
    Object.setPrototypeOf(this, PermanentBackendError.prototype);
  }
}

export class PermanentSubmissionError extends PermanentBackendError {
  constructor(message: string) {
    super(message, 'PERMANENT_SUBMISSION_ERROR');
    this.name = 'PermanentSubmissionError';
    Object.setPrototypeOf(this, PermanentSubmissionError.prototype);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
