/**
 * Error taxonomy for the review queue.
 *
 * Every error carries a stable `kind` so that outcomes can be reported
 * across process boundaries without shipping stack traces.
 */

export type ErrorKind =
  | 'validation'
  | 'dispatch'
  | 'transport'
  | 'generation'
  | 'not_found'
  | 'invalid_state'
  | 'persistence'
  | 'unexpected';

/**
 * Base error class for all review queue errors
 */
export class ReviewQueueError extends Error {
  public readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind) {
    super(message);
    this.name = 'ReviewQueueError';
    this.kind = kind;
    Object.setPrototypeOf(this, ReviewQueueError.prototype);
  }
}

/**
 * Bad input. Fatal for a pipeline run; surfaced directly at submission time.
 */
export class ValidationError extends ReviewQueueError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'validation');
    this.name = 'ValidationError';
    this.field = field;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * The job queue refused the job at submission time.
 */
export class DispatchError extends ReviewQueueError {
  public readonly taskId: string;

  constructor(taskId: string, reason: string) {
    super(`Failed to start analysis: ${reason}`, 'dispatch');
    this.name = 'DispatchError';
    this.taskId = taskId;
    Object.setPrototypeOf(this, DispatchError.prototype);
  }
}

/**
 * Network or API failure while fetching change data. Fatal for the task.
 */
export class TransportError extends ReviewQueueError {
  constructor(message: string) {
    super(message, 'transport');
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Review generation failed. Recorded on the task but never fails it.
 */
export class GenerationError extends ReviewQueueError {
  constructor(message: string) {
    super(message, 'generation');
    this.name = 'GenerationError';
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

export class NotFoundError extends ReviewQueueError {
  public readonly taskId: string;

  constructor(taskId: string) {
    super(`Task not found: ${taskId}`, 'not_found');
    this.name = 'NotFoundError';
    this.taskId = taskId;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class InvalidStateError extends ReviewQueueError {
  public readonly taskId: string;
  public readonly status: string;

  constructor(taskId: string, status: string, message?: string) {
    super(message ?? `Task not completed. Current status: ${status}`, 'invalid_state');
    this.name = 'InvalidStateError';
    this.taskId = taskId;
    this.status = status;
    Object.setPrototypeOf(this, InvalidStateError.prototype);
  }
}

/**
 * Task record store read or write failure.
 */
export class PersistenceError extends ReviewQueueError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${toErrorMessage(cause)}`, 'persistence');
    this.name = 'PersistenceError';
    this.operation = operation;
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }
}

/**
 * Message of an arbitrary thrown value, without the stack.
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errorKindOf(error: unknown): ErrorKind {
  return error instanceof ReviewQueueError ? error.kind : 'unexpected';
}
