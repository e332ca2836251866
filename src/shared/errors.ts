/**
 * Base class for errors raised by the application itself
 * `code` is stable and safe to branch on; `message` is for logs
 */
export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input for the current step or operation */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION');
  }
}

/** A referenced row does not exist */
export class NotFoundError extends AppError {
  constructor(
    readonly entity: string,
    readonly key: string | number
  ) {
    super(`${entity} ${key} not found`, 'NOT_FOUND');
  }
}

/** Persisted data that the application cannot interpret */
export class DataIntegrityError extends AppError {
  constructor(message: string) {
    super(message, 'DATA_INTEGRITY');
  }
}

/** Write queue no longer accepts jobs, or the database handle is closed */
export class QueueClosedError extends AppError {
  constructor() {
    super('Write queue is closed', 'QUEUE_CLOSED');
  }
}

export class MigrationError extends AppError {
  constructor(
    readonly version: number,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Migration ${version} failed: ${reason}`, 'MIGRATION');
  }
}
