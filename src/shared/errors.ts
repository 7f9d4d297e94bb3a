export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** A field submission that cannot be turned into a record. Never reaches the queue. */
export class MalformedInputError extends AppError {
  constructor(public readonly problems: string[]) {
    super(`Malformed field submission: ${problems.join('; ')}`, 400, 'MALFORMED_INPUT');
    this.name = 'MalformedInputError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

/** Timeout, dropped connection, busy database. The entry is retried with backoff. */
export class TransientStoreError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, 'TRANSIENT_STORE_ERROR');
    this.name = 'TransientStoreError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** Constraint violation or invalid natural key. Needs an operator requeue after correction. */
export class PermanentStoreError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 422, 'PERMANENT_STORE_ERROR');
    this.name = 'PermanentStoreError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}
