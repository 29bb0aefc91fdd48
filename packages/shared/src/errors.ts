export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required') {
    super('AUTHENTICATION_REQUIRED', message, 401);
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = 'Permission denied') {
    super('AUTHORIZATION_DENIED', message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: string) {
    super('NOT_FOUND', id ? `${entity} ${id} not found` : `${entity} not found`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: Array<{ field: string; message: string }>,
  ) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: string = 'CONFLICT') {
    super(code, message, 409);
  }
}

/**
 * Raised when persisted state would break a bookkeeping invariant.
 * Never collected into batch reports; it aborts the enclosing transaction.
 */
export class ConsistencyError extends AppError {
  constructor(code: string, message: string) {
    super(code, message, 500);
  }
}

/** Client errors (4xx) are per-item failures a batch may report and skip. */
export function isItemError(err: unknown): err is AppError {
  return err instanceof AppError && err.statusCode >= 400 && err.statusCode < 500;
}
