/**
 * Request-scoped errors. Fastify renders `statusCode` and `code` through the
 * error handler registered in app.ts.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Unknown enum value in a gallery filter
 */
export class InvalidFilterError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'invalid_filter', details);
    this.name = 'InvalidFilterError';
  }
}

/**
 * Non-positive or non-integer page index
 */
export class InvalidPageError extends AppError {
  constructor(message = 'Page must be a positive integer') {
    super(message, 400, 'invalid_page');
    this.name = 'InvalidPageError';
  }
}

/**
 * Caller is known but not allowed to do this
 */
export class NotAuthorizedError extends AppError {
  constructor(message: string) {
    super(message, 403, 'not_authorized');
    this.name = 'NotAuthorizedError';
  }
}

/**
 * Missing or invalid credentials
 */
export class AuthError extends AppError {
  constructor(message: string) {
    super(message, 401, 'unauthenticated');
    this.name = 'AuthError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, `${resource}_not_found`);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = 'conflict') {
    super(message, 409, code);
    this.name = 'ConflictError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'validation_failed', details);
    this.name = 'ValidationError';
  }
}

export class InsufficientCreditsError extends AppError {
  constructor(required: number, available: number) {
    super(`Insufficient credits: ${required} required, ${available} available`, 402, 'insufficient_credits', {
      required,
      available,
    });
    this.name = 'InsufficientCreditsError';
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 503, 'service_unavailable');
    this.name = 'ServiceUnavailableError';
  }
}
