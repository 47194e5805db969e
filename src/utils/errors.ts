/**
 * Error Handling Utilities
 *
 * Typed application errors. Each carries a machine-readable code and the HTTP
 * status it is surfaced with at the request boundary.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Malformed request that never reached validation (e.g. unparseable JSON)
 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 'BAD_REQUEST', 400);
  }
}

/**
 * Field-level validation failure
 */
export class ValidationError extends AppError {
  public readonly fieldErrors: Record<string, string[]>;

  constructor(fieldErrors: Record<string, string[]>) {
    const errorCount = Object.values(fieldErrors).flat().length;
    super(
      `Validation failed with ${errorCount} error(s)`,
      'VALIDATION_ERROR',
      400,
      { fields: fieldErrors }
    );
    this.fieldErrors = fieldErrors;
  }

  static fromZodError(error: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const fieldErrors: Record<string, string[]> = {};
    for (const issue of error.issues) {
      const path = issue.path.join('.') || '_root';
      const messages = fieldErrors[path] ?? [];
      messages.push(issue.message);
      fieldErrors[path] = messages;
    }
    return new ValidationError(fieldErrors);
  }
}

/**
 * Uniqueness constraint violated by a create or update
 */
export class ConflictError extends AppError {
  constructor(message: string, field: string, code: string = 'CONFLICT') {
    super(message, code, 400, { field });
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string, message: string = `${resource} not found`) {
    super(message, 'NOT_FOUND', 404);
  }
}

/**
 * Check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
