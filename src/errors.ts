/**
 * Application error hierarchy.
 * Every failure the core raises is an AppError subclass with a stable code.
 * The command layer turns these into "Error: <message>" lines.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed phone, birthday, page number or configuration value. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
  }
}

/** Referenced contact or phone is absent. */
export class NotFoundError extends AppError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
  }
}

/** Input line could not be understood as a command. */
export class ParseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PARSE_ERROR', message, details);
  }
}
