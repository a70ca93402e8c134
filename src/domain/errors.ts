/**
 * Application error types
 * Each error carries a stable code so callers can branch without string matching
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Database operation errors (open, schema, insert, query)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', details);
  }
}

/**
 * Rejected user input (amount, description, transaction fields)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

/**
 * Configuration errors - fatal on startup
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
  }
}

/**
 * Report generation failed (script exit code, spawn failure, timeout, query failure)
 */
export class ReportError extends AppError {
  constructor(
    message: string,
    public readonly kind: string,
    details?: unknown
  ) {
    super(message, 'REPORT_ERROR', { kind, details });
  }
}

/**
 * Chat provider rejected a call or could not be reached
 */
export class TransportError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'TRANSPORT_ERROR', details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
