/**
 * Application Error Models
 *
 * Common error types used across the application.
 * These errors are mapped to appropriate HTTP status codes
 * by the error handling middleware.
 */

/**
 * Resource not found error (404)
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Bad request error (400)
 */
export class BadRequestError extends Error {
  constructor(message: string, public details?: Record<string, string>) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Conflict with existing state (409)
 */
export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

/**
 * A weekly entry already exists for the same player and week (409)
 */
export class DuplicateWeekError extends ConflictError {
  constructor(
    public readonly playerId: string,
    public readonly weekStart: string
  ) {
    super(`A weekly entry already exists for player ${playerId} in the week starting ${weekStart}`);
    this.name = 'DuplicateWeekError';
  }
}

/**
 * Service unavailable error (503)
 */
export class ServiceUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * The spreadsheet could not be opened or reached (503).
 * Carries the checks an operator should make before trying again.
 */
export class SpreadsheetConnectionError extends ServiceUnavailableError {
  constructor(
    message: string,
    public readonly hints: string[],
    public readonly detail: string
  ) {
    super(message);
    this.name = 'SpreadsheetConnectionError';
  }
}

/**
 * Missing or malformed deployment setting (500, fatal)
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly settings: string[]) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
