/**
 * Error Handling Middleware
 *
 * Centralized error handling that catches and formats different types of errors
 * into standardized API responses with appropriate HTTP status codes.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import {
  NotFoundError,
  BadRequestError,
  ConflictError,
  ConfigurationError,
  ServiceUnavailableError,
  SpreadsheetConnectionError,
} from '../models/errors';
import {
  notFoundErrorResponse,
  validationErrorResponse,
  conflictErrorResponse,
  configurationErrorResponse,
  internalErrorResponse,
  serviceUnavailableErrorResponse,
} from '../utils/response-formatter';
import { LogLevel, log } from '../utils/logger';

/**
 * Validation error class with field-level details
 */
export class ValidationError extends Error {
  constructor(message: string, public details?: Record<string, string>) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Handle error and format appropriate response
 *
 * Maps application errors to standardized API responses with correct
 * HTTP status codes and error formats. Handles:
 * - Configuration errors (500, CONFIGURATION_ERROR)
 * - Spreadsheet connection errors (503)
 * - Not found errors (404)
 * - Validation errors (400)
 * - Conflicts such as a duplicate week (409)
 * - Generic errors (500)
 *
 * @param error - Error to handle
 * @param requestId - Request ID for tracing
 * @returns Formatted API Gateway response
 *
 * @example
 * ```typescript
 * try {
 *   // ... operation
 * } catch (error) {
 *   return handleError(error, requestId);
 * }
 * ```
 */
export function handleError(
  error: unknown,
  requestId: string
): APIGatewayProxyResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof ConfigurationError) {
    log(LogLevel.ERROR, 'Configuration error', { request_id: requestId, settings: err.settings });
    return configurationErrorResponse(err.message, { settings: err.settings }, requestId);
  }

  if (err instanceof NotFoundError) {
    return notFoundErrorResponse(err.message, requestId);
  }

  if (err instanceof BadRequestError || err instanceof ValidationError) {
    return validationErrorResponse(err.message, err.details, requestId);
  }

  if (err instanceof ConflictError) {
    return conflictErrorResponse(err.message, requestId);
  }

  if (err instanceof SpreadsheetConnectionError) {
    return serviceUnavailableErrorResponse(
      err.message,
      { hints: err.hints, detail: err.detail },
      requestId
    );
  }

  if (err instanceof ServiceUnavailableError) {
    return serviceUnavailableErrorResponse(err.message, undefined, requestId);
  }

  log(LogLevel.ERROR, 'Unhandled error', {
    request_id: requestId,
    error: err.message,
    stack: err.stack,
  });

  return internalErrorResponse(
    'Internal server error',
    process.env.NODE_ENV === 'development' ? { error: err.message } : undefined,
    requestId
  );
}
