/**
 * Response Formatting Utilities
 *
 * Provides helper functions for creating standardized API responses.
 * All responses include request_id, timestamp, and CORS headers.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { v4 as uuidv4 } from 'uuid';
import {
  SuccessResponse,
  ErrorResponse,
  ErrorDetails,
  HttpStatus,
  ErrorCode,
  FieldErrors,
  ConfigurationErrorDetails,
  SpreadsheetErrorDetails,
} from '../models/response';

/**
 * CORS headers for all responses
 */
export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,X-Amz-Date,X-Api-Key,X-Amz-Security-Token',
  'Access-Control-Allow-Methods': 'GET,POST,PUT,DELETE,OPTIONS',
};

/**
 * Generate a unique request ID
 *
 * @returns UUID v4 string
 */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Generate ISO-8601 timestamp
 */
export function generateTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Create a success response
 *
 * Wraps response data in standard envelope with request_id and timestamp.
 *
 * @param data - Response payload
 * @param statusCode - HTTP status code (default: 200)
 * @param requestId - Optional request ID (generated if not provided)
 *
 * @example
 * ```typescript
 * return successResponse({ players: [...] }, HttpStatus.OK, requestId);
 * ```
 */
export function successResponse<T>(
  data: T,
  statusCode: HttpStatus = HttpStatus.OK,
  requestId?: string
): APIGatewayProxyResult {
  const response: SuccessResponse<T> = {
    request_id: requestId || generateRequestId(),
    timestamp: generateTimestamp(),
    data,
  };

  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...CORS_HEADERS,
    },
    body: JSON.stringify(response),
  };
}

/**
 * Create a file download response
 *
 * Binary content is sent base64-encoded for API Gateway.
 *
 * @param content - File body
 * @param contentType - MIME type
 * @param filename - Name offered to the browser
 */
export function fileResponse(
  content: string | Buffer,
  contentType: string,
  filename: string
): APIGatewayProxyResult {
  const binary = Buffer.isBuffer(content);

  return {
    statusCode: HttpStatus.OK,
    headers: {
      'Content-Type': contentType,
      'Content-Disposition': `attachment; filename="${filename}"`,
      ...CORS_HEADERS,
    },
    body: binary ? content.toString('base64') : content,
    isBase64Encoded: binary,
  };
}

/**
 * Create an error response
 *
 * @param code - Machine-readable error code
 * @param message - Human-readable error message
 * @param statusCode - HTTP status code
 * @param details - Optional additional error context
 * @param requestId - Optional request ID (generated if not provided)
 *
 * @example
 * ```typescript
 * return errorResponse(
 *   ErrorCode.NOT_FOUND,
 *   'Player not found',
 *   HttpStatus.NOT_FOUND
 * );
 * ```
 */
export function errorResponse(
  code: ErrorCode,
  message: string,
  statusCode: HttpStatus,
  details?: ErrorDetails['details'],
  requestId?: string
): APIGatewayProxyResult {
  const errorDetails: ErrorDetails = {
    code,
    message,
    request_id: requestId || generateRequestId(),
  };

  if (details) {
    errorDetails.details = details;
  }

  const response: ErrorResponse = {
    error: errorDetails,
  };

  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...CORS_HEADERS,
    },
    body: JSON.stringify(response),
  };
}

/**
 * Create a validation error response (400)
 */
export function validationErrorResponse(
  message: string,
  details?: FieldErrors,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.VALIDATION_ERROR,
    message,
    HttpStatus.BAD_REQUEST,
    details,
    requestId
  );
}

/**
 * Create a not found error response (404)
 */
export function notFoundErrorResponse(
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.NOT_FOUND,
    message,
    HttpStatus.NOT_FOUND,
    undefined,
    requestId
  );
}

/**
 * Create a conflict error response (409)
 */
export function conflictErrorResponse(
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.CONFLICT,
    message,
    HttpStatus.CONFLICT,
    undefined,
    requestId
  );
}

/**
 * Create a configuration error response (500)
 *
 * @param details - Names of the missing or malformed settings
 */
export function configurationErrorResponse(
  message: string,
  details?: ConfigurationErrorDetails,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.CONFIGURATION_ERROR,
    message,
    HttpStatus.INTERNAL_SERVER_ERROR,
    details,
    requestId
  );
}

/**
 * Create an internal server error response (500)
 *
 * @param details - Optional error details (sanitized for production)
 */
export function internalErrorResponse(
  message: string = 'Internal server error',
  details?: { error: string },
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.INTERNAL_ERROR,
    message,
    HttpStatus.INTERNAL_SERVER_ERROR,
    details,
    requestId
  );
}

/**
 * Create a service unavailable error response (503)
 *
 * @param details - What to check before retrying, plus the underlying cause
 */
export function serviceUnavailableErrorResponse(
  message: string = 'Service temporarily unavailable',
  details?: SpreadsheetErrorDetails,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.SERVICE_UNAVAILABLE,
    message,
    HttpStatus.SERVICE_UNAVAILABLE,
    details,
    requestId
  );
}
