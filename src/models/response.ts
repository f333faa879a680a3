/**
 * API Response Models
 *
 * Type definitions for standardized API responses.
 * All JSON responses include request_id and timestamp for traceability;
 * CSV and workbook downloads are sent as bare files.
 */

/**
 * Standard success response envelope
 */
export interface SuccessResponse<T> {
  request_id: string;
  timestamp: string;
  data: T;
}

/**
 * Field name -> problem, for 400 responses
 */
export type FieldErrors = Record<string, string>;

/**
 * Settings that are missing or malformed, for configuration errors
 */
export interface ConfigurationErrorDetails {
  settings: string[];
}

/**
 * What to check when the spreadsheet cannot be reached, plus the cause
 */
export interface SpreadsheetErrorDetails {
  hints: string[];
  detail: string;
}

/**
 * Error details object
 */
export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  request_id: string;
  details?: FieldErrors | ConfigurationErrorDetails | SpreadsheetErrorDetails | { error: string };
}

/**
 * Standard error response envelope
 */
export interface ErrorResponse {
  error: ErrorDetails;
}

/**
 * HTTP status codes
 */
export enum HttpStatus {
  OK = 200,
  CREATED = 201,
  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  CONFLICT = 409,
  INTERNAL_SERVER_ERROR = 500,
  SERVICE_UNAVAILABLE = 503,
}

/**
 * Standard error codes
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}
