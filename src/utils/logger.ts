/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the application. All logs include timestamp, level and relevant context.
 * Player personal data (names, birth dates, notes) is redacted from context.
 */

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  request_id?: string;
}

/**
 * API request log entry
 */
interface RequestLogEntry extends BaseLogEntry {
  log_type: 'API_REQUEST';
  method: string;
  path: string;
  status_code: number;
  latency_ms: number;
}

/**
 * Spreadsheet error log entry
 */
interface SpreadsheetLogEntry extends BaseLogEntry {
  log_type: 'SPREADSHEET_ERROR';
  error_message: string;
  worksheet: string;
  operation: string;
}

type LogContext = Record<string, unknown>;

/**
 * PII patterns to sanitize from logs
 */
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

/**
 * Fields that may contain PII and should be excluded
 */
const PII_FIELDS = [
  'name',
  'nombre',
  'player_name',
  'birth_date',
  'fecha_nacimiento',
  'notes',
  'observaciones',
  'email',
  'phone',
  'private_key',
];

/**
 * Sanitize string by removing PII patterns
 */
function sanitizeString(value: string): string {
  return value
    .replace(PII_PATTERNS.email, '[EMAIL_REDACTED]')
    .replace(PII_PATTERNS.phone, '[PHONE_REDACTED]');
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value !== null && typeof value === 'object') {
    return sanitizeObject(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

/**
 * Sanitize object by removing PII fields and patterns
 */
function sanitizeObject(obj: LogContext): LogContext {
  const sanitized: LogContext = {};

  for (const [key, value] of Object.entries(obj)) {
    sanitized[key] = PII_FIELDS.includes(key.toLowerCase()) ? '[PII_REDACTED]' : sanitizeValue(value);
  }

  return sanitized;
}

/**
 * Minimum level written, from LOG_LEVEL (default info)
 */
function thresholdLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || 'info').toUpperCase();
  const match = Object.values(LogLevel).find((level) => level === configured);
  return match ?? LogLevel.INFO;
}

/**
 * Write log entry to console (CloudWatch)
 */
function writeLog(entry: BaseLogEntry & LogContext): void {
  if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[thresholdLevel()]) {
    return;
  }
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log API request
 *
 * @example
 * ```typescript
 * logRequest({
 *   requestId: 'abc-123',
 *   method: 'GET',
 *   path: '/summary',
 *   statusCode: 200,
 *   latencyMs: 45
 * });
 * ```
 */
export function logRequest(params: {
  requestId: string;
  method: string;
  path: string;
  statusCode: number;
  latencyMs: number;
}): void {
  const entry: RequestLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.statusCode >= 500 ? LogLevel.ERROR : params.statusCode >= 400 ? LogLevel.WARN : LogLevel.INFO,
    log_type: 'API_REQUEST',
    request_id: params.requestId,
    method: params.method,
    path: params.path,
    status_code: params.statusCode,
    latency_ms: params.latencyMs,
  };

  writeLog({ ...entry });
}

/**
 * Log a failed spreadsheet call
 *
 * @example
 * ```typescript
 * logSpreadsheet({
 *   errorMessage: 'The caller does not have permission',
 *   worksheet: 'jugadores',
 *   operation: 'READ'
 * });
 * ```
 */
export function logSpreadsheet(params: {
  requestId?: string;
  errorMessage: string;
  worksheet: string;
  operation: string;
}): void {
  const entry: SpreadsheetLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    log_type: 'SPREADSHEET_ERROR',
    request_id: params.requestId,
    error_message: sanitizeString(params.errorMessage),
    worksheet: params.worksheet,
    operation: params.operation,
  };

  writeLog({ ...entry });
}

/**
 * Log generic message with context
 *
 * @example
 * ```typescript
 * log(LogLevel.WARN, 'Cells defaulted while decoding', {
 *   worksheet: 'seguimiento',
 *   issues: 3
 * });
 * ```
 */
export function log(level: LogLevel, message: string, context?: LogContext): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  writeLog({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...sanitizedContext,
  });
}
