/**
 * Log level enumeration
 * Defines severity levels for log entries
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Arbitrary structured context attached to a log line
 */
export type LogContext = Record<string, unknown>;

/**
 * Request log entry data structure
 * Captures the fields written for every completed HTTP request
 */
export interface RequestLogEntry {
  /**
   * Correlation ID for tracing
   * Taken from x-request-id or generated per request
   */
  correlation_id: string;

  /** Request path (query string excluded) */
  path: string;

  /** HTTP method */
  method: string;

  /** HTTP status code sent to the client */
  status_code: number;

  /** Time from request start to response finish, in milliseconds */
  duration: number;

  /** ISO 8601 timestamp of completion */
  timestamp: string;

  /**
   * Client details
   */
  metadata?: RequestLogMetadata;
}

/**
 * Optional metadata for request logging
 */
export interface RequestLogMetadata {
  ip?: string;
  user_agent?: string;
}

/**
 * One structured line as written to the console
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  context?: LogContext;
}

/**
 * Async log operation result
 */
export interface LogResult {
  success: boolean;
  error?: string;
  timestamp: string;
}
