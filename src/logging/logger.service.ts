import type { LogContext, LogEntry, LogResult, RequestLogEntry } from '../types/log.types.js';
import { LogLevel } from '../types/log.types.js';

/**
 * Logger Service
 *
 * Structured console logger shared by every module of the service.
 * Each line is a single JSON object so container log drivers can ship it as-is.
 *
 * Architecture:
 * - Level filtering from LOG_LEVEL (debug, info, warn, error)
 * - LOGGING_ENABLED=false silences everything (used by some tests)
 * - Request logs are written on the next tick with setImmediate so the
 *   response is never held up by console I/O
 *
 * Usage:
 * ```typescript
 * import { logger } from '../logging/logger.service.js';
 * logger.info('Startup', 'Listening', { port: 5000 });
 * ```
 */
export class LoggerService {
  private minLevel: LogLevel = LogLevel.INFO;

  private enabled: boolean = true;

  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
  };

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const logLevel = env.LOG_LEVEL?.toLowerCase();
    if (logLevel !== undefined && LoggerService.isLogLevel(logLevel)) {
      this.minLevel = logLevel;
    }

    if (env.LOGGING_ENABLED === 'false') {
      this.enabled = false;
    }
  }

  static isLogLevel(level: string): level is LogLevel {
    return Object.values(LogLevel).some((value) => value === level);
  }

  private shouldLog(level: LogLevel): boolean {
    return this.enabled && this.levelPriority[level] >= this.levelPriority[this.minLevel];
  }

  private formatLogEntry(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      scope: entry.scope,
      message: entry.message,
      ...(entry.context && { context: entry.context })
    });
  }

  /**
   * Uses the console method matching the level so stderr/stdout split is preserved
   */
  private writeLog(entry: LogEntry): void {
    const logString = this.formatLogEntry(entry);

    switch (entry.level) {
      case LogLevel.ERROR:
        console.error(logString);
        break;
      case LogLevel.WARN:
        console.warn(logString);
        break;
      case LogLevel.DEBUG:
        console.debug(logString);
        break;
      case LogLevel.INFO:
      default:
        console.log(logString);
        break;
    }
  }

  log(level: LogLevel, scope: string, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    this.writeLog({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      ...(context && { context })
    });
  }

  debug(scope: string, message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, scope, message, context);
  }

  info(scope: string, message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, scope, message, context);
  }

  warn(scope: string, message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, scope, message, context);
  }

  error(scope: string, message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, scope, message, context);
  }

  /**
   * Log a completed request without blocking the response
   *
   * @param entry - Request log entry to log
   * @returns Promise that resolves once the line is written
   */
  async logRequest(entry: RequestLogEntry): Promise<LogResult> {
    if (!this.shouldLog(LogLevel.INFO)) {
      return {
        success: true,
        timestamp: new Date().toISOString()
      };
    }

    return new Promise((resolve) => {
      setImmediate(() => {
        try {
          this.writeLog({
            timestamp: entry.timestamp,
            level: LogLevel.INFO,
            scope: 'RequestLog',
            message: `${entry.method} ${entry.path} - ${entry.status_code}`,
            context: {
              correlation_id: entry.correlation_id,
              method: entry.method,
              path: entry.path,
              status_code: entry.status_code,
              duration_ms: entry.duration,
              ...(entry.metadata && { metadata: entry.metadata })
            }
          });
          resolve({
            success: true,
            timestamp: new Date().toISOString()
          });
        } catch (error) {
          resolve({
            success: false,
            error: error instanceof Error ? error.message : 'Unknown error',
            timestamp: new Date().toISOString()
          });
        }
      });
    });
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }
}

/**
 * Shared logger instance
 */
export const logger = new LoggerService();
