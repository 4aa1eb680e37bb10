/**
 * Logging Module - Barrel Exports
 *
 * Usage:
 * ```typescript
 * import { logger } from '../logging/index.js';
 * ```
 */

export { logger, LoggerService } from './logger.service.js';

export type {
  RequestLogEntry,
  RequestLogMetadata,
  LogEntry,
  LogContext,
  LogResult
} from '../types/log.types.js';

export { LogLevel } from '../types/log.types.js';
