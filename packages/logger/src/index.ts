/**
 * @fileoverview Logging utilities for Trellis
 * @module @trellis/logger
 *
 * Structured, console-backed logging with levels, JSON and pretty output,
 * child loggers and credential redaction for outbound HTTP calls.
 *
 * @example
 * ```typescript
 * import { configureLogger, createLogger } from '@trellis/logger';
 *
 * configureLogger({ level: 'debug', format: 'pretty' });
 *
 * const log = createLogger({ component: 'sync' });
 * log.info('Boards fetched', { count: 12 });
 * ```
 */

export {
  Logger,
  logger,
  createLogger,
  configureLogger,
  getLoggerConfig,
  resetLoggerConfig,
  formatEntry,
} from './logger.js';

export { redactUrl, SENSITIVE_PARAMS } from './redact.js';

export {
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
  type LogOutput,
  type ErrorInfo,
  type HttpInfo,
  type ILogger,
  LOG_LEVELS,
} from './types.js';
