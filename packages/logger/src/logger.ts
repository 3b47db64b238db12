/**
 * @fileoverview Core Logger class for Trellis
 * @module @trellis/logger/logger
 */

import {
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
  type ErrorInfo,
  type HttpInfo,
  type ILogger,
  LOG_LEVELS,
} from './types.js';
import { redactUrl } from './redact.js';

// ============================================================================
// Default Configuration
// ============================================================================

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

function envLevel(): LogLevel {
  const value = process.env['LOG_LEVEL'];
  return isLogLevel(value) ? value : 'info';
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: envLevel(),
  service: process.env['SERVICE_NAME'] ?? 'trellis',
  format: process.env['NODE_ENV'] === 'production' ? 'json' : 'pretty',
  timestamps: true,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

/**
 * Configure the global logger settings.
 * @param config - Partial configuration to merge
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Get the current logger configuration.
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

/**
 * Restore the configuration read from the environment at startup.
 */
export function resetLoggerConfig(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}

// ============================================================================
// Formatting
// ============================================================================

const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  gray: '\x1b[90m',
  bold: '\x1b[1m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

function statusColor(statusCode: number): string {
  if (statusCode >= 500) return COLORS.red;
  if (statusCode >= 400) return COLORS.yellow;
  return COLORS.green;
}

/**
 * Format a log entry for output.
 */
export function formatEntry(entry: LogEntry, config: LoggerConfig = globalConfig): string {
  if (config.format === 'json') {
    return JSON.stringify(entry);
  }

  const color = LEVEL_COLORS[entry.level];
  let output = '';

  if (config.timestamps) {
    const time = new Date(entry.timestamp).toLocaleTimeString();
    output += `${COLORS.gray}${time}${COLORS.reset} `;
  }

  output += `${color}${COLORS.bold}${entry.level.toUpperCase().padEnd(5)}${COLORS.reset} `;
  output += entry.message;

  if (entry.durationMs !== undefined) {
    output += ` ${COLORS.gray}(${entry.durationMs}ms)${COLORS.reset}`;
  }

  if (entry.http) {
    output += ` ${COLORS.blue}${entry.http.method} ${entry.http.url}${COLORS.reset}`;
    if (entry.http.statusCode !== undefined) {
      output += ` ${statusColor(entry.http.statusCode)}${entry.http.statusCode}${COLORS.reset}`;
    }
  }

  if (entry.context && Object.keys(entry.context).length > 0) {
    output += `\n  ${COLORS.gray}context: ${JSON.stringify(entry.context)}${COLORS.reset}`;
  }

  if (entry.error) {
    output += `\n  ${COLORS.red}error: ${entry.error.name}: ${entry.error.message}${COLORS.reset}`;
    if (entry.error.stack) {
      const stackLines = entry.error.stack.split('\n').slice(1, 5);
      output += `\n  ${COLORS.gray}${stackLines.join('\n  ')}${COLORS.reset}`;
    }
  }

  return output;
}

function defaultOutput(entry: LogEntry): void {
  const formatted = formatEntry(entry);

  switch (entry.level) {
    case 'error':
    case 'fatal':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

function toErrorInfo(error: unknown): ErrorInfo | undefined {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { name: error.name, message: error.message, stack: error.stack, code };
  }
  if (error !== null && typeof error === 'object' && 'message' in error) {
    return { name: 'Error', message: String(error.message) };
  }
  return undefined;
}

function toHttpInfo(http: unknown): HttpInfo | undefined {
  if (http === null || typeof http !== 'object') return undefined;
  if (!('method' in http) || !('url' in http)) return undefined;

  const info: HttpInfo = { method: String(http.method), url: redactUrl(String(http.url)) };
  if ('statusCode' in http && typeof http.statusCode === 'number') {
    info.statusCode = http.statusCode;
  }
  if ('transport' in http && typeof http.transport === 'string') {
    info.transport = http.transport;
  }
  return info;
}

// ============================================================================
// Logger Class
// ============================================================================

/**
 * Structured logger.
 *
 * The `error`, `durationMs` and `http` keys of the data argument are lifted
 * into dedicated entry fields; everything else lands in `context`. URLs in
 * `http` are redacted before they reach any output.
 *
 * @example
 * ```typescript
 * const log = new Logger({ component: 'client' });
 * log.debug('request completed', {
 *   http: { method: 'GET', url, statusCode: 200 },
 *   durationMs: 84,
 * });
 * ```
 */
export class Logger implements ILogger {
  private readonly context: Record<string, unknown>;

  constructor(context?: Record<string, unknown>) {
    this.context = context ? { ...context } : {};
  }

  /**
   * Create a child logger with additional context.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({ ...this.context, ...context });
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[globalConfig.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: globalConfig.service,
    };

    const { error, durationMs, http, ...rest } = {
      ...globalConfig.defaultContext,
      ...this.context,
      ...data,
    };

    const errorInfo = toErrorInfo(error);
    if (errorInfo) entry.error = errorInfo;

    if (typeof durationMs === 'number') entry.durationMs = durationMs;

    const httpInfo = toHttpInfo(http);
    if (httpInfo) entry.http = httpInfo;

    if (Object.keys(rest).length > 0) entry.context = rest;

    (globalConfig.output ?? defaultOutput)(entry);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  fatal(message: string, data?: Record<string, unknown>): void {
    this.log('fatal', message, data);
  }

  /**
   * Start timing an operation. `end()` returns the elapsed milliseconds and,
   * unless a level of `false` is given, logs `"<operation> completed"`.
   */
  time(
    operation: string,
    data?: Record<string, unknown>,
  ): { end: (extra?: Record<string, unknown>, level?: LogLevel | false) => number } {
    const start = performance.now();
    return {
      end: (extra, level = 'info') => {
        const durationMs = Math.round(performance.now() - start);
        if (level !== false) {
          this.log(level, `${operation} completed`, { ...data, ...extra, durationMs });
        }
        return durationMs;
      },
    };
  }
}

// ============================================================================
// Default Logger Instance
// ============================================================================

/**
 * Default logger instance.
 */
export const logger = new Logger();

/**
 * Create a new logger with context.
 */
export function createLogger(context?: Record<string, unknown>): Logger {
  return new Logger(context);
}
