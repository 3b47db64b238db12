/**
 * @fileoverview Type definitions for the Trellis logger
 * @module @trellis/logger/types
 */

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Log levels in order of severity.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric values for log level comparison.
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

// ============================================================================
// Log Entry
// ============================================================================

/**
 * Structured log entry.
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Service name */
  service: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  error?: ErrorInfo;
  /** Duration in milliseconds for timed operations */
  durationMs?: number;
  /** Outbound HTTP call details */
  http?: HttpInfo;
}

/**
 * Error information in log entries.
 */
export interface ErrorInfo {
  name: string;
  message: string;
  stack?: string;
  /** Error code if available */
  code?: string;
}

/**
 * Outbound HTTP call in log entries. The URL is always redacted.
 */
export interface HttpInfo {
  method: string;
  url: string;
  statusCode?: number;
  /** Transport that carried the call */
  transport?: string;
}

// ============================================================================
// Logger Configuration
// ============================================================================

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Service name for identification */
  service: string;
  format: 'json' | 'pretty';
  /** Whether to include timestamps in pretty format */
  timestamps: boolean;
  /** Default context to include in all log entries */
  defaultContext?: Record<string, unknown>;
  /** Custom output function (for testing or custom transports) */
  output?: LogOutput;
}

/**
 * Custom log output function.
 */
export type LogOutput = (entry: LogEntry) => void;

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger interface for dependency injection.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  fatal(message: string, data?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): ILogger;
}
