/**
 * Centralized Logging Types
 *
 * Shared between the plan engine, its HTTP surface and CLI scripts.
 * Structured logging with multiple transport support.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG CONTEXT
// ============================================

/** Trace keys attached to every entry a logger produces. */
export interface LogContext {
  /** Correlation ID threaded through every call belonging to one plan */
  correlationId?: string;
  /** Plan the entry belongs to */
  planId?: string;
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Component that produced the log (e.g., "server.planner", "server.tools") */
  component: string;
  message: string;
  /** Structured data payload */
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  /** Transport name for debugging */
  name: string;
  /** Minimum level this transport handles */
  minLevel: LogLevel;
  log(entry: LogEntry): void | Promise<void>;
  /** Flush any buffered logs (for graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LoggerConfig {
  /** Minimum level to log (entries below this are ignored) */
  minLevel: LogLevel;
  /** Component name for this logger instance */
  component: string;
  /** Default context to attach to all logs */
  defaultContext?: LogContext;
  transports: LogTransport[];
  /** Fields to redact from data (regex patterns) */
  redactPatterns?: RegExp[];
  /** Keep last N logs in memory (for inspection and tests) */
  ringBufferSize?: number;
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: { component?: string } & LogContext): ILogger;

  setCorrelationId(id: string): void;

  /** Get recent logs from ring buffer */
  getRecentLogs(count?: number): LogEntry[];

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /apiKey/i,
  /api_key/i,
  /password/i,
  /secret/i,
  /token$/i,
  /authorization/i,
  /credential/i,
];
