/**
 * Core Logger Implementation
 *
 * Structured logging with multiple transport support and
 * correlation-id propagation through child loggers.
 */

import {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LoggerConfig,
  type LogTransport,
  type ILogger,
} from "./types.js";

/** Level and transports shared by a root logger and all of its children. */
export interface LoggerOutputs {
  minLevel: LogLevel;
  transports: LogTransport[];
}

// ============================================
// RING BUFFER
// ============================================

export class RingBuffer<T> {
  private buffer: T[] = [];
  private head = 0;

  constructor(private readonly capacity: number) {}

  push(item: T): void {
    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return;
    }
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
  }

  getAll(): T[] {
    if (this.buffer.length < this.capacity) return [...this.buffer];
    // Full: oldest entry sits at head
    return [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
  }

  getLast(n: number): T[] {
    return this.getAll().slice(-n);
  }

  clear(): void {
    this.buffer = [];
    this.head = 0;
  }
}

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];
  private readonly ringBuffer: RingBuffer<LogEntry>;
  private readonly outputs: LoggerOutputs;
  private context: LogContext;

  constructor(config: LoggerConfig, ringBuffer?: RingBuffer<LogEntry>, outputs?: LoggerOutputs) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    // Children share the parent's buffer so recent logs stay in one place
    this.ringBuffer = ringBuffer ?? new RingBuffer<LogEntry>(config.ringBufferSize ?? 1000);
    this.outputs = outputs ?? { minLevel: config.minLevel, transports: [...config.transports] };
    this.context = { ...config.defaultContext };
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private write(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown,
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.outputs.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      correlationId: this.context.correlationId,
      planId: this.context.planId,
    };

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: "Unknown", message: String(error) };
    }

    this.ringBuffer.push(entry);

    for (const transport of this.outputs.transports) {
      if (LOG_LEVELS[level] >= LOG_LEVELS[transport.minLevel]) {
        try {
          const pending = transport.log(entry);
          if (pending instanceof Promise) {
            pending.catch((e: unknown) => console.error(`[Logger] Transport ${transport.name} failed:`, e));
          }
        } catch (e) {
          console.error(`[Logger] Transport ${transport.name} failed:`, e);
        }
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (value instanceof Error) {
        result[key] = { name: value.name, message: value.message };
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context Management
  // ----------------------------------------

  child(context: { component?: string } & LogContext): ILogger {
    const { component, ...rest } = context;
    return new Logger(
      {
        ...this.config,
        component: component ?? this.config.component,
        defaultContext: { ...this.context, ...rest },
      },
      this.ringBuffer,
      this.outputs,
    );
  }

  /**
   * Replace the level and transports in place. Every logger in the same
   * family sees the change, including children created earlier.
   * Returns the transports that were replaced.
   */
  reconfigure(outputs: LoggerOutputs): LogTransport[] {
    const replaced = this.outputs.transports;
    this.outputs.minLevel = outputs.minLevel;
    this.outputs.transports = [...outputs.transports];
    return replaced;
  }

  setCorrelationId(id: string): void {
    this.context.correlationId = id;
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.ringBuffer.getLast(count);
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(this.outputs.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.outputs.transports.map(t => t.close?.()));
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================
// GLOBAL LOGGER SINGLETON
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}
