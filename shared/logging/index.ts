/**
 * Centralized Logging System
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, ConsoleTransport, FileTransport } from "@planloom/shared/logging";
 *
 * const logger = initLogger({
 *   minLevel: "debug",
 *   component: "server",
 *   transports: [
 *     new ConsoleTransport({ colors: true }),
 *     new FileTransport({ logDir: "./logs" }),
 *   ],
 * });
 *
 * const planLog = logger.child({ component: "server.planner", correlationId: "c-1" });
 * planLog.info("Requirements generated", { count: 2 });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

export {
  Logger,
  RingBuffer,
  initLogger,
  getLogger,
  type LoggerOutputs,
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  formatPlainText,
  type ConsoleTransportOptions,
  type FileTransportOptions,
} from "./transports/index.js";
