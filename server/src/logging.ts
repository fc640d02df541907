/**
 * Logging Setup for the Plan Engine
 *
 * Initializes the centralized logging system with appropriate transports.
 */

import {
  initLogger,
  Logger,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogLevel,
  type LogTransport,
} from "@planloom/shared/logging";
import { LOG_DIR, LOG_LEVEL } from "./config.js";

export interface LoggingOptions {
  /** Minimum level to log (default: LOG_LEVEL, else "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Directory for file output (default: LOG_DIR; empty disables) */
  logDir?: string;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
  /** Route console output to stderr so stdout stays clean for CLI results */
  stderrOnly?: boolean;
}

// ============================================
// INITIALIZATION
// ============================================

let logger: Logger | null = null;

/**
 * Initialize the logging system for the server. Calling it again
 * reconfigures the existing logger, so loggers created earlier follow.
 */
export function initServerLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const minLevel = options.minLevel ?? LOG_LEVEL ?? (isDev ? "debug" : "info");

  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors,
      prettyPrint: isDev,
      stderrOnly: options.stderrOnly,
    }));
  }

  const logDir = options.logDir ?? LOG_DIR;
  if (logDir) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir,
      filename: "server",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 10,
    }));
  }

  if (logger) {
    // Module-level component loggers are children of this one; swap in place
    const replaced = logger.reconfigure({ minLevel, transports });
    Promise.all(replaced.map(t => t.close?.())).catch((e: unknown) => {
      console.error("[Logging] Closing replaced transports failed:", e);
    });
    return logger;
  }

  logger = initLogger({
    minLevel,
    component: "server",
    transports,
    ringBufferSize: 2000,
  });

  return logger;
}

/**
 * Get the server logger instance. Auto-initializes if not already done.
 */
export function getServerLogger(): Logger {
  return logger ?? initServerLogging();
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return getServerLogger().child({ component: `server.${component}` });
}

/**
 * Create a component logger bound to one plan's trace keys.
 */
export function createPlanLogger(component: string, correlationId: string, planId?: string): ILogger {
  return getServerLogger().child({ component: `server.${component}`, correlationId, planId });
}
