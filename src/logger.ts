/**
 * Structured logger.
 *
 * JSON lines in production, a short human-readable line otherwise. Everything
 * goes to stderr: stdout belongs to the MCP stdio transport.
 *
 * ```typescript
 * const log = createLogger({ minLevel: "info" }).child({ feedId: feed.id });
 * log.warn("Skipping entry without guid", { index: 3 });
 * ```
 */

import type { LogLevel } from "./config.js";

export type { LogLevel };

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  json?: boolean;
  service?: string;
  /** Receives each formatted line. Defaults to console.error. */
  write?: (line: string, level: LogLevel) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const isProduction = process.env.NODE_ENV === "production";

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    minLevel = isProduction ? "info" : "debug",
    json = isProduction,
    service = "feed-ingest",
    write = (line: string) => console.error(line),
  } = options;
  const minPriority = LOG_LEVEL_PRIORITY[minLevel];

  function format(level: LogLevel, message: string, context: LogContext): string {
    if (json) {
      return JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        service,
        message,
        ...context,
      });
    }
    const label = `[${level.toUpperCase()}]`.padEnd(7);
    const ctx = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
    return `${label} ${message}${ctx}`;
  }

  function build(base: LogContext): Logger {
    const log = (level: LogLevel, message: string, context?: LogContext) => {
      if (LOG_LEVEL_PRIORITY[level] < minPriority) return;
      write(format(level, message, { ...base, ...context }), level);
    };
    return {
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (context) => build({ ...base, ...context }),
    };
  }

  return build({});
}

/** Default for components built without a logger. */
export const silentLogger: Logger = createLogger({ minLevel: "error", write: () => {} });
