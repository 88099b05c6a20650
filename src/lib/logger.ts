/**
 * Structured Logger
 *
 * JSON lines in production, colored lines in development. Set LOG_LEVEL to
 * change the minimum level (default: "info" in production, "debug" otherwise).
 *
 * Usage:
 * ```typescript
 * import { logger } from "@/lib/logger";
 *
 * logger.info("Fetched newsletters", { count: 12 });
 * logger.error("Failed to send digest", { error: errorMessage(error) });
 * ```
 */

import * as Sentry from "@sentry/node";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};

const RESET = "\x1b[0m";

const SERVICE = "newsletter-digest";

const isProduction = process.env.NODE_ENV === "production";

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return undefined;
}

const minLevelPriority =
  LOG_LEVEL_PRIORITY[parseLogLevel(process.env.LOG_LEVEL) ?? (isProduction ? "info" : "debug")];

function format(level: LogLevel, message: string, context: LogContext): string {
  if (isProduction) {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      service: SERVICE,
      ...context,
    });
  }

  const label = `[${level.toUpperCase()}]`.padEnd(7);
  const details = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
  return `${LEVEL_COLORS[level]}${label}${RESET} ${message}${details}`;
}

function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (LOG_LEVEL_PRIORITY[level] < minLevelPriority) {
    return;
  }

  const line = format(level, message, context);

  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      if (isProduction) {
        Sentry.addBreadcrumb({ category: "log", message, level: "error", data: context });
      }
      break;
  }
}

function withContext(base: LogContext): Logger {
  return {
    debug: (message, context) => log("debug", message, { ...base, ...context }),
    info: (message, context) => log("info", message, { ...base, ...context }),
    warn: (message, context) => log("warn", message, { ...base, ...context }),
    error: (message, context) => log("error", message, { ...base, ...context }),
  };
}

/**
 * Default logger instance.
 */
export const logger: Logger = withContext({});

/**
 * Logger for one digest run. Pass it to every component the run builds so each
 * line carries the same runId.
 */
export function createRunLogger(context: { runId: string; mode: "send" | "preview" }): Logger {
  return withContext(context);
}
