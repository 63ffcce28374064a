/**
 * Lightweight logging utility.
 * Writes timestamped lines to the console and, optionally, to a log file.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogContext = Record<string, unknown>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Append entries to this file */
  file?: string;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger that tags every entry with the given request id. */
  child(requestId: string): Logger;
}

export function formatLogEntry(
  level: LogLevel,
  requestId: string | undefined,
  message: string,
  context?: LogContext,
  now: Date = new Date()
): string {
  const levelStr = level.toUpperCase().padEnd(5);
  let entry = `[${now.toISOString()}] [${levelStr}] [${requestId ?? "-"}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const toConsole = options.console ?? true;
  const file = options.file;

  if (file) {
    mkdirSync(dirname(file), { recursive: true });
  }

  function build(requestId: string | undefined): Logger {
    function log(entryLevel: LogLevel, message: string, context?: LogContext): void {
      if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) {
        return;
      }

      const entry = formatLogEntry(entryLevel, requestId, message, context);

      if (toConsole) {
        getConsoleMethod(entryLevel)(entry);
      }

      if (file) {
        try {
          appendFileSync(file, entry + "\n");
        } catch (err) {
          console.error(`Failed to write to log file: ${String(err)}`);
        }
      }
    }

    return {
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (childRequestId) => build(childRequestId)
    };
  }

  return build(undefined);
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ console: false });
