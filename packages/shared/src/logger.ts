import { appendFileSync } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  service?: string;
  videoId?: string;
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function getConfiguredLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

function shouldLog(level: LogLevel): boolean {
  const configuredLevel = getConfiguredLevel();
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

function formatEntry(
  level: LogLevel,
  message: string,
  defaultContext?: LogContext,
  callContext?: LogContext,
): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...defaultContext,
    ...callContext,
  };
}

/**
 * Writes one serialized entry. When `LOG_FILE` is set every level is appended
 * to that file, which keeps the terminal free for live progress output.
 */
function writeEntry(level: LogLevel, json: string): void {
  const logFile = process.env.LOG_FILE;
  if (logFile) {
    appendFileSync(logFile, json + "\n", "utf-8");
    return;
  }

  if (level === "error") {
    process.stderr.write(json + "\n");
  } else {
    process.stdout.write(json + "\n");
  }
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export function createLogger(defaultContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level)) {
      return;
    }

    const entry = formatEntry(level, message, defaultContext, context);
    writeEntry(level, JSON.stringify(entry));
  }

  return {
    debug(message: string, context?: LogContext): void {
      log("debug", message, context);
    },
    info(message: string, context?: LogContext): void {
      log("info", message, context);
    },
    warn(message: string, context?: LogContext): void {
      log("warn", message, context);
    },
    error(message: string, context?: LogContext): void {
      log("error", message, context);
    },
    child(context: LogContext): Logger {
      const mergedContext = { ...defaultContext, ...context };
      return createLogger(mergedContext);
    },
  };
}

export const logger = createLogger({ service: "watch-audit" });
