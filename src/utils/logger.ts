import { env } from "../config/env.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LogContext {
  [key: string]: unknown;
}

// stdout carries command output (and `make --out -`), so every log line goes to stderr.
function emit(level: LogLevel, message: string, context: LogContext = {}): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[env.LOG_LEVEL]) {
    return;
  }

  const payload = {
    ts: new Date().toISOString(),
    level,
    message,
    ...context,
  };

  console.error(JSON.stringify(payload));
}

export const logger = {
  debug: (message: string, context?: LogContext) => emit("debug", message, context),
  info: (message: string, context?: LogContext) => emit("info", message, context),
  warn: (message: string, context?: LogContext) => emit("warn", message, context),
  error: (message: string, context?: LogContext) => emit("error", message, context),
};
