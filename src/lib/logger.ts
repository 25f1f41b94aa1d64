export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function resolveThreshold(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }

  return "info";
}

let threshold: LogLevel = resolveThreshold();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }

  const payload = {
    ts: new Date().toISOString(),
    level,
    message,
    ...(context ?? {})
  };

  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
    return;
  }

  console.log(line);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const logger = {
  debug: (message: string, context?: LogContext): void => log("debug", message, context),
  info: (message: string, context?: LogContext): void => log("info", message, context),
  warn: (message: string, context?: LogContext): void => log("warn", message, context),
  error: (message: string, context?: LogContext): void => log("error", message, context)
};
