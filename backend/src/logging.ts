// backend/src/logging.ts
// Structured JSON-line logging

export interface LogContext {
  service: string;
}

export interface Logger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
}

function writeLog(
  level: "info" | "warn" | "error",
  message: string,
  context: LogContext,
  meta?: Record<string, unknown>
) {
  const payload = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...context,
    ...(meta || {}),
  };

  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(context: LogContext): Logger {
  return {
    info: (message, meta) => writeLog("info", message, context, meta),
    warn: (message, meta) => writeLog("warn", message, context, meta),
    error: (message, meta) => writeLog("error", message, context, meta),
  };
}

export function sanitizeError(error: unknown) {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: "Unknown error", detail: String(error) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
