export interface LogContext {
  [key: string]: unknown;
}

function formatLog(level: string, message: string, context?: LogContext): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    service: "hs-classifier",
    message,
    ...context,
  });
}

function debugEnabled(): boolean {
  return process.env.LOG_LEVEL === "debug" || process.env.NODE_ENV !== "production";
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    console.log(formatLog("INFO", message, context));
  },

  warn: (message: string, context?: LogContext) => {
    console.warn(formatLog("WARN", message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? { message: error.message, name: error.name, stack: error.stack }
          : String(error),
    };
    console.error(formatLog("ERROR", message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (debugEnabled()) {
      console.debug(formatLog("DEBUG", message, context));
    }
  },
};
