type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// Read on every call so tests and long-lived callers can change LOG_LEVEL.
function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase() ?? "warn";
  return isLogLevel(configured) ? LOG_LEVELS[configured] : LOG_LEVELS.warn;
}

function formatLogEntry(entry: LogEntry): string {
  return JSON.stringify(entry);
}

// stdout carries extracted content, so every level goes to stderr.
function write(level: LogLevel, message: string, meta?: Record<string, unknown>, error?: unknown): void {
  if (LOG_LEVELS[level] < threshold()) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  };

  if (error instanceof Error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  } else if (error !== undefined) {
    entry.error = String(error);
  }

  console.error(formatLogEntry(entry));
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>): void {
    write("debug", message, meta);
  },

  info(message: string, meta?: Record<string, unknown>): void {
    write("info", message, meta);
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    write("warn", message, meta);
  },

  error(
    message: string,
    error?: Error | unknown,
    meta?: Record<string, unknown>
  ): void {
    write("error", message, meta, error);
  },
};
