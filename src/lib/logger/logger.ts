import type { LogFormat, LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  /** "pretty" prints one readable line per entry, "json" one JSON object */
  format?: LogFormat;
  /** Context merged into every entry */
  context?: Record<string, unknown>;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean =>
  logLevels[level] >= logLevels[currentLevel];

const mergeContext = (
  base: Record<string, unknown> | undefined,
  extra: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined => {
  if (!base) return extra;
  if (!extra) return base;
  return { ...base, ...extra };
};

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => ({
  timestamp: new Date().toISOString(),
  level,
  message,
  ...(context && { context }),
  ...(error && {
    error: {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
    },
  }),
});

export const formatLog = (entry: LogEntry, format: LogFormat): string => {
  if (format === "pretty") {
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${
      entry.context ? ` ${JSON.stringify(entry.context)}` : ""
    }${entry.error ? ` ${entry.error.name}: ${entry.error.message}` : ""}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  /** Derive a logger whose entries always carry `context` */
  child: (context: Record<string, unknown>) => Logger;
}

export const createLogger = (loggerConfig: LoggerConfig): Logger => {
  const { level, format = "json", context: baseContext } = loggerConfig;

  const write = (
    entryLevel: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void => {
    if (!shouldLog(entryLevel, level)) return;
    const line = formatLog(
      createLogEntry(entryLevel, message, mergeContext(baseContext, context), error),
      format,
    );
    if (entryLevel === "error") {
      console.error(line);
    } else if (entryLevel === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, error, context) => write("error", message, context, error),
    child: (context) =>
      createLogger({ level, format, context: mergeContext(baseContext, context) }),
  };
};

/** Logger that drops every entry; the default for library code without a host logger */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

/** Normalize a caught value into an Error for `logger.error` */
export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
