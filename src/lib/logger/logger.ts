import type { LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  /** Human-readable lines instead of JSON (development) */
  pretty?: boolean;
  /** Static fields merged into every entry's context */
  bindings?: Record<string, unknown>;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
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

const errorCode = (error: Error): string | undefined =>
  "code" in error && typeof error.code === "string" ? error.code : undefined;

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => {
  const code = error ? errorCode(error) : undefined;
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context && Object.keys(context).length > 0 && { context }),
    ...(error && {
      error: {
        name: error.name,
        message: error.message,
        ...(code && { code }),
        ...(error.stack && { stack: error.stack }),
      },
    }),
  };
};

const formatLog = (entry: LogEntry, pretty: boolean): string => {
  if (pretty) {
    const context = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const error = entry.error ? ` (${entry.error.name}: ${entry.error.message})` : "";
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${context}${error}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  /** Derive a logger whose entries always carry the given fields */
  child: (bindings: Record<string, unknown>) => Logger;
}

export const createLogger = (loggerConfig: LoggerConfig = { level: "info" }): Logger => {
  const { level, pretty = false, bindings } = loggerConfig;

  const withBindings = (context?: Record<string, unknown>): Record<string, unknown> | undefined =>
    bindings ? { ...bindings, ...context } : context;

  return {
    debug: (message, context): void => {
      if (shouldLog("debug", level)) {
        console.log(formatLog(createLogEntry("debug", message, withBindings(context)), pretty));
      }
    },

    info: (message, context): void => {
      if (shouldLog("info", level)) {
        console.log(formatLog(createLogEntry("info", message, withBindings(context)), pretty));
      }
    },

    warn: (message, context): void => {
      if (shouldLog("warn", level)) {
        console.warn(formatLog(createLogEntry("warn", message, withBindings(context)), pretty));
      }
    },

    error: (message, error, context): void => {
      if (shouldLog("error", level)) {
        console.error(
          formatLog(createLogEntry("error", message, withBindings(context), error), pretty),
        );
      }
    },

    child: (childBindings): Logger =>
      createLogger({ level, pretty, bindings: { ...bindings, ...childBindings } }),
  };
};

/**
 * Normalise an unknown thrown value for `logger.error`.
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
