/**
 * @nlroute/logger
 *
 * Structured JSON logging with per-component context and level filtering
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LogContext {
  component: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Entries below this level are dropped (default: "info") */
  level?: LogLevel;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(fields: Partial<LogContext>): Logger;
}

type EntryLevel = Exclude<LogLevel, "silent">;

interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a structured logger for a component
 */
export function createLogger(context: LogContext, options: LoggerOptions = {}): Logger {
  const threshold = options.level ?? "info";

  const enabled = (level: EntryLevel): boolean => LEVEL_RANK[level] >= LEVEL_RANK[threshold];

  const formatLog = (
    level: EntryLevel,
    message: string,
    meta?: Record<string, unknown>
  ): string => {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: context.component,
      message,
      ...Object.fromEntries(
        Object.entries(context).filter(([key]) => key !== "component")
      ),
      ...meta,
    };
    return JSON.stringify(entry, (_key, value: unknown) =>
      typeof value === "bigint" ? value.toString() : value
    );
  };

  return {
    level: threshold,
    debug: (msg, meta) => {
      if (enabled("debug")) console.debug(formatLog("debug", msg, meta));
    },
    info: (msg, meta) => {
      if (enabled("info")) console.info(formatLog("info", msg, meta));
    },
    warn: (msg, meta) => {
      if (enabled("warn")) console.warn(formatLog("warn", msg, meta));
    },
    error: (msg, meta) => {
      if (enabled("error")) console.error(formatLog("error", msg, meta));
    },
    child: (fields) =>
      createLogger(
        { ...context, ...fields, component: fields.component ?? context.component },
        { level: threshold }
      ),
  };
}
