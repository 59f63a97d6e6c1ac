/**
 * packages/core/src/logger.ts — Leveled structured logger.
 *
 * Why: The terminal is owned by the dashboard, so log output cannot go to
 * stdout. Core code logs through this interface and the backend decides
 * where records land (an NDJSON file, stderr, or memory in tests).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFieldValue = string | number | boolean | null;

export type LogFields = Readonly<Record<string, LogFieldValue>>;

export type LogRecord = Readonly<{
  ts: number;
  level: LogLevel;
  message: string;
  fields: LogFields;
}>;

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Derive a logger that tags every record with `scope`. */
  child(scope: string): Logger;
}

export type CreateLoggerOptions = Readonly<{
  sink: LogSink;
  minLevel?: LogLevel;
  now?: () => number;
  fields?: LogFields;
}>;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
});

export function isLogLevel(value: string): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export function createLogger(opts: CreateLoggerOptions): Logger {
  const minRank = LEVEL_RANK[opts.minLevel ?? "info"];
  const now = opts.now ?? Date.now;
  const baseFields: LogFields = opts.fields ?? {};

  const emit = (level: LogLevel, message: string, fields: LogFields | undefined): void => {
    if (LEVEL_RANK[level] < minRank) return;
    opts.sink(
      Object.freeze({
        ts: now(),
        level,
        message,
        fields: Object.freeze({ ...baseFields, ...fields }),
      }),
    );
  };

  return Object.freeze({
    debug: (message: string, fields?: LogFields) => emit("debug", message, fields),
    info: (message: string, fields?: LogFields) => emit("info", message, fields),
    warn: (message: string, fields?: LogFields) => emit("warn", message, fields),
    error: (message: string, fields?: LogFields) => emit("error", message, fields),
    child: (scope: string) =>
      createLogger({ ...opts, fields: { ...baseFields, scope } }),
  });
}

/** Logger that drops every record. */
export const silentLogger: Logger = createLogger({ sink: () => {}, minLevel: "error" });
