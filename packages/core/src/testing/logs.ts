import type { LogLevel, LogRecord, LogSink } from "../logger.js";

export type MemorySink = Readonly<{
  sink: LogSink;
  records: readonly LogRecord[];
  messages(level?: LogLevel): readonly string[];
  clear(): void;
}>;

/** Log sink that keeps records in memory for assertions. */
export function createMemorySink(): MemorySink {
  const records: LogRecord[] = [];
  return {
    sink: (record) => {
      records.push(record);
    },
    records,
    messages(level) {
      return records
        .filter((record) => level === undefined || record.level === level)
        .map((record) => record.message);
    },
    clear() {
      records.length = 0;
    },
  };
}
