/**
 * packages/node/src/logging/logSinks.ts — NDJSON log sinks.
 *
 * The terminal belongs to the dashboard, so records go to a file by default:
 *   DNSBOARD_LOG=/tmp/dnsboard.ndjson   (default)
 *   DNSBOARD_LOG=-                      stderr
 *   DNSBOARD_LOG_LEVEL=debug|info|warn|error
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import {
  type LogLevel,
  type LogRecord,
  type LogSink,
  type Logger,
  createLogger,
  isLogLevel,
} from "@dnsboard/core";

export const DEFAULT_LOG_PATH = "/tmp/dnsboard.ndjson";

export type LineWriter = Readonly<{ write: (chunk: string) => unknown }>;

export function formatLogLine(record: LogRecord): string {
  return JSON.stringify({
    ts: new Date(record.ts).toISOString(),
    level: record.level,
    msg: record.message,
    ...record.fields,
  });
}

export function createStreamSink(stream: LineWriter): LogSink {
  return (record) => {
    stream.write(`${formatLogLine(record)}\n`);
  };
}

export function createFileSink(path: string): LogSink {
  let ready = false;
  return (record) => {
    try {
      if (!ready) {
        mkdirSync(dirname(path), { recursive: true });
        ready = true;
      }
      appendFileSync(path, `${formatLogLine(record)}\n`, "utf8");
    } catch {
      // Logging must never affect runtime behavior.
    }
  };
}

export type LoggerFromEnvOptions = Readonly<{
  env: Readonly<Record<string, string | undefined>>;
  stderr?: LineWriter;
}>;

/** Build the process logger from DNSBOARD_LOG / DNSBOARD_LOG_LEVEL. */
export function createLoggerFromEnv(opts: LoggerFromEnvOptions): Logger {
  const target = opts.env.DNSBOARD_LOG?.trim() || DEFAULT_LOG_PATH;
  const levelRaw = opts.env.DNSBOARD_LOG_LEVEL?.trim().toLowerCase() ?? "";
  const minLevel: LogLevel = isLogLevel(levelRaw) ? levelRaw : "info";
  const sink =
    target === "-" ? createStreamSink(opts.stderr ?? process.stderr) : createFileSink(target);
  return createLogger({ sink, minLevel });
}
