import { readFileSync } from "node:fs";
import { join } from "node:path";
import { createLogger } from "@dnsboard/core";
import { assert, describe, test, withTempDir } from "@dnsboard/testkit";
import {
  createFileSink,
  createLoggerFromEnv,
  createStreamSink,
  formatLogLine,
} from "../logging/logSinks.js";

function collector() {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string) => chunks.push(chunk) };
}

describe("log sinks", () => {
  test("formatLogLine flattens fields after ts, level and msg", () => {
    const line = formatLogLine({
      ts: 0,
      level: "warn",
      message: "statistics request failed",
      fields: { endpoint: "/history", status: 502 },
    });
    assert.equal(
      line,
      '{"ts":"1970-01-01T00:00:00.000Z","level":"warn","msg":"statistics request failed","endpoint":"/history","status":502}',
    );
  });

  test("stream sink writes one line per record", () => {
    const out = collector();
    const logger = createLogger({ sink: createStreamSink(out), now: () => 1000 });
    logger.info("started");
    logger.child("power").warn("no strategy succeeded");
    assert.deepEqual(out.chunks, [
      '{"ts":"1970-01-01T00:00:01.000Z","level":"info","msg":"started"}\n',
      '{"ts":"1970-01-01T00:00:01.000Z","level":"warn","msg":"no strategy succeeded","scope":"power"}\n',
    ]);
  });

  test("file sink appends NDJSON and creates the directory", async () => {
    await withTempDir((dir) => {
      const path = join(dir, "logs", "dash.ndjson");
      const logger = createLogger({ sink: createFileSink(path), now: () => 0 });
      logger.info("one");
      logger.error("two", { code: "IO_FAILED" });
      const lines = readFileSync(path, "utf8").trimEnd().split("\n");
      assert.equal(lines.length, 2);
      assert.deepEqual(JSON.parse(lines[1] ?? ""), {
        ts: "1970-01-01T00:00:00.000Z",
        level: "error",
        msg: "two",
        code: "IO_FAILED",
      });
    });
  });

  test("file sink failures do not throw", async () => {
    await withTempDir((dir) => {
      const sink = createFileSink(dir);
      assert.doesNotThrow(() => sink({ ts: 0, level: "info", message: "x", fields: {} }));
    });
  });

  test("createLoggerFromEnv honours DNSBOARD_LOG=- and the level", () => {
    const err = collector();
    const logger = createLoggerFromEnv({
      env: { DNSBOARD_LOG: "-", DNSBOARD_LOG_LEVEL: "WARN" },
      stderr: err,
    });
    logger.info("hidden");
    logger.warn("shown");
    assert.equal(err.chunks.length, 1);
    assert.match(err.chunks[0] ?? "", /"msg":"shown"/);
  });

  test("an unknown level falls back to info", () => {
    const err = collector();
    const logger = createLoggerFromEnv({
      env: { DNSBOARD_LOG: "-", DNSBOARD_LOG_LEVEL: "verbose" },
      stderr: err,
    });
    logger.debug("hidden");
    logger.info("shown");
    assert.equal(err.chunks.length, 1);
  });
});
