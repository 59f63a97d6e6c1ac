import { assert, describe, test } from "@dnsboard/testkit";
import { createLogger } from "../../logger.js";
import { createMemorySink } from "../../testing/index.js";
import { createRefreshScheduler } from "../refreshScheduler.js";

function counter(values: readonly number[] = []) {
  let calls = 0;
  return {
    get calls() {
      return calls;
    },
    fetch: async () => {
      calls += 1;
      return values[calls - 1] ?? calls;
    },
  };
}

describe("refresh scheduler", () => {
  test("fetches on the first tick, then only once the interval has elapsed", async () => {
    const scheduler = createRefreshScheduler();
    const source = counter();
    const handle = scheduler.register("summary", { intervalMs: 5000, initial: 0, fetch: source.fetch });

    assert.deepEqual(await scheduler.tick(0), ["summary"]);
    assert.equal(handle.lastFetchMs, 0);
    assert.deepEqual(await scheduler.tick(3000), []);
    assert.equal(source.calls, 1);
    assert.deepEqual(await scheduler.tick(6000), ["summary"]);
    assert.equal(source.calls, 2);
    assert.equal(handle.lastFetchMs, 6000);
    assert.equal(handle.value, 2);
  });

  test("an elapsed time equal to the interval is not yet due", async () => {
    const scheduler = createRefreshScheduler();
    const source = counter();
    scheduler.register("history", { intervalMs: 5000, initial: 0, fetch: source.fetch });
    await scheduler.tick(0);
    assert.deepEqual(await scheduler.tick(5000), []);
    assert.deepEqual(await scheduler.tick(5001), ["history"]);
  });

  test("classes keep independent cadences", async () => {
    const scheduler = createRefreshScheduler();
    const api = counter();
    const system = counter();
    scheduler.register("summary", { intervalMs: 5000, initial: 0, fetch: api.fetch });
    scheduler.register("system", { intervalMs: 2000, initial: 0, fetch: system.fetch });

    assert.deepEqual(await scheduler.tick(0), ["summary", "system"]);
    assert.deepEqual(await scheduler.tick(2500), ["system"]);
    assert.deepEqual(await scheduler.tick(5500), ["summary", "system"]);
    assert.deepEqual(scheduler.names(), ["summary", "system"]);
  });

  test("a rejected fetch keeps the cached value and waits a full interval", async () => {
    const mem = createMemorySink();
    const scheduler = createRefreshScheduler({ logger: createLogger({ sink: mem.sink }) });
    let fail = false;
    const handle = scheduler.register("top-blocked", {
      intervalMs: 1000,
      initial: "empty",
      fetch: async () => {
        if (fail) throw new Error("timeout");
        return "fresh";
      },
    });

    await scheduler.tick(0);
    assert.equal(handle.value, "fresh");
    fail = true;
    assert.deepEqual(await scheduler.tick(1500), ["top-blocked"]);
    assert.equal(handle.value, "fresh");
    assert.equal(handle.lastFetchMs, 1500);
    assert.deepEqual(await scheduler.tick(2000), []);
    assert.deepEqual(mem.messages("warn"), ["refresh failed, keeping cached value"]);
    assert.deepEqual(mem.records[0]?.fields, { dataClass: "top-blocked", error: "Error: timeout" });
  });

  test("a resolved empty sentinel replaces the cache", async () => {
    const scheduler = createRefreshScheduler();
    const results: string[][] = [["a"], []];
    const handle = scheduler.register("top-clients", {
      intervalMs: 10,
      initial: ["initial"],
      fetch: async () => results.shift() ?? [],
    });
    await scheduler.tick(0);
    assert.deepEqual(handle.value, ["a"]);
    await scheduler.tick(20);
    assert.deepEqual(handle.value, []);
  });

  test("setInterval changes the cadence from the last fetch", async () => {
    const scheduler = createRefreshScheduler();
    const source = counter();
    const handle = scheduler.register("summary", { intervalMs: 60_000, initial: 0, fetch: source.fetch });
    await scheduler.tick(0);
    assert.deepEqual(await scheduler.tick(6000), []);
    handle.setInterval(5000);
    assert.equal(handle.intervalMs, 5000);
    assert.deepEqual(await scheduler.tick(6000), ["summary"]);
  });

  test("duplicate names are rejected", () => {
    const scheduler = createRefreshScheduler();
    scheduler.register("summary", { intervalMs: 1, initial: 0, fetch: async () => 1 });
    assert.throws(
      () => scheduler.register("summary", { intervalMs: 1, initial: 0, fetch: async () => 1 }),
      /already registered: summary/,
    );
  });
});
