import { EMPTY_HISTORY, EMPTY_SUMMARY, EMPTY_TOP_LIST, createLogger } from "@dnsboard/core";
import { createMemorySink } from "@dnsboard/core/testing";
import { assert, describe, test } from "@dnsboard/testkit";
import {
  type FetchLike,
  createStatsClient,
  normalizeHistory,
  normalizeSummary,
  normalizeTopBlocked,
  normalizeTopClients,
} from "../api/statsClient.js";

type Call = Readonly<{ url: string; method: string; sid: string | null; body: string | null }>;

type Reply = Readonly<{ status: number; body?: unknown }>;

/** In-process stand-in for the appliance API: replies are consumed in order. */
function fakeApi(replies: Reply[]) {
  const calls: Call[] = [];
  const fetch: FetchLike = async (url, init) => {
    const headers = new Headers(init?.headers);
    calls.push({
      url,
      method: init?.method ?? "GET",
      sid: headers.get("sid"),
      body: typeof init?.body === "string" ? init.body : null,
    });
    const reply = replies.shift();
    if (!reply) throw new Error(`unexpected request ${url}`);
    return new Response(JSON.stringify(reply.body ?? {}), {
      status: reply.status,
      headers: { "content-type": "application/json" },
    });
  };
  return { calls, fetch };
}

const AUTH_OK: Reply = { status: 200, body: { session: { valid: true, sid: "sid-1" } } };

const SUMMARY_BODY = {
  queries: { total: 12345, blocked: 2345, percent_blocked: 19.0 },
  clients: { active: 7 },
  gravity: { domains_being_blocked: 120000 },
};

describe("stats response normalizers", () => {
  test("summary maps nested fields", () => {
    assert.deepEqual(normalizeSummary(SUMMARY_BODY), {
      totalQueries: 12345,
      blocked: 2345,
      percentBlocked: 19,
      activeClients: 7,
      domainsBlocked: 120000,
      enabled: true,
    });
  });

  test("summary blocking flag accepts booleans and status strings", () => {
    assert.equal(normalizeSummary({ blocking: false }).enabled, false);
    assert.equal(normalizeSummary({ blocking: "disabled" }).enabled, false);
    assert.equal(normalizeSummary({ blocking: "enabled" }).enabled, true);
    assert.equal(normalizeSummary(null), EMPTY_SUMMARY);
  });

  test("history keeps well-formed points", () => {
    assert.deepEqual(
      normalizeHistory({
        history: [{ timestamp: 100, total: 50, blocked: 5 }, "junk", { timestamp: 700, total: "8" }],
      }),
      [
        { timestamp: 100, total: 50, blocked: 5 },
        { timestamp: 700, total: 8, blocked: 0 },
      ],
    );
    assert.equal(normalizeHistory({}), EMPTY_HISTORY);
  });

  test("top lists keep order and fall back on labels", () => {
    assert.deepEqual(
      normalizeTopBlocked({ domains: [{ domain: "ads.example.com", count: 40 }, { count: 3 }] }),
      [
        { label: "ads.example.com", count: 40 },
        { label: "unknown", count: 3 },
      ],
    );
    assert.deepEqual(
      normalizeTopClients({
        clients: [
          { name: "laptop", ip: "10.0.0.2", count: 9 },
          { name: "", ip: "10.0.0.3", count: 4 },
          { count: 1 },
        ],
      }),
      [
        { label: "laptop", count: 9 },
        { label: "10.0.0.3", count: 4 },
        { label: "unknown", count: 1 },
      ],
    );
    assert.equal(normalizeTopClients({ clients: "nope" }), EMPTY_TOP_LIST);
  });
});

describe("stats client", () => {
  test("authenticates once, then sends the session id", async () => {
    const api = fakeApi([AUTH_OK, { status: 200, body: SUMMARY_BODY }, { status: 200, body: {} }]);
    const client = createStatsClient({
      baseUrl: "http://pi.hole/api/",
      password: "test-secret",
      fetch: api.fetch,
    });
    assert.equal((await client.getSummary()).totalQueries, 12345);
    await client.getHistory();
    assert.equal(client.sessionId(), "sid-1");
    assert.deepEqual(api.calls, [
      {
        url: "http://pi.hole/api/auth",
        method: "POST",
        sid: null,
        body: '{"password":"test-secret"}',
      },
      { url: "http://pi.hole/api/stats/summary", method: "GET", sid: "sid-1", body: null },
      { url: "http://pi.hole/api/history", method: "GET", sid: "sid-1", body: null },
    ]);
  });

  test("no password means no auth request", async () => {
    const api = fakeApi([{ status: 200, body: { domains: [] } }]);
    const client = createStatsClient({ baseUrl: "http://pi.hole/api", password: "", fetch: api.fetch });
    await client.getTopBlocked(5);
    assert.deepEqual(
      api.calls.map((c) => c.url),
      ["http://pi.hole/api/stats/top_domains?blocked=true&count=5"],
    );
    assert.equal(client.sessionId(), null);
  });

  test("a 401 re-authenticates and retries once", async () => {
    const api = fakeApi([
      AUTH_OK,
      { status: 401 },
      { status: 200, body: { session: { sid: "sid-2" } } },
      { status: 200, body: { clients: [{ ip: "10.0.0.9", count: 2 }] } },
    ]);
    const client = createStatsClient({
      baseUrl: "http://pi.hole/api",
      password: "test-secret",
      fetch: api.fetch,
    });
    assert.deepEqual(await client.getTopClients(10), [{ label: "10.0.0.9", count: 2 }]);
    assert.deepEqual(
      api.calls.map((c) => `${c.method} ${c.url.replace("http://pi.hole/api", "")} ${c.sid}`),
      [
        "POST /auth null",
        "GET /stats/top_clients?count=10 sid-1",
        "POST /auth null",
        "GET /stats/top_clients?count=10 sid-2",
      ],
    );
  });

  test("failures resolve to empty values and are logged", async () => {
    const memory = createMemorySink();
    const api = fakeApi([{ status: 500 }]);
    const client = createStatsClient({
      baseUrl: "http://pi.hole/api",
      password: "",
      fetch: api.fetch,
      logger: createLogger({ sink: memory.sink }),
    });
    assert.equal(await client.getSummary(), EMPTY_SUMMARY);
    assert.equal(await client.getHistory(), EMPTY_HISTORY);
    assert.deepEqual(memory.messages("warn"), [
      "statistics request failed",
      "statistics request failed",
    ]);
    assert.equal(memory.records[0]?.fields.error, "DashboardError: HTTP 500");
    assert.equal(memory.records[1]?.fields.error, "Error: unexpected request http://pi.hole/api/history");
  });

  test("a rejected login leaves requests unauthenticated", async () => {
    const api = fakeApi([{ status: 403 }, { status: 200, body: SUMMARY_BODY }]);
    const client = createStatsClient({
      baseUrl: "http://pi.hole/api",
      password: "test-secret",
      fetch: api.fetch,
    });
    assert.equal((await client.getSummary()).activeClients, 7);
    assert.equal(api.calls[1]?.sid, null);
    assert.equal(client.sessionId(), null);
  });
});
