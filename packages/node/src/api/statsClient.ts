/**
 * packages/node/src/api/statsClient.ts — HTTP client for the appliance's
 * statistics API (v6 layout).
 *
 *   POST /auth                                  { password } -> { session: { sid } }
 *   GET  /stats/summary
 *   GET  /history
 *   GET  /stats/top_domains?blocked=true&count=N
 *   GET  /stats/top_clients?count=N
 *
 * Authenticated requests carry the session id in a `sid` header. A 401
 * triggers one re-authentication and one retry. Every public call resolves:
 * network, HTTP and shape errors produce the matching EMPTY_* value.
 */

import {
  DashboardError,
  EMPTY_HISTORY,
  EMPTY_SUMMARY,
  EMPTY_TOP_LIST,
  type HistoryPoint,
  type Logger,
  type StatisticsClient,
  type Summary,
  type TopEntry,
  type TopList,
  describeError,
  silentLogger,
} from "@dnsboard/core";

export const REQUEST_TIMEOUT_MS = 5000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type StatsClientOptions = Readonly<{
  baseUrl: string;
  password: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  logger?: Logger;
}>;

type JsonRecord = Readonly<Record<string, unknown>>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function num(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return 0;
}

function str(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function normalizeSummary(body: unknown): Summary {
  if (!isRecord(body)) return EMPTY_SUMMARY;
  const queries = field(body, "queries");
  const blocking = body.blocking;
  return Object.freeze({
    totalQueries: num(field(queries, "total")),
    blocked: num(field(queries, "blocked")),
    percentBlocked: num(field(queries, "percent_blocked")),
    activeClients: num(field(field(body, "clients"), "active")),
    domainsBlocked: num(field(field(body, "gravity"), "domains_being_blocked")),
    enabled:
      typeof blocking === "boolean"
        ? blocking
        : typeof blocking === "string"
          ? blocking === "enabled"
          : true,
  });
}

export function normalizeHistory(body: unknown): readonly HistoryPoint[] {
  const history = field(body, "history");
  if (!Array.isArray(history)) return EMPTY_HISTORY;
  const points: HistoryPoint[] = [];
  for (const item of history) {
    if (!isRecord(item)) continue;
    points.push(
      Object.freeze({
        timestamp: num(item.timestamp),
        total: num(item.total),
        blocked: num(item.blocked),
      }),
    );
  }
  return Object.freeze(points);
}

function normalizeTop(
  body: unknown,
  listKey: string,
  label: (item: JsonRecord) => string,
): TopList {
  const items = field(body, listKey);
  if (!Array.isArray(items)) return EMPTY_TOP_LIST;
  const entries: TopEntry[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    entries.push(Object.freeze({ label: label(item), count: num(item.count) }));
  }
  return Object.freeze(entries);
}

export function normalizeTopBlocked(body: unknown): TopList {
  return normalizeTop(body, "domains", (item) => str(item.domain) ?? "unknown");
}

export function normalizeTopClients(body: unknown): TopList {
  return normalizeTop(body, "clients", (item) => str(item.name) ?? str(item.ip) ?? "unknown");
}

export interface StatsHttpClient extends StatisticsClient {
  /** Current session id; null before authentication or without a password. */
  sessionId(): string | null;
}

export function createStatsClient(opts: StatsClientOptions): StatsHttpClient {
  const doFetch = opts.fetch ?? fetch;
  const timeoutMs = opts.timeoutMs ?? REQUEST_TIMEOUT_MS;
  const logger = (opts.logger ?? silentLogger).child("stats-api");
  const baseUrl = opts.baseUrl.replace(/\/+$/, "");
  let sid: string | null = null;
  let attemptedAuth = false;

  const authenticate = async (): Promise<void> => {
    attemptedAuth = true;
    if (opts.password === "") return;
    try {
      const response = await doFetch(`${baseUrl}/auth`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ password: opts.password }),
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (response.status !== 200) {
        logger.warn("authentication rejected", { status: response.status });
        return;
      }
      sid = str(field(field(await response.json(), "session"), "sid"));
    } catch (error: unknown) {
      logger.warn("authentication failed", { error: describeError(error) });
    }
  };

  const request = (endpoint: string): Promise<Response> => {
    const headers: Record<string, string> = {};
    if (sid !== null) headers.sid = sid;
    return doFetch(`${baseUrl}${endpoint}`, {
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });
  };

  /** Parsed JSON body, or null on any failure. */
  const get = async (endpoint: string): Promise<unknown> => {
    try {
      if (!attemptedAuth) await authenticate();
      let response = await request(endpoint);
      if (response.status === 401) {
        await authenticate();
        response = await request(endpoint);
      }
      if (response.status !== 200) {
        throw new DashboardError("FETCH_FAILED", `HTTP ${response.status}`);
      }
      return await response.json();
    } catch (error: unknown) {
      logger.warn("statistics request failed", { endpoint, error: describeError(error) });
      return null;
    }
  };

  return {
    sessionId() {
      return sid;
    },
    async getSummary() {
      return normalizeSummary(await get("/stats/summary"));
    },
    async getHistory() {
      return normalizeHistory(await get("/history"));
    },
    async getTopBlocked(count) {
      return normalizeTopBlocked(await get(`/stats/top_domains?blocked=true&count=${count}`));
    },
    async getTopClients(count) {
      return normalizeTopClients(await get(`/stats/top_clients?count=${count}`));
    },
  };
}
