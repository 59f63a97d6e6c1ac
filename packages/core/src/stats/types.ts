/**
 * Data shapes delivered by the statistics client and the local metrics
 * source, plus the empty values they fall back to.
 */

export type Summary = Readonly<{
  totalQueries: number;
  blocked: number;
  percentBlocked: number;
  activeClients: number;
  domainsBlocked: number;
  /** Blocking switched on at the appliance. */
  enabled: boolean;
}>;

export type HistoryPoint = Readonly<{
  /** Bucket start, seconds since the epoch. */
  timestamp: number;
  total: number;
  blocked: number;
}>;

/** One row of a top-N list, ordered by descending count. */
export type TopEntry = Readonly<{ label: string; count: number }>;

export type TopList = readonly TopEntry[];

export type SystemMetrics = Readonly<{
  cpuPercent: number;
  memUsedMb: number;
  memTotalMb: number;
  diskUsedGb: number;
  diskTotalGb: number;
  temperatureC: number;
  uptimeSeconds: number;
  ipAddress: string;
  hostname: string;
  fanRpm: number;
}>;

/**
 * Remote statistics service. Every call resolves; network and auth failures
 * produce the matching EMPTY_* value.
 */
export interface StatisticsClient {
  getSummary(): Promise<Summary>;
  getHistory(): Promise<readonly HistoryPoint[]>;
  getTopBlocked(count: number): Promise<TopList>;
  getTopClients(count: number): Promise<TopList>;
}

/** Best-effort local metrics; unreadable fields are zero or "N/A". */
export interface SystemMetricsSource {
  read(): Promise<SystemMetrics>;
}

export const EMPTY_SUMMARY: Summary = Object.freeze({
  totalQueries: 0,
  blocked: 0,
  percentBlocked: 0,
  activeClients: 0,
  domainsBlocked: 0,
  enabled: false,
});

export const EMPTY_HISTORY: readonly HistoryPoint[] = Object.freeze([]);

export const EMPTY_TOP_LIST: TopList = Object.freeze([]);

export const EMPTY_SYSTEM_METRICS: SystemMetrics = Object.freeze({
  cpuPercent: 0,
  memUsedMb: 0,
  memTotalMb: 0,
  diskUsedGb: 0,
  diskTotalGb: 0,
  temperatureC: 0,
  uptimeSeconds: 0,
  ipAddress: "N/A",
  hostname: "N/A",
  fanRpm: 0,
});
