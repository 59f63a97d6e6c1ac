/**
 * packages/node/src/metrics/systemMetrics.ts — Local host metrics.
 *
 * Every field is read independently; a field that cannot be read keeps its
 * empty value (0 or "N/A") and never fails the whole sample.
 */

import { statfs as fsStatfs } from "node:fs/promises";
import { hostname as osHostname, networkInterfaces as osNetworkInterfaces } from "node:os";
import {
  EMPTY_SYSTEM_METRICS,
  type Logger,
  type SystemMetrics,
  type SystemMetricsSource,
  describeError,
  silentLogger,
} from "@dnsboard/core";
import { readInt, readTrimmed, underRoot } from "../power/sysfs.js";

export const FAN_RPM_PATHS = Object.freeze([
  "/sys/devices/platform/cooling_fan/hwmon/hwmon2/fan1_input",
  "/sys/devices/platform/cooling_fan/hwmon/hwmon3/fan1_input",
  "/sys/devices/platform/cooling_fan/hwmon/hwmon1/fan1_input",
] as const);

const GIB = 1024 ** 3;

export type CpuSample = Readonly<{ idle: number; total: number }>;

export type DiskUsage = Readonly<{ usedGb: number; totalGb: number }>;

type InterfaceAddress = Readonly<{ family: string | number; address: string; internal: boolean }>;

export type SystemMetricsOptions = Readonly<{
  root?: string;
  logger?: Logger;
  /** Disk usage of the root filesystem. */
  disk?: () => Promise<DiskUsage>;
  interfaces?: () => Readonly<Record<string, readonly InterfaceAddress[] | undefined>>;
  fallbackHostname?: () => string;
}>;

/** First line of /proc/stat; idle is the fourth counter. */
export function parseCpuSample(stat: string): CpuSample | null {
  const line = stat.split("\n", 1)[0] ?? "";
  const fields = line.trim().split(/\s+/);
  if (fields[0] !== "cpu") return null;
  const counters = fields.slice(1).map((f) => Number.parseInt(f, 10));
  const idle = counters[3];
  if (idle === undefined || counters.some((n) => !Number.isFinite(n))) return null;
  return Object.freeze({ idle, total: counters.reduce((sum, n) => sum + n, 0) });
}

/** Busy percent between two samples; null when no time passed. */
export function cpuPercentBetween(previous: CpuSample, current: CpuSample): number | null {
  const totalDelta = current.total - previous.total;
  if (totalDelta <= 0) return null;
  const idleDelta = current.idle - previous.idle;
  return 100 * (1 - idleDelta / totalDelta);
}

/** MemTotal and MemTotal - MemAvailable, in MB. */
export function parseMeminfo(text: string): Readonly<{ usedMb: number; totalMb: number }> {
  const kb = new Map<string, number>();
  for (const line of text.split("\n")) {
    const match = /^(\w+):\s+(\d+)/.exec(line);
    if (match?.[1] && match[2]) kb.set(match[1], Number(match[2]));
  }
  const totalMb = (kb.get("MemTotal") ?? 0) / 1024;
  const availableMb = (kb.get("MemAvailable") ?? 0) / 1024;
  return Object.freeze({ usedMb: totalMb - availableMb, totalMb });
}

export function firstIpv4(
  interfaces: Readonly<Record<string, readonly InterfaceAddress[] | undefined>>,
): string | null {
  for (const addresses of Object.values(interfaces)) {
    for (const entry of addresses ?? []) {
      const v4 = entry.family === "IPv4" || entry.family === 4;
      if (v4 && !entry.internal) return entry.address;
    }
  }
  return null;
}

async function rootDiskUsage(): Promise<DiskUsage> {
  const stats = await fsStatfs("/");
  const totalBytes = stats.blocks * stats.bsize;
  const freeBytes = stats.bfree * stats.bsize;
  return Object.freeze({ usedGb: (totalBytes - freeBytes) / GIB, totalGb: totalBytes / GIB });
}

export function createSystemMetricsSource(opts: SystemMetricsOptions = {}): SystemMetricsSource {
  const root = opts.root ?? "";
  const logger = opts.logger ?? silentLogger;
  const disk = opts.disk ?? rootDiskUsage;
  const interfaces = opts.interfaces ?? osNetworkInterfaces;
  const fallbackHostname = opts.fallbackHostname ?? osHostname;
  const path = (p: string) => underRoot(root, p);

  let lastCpu: CpuSample | null = null;
  let lastCpuPercent = 0;

  async function field<T>(name: string, fallback: T, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error: unknown) {
      logger.debug("system metric unavailable", { metric: name, error: describeError(error) });
      return fallback;
    }
  }

  const readCpu = async (): Promise<number> => {
    const sample = parseCpuSample(await readTrimmed(path("/proc/stat")));
    if (sample === null) throw new Error("unrecognised /proc/stat");
    if (lastCpu !== null) {
      lastCpuPercent = cpuPercentBetween(lastCpu, sample) ?? lastCpuPercent;
    }
    lastCpu = sample;
    return lastCpuPercent;
  };

  const readFan = async (): Promise<number> => {
    for (const fanPath of FAN_RPM_PATHS) {
      try {
        return await readInt(path(fanPath));
      } catch (error: unknown) {
        logger.debug("fan sensor unavailable", { path: fanPath, error: describeError(error) });
      }
    }
    return 0;
  };

  return {
    async read(): Promise<SystemMetrics> {
      const empty = EMPTY_SYSTEM_METRICS;
      const cpuPercent = await field("cpu", lastCpuPercent, readCpu);
      const mem = await field("memory", { usedMb: 0, totalMb: 0 }, async () =>
        parseMeminfo(await readTrimmed(path("/proc/meminfo"))),
      );
      const diskUsage = await field("disk", { usedGb: 0, totalGb: 0 }, disk);
      const temperatureC = await field(
        "temperature",
        empty.temperatureC,
        async () => (await readInt(path("/sys/class/thermal/thermal_zone0/temp"))) / 1000,
      );
      const uptimeSeconds = await field("uptime", empty.uptimeSeconds, async () => {
        const first = (await readTrimmed(path("/proc/uptime"))).split(/\s+/)[0];
        const seconds = Number(first);
        if (!Number.isFinite(seconds)) throw new Error("unrecognised /proc/uptime");
        return seconds;
      });
      const ipAddress = await field(
        "ip",
        empty.ipAddress,
        async () => firstIpv4(interfaces()) ?? empty.ipAddress,
      );
      const hostname = await field("hostname", empty.hostname, async () => {
        try {
          const name = await readTrimmed(path("/etc/hostname"));
          if (name.length > 0) return name;
        } catch (error: unknown) {
          logger.debug("hostname file unavailable", { error: describeError(error) });
        }
        return fallbackHostname() || empty.hostname;
      });
      const fanRpm = await field("fan", empty.fanRpm, readFan);

      return Object.freeze({
        cpuPercent,
        memUsedMb: mem.usedMb,
        memTotalMb: mem.totalMb,
        diskUsedGb: diskUsage.usedGb,
        diskTotalGb: diskUsage.totalGb,
        temperatureC,
        uptimeSeconds,
        ipAddress,
        hostname,
        fanRpm,
      });
    },
  };
}
