/**
 * packages/core/src/scheduler/refreshScheduler.ts — Per-class refresh cadence.
 *
 * Each data class owns an interval, the time of its last fetch and the last
 * value the fetch produced. `tick(now)` fetches every class whose interval
 * has elapsed (`now - lastFetch > interval`), one after another.
 *
 * Failure model:
 *   - a fetch that resolves (even to an empty sentinel) replaces the cache
 *   - a fetch that rejects keeps the previous cache
 *   - in both cases `lastFetch` moves to `now`; the class is not retried
 *     until its interval elapses again
 */

import { describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

export type RefreshClassSpec<T> = Readonly<{
  intervalMs: number;
  initial: T;
  fetch: () => Promise<T>;
}>;

/** Typed view of one registered data class. */
export interface RefreshHandle<T> {
  readonly name: string;
  readonly value: T;
  readonly intervalMs: number;
  /** Time of the last fetch attempt; -Infinity before the first. */
  readonly lastFetchMs: number;
  setInterval(intervalMs: number): void;
}

export interface RefreshScheduler {
  register<T>(name: string, spec: RefreshClassSpec<T>): RefreshHandle<T>;
  /** Fetch every due class. Resolves to the names that were fetched. */
  tick(nowMs: number): Promise<readonly string[]>;
  names(): readonly string[];
}

type Slot = Readonly<{
  name: string;
  due(nowMs: number): boolean;
  refresh(nowMs: number): Promise<void>;
}>;

function sanitizeInterval(intervalMs: number): number {
  if (!Number.isFinite(intervalMs) || intervalMs < 0) return 0;
  return intervalMs;
}

class RefreshSlot<T> implements RefreshHandle<T>, Slot {
  readonly name: string;
  private cached: T;
  private interval: number;
  private last = Number.NEGATIVE_INFINITY;
  private readonly fetcher: () => Promise<T>;
  private readonly logger: Logger;

  constructor(name: string, spec: RefreshClassSpec<T>, logger: Logger) {
    this.name = name;
    this.cached = spec.initial;
    this.interval = sanitizeInterval(spec.intervalMs);
    this.fetcher = spec.fetch;
    this.logger = logger;
  }

  get value(): T {
    return this.cached;
  }

  get intervalMs(): number {
    return this.interval;
  }

  get lastFetchMs(): number {
    return this.last;
  }

  setInterval(intervalMs: number): void {
    this.interval = sanitizeInterval(intervalMs);
  }

  due(nowMs: number): boolean {
    return nowMs - this.last > this.interval;
  }

  async refresh(nowMs: number): Promise<void> {
    this.last = nowMs;
    try {
      this.cached = await this.fetcher();
    } catch (error: unknown) {
      this.logger.warn("refresh failed, keeping cached value", {
        dataClass: this.name,
        error: describeError(error),
      });
    }
  }
}

export function createRefreshScheduler(
  opts: Readonly<{ logger?: Logger }> = {},
): RefreshScheduler {
  const logger = opts.logger ?? silentLogger;
  const slots: Slot[] = [];

  return {
    register<T>(name: string, spec: RefreshClassSpec<T>): RefreshHandle<T> {
      if (slots.some((slot) => slot.name === name)) {
        throw new Error(`refresh class already registered: ${name}`);
      }
      const slot = new RefreshSlot(name, spec, logger);
      slots.push(slot);
      return slot;
    },
    async tick(nowMs) {
      const fetched: string[] = [];
      for (const slot of slots) {
        if (!slot.due(nowMs)) continue;
        await slot.refresh(nowMs);
        fetched.push(slot.name);
      }
      return Object.freeze(fetched);
    },
    names() {
      return Object.freeze(slots.map((slot) => slot.name));
    },
  };
}
