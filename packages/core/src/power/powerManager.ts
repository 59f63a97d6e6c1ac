/**
 * packages/core/src/power/powerManager.ts — Awake/Asleep display state.
 *
 * Sleep runs every strategy in list order, wake runs them in reverse. The
 * state flips regardless of how many strategies worked: rendering stops on
 * sleep even when no hardware could be blanked.
 */

import { describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { DisplayPowerStrategy, PowerState, SavedBrightness, StrategyOutcome } from "./types.js";

export interface PowerManager {
  state(): PowerState;
  isAsleep(): boolean;
  recordActivity(nowMs: number): void;
  /** Idle beyond `timeoutMinutes` while awake; a timeout of 0 never sleeps. */
  shouldSleep(nowMs: number, timeoutMinutes: number): boolean;
  /** Blank the display. Resolves to false when already asleep. */
  sleep(): Promise<boolean>;
  /** Unblank the display. Resolves to false when already awake. */
  wake(): Promise<boolean>;
}

export type CreatePowerManagerOptions = Readonly<{
  strategies: readonly DisplayPowerStrategy[];
  now: () => number;
  logger?: Logger;
}>;

async function attempt(run: () => Promise<StrategyOutcome>): Promise<StrategyOutcome> {
  try {
    return await run();
  } catch (error: unknown) {
    return Object.freeze({ ok: false, reason: describeError(error) });
  }
}

export function createPowerManager(opts: CreatePowerManagerOptions): PowerManager {
  const logger = opts.logger ?? silentLogger;
  let current: PowerState = Object.freeze({
    asleep: false,
    savedBrightness: null,
    activeStrategy: null,
    lastActivityMs: opts.now(),
  });
  // In-flight transitions are tracked so overlapping calls stay idempotent.
  let transition: Promise<boolean> | null = null;

  const runSleep = async (): Promise<boolean> => {
    let saved: SavedBrightness | null = null;
    let succeeded = 0;
    for (const strategy of opts.strategies) {
      const outcome = await attempt(() => strategy.sleep());
      if (outcome.ok) {
        succeeded += 1;
        if (outcome.saved && saved === null) saved = outcome.saved;
        logger.debug("display sleep strategy succeeded", { strategy: strategy.name });
      } else {
        logger.debug("display sleep strategy unavailable", {
          strategy: strategy.name,
          reason: outcome.reason,
        });
      }
    }

    current = Object.freeze({
      ...current,
      asleep: true,
      savedBrightness: saved?.value ?? null,
      activeStrategy: saved?.path ?? null,
    });

    if (succeeded > 0) {
      logger.info("display sleeping", { strategies: succeeded });
    } else {
      logger.warn("display sleep: no working method found");
    }
    return true;
  };

  const runWake = async (): Promise<boolean> => {
    const saved: SavedBrightness | null =
      current.activeStrategy !== null && current.savedBrightness !== null
        ? Object.freeze({ path: current.activeStrategy, value: current.savedBrightness })
        : null;

    for (const strategy of [...opts.strategies].reverse()) {
      const outcome = await attempt(() => strategy.wake(saved));
      if (outcome.ok) {
        logger.debug("display wake strategy succeeded", { strategy: strategy.name });
      } else {
        logger.debug("display wake strategy unavailable", {
          strategy: strategy.name,
          reason: outcome.reason,
        });
      }
    }

    current = Object.freeze({
      asleep: false,
      savedBrightness: null,
      activeStrategy: null,
      lastActivityMs: opts.now(),
    });
    logger.info("display waking");
    return true;
  };

  const serialize = (run: () => Promise<boolean>): Promise<boolean> => {
    const next = (transition ?? Promise.resolve(true)).then(run);
    transition = next;
    return next.finally(() => {
      if (transition === next) transition = null;
    });
  };

  return {
    state() {
      return current;
    },
    isAsleep() {
      return current.asleep;
    },
    recordActivity(nowMs) {
      current = Object.freeze({ ...current, lastActivityMs: nowMs });
    },
    shouldSleep(nowMs, timeoutMinutes) {
      if (timeoutMinutes <= 0 || current.asleep) return false;
      return nowMs - current.lastActivityMs > timeoutMinutes * 60_000;
    },
    sleep() {
      return serialize(() => (current.asleep ? Promise.resolve(false) : runSleep()));
    },
    wake() {
      return serialize(() => (current.asleep ? runWake() : Promise.resolve(false)));
    },
  };
}
