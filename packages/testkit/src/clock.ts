export type ManualClock = Readonly<{
  now: () => number;
  advance: (ms: number) => number;
  set: (ms: number) => void;
}>;

/** Deterministic clock for timing-sensitive tests. */
export function createManualClock(startMs = 0): ManualClock {
  let current = startMs;
  return Object.freeze({
    now: () => current,
    advance: (ms: number) => {
      current += ms;
      return current;
    },
    set: (ms: number) => {
      current = ms;
    },
  });
}
