/**
 * Animated counter: eases the shown value from where it was toward a new
 * target over a fixed duration.
 */

export const COUNTER_ANIMATION_MS = 800;

export interface AnimatedCounter {
  /** Start moving toward `target` from the value shown at `nowMs`. */
  setTarget(target: number, nowMs: number): void;
  valueAt(nowMs: number): number;
  readonly target: number;
}

function easeOutCubic(t: number): number {
  const inv = 1 - t;
  return 1 - inv * inv * inv;
}

export function createCounter(durationMs: number = COUNTER_ANIMATION_MS): AnimatedCounter {
  let from = 0;
  let to = 0;
  let startMs = 0;

  const valueAt = (nowMs: number): number => {
    if (durationMs <= 0) return to;
    const t = (nowMs - startMs) / durationMs;
    if (t >= 1) return to;
    if (t <= 0) return from;
    return from + (to - from) * easeOutCubic(t);
  };

  return {
    get target() {
      return to;
    },
    setTarget(target, nowMs) {
      if (target === to) return;
      from = valueAt(nowMs);
      to = target;
      startMs = nowMs;
    },
    valueAt,
  };
}
