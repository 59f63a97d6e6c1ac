/**
 * packages/core/src/input/gesture.ts — Pointer pair to tap/swipe classifier.
 *
 * One pointer-down followed by one pointer-up yields exactly one gesture.
 * Classification uses the horizontal displacement only:
 *
 *   dx < -threshold  => swipe-left
 *   dx >  threshold  => swipe-right
 *   otherwise        => tap
 *
 * Both comparisons are strict, so |dx| == threshold is a tap.
 */

import type { Gesture, Point } from "./events.js";

export const DEFAULT_SWIPE_THRESHOLD = 50;

export interface GestureClassifier {
  readonly threshold: number;
  /** Record a gesture anchor. An unresolved earlier anchor is dropped. */
  pointerDown(pos: Point): void;
  /** Consume the anchor and classify. Returns null without an anchor. */
  pointerUp(pos: Point): Gesture | null;
  /** Drop the pending anchor, if any. */
  cancel(): void;
  /** True while an anchor is waiting for its pointer-up. */
  pending(): boolean;
}

export function classifyGesture(start: Point, end: Point, threshold: number): Gesture {
  const dx = end.x - start.x;
  if (dx < -threshold) return Object.freeze({ kind: "swipe-left" });
  if (dx > threshold) return Object.freeze({ kind: "swipe-right" });
  return Object.freeze({ kind: "tap", pos: end });
}

function sanitizeThreshold(threshold: number): number {
  if (!Number.isFinite(threshold) || threshold < 0) return DEFAULT_SWIPE_THRESHOLD;
  return threshold;
}

export function createGestureClassifier(
  threshold: number = DEFAULT_SWIPE_THRESHOLD,
): GestureClassifier {
  const safeThreshold = sanitizeThreshold(threshold);
  let anchor: Point | null = null;

  return {
    threshold: safeThreshold,
    pointerDown(pos) {
      anchor = pos;
    },
    pointerUp(pos) {
      if (anchor === null) return null;
      const start = anchor;
      anchor = null;
      return classifyGesture(start, pos, safeThreshold);
    },
    cancel() {
      anchor = null;
    },
    pending() {
      return anchor !== null;
    },
  };
}
