/**
 * packages/node/src/runtime/frameLoop.ts — Fixed-rate frame loop.
 *
 * One iteration: drain queued input, run a controller tick, then sleep for
 * whatever is left of the frame budget. The loop ends on a quit event, when
 * `signal` aborts, or when a tick throws (the error propagates).
 */

import { setTimeout as delay } from "node:timers/promises";
import { type DashboardController, type Logger, silentLogger } from "@dnsboard/core";
import type { InputQueue } from "../input/inputQueue.js";

export type FrameLoopOptions = Readonly<{
  controller: Pick<DashboardController, "tick">;
  queue: InputQueue;
  fps: number;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}>;

export type FrameLoopResult = Readonly<{
  frames: number;
  reason: "quit" | "aborted";
}>;

export function frameIntervalMs(fps: number): number {
  const safe = Number.isFinite(fps) && fps > 0 ? fps : 30;
  return 1000 / safe;
}

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

export async function runFrameLoop(opts: FrameLoopOptions): Promise<FrameLoopResult> {
  const now = opts.now ?? Date.now;
  const sleep = opts.sleep ?? defaultSleep;
  const logger = (opts.logger ?? silentLogger).child("frame-loop");
  const interval = frameIntervalMs(opts.fps);
  let frames = 0;

  logger.info("frame loop started", { fps: opts.fps });
  while (opts.signal?.aborted !== true) {
    const started = now();
    const result = await opts.controller.tick(started, opts.queue.drain());
    frames += 1;
    if (result.quit) {
      logger.info("frame loop stopped", { reason: "quit", frames });
      return Object.freeze({ frames, reason: "quit" });
    }
    const remaining = interval - (now() - started);
    await sleep(remaining > 0 ? remaining : 0);
  }
  logger.info("frame loop stopped", { reason: "aborted", frames });
  return Object.freeze({ frames, reason: "aborted" });
}
