import type { InputEvent } from "@dnsboard/core";

export const DEFAULT_QUEUE_LIMIT = 256;

export interface InputQueue {
  push(events: readonly InputEvent[]): void;
  /** Everything buffered since the previous drain, oldest first. */
  drain(): readonly InputEvent[];
  size(): number;
  /** Events discarded because the queue was full. */
  dropped(): number;
}

/**
 * Buffer between asynchronous input sources and the once-per-tick drain.
 * When full, the oldest events are dropped; a quit is never dropped.
 */
export function createInputQueue(limit: number = DEFAULT_QUEUE_LIMIT): InputQueue {
  const max = Number.isInteger(limit) && limit > 0 ? limit : DEFAULT_QUEUE_LIMIT;
  let buffer: InputEvent[] = [];
  let droppedCount = 0;

  return {
    push(events) {
      for (const event of events) {
        buffer.push(event);
        if (buffer.length <= max) continue;
        const index = buffer.findIndex((e) => e.kind !== "quit");
        if (index < 0) {
          buffer.shift();
        } else {
          buffer.splice(index, 1);
        }
        droppedCount += 1;
      }
    },
    drain() {
      const out = buffer;
      buffer = [];
      return Object.freeze(out);
    },
    size() {
      return buffer.length;
    },
    dropped() {
      return droppedCount;
    },
  };
}
