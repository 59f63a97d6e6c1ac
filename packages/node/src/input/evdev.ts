/**
 * packages/node/src/input/evdev.ts — Linux touchscreen input.
 *
 * Decodes `struct input_event` records read from /dev/input/eventN:
 *
 *   64-bit layout (24 bytes): tv_sec i64 | tv_usec i64 | type u16 | code u16 | value i32
 *   32-bit layout (16 bytes): tv_sec i32 | tv_usec i32 | type u16 | code u16 | value i32
 *
 * Touch state accumulates until SYN_REPORT, which commits at most one
 * pointer-down or pointer-up at the latest position. Raw axis values are
 * scaled from the panel's range to display pixels.
 */

import { createReadStream } from "node:fs";
import { type DisplaySize, type InputEvent, type Logger, type Point, describeError } from "@dnsboard/core";

export const EV_SYN = 0x00;
export const EV_KEY = 0x01;
export const EV_ABS = 0x03;
export const SYN_REPORT = 0x00;
export const BTN_TOUCH = 0x14a;
export const ABS_X = 0x00;
export const ABS_Y = 0x01;
export const ABS_MT_POSITION_X = 0x35;
export const ABS_MT_POSITION_Y = 0x36;

export type EvdevRecordSize = 16 | 24;

export type RawInputEvent = Readonly<{ type: number; code: number; value: number }>;

export type EvdevDecoderOptions = Readonly<{
  /** Raw axis range reported by the panel (0..max). */
  touchMax: DisplaySize;
  display: DisplaySize;
  recordSize?: EvdevRecordSize;
}>;

export interface EvdevDecoder {
  /** Feed raw bytes; returns pointer events committed by complete records. */
  push(chunk: Uint8Array): InputEvent[];
  /** Bytes held back waiting for the rest of a record. */
  pendingBytes(): number;
}

/** Scale a raw panel coordinate into display pixels. */
export function scaleAxis(raw: number, rawMax: number, displayExtent: number): number {
  if (rawMax <= 0) return 0;
  const scaled = Math.round((raw * displayExtent) / rawMax);
  return Math.min(Math.max(0, scaled), Math.max(0, displayExtent - 1));
}

export function decodeRecord(bytes: Uint8Array, offset: number, recordSize: EvdevRecordSize): RawInputEvent {
  const view = new DataView(bytes.buffer, bytes.byteOffset + offset, recordSize);
  const base = recordSize - 8;
  return Object.freeze({
    type: view.getUint16(base, true),
    code: view.getUint16(base + 2, true),
    value: view.getInt32(base + 4, true),
  });
}

export function createEvdevDecoder(opts: EvdevDecoderOptions): EvdevDecoder {
  const recordSize = opts.recordSize ?? 24;
  let carry = new Uint8Array(0);
  let rawX = 0;
  let rawY = 0;
  let pending: "down" | "up" | null = null;

  const position = (): Point =>
    Object.freeze({
      x: scaleAxis(rawX, opts.touchMax.width, opts.display.width),
      y: scaleAxis(rawY, opts.touchMax.height, opts.display.height),
    });

  const apply = (event: RawInputEvent, out: InputEvent[]): void => {
    switch (event.type) {
      case EV_ABS:
        if (event.code === ABS_X || event.code === ABS_MT_POSITION_X) rawX = event.value;
        else if (event.code === ABS_Y || event.code === ABS_MT_POSITION_Y) rawY = event.value;
        return;
      case EV_KEY:
        if (event.code === BTN_TOUCH) pending = event.value === 0 ? "up" : "down";
        return;
      case EV_SYN:
        if (event.code !== SYN_REPORT || pending === null) return;
        out.push(
          Object.freeze({ kind: pending === "down" ? "pointer-down" : "pointer-up", pos: position() }),
        );
        pending = null;
        return;
      default:
        return;
    }
  };

  return {
    push(chunk) {
      const bytes = new Uint8Array(carry.byteLength + chunk.byteLength);
      bytes.set(carry, 0);
      bytes.set(chunk, carry.byteLength);
      const whole = bytes.byteLength - (bytes.byteLength % recordSize);
      const out: InputEvent[] = [];
      for (let off = 0; off < whole; off += recordSize) {
        apply(decodeRecord(bytes, off, recordSize), out);
      }
      carry = bytes.slice(whole);
      return out;
    },
    pendingBytes() {
      return carry.byteLength;
    },
  };
}

export type EvdevSource = Readonly<{ close: () => void }>;

/** Stream a device node through a decoder into `onEvents`. */
export function openEvdevSource(
  path: string,
  decoder: EvdevDecoder,
  onEvents: (events: readonly InputEvent[]) => void,
  logger: Logger,
): EvdevSource {
  const stream = createReadStream(path);
  stream.on("data", (chunk) => {
    const bytes = typeof chunk === "string" ? new TextEncoder().encode(chunk) : chunk;
    const events = decoder.push(bytes);
    if (events.length > 0) onEvents(events);
  });
  stream.on("error", (error) => {
    logger.warn("touch device unavailable", { path, error: describeError(error) });
  });
  logger.info("touch input opened", { path });
  return Object.freeze({ close: () => stream.destroy() });
}
