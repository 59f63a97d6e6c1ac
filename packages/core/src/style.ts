/**
 * packages/core/src/style.ts — Cell styling types and helpers.
 */

/** Packed RGB color (0x00RRGGBB). */
export type Rgb24 = number;

/** Cell styling options. Unset colors fall back to the output's defaults. */
export type TextStyle = Readonly<{
  fg?: Rgb24;
  bg?: Rgb24;
  bold?: boolean;
  dim?: boolean;
}>;

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

/** Create a packed RGB color value. */
export function rgb(r: number, g: number, b: number): Rgb24 {
  const rr = clampChannel(r);
  const gg = clampChannel(g);
  const bb = clampChannel(b);
  return ((rr & 0xff) << 16) | ((gg & 0xff) << 8) | (bb & 0xff);
}

export function rgbR(value: Rgb24): number {
  return (value >>> 16) & 0xff;
}

export function rgbG(value: Rgb24): number {
  return (value >>> 8) & 0xff;
}

export function rgbB(value: Rgb24): number {
  return value & 0xff;
}

/** Shift every channel by `delta`, clamped to 0..255. */
export function mergeStyle(base: TextStyle | undefined, over: TextStyle | undefined): TextStyle {
  return Object.freeze({ ...base, ...over });
}
