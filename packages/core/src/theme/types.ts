/**
 * packages/core/src/theme/types.ts — Theme value types.
 *
 * A Theme is an immutable value passed into every draw call. Switching
 * themes produces a different value; nothing mutates shared color state.
 */

import type { Rgb24 } from "../style.js";

/** Border/bar rendering flavour of a theme. */
export type ThemeStyle = "pixel" | "glow";

export type ThemeColors = Readonly<{
  /** Screen background */
  background: Rgb24;
  /** Panels and chart backgrounds */
  panel: Rgb24;
  /** Body text */
  text: Rgb24;
  /** Labels, hints, inactive indicators */
  muted: Rgb24;
  primary: Rgb24;
  secondary: Rgb24;
  accent: Rgb24;
  success: Rgb24;
  warning: Rgb24;
  error: Rgb24;
  info: Rgb24;
}>;

export type Theme = Readonly<{
  name: string;
  style: ThemeStyle;
  colors: ThemeColors;
}>;
