/**
 * packages/core/src/theme/presets.ts — Built-in theme presets.
 *
 * Available themes, in cycling order:
 *   default, monochrome, neon, ocean, sunset, matrix, cyberpunk, crimson
 */

import { rgb } from "../style.js";
import type { Theme, ThemeColors, ThemeStyle } from "./types.js";

function defineTheme(name: string, style: ThemeStyle, colors: ThemeColors): Theme {
  return Object.freeze({ name, style, colors: Object.freeze({ ...colors }) });
}

const BLACK = rgb(0, 0, 0);
const WHITE = rgb(255, 255, 255);

export const defaultTheme = defineTheme("default", "pixel", {
  background: BLACK,
  panel: rgb(40, 40, 40),
  text: WHITE,
  muted: rgb(100, 100, 100),
  primary: rgb(0, 255, 0),
  secondary: rgb(0, 255, 255),
  accent: rgb(255, 165, 0),
  success: rgb(0, 255, 0),
  warning: rgb(255, 255, 0),
  error: rgb(255, 50, 50),
  info: rgb(180, 100, 255),
});

export const monochromeTheme = defineTheme("monochrome", "pixel", {
  background: BLACK,
  panel: rgb(40, 40, 40),
  text: WHITE,
  muted: rgb(100, 100, 100),
  primary: WHITE,
  secondary: rgb(200, 200, 200),
  accent: rgb(180, 180, 180),
  success: WHITE,
  warning: rgb(200, 200, 200),
  error: rgb(150, 150, 150),
  info: rgb(180, 180, 180),
});

export const neonTheme = defineTheme("neon", "glow", {
  background: BLACK,
  panel: rgb(40, 0, 40),
  text: WHITE,
  muted: rgb(100, 100, 100),
  primary: rgb(255, 0, 255),
  secondary: rgb(255, 100, 255),
  accent: rgb(255, 0, 150),
  success: rgb(255, 0, 255),
  warning: rgb(255, 100, 200),
  error: rgb(255, 0, 100),
  info: rgb(200, 0, 255),
});

export const oceanTheme = defineTheme("ocean", "glow", {
  background: BLACK,
  panel: rgb(0, 40, 100),
  text: rgb(200, 230, 255),
  muted: rgb(0, 70, 150),
  primary: rgb(0, 150, 255),
  secondary: rgb(0, 100, 200),
  accent: rgb(0, 150, 255),
  success: rgb(0, 150, 255),
  warning: rgb(0, 100, 200),
  error: rgb(0, 70, 150),
  info: rgb(0, 100, 200),
});

export const sunsetTheme = defineTheme("sunset", "glow", {
  background: BLACK,
  panel: rgb(100, 50, 0),
  text: rgb(255, 220, 180),
  muted: rgb(150, 70, 0),
  primary: rgb(255, 150, 0),
  secondary: rgb(200, 100, 0),
  accent: rgb(255, 150, 0),
  success: rgb(255, 150, 0),
  warning: rgb(200, 100, 0),
  error: rgb(150, 70, 0),
  info: rgb(200, 100, 0),
});

export const matrixTheme = defineTheme("matrix", "pixel", {
  background: BLACK,
  panel: rgb(0, 60, 0),
  text: rgb(180, 255, 180),
  muted: rgb(0, 100, 0),
  primary: rgb(0, 200, 0),
  secondary: rgb(0, 150, 0),
  accent: rgb(0, 200, 0),
  success: rgb(0, 200, 0),
  warning: rgb(0, 150, 0),
  error: rgb(0, 100, 0),
  info: rgb(0, 150, 0),
});

export const cyberpunkTheme = defineTheme("cyberpunk", "glow", {
  background: BLACK,
  panel: rgb(40, 40, 40),
  text: WHITE,
  muted: rgb(100, 100, 100),
  primary: rgb(255, 0, 150),
  secondary: rgb(0, 255, 255),
  accent: rgb(255, 255, 0),
  success: rgb(0, 255, 255),
  warning: rgb(255, 255, 0),
  error: rgb(255, 0, 50),
  info: rgb(150, 0, 255),
});

export const crimsonTheme = defineTheme("crimson", "pixel", {
  background: BLACK,
  panel: rgb(60, 0, 0),
  text: rgb(255, 200, 200),
  muted: rgb(100, 0, 0),
  primary: rgb(200, 0, 0),
  secondary: rgb(150, 0, 0),
  accent: rgb(200, 0, 0),
  success: rgb(200, 0, 0),
  warning: rgb(150, 0, 0),
  error: rgb(100, 0, 0),
  info: rgb(150, 0, 0),
});

export const THEME_PRESETS: readonly Theme[] = Object.freeze([
  defaultTheme,
  monochromeTheme,
  neonTheme,
  oceanTheme,
  sunsetTheme,
  matrixTheme,
  cyberpunkTheme,
  crimsonTheme,
]);
