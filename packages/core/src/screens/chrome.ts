/**
 * packages/core/src/screens/chrome.ts — Overlays drawn on top of every
 * screen: page indicators, scanlines and the FPS counter.
 */

import type { Surface } from "../drawApi.js";
import type { Theme } from "../theme/index.js";

export function indicatorText(current: number, count: number): string {
  const dots: string[] = [];
  for (let i = 0; i < count; i++) dots.push(i === current ? "●" : "○");
  return dots.join(" ");
}

/** Page dots centered on the bottom row. */
export function drawIndicators(surface: Surface, theme: Theme, current: number, count: number): void {
  const text = indicatorText(current, count);
  const x = Math.max(0, Math.floor((surface.cols - text.length) / 2));
  surface.drawText(x, surface.rows - 1, text, { fg: theme.colors.primary });
}

/** Dim every odd row. */
export function drawScanlines(surface: Surface): void {
  for (let row = 1; row < surface.rows; row += 2) {
    surface.tint(0, row, surface.cols, 1, { dim: true });
  }
}

export function drawFps(surface: Surface, theme: Theme, fps: number): void {
  const text = `${Math.round(fps)} FPS`;
  surface.drawText(Math.max(0, surface.cols - text.length - 1), surface.rows - 1, text, {
    fg: theme.colors.warning,
  });
}
