import type { Surface } from "../drawApi.js";
import type { Rgb24 } from "../style.js";
import type { Theme } from "../theme/index.js";
import { truncate } from "./formatters.js";

type BorderGlyphs = Readonly<{ tl: string; tr: string; bl: string; br: string; h: string; v: string }>;

const PIXEL_BORDER: BorderGlyphs = Object.freeze({
  tl: "┏",
  tr: "┓",
  bl: "┗",
  br: "┛",
  h: "━",
  v: "┃",
});

const GLOW_BORDER: BorderGlyphs = Object.freeze({
  tl: "╭",
  tr: "╮",
  bl: "╰",
  br: "╯",
  h: "─",
  v: "│",
});

export function clearScreen(surface: Surface, theme: Theme): void {
  surface.clear({ bg: theme.colors.background, fg: theme.colors.text });
}

/** Title on row 0 at column 1. */
export function drawTitle(surface: Surface, theme: Theme, title: string, color?: Rgb24): void {
  surface.drawText(1, 0, truncate(title, surface.cols - 2), {
    fg: color ?? theme.colors.primary,
    bg: theme.colors.background,
    bold: true,
  });
}

export function drawCentered(
  surface: Surface,
  y: number,
  text: string,
  fg: Rgb24,
  bg?: Rgb24,
): void {
  const shown = truncate(text, surface.cols);
  const x = Math.max(0, Math.floor((surface.cols - shown.length) / 2));
  surface.drawText(x, y, shown, bg === undefined ? { fg } : { fg, bg });
}

export function drawNoData(surface: Surface, theme: Theme): void {
  drawCentered(surface, Math.floor(surface.rows / 2), "NO DATA", theme.colors.muted);
}

export function drawBox(
  surface: Surface,
  theme: Theme,
  x: number,
  y: number,
  w: number,
  h: number,
  color: Rgb24,
): void {
  if (w < 2 || h < 2) return;
  const g = theme.style === "glow" ? GLOW_BORDER : PIXEL_BORDER;
  const style = { fg: color, bg: theme.colors.background };
  const inner = g.h.repeat(w - 2);
  surface.drawText(x, y, `${g.tl}${inner}${g.tr}`, style);
  surface.drawText(x, y + h - 1, `${g.bl}${inner}${g.br}`, style);
  for (let row = y + 1; row < y + h - 1; row++) {
    surface.drawText(x, row, g.v, style);
    surface.drawText(x + w - 1, row, g.v, style);
  }
}

/**
 * Horizontal meter of `width` cells filled to `percent`.
 * Pixel themes use solid blocks; glow themes use a lighter track.
 */
export function drawBar(
  surface: Surface,
  theme: Theme,
  x: number,
  y: number,
  width: number,
  percent: number,
  color: Rgb24,
): void {
  if (width <= 0) return;
  const safe = Number.isFinite(percent) ? Math.min(100, Math.max(0, percent)) : 0;
  const filled = Math.round((safe / 100) * width);
  const fill = theme.style === "glow" ? "▰" : "█";
  const track = theme.style === "glow" ? "▱" : "░";
  surface.drawText(x, y, fill.repeat(filled), { fg: color, bg: theme.colors.background });
  surface.drawText(x + filled, y, track.repeat(width - filled), {
    fg: theme.colors.panel,
    bg: theme.colors.background,
  });
}

/** "LABEL ......... value" line spanning `width` cells. */
export function drawLabelValue(
  surface: Surface,
  theme: Theme,
  x: number,
  y: number,
  width: number,
  label: string,
  value: string,
  valueColor?: Rgb24,
): void {
  const shownValue = truncate(value, Math.max(0, width - label.length - 1));
  surface.drawText(x, y, label, { fg: theme.colors.muted, bg: theme.colors.background });
  surface.drawText(x + width - shownValue.length, y, shownValue, {
    fg: valueColor ?? theme.colors.text,
    bg: theme.colors.background,
    bold: true,
  });
}
