/**
 * packages/core/src/screens/history.ts — Query volume over time.
 *
 * One column per history bucket, newest on the right. The blocked share of
 * each bucket is drawn over its total in the error color.
 */

import type { Surface } from "../drawApi.js";
import type { HistoryPoint } from "../stats/types.js";
import type { Theme } from "../theme/index.js";
import { formatCompact } from "./formatters.js";
import { clearScreen, drawNoData, drawTitle } from "./primitives.js";
import type { Screen } from "./types.js";

/** Buckets kept on screen (24 hours of 30-minute buckets). */
export const HISTORY_WINDOW = 48;

export type HistoryTotals = Readonly<{ total: number; blocked: number; peak: number }>;

export function visibleHistory(points: readonly HistoryPoint[], width: number): readonly HistoryPoint[] {
  const limit = Math.max(0, Math.min(HISTORY_WINDOW, width));
  return points.slice(Math.max(0, points.length - limit));
}

export function summarizeHistory(points: readonly HistoryPoint[]): HistoryTotals {
  let total = 0;
  let blocked = 0;
  let peak = 0;
  for (const point of points) {
    total += point.total;
    blocked += point.blocked;
    if (point.total > peak) peak = point.total;
  }
  return Object.freeze({ total, blocked, peak });
}

/** Filled rows for `value` in a column of `height` rows scaled to `peak`. */
export function columnHeight(value: number, peak: number, height: number): number {
  if (peak <= 0 || value <= 0 || height <= 0) return 0;
  return Math.max(1, Math.round((Math.min(value, peak) / peak) * height));
}

export function createHistoryScreen(): Screen<readonly HistoryPoint[]> {
  let points: readonly HistoryPoint[] = [];

  return {
    id: "history",
    title: "QUERY HISTORY",
    update(next) {
      points = next;
    },
    draw(surface: Surface, theme: Theme) {
      const c = theme.colors;
      clearScreen(surface, theme);
      drawTitle(surface, theme, "QUERY HISTORY");
      if (points.length === 0) {
        drawNoData(surface, theme);
        return;
      }

      const chartTop = 2;
      const chartBottom = surface.rows - 4;
      const chartHeight = chartBottom - chartTop + 1;
      const shown = visibleHistory(points, surface.cols - 2);
      const { peak } = summarizeHistory(shown);
      const left = surface.cols - 1 - shown.length;

      shown.forEach((point, index) => {
        const x = left + index;
        const totalRows = columnHeight(point.total, peak, chartHeight);
        const blockedRows = Math.min(totalRows, columnHeight(point.blocked, peak, chartHeight));
        for (let i = 0; i < totalRows; i++) {
          const y = chartBottom - i;
          surface.drawText(x, y, theme.style === "glow" ? "┃" : "█", {
            fg: i < blockedRows ? c.error : c.secondary,
          });
        }
      });

      const totals = summarizeHistory(points.slice(-HISTORY_WINDOW));
      surface.drawText(1, surface.rows - 3, `PEAK ${formatCompact(peak)}`, { fg: c.muted });
      surface.drawText(1, surface.rows - 2, `TOTAL ${formatCompact(totals.total)}`, {
        fg: c.secondary,
      });
      const blockedLabel = `BLOCKED ${formatCompact(totals.blocked)}`;
      surface.drawText(surface.cols - blockedLabel.length - 1, surface.rows - 2, blockedLabel, {
        fg: c.error,
      });
    },
  };
}
