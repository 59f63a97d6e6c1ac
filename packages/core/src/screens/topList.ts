/**
 * packages/core/src/screens/topList.ts — Ranked top-N lists (blocked
 * domains and busiest clients share one layout).
 */

import type { Surface } from "../drawApi.js";
import type { ScreenId } from "../navigation/navigation.js";
import type { TopList } from "../stats/types.js";
import type { Rgb24 } from "../style.js";
import type { Theme, ThemeColors } from "../theme/index.js";
import { formatCount, truncate } from "./formatters.js";
import { clearScreen, drawNoData, drawTitle } from "./primitives.js";
import type { Screen } from "./types.js";

type TopListKind = Extract<ScreenId, "top-blocked" | "top-clients">;

const TITLES: Readonly<Record<TopListKind, string>> = Object.freeze({
  "top-blocked": "TOP BLOCKED",
  "top-clients": "TOP CLIENTS",
});

const ACCENTS: Readonly<Record<TopListKind, (colors: ThemeColors) => Rgb24>> = Object.freeze({
  "top-blocked": (colors: ThemeColors) => colors.error,
  "top-clients": (colors: ThemeColors) => colors.info,
});

/** "  1 label.......  count" sized to `width`. */
export function formatTopRow(rank: number, label: string, count: number, width: number): string {
  const prefix = `${String(rank).padStart(2, " ")} `;
  const value = formatCount(count);
  const labelWidth = Math.max(0, width - prefix.length - value.length - 1);
  return `${prefix}${truncate(label, labelWidth).padEnd(labelWidth, " ")} ${value}`;
}

export function createTopListScreen(kind: TopListKind): Screen<TopList> {
  let entries: TopList = [];
  const title = TITLES[kind];

  return {
    id: kind,
    title,
    update(next) {
      entries = next;
    },
    draw(surface: Surface, theme: Theme) {
      const c = theme.colors;
      const accent = ACCENTS[kind](c);
      clearScreen(surface, theme);
      drawTitle(surface, theme, title, accent);
      if (entries.length === 0) {
        drawNoData(surface, theme);
        return;
      }

      const width = surface.cols - 2;
      const maxRows = Math.max(0, surface.rows - 4);

      entries.slice(0, maxRows).forEach((entry, index) => {
        const y = 2 + index;
        surface.drawText(1, y, formatTopRow(index + 1, entry.label, entry.count, width), {
          fg: index === 0 ? accent : c.text,
        });
      });
    },
  };
}
