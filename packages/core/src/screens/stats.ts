/**
 * packages/core/src/screens/stats.ts — Headline query statistics.
 */

import type { Surface } from "../drawApi.js";
import { EMPTY_SUMMARY } from "../stats/types.js";
import type { Theme } from "../theme/index.js";
import { createCounter } from "./counter.js";
import { formatCount, formatPercent } from "./formatters.js";
import { clearScreen, drawBar, drawBox, drawCentered, drawTitle } from "./primitives.js";
import type { FrameInfo, Screen, StatsData } from "./types.js";

export function createStatsScreen(): Screen<StatsData> {
  const total = createCounter();
  const blocked = createCounter();
  const percent = createCounter();
  const clients = createCounter();
  let data: StatsData = Object.freeze({ summary: EMPTY_SUMMARY, ipAddress: "N/A" });

  return {
    id: "stats",
    title: "DNS STATS",
    update(next, nowMs) {
      data = next;
      total.setTarget(next.summary.totalQueries, nowMs);
      blocked.setTarget(next.summary.blocked, nowMs);
      percent.setTarget(next.summary.percentBlocked, nowMs);
      clients.setTarget(next.summary.activeClients, nowMs);
    },
    draw(surface: Surface, theme: Theme, frame: FrameInfo) {
      const c = theme.colors;
      clearScreen(surface, theme);
      drawTitle(surface, theme, "DNS STATS");

      const status = data.summary.enabled ? "ACTIVE" : "DISABLED";
      surface.drawText(surface.cols - status.length - 1, 0, status, {
        fg: data.summary.enabled ? c.success : c.error,
        bold: true,
      });

      const half = Math.floor(surface.cols / 2);
      const tiles = [
        { label: "TOTAL QUERIES", value: formatCount(total.valueAt(frame.nowMs)), color: c.secondary },
        { label: "BLOCKED", value: formatCount(blocked.valueAt(frame.nowMs)), color: c.error },
        { label: "BLOCK RATE", value: formatPercent(percent.valueAt(frame.nowMs)), color: c.warning },
        { label: "CLIENTS", value: formatCount(clients.valueAt(frame.nowMs)), color: c.info },
      ] as const;

      tiles.forEach((tile, index) => {
        const x = index % 2 === 0 ? 0 : half;
        const y = 2 + Math.floor(index / 2) * 5;
        const w = index % 2 === 0 ? half : surface.cols - half;
        drawBox(surface, theme, x, y, w, 5, tile.color);
        surface.drawText(x + 2, y + 1, tile.label, { fg: c.muted });
        surface.drawText(x + 2, y + 2, tile.value, { fg: tile.color, bold: true });
      });

      drawBar(surface, theme, 1, 13, surface.cols - 2, percent.valueAt(frame.nowMs), c.error);
      drawCentered(
        surface,
        15,
        `${formatCount(data.summary.domainsBlocked)} DOMAINS ON BLOCKLIST`,
        c.text,
      );
      drawCentered(surface, 16, `IP ${data.ipAddress}`, c.muted);
    },
  };
}
