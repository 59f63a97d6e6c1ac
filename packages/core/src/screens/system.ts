/**
 * packages/core/src/screens/system.ts — Host health (CPU, memory, disk,
 * temperature, uptime, network identity).
 */

import type { Surface } from "../drawApi.js";
import { EMPTY_SYSTEM_METRICS, type SystemMetrics } from "../stats/types.js";
import type { Rgb24 } from "../style.js";
import type { Theme, ThemeColors } from "../theme/index.js";
import {
  formatPercent,
  formatTemperature,
  formatUptime,
  ratioPercent,
} from "./formatters.js";
import { clearScreen, drawBar, drawLabelValue, drawTitle } from "./primitives.js";
import type { Screen } from "./types.js";

/** Load color: success below 60%, warning below 85%, error above. */
export function loadColor(colors: ThemeColors, percent: number): Rgb24 {
  if (percent >= 85) return colors.error;
  if (percent >= 60) return colors.warning;
  return colors.success;
}

export function temperatureColor(colors: ThemeColors, celsius: number): Rgb24 {
  if (celsius >= 70) return colors.error;
  if (celsius >= 55) return colors.warning;
  return colors.success;
}

export function createSystemScreen(): Screen<SystemMetrics> {
  let metrics: SystemMetrics = EMPTY_SYSTEM_METRICS;

  return {
    id: "system",
    title: "SYSTEM",
    update(next) {
      metrics = next;
    },
    draw(surface: Surface, theme: Theme) {
      const c = theme.colors;
      clearScreen(surface, theme);
      drawTitle(surface, theme, "SYSTEM");

      const width = surface.cols - 2;
      const memPercent = ratioPercent(metrics.memUsedMb, metrics.memTotalMb);
      const diskPercent = ratioPercent(metrics.diskUsedGb, metrics.diskTotalGb);
      const meters = [
        { label: "CPU", percent: metrics.cpuPercent, detail: formatPercent(metrics.cpuPercent) },
        {
          label: "MEM",
          percent: memPercent,
          detail: `${Math.round(metrics.memUsedMb)}/${Math.round(metrics.memTotalMb)}MB`,
        },
        {
          label: "DISK",
          percent: diskPercent,
          detail: `${metrics.diskUsedGb.toFixed(1)}/${metrics.diskTotalGb.toFixed(1)}GB`,
        },
      ];

      let y = 2;
      for (const meter of meters) {
        const color = loadColor(c, meter.percent);
        drawLabelValue(surface, theme, 1, y, width, meter.label, meter.detail, color);
        drawBar(surface, theme, 1, y + 1, width, meter.percent, color);
        y += 3;
      }

      drawLabelValue(
        surface,
        theme,
        1,
        y,
        width,
        "TEMP",
        formatTemperature(metrics.temperatureC),
        temperatureColor(c, metrics.temperatureC),
      );
      drawLabelValue(surface, theme, 1, y + 1, width, "UPTIME", formatUptime(metrics.uptimeSeconds));
      drawLabelValue(surface, theme, 1, y + 2, width, "IP", metrics.ipAddress);
      drawLabelValue(surface, theme, 1, y + 3, width, "HOST", metrics.hostname);
      if (metrics.fanRpm > 0) {
        drawLabelValue(surface, theme, 1, y + 4, width, "FAN", `${Math.round(metrics.fanRpm)} RPM`);
      }
    },
  };
}
