import { createHistoryScreen } from "./history.js";
import { createSettingsScreen } from "./settings.js";
import { createStatsScreen } from "./stats.js";
import { createSystemScreen } from "./system.js";
import { createTopListScreen } from "./topList.js";
import type { DashboardScreens } from "./types.js";

export type {
  DashboardScreens,
  FrameInfo,
  LockAreaProvider,
  Screen,
  ScreenCommand,
  ScreenDataMap,
  SettingsViewData,
  StatsData,
  SurfaceSize,
  TapHandler,
} from "./types.js";
export { hasLockArea, isTapHandler } from "./types.js";
export { createCounter, COUNTER_ANIMATION_MS, type AnimatedCounter } from "./counter.js";
export * from "./formatters.js";
export { drawFps, drawIndicators, drawScanlines, indicatorText } from "./chrome.js";
export { HISTORY_WINDOW, createHistoryScreen, summarizeHistory, visibleHistory } from "./history.js";
export {
  LOCK_AREA_COLS,
  SETTING_ROWS,
  createSettingsScreen,
  isInLockArea,
  settingRowAt,
  type SettingsScreen,
} from "./settings.js";
export { createStatsScreen } from "./stats.js";
export { createSystemScreen, loadColor } from "./system.js";
export { createTopListScreen, formatTopRow } from "./topList.js";

export function createScreens(opts: Readonly<{ version: string }>): DashboardScreens {
  return Object.freeze({
    stats: createStatsScreen(),
    history: createHistoryScreen(),
    "top-blocked": createTopListScreen("top-blocked"),
    "top-clients": createTopListScreen("top-clients"),
    system: createSystemScreen(),
    settings: createSettingsScreen(opts),
  });
}
