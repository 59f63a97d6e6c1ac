/**
 * packages/core/src/screens/settings.ts — On-device settings editor.
 *
 * Layout (cells):
 *   row 0-1, last LOCK_AREA_COLS columns   lock toggle
 *   row 3 + 2*i (and the row below)        setting i
 *
 * A tap on the left half of a setting row steps it back, the right half
 * steps it forward. On/off settings flip on either half.
 */

import type { CellPoint, Surface } from "../drawApi.js";
import { stepOption } from "../settings/reducer.js";
import {
  API_INTERVAL_OPTIONS,
  BRIGHTNESS_STEP,
  DEFAULT_SETTINGS,
  SCREEN_TIMEOUT_OPTIONS,
  type SettingsAction,
  type SettingsRecord,
} from "../settings/types.js";
import { cycleThemeName, type Theme } from "../theme/index.js";
import {
  formatInterval,
  formatOnOff,
  formatTimeout,
} from "./formatters.js";
import { clearScreen, drawCentered, drawTitle } from "./primitives.js";
import type {
  LockAreaProvider,
  Screen,
  ScreenCommand,
  SettingsViewData,
  SurfaceSize,
  TapHandler,
} from "./types.js";

export const LOCK_AREA_COLS = 8;
export const SETTINGS_FIRST_ROW = 3;
export const SETTINGS_ROW_STRIDE = 2;

type SettingRow = Readonly<{
  label: string;
  value(settings: SettingsRecord): string;
  action(settings: SettingsRecord, step: 1 | -1): SettingsAction;
}>;

export const SETTING_ROWS: readonly SettingRow[] = Object.freeze([
  {
    label: "THEME",
    value: (s: SettingsRecord) => s.theme.toUpperCase(),
    action: (s: SettingsRecord, step: 1 | -1): SettingsAction => ({
      type: "change-theme",
      theme: cycleThemeName(s.theme, step),
    }),
  },
  {
    label: "SCANLINES",
    value: (s: SettingsRecord) => formatOnOff(s.scanlines),
    action: (): SettingsAction => ({ type: "toggle-scanlines" }),
  },
  {
    label: "SHOW FPS",
    value: (s: SettingsRecord) => formatOnOff(s.showFps),
    action: (): SettingsAction => ({ type: "toggle-fps" }),
  },
  {
    label: "BRIGHTNESS",
    value: (s: SettingsRecord) => `${s.brightness}%`,
    action: (s: SettingsRecord, step: 1 | -1): SettingsAction => ({
      type: "set-brightness",
      value: s.brightness + step * BRIGHTNESS_STEP,
    }),
  },
  {
    label: "API REFRESH",
    value: (s: SettingsRecord) => formatInterval(s.apiInterval),
    action: (s: SettingsRecord, step: 1 | -1): SettingsAction => ({
      type: "set-api-interval",
      value: stepOption(API_INTERVAL_OPTIONS, s.apiInterval, step),
    }),
  },
  {
    label: "SCREEN TIMEOUT",
    value: (s: SettingsRecord) => formatTimeout(s.screenTimeout),
    action: (s: SettingsRecord, step: 1 | -1): SettingsAction => ({
      type: "set-timeout",
      value: stepOption(SCREEN_TIMEOUT_OPTIONS, s.screenTimeout, step),
    }),
  },
]);

export function isInLockArea(pos: CellPoint, size: SurfaceSize): boolean {
  return pos.row <= 1 && pos.col >= size.cols - LOCK_AREA_COLS;
}

/** Index of the setting row under `row`, or null. */
export function settingRowAt(row: number): number | null {
  const offset = row - SETTINGS_FIRST_ROW;
  if (offset < 0) return null;
  const index = Math.floor(offset / SETTINGS_ROW_STRIDE);
  return index < SETTING_ROWS.length ? index : null;
}

export type SettingsScreen = Screen<SettingsViewData> & TapHandler & LockAreaProvider;

export function createSettingsScreen(opts: Readonly<{ version: string }>): SettingsScreen {
  let view: SettingsViewData = Object.freeze({ settings: DEFAULT_SETTINGS, locked: true });

  return {
    id: "settings",
    title: "SETTINGS",
    update(next) {
      view = next;
    },
    inLockArea: isInLockArea,
    handleTap(pos, size): ScreenCommand | null {
      if (isInLockArea(pos, size)) return Object.freeze({ kind: "toggle-lock" });
      if (view.locked) return null;
      const index = settingRowAt(pos.row);
      const row = index === null ? undefined : SETTING_ROWS[index];
      if (!row) return null;
      const step: 1 | -1 = pos.col < Math.floor(size.cols / 2) ? -1 : 1;
      return Object.freeze({ kind: "settings", action: row.action(view.settings, step) });
    },
    draw(surface: Surface, theme: Theme) {
      const c = theme.colors;
      clearScreen(surface, theme);
      drawTitle(surface, theme, "SETTINGS");

      const lockLabel = view.locked ? "[LOCK]" : "[OPEN]";
      surface.drawText(surface.cols - lockLabel.length - 1, 0, lockLabel, {
        fg: view.locked ? c.warning : c.success,
        bold: true,
      });

      SETTING_ROWS.forEach((row, index) => {
        const y = SETTINGS_FIRST_ROW + index * SETTINGS_ROW_STRIDE;
        const valueColor = view.locked ? c.muted : c.primary;
        surface.drawText(2, y, row.label, { fg: view.locked ? c.muted : c.text });
        const value = `< ${row.value(view.settings)} >`;
        surface.drawText(surface.cols - value.length - 2, y, value, {
          fg: valueColor,
          bold: !view.locked,
        });
      });

      const hintRow = SETTINGS_FIRST_ROW + SETTING_ROWS.length * SETTINGS_ROW_STRIDE;
      drawCentered(surface, hintRow, view.locked ? "TAP LOCK TO EDIT" : "TAP TO CHANGE", c.accent);
      drawCentered(surface, surface.rows - 2, `DNSBOARD v${opts.version}`, c.muted);
    },
  };
}
