import { isThemeName } from "../theme/index.js";
import {
  API_INTERVAL_OPTIONS,
  BRIGHTNESS_MAX,
  BRIGHTNESS_MIN,
  SCREEN_TIMEOUT_OPTIONS,
  type SettingsAction,
  type SettingsRecord,
} from "./types.js";

export function clampBrightness(value: number): number {
  if (!Number.isFinite(value)) return BRIGHTNESS_MAX;
  const rounded = Math.round(value);
  if (rounded < BRIGHTNESS_MIN) return BRIGHTNESS_MIN;
  if (rounded > BRIGHTNESS_MAX) return BRIGHTNESS_MAX;
  return rounded;
}

export function isApiInterval(value: number): boolean {
  return API_INTERVAL_OPTIONS.some((option) => option === value);
}

export function isScreenTimeout(value: number): boolean {
  return SCREEN_TIMEOUT_OPTIONS.some((option) => option === value);
}

/** Step through a fixed option list, wrapping at both ends. */
export function stepOption(options: readonly number[], current: number, step: 1 | -1): number {
  const index = options.indexOf(current);
  const base = index < 0 ? 0 : index;
  const next = (((base + step) % options.length) + options.length) % options.length;
  return options[next] ?? current;
}

/**
 * Apply one settings action. Every action touches exactly one field;
 * values outside the allowed sets leave the record unchanged.
 */
export function reduceSettings(record: SettingsRecord, action: SettingsAction): SettingsRecord {
  switch (action.type) {
    case "change-theme":
      if (!isThemeName(action.theme)) return record;
      return Object.freeze({ ...record, theme: action.theme });
    case "toggle-scanlines":
      return Object.freeze({ ...record, scanlines: !record.scanlines });
    case "toggle-fps":
      return Object.freeze({ ...record, showFps: !record.showFps });
    case "set-brightness":
      return Object.freeze({ ...record, brightness: clampBrightness(action.value) });
    case "set-api-interval":
      if (!isApiInterval(action.value)) return record;
      return Object.freeze({ ...record, apiInterval: action.value });
    case "set-timeout":
      if (!isScreenTimeout(action.value)) return record;
      return Object.freeze({ ...record, screenTimeout: action.value });
    default: {
      // Tags outside the union can still arrive from untyped callers.
      const unhandled: never = action;
      void unhandled;
      return record;
    }
  }
}
