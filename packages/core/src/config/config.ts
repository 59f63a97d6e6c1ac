/**
 * packages/core/src/config/config.ts — Dashboard configuration parsing.
 *
 * Every variable is optional and validated on its own. A value that cannot
 * be used is logged and replaced by its default; it never aborts startup.
 *
 *   DNSBOARD_THEME            theme preset name              (default)
 *   DNSBOARD_API_INTERVAL     seconds, one of 5/10/30/60     (5)
 *   DNSBOARD_SCREEN_TIMEOUT   minutes, one of 0/1/5/10/30    (0 = never)
 *   DNSBOARD_SCANLINES        on/off                         (on)
 *   DNSBOARD_SHOW_FPS         on/off                         (off)
 *   DNSBOARD_BRIGHTNESS       percent, clamped to 10..100    (100)
 *   DNSBOARD_SWIPE_THRESHOLD  pixels                         (50)
 *   DNSBOARD_DISPLAY_SIZE     WIDTHxHEIGHT pixels            (480x320)
 *   DNSBOARD_FPS              frames per second              (30)
 *   DNSBOARD_SYSTEM_INTERVAL  seconds between local metrics  (2)
 *   DNSBOARD_API_URL          statistics API base URL        (http://localhost/api)
 *   DNSBOARD_API_PASSWORD     statistics API password        (none)
 *   DNSBOARD_TOP_COUNT        rows on the top-N screens      (10)
 *   DNSBOARD_TOUCH_DEVICE     evdev touchscreen path         (none)
 *   DNSBOARD_TOUCH_MAX        raw touch axis maximum, XxY    (display size)
 */

import type { DisplaySize } from "../drawApi.js";
import { DEFAULT_SWIPE_THRESHOLD } from "../input/gesture.js";
import type { Logger } from "../logger.js";
import { clampBrightness, isApiInterval, isScreenTimeout } from "../settings/reducer.js";
import { DEFAULT_SETTINGS, SETTINGS_KEYS, type SettingsRecord } from "../settings/types.js";
import { isThemeName } from "../theme/index.js";

export type ConfigSource = Readonly<Record<string, string | undefined>>;

export type DashboardConfig = Readonly<{
  settings: SettingsRecord;
  swipeThreshold: number;
  display: DisplaySize;
  fps: number;
  systemIntervalMs: number;
  apiUrl: string;
  apiPassword: string;
  topCount: number;
  touchDevice: string | null;
  touchMax: DisplaySize;
}>;

export const CONFIG_KEYS = Object.freeze({
  ...SETTINGS_KEYS,
  swipeThreshold: "DNSBOARD_SWIPE_THRESHOLD",
  displaySize: "DNSBOARD_DISPLAY_SIZE",
  fps: "DNSBOARD_FPS",
  systemInterval: "DNSBOARD_SYSTEM_INTERVAL",
  apiUrl: "DNSBOARD_API_URL",
  apiPassword: "DNSBOARD_API_PASSWORD",
  topCount: "DNSBOARD_TOP_COUNT",
  touchDevice: "DNSBOARD_TOUCH_DEVICE",
  touchMax: "DNSBOARD_TOUCH_MAX",
} as const);

export const DEFAULT_DISPLAY: DisplaySize = Object.freeze({ width: 480, height: 320 });
export const DEFAULT_FPS = 30;
export const DEFAULT_SYSTEM_INTERVAL_S = 2;
export const DEFAULT_API_URL = "http://localhost/api";
export const DEFAULT_TOP_COUNT = 10;

const TRUE_WORDS: ReadonlySet<string> = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS: ReadonlySet<string> = new Set(["0", "false", "no", "off"]);

type Reader = Readonly<{
  text(key: string): string | null;
  integer(key: string, fallback: number): number;
  flag(key: string, fallback: boolean): boolean;
  size(key: string, fallback: DisplaySize): DisplaySize;
}>;

function createReader(source: ConfigSource, logger: Logger): Reader {
  const text = (key: string): string | null => {
    const raw = source[key];
    if (typeof raw !== "string") return null;
    const value = raw.trim();
    return value.length > 0 ? value : null;
  };

  const invalid = (key: string, value: string, fallback: string): void => {
    logger.warn("invalid config value, using default", { key, value, fallback });
  };

  return {
    text,
    integer(key, fallback) {
      const value = text(key);
      if (value === null) return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed)) {
        invalid(key, value, String(fallback));
        return fallback;
      }
      return parsed;
    },
    flag(key, fallback) {
      const value = text(key);
      if (value === null) return fallback;
      const norm = value.toLowerCase();
      if (TRUE_WORDS.has(norm)) return true;
      if (FALSE_WORDS.has(norm)) return false;
      invalid(key, value, fallback ? "on" : "off");
      return fallback;
    },
    size(key, fallback) {
      const value = text(key);
      if (value === null) return fallback;
      const match = /^(\d+)\s*[xX]\s*(\d+)$/.exec(value);
      const width = Number(match?.[1]);
      const height = Number(match?.[2]);
      if (!match || width <= 0 || height <= 0) {
        invalid(key, value, `${fallback.width}x${fallback.height}`);
        return fallback;
      }
      return Object.freeze({ width, height });
    },
  };
}

function readSettings(read: Reader, logger: Logger): SettingsRecord {
  const themeRaw = read.text(SETTINGS_KEYS.theme);
  let theme = DEFAULT_SETTINGS.theme;
  if (themeRaw !== null) {
    if (isThemeName(themeRaw)) {
      theme = themeRaw;
    } else {
      logger.warn("unknown theme, using default", { key: SETTINGS_KEYS.theme, value: themeRaw });
    }
  }

  let apiInterval = read.integer(SETTINGS_KEYS.apiInterval, DEFAULT_SETTINGS.apiInterval);
  if (!isApiInterval(apiInterval)) {
    logger.warn("api interval not supported, using default", {
      requested: apiInterval,
      used: DEFAULT_SETTINGS.apiInterval,
    });
    apiInterval = DEFAULT_SETTINGS.apiInterval;
  }

  let screenTimeout = read.integer(SETTINGS_KEYS.screenTimeout, DEFAULT_SETTINGS.screenTimeout);
  if (!isScreenTimeout(screenTimeout)) {
    logger.warn("screen timeout not supported, using default", {
      requested: screenTimeout,
      used: DEFAULT_SETTINGS.screenTimeout,
    });
    screenTimeout = DEFAULT_SETTINGS.screenTimeout;
  }

  const requestedBrightness = read.integer(SETTINGS_KEYS.brightness, DEFAULT_SETTINGS.brightness);
  const brightness = clampBrightness(requestedBrightness);
  if (brightness !== requestedBrightness) {
    logger.warn("brightness out of range, clamped", {
      requested: requestedBrightness,
      used: brightness,
    });
  }

  return Object.freeze({
    theme,
    apiInterval,
    screenTimeout,
    scanlines: read.flag(SETTINGS_KEYS.scanlines, DEFAULT_SETTINGS.scanlines),
    showFps: read.flag(SETTINGS_KEYS.showFps, DEFAULT_SETTINGS.showFps),
    brightness,
  });
}

function positive(
  key: string,
  value: number,
  fallback: number,
  logger: Logger,
): number {
  if (value > 0) return value;
  logger.warn("config value must be positive, using default", { key, value, fallback });
  return fallback;
}

export function parseDashboardConfig(source: ConfigSource, logger: Logger): DashboardConfig {
  const read = createReader(source, logger);
  const display = read.size(CONFIG_KEYS.displaySize, DEFAULT_DISPLAY);

  const swipe = read.integer(CONFIG_KEYS.swipeThreshold, DEFAULT_SWIPE_THRESHOLD);
  const fps = read.integer(CONFIG_KEYS.fps, DEFAULT_FPS);
  const systemInterval = read.integer(CONFIG_KEYS.systemInterval, DEFAULT_SYSTEM_INTERVAL_S);
  const topCount = read.integer(CONFIG_KEYS.topCount, DEFAULT_TOP_COUNT);

  return Object.freeze({
    settings: readSettings(read, logger),
    swipeThreshold: positive(CONFIG_KEYS.swipeThreshold, swipe, DEFAULT_SWIPE_THRESHOLD, logger),
    display,
    fps: positive(CONFIG_KEYS.fps, fps, DEFAULT_FPS, logger),
    systemIntervalMs:
      positive(CONFIG_KEYS.systemInterval, systemInterval, DEFAULT_SYSTEM_INTERVAL_S, logger) *
      1000,
    apiUrl: (read.text(CONFIG_KEYS.apiUrl) ?? DEFAULT_API_URL).replace(/\/+$/, ""),
    apiPassword: read.text(CONFIG_KEYS.apiPassword) ?? "",
    topCount: positive(CONFIG_KEYS.topCount, topCount, DEFAULT_TOP_COUNT, logger),
    touchDevice: read.text(CONFIG_KEYS.touchDevice),
    touchMax: read.size(CONFIG_KEYS.touchMax, display),
  });
}
