/**
 * Settings record and the actions that mutate it.
 */

export const API_INTERVAL_OPTIONS = Object.freeze([5, 10, 30, 60] as const);
export const SCREEN_TIMEOUT_OPTIONS = Object.freeze([0, 1, 5, 10, 30] as const);

export const BRIGHTNESS_MIN = 10;
export const BRIGHTNESS_MAX = 100;
export const BRIGHTNESS_STEP = 10;

export type SettingsRecord = Readonly<{
  theme: string;
  /** Seconds between statistics refreshes; one of API_INTERVAL_OPTIONS. */
  apiInterval: number;
  /** Minutes of inactivity before the display sleeps; 0 = never. */
  screenTimeout: number;
  scanlines: boolean;
  showFps: boolean;
  /** Backlight percent in [BRIGHTNESS_MIN, BRIGHTNESS_MAX]. */
  brightness: number;
}>;

export type SettingsAction =
  | Readonly<{ type: "change-theme"; theme: string }>
  | Readonly<{ type: "toggle-scanlines" }>
  | Readonly<{ type: "toggle-fps" }>
  | Readonly<{ type: "set-brightness"; value: number }>
  | Readonly<{ type: "set-api-interval"; value: number }>
  | Readonly<{ type: "set-timeout"; value: number }>;

export const DEFAULT_SETTINGS: SettingsRecord = Object.freeze({
  theme: "default",
  apiInterval: 5,
  screenTimeout: 0,
  scanlines: true,
  showFps: false,
  brightness: 100,
});

/** Settings file keys managed by the store, in record-field order. */
export const SETTINGS_KEYS = Object.freeze({
  theme: "DNSBOARD_THEME",
  apiInterval: "DNSBOARD_API_INTERVAL",
  screenTimeout: "DNSBOARD_SCREEN_TIMEOUT",
  scanlines: "DNSBOARD_SCANLINES",
  showFps: "DNSBOARD_SHOW_FPS",
  brightness: "DNSBOARD_BRIGHTNESS",
} as const satisfies Record<keyof SettingsRecord, string>);

export type PersistResult =
  | Readonly<{ ok: true; path: string }>
  | Readonly<{ ok: false; error: string }>;
