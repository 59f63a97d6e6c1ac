/**
 * Display power control types.
 */

/** Backlight value captured when a strategy blanked the panel by dimming it. */
export type SavedBrightness = Readonly<{
  /** Device path the value was read from and must be restored to. */
  path: string;
  value: number;
}>;

export type StrategyOutcome =
  | Readonly<{ ok: true; saved?: SavedBrightness }>
  | Readonly<{ ok: false; reason: string }>;

/**
 * One way of blanking/unblanking the physical display.
 *
 * Strategies report failure through their outcome; a strategy that throws is
 * treated the same as `{ ok: false }`.
 */
export interface DisplayPowerStrategy {
  readonly name: string;
  sleep(): Promise<StrategyOutcome>;
  wake(saved: SavedBrightness | null): Promise<StrategyOutcome>;
}

export type PowerState = Readonly<{
  asleep: boolean;
  /** Only meaningful while asleep. */
  savedBrightness: number | null;
  /** Only meaningful while asleep: device path holding savedBrightness. */
  activeStrategy: string | null;
  lastActivityMs: number;
}>;

/** Backlight level control, used for the brightness setting. */
export interface BacklightControl {
  setPercent(percent: number): Promise<boolean>;
}
