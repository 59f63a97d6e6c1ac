import type { CellPoint, Surface } from "../drawApi.js";
import type { ScreenId } from "../navigation/navigation.js";
import type { SettingsAction, SettingsRecord } from "../settings/types.js";
import type { HistoryPoint, Summary, SystemMetrics, TopList } from "../stats/types.js";
import type { Theme } from "../theme/index.js";

export type FrameInfo = Readonly<{ nowMs: number }>;

export type SurfaceSize = Pick<Surface, "cols" | "rows">;

/** What a tap on a screen asks the controller to do. */
export type ScreenCommand =
  | Readonly<{ kind: "settings"; action: SettingsAction }>
  | Readonly<{ kind: "toggle-lock" }>;

export interface Screen<D> {
  readonly id: ScreenId;
  readonly title: string;
  /** Called once per tick with the currently cached data. */
  update(data: D, nowMs: number): void;
  draw(surface: Surface, theme: Theme, frame: FrameInfo): void;
}

/** Optional capability: screens that react to taps. */
export interface TapHandler {
  handleTap(pos: CellPoint, size: SurfaceSize): ScreenCommand | null;
}

/** Optional capability: screens with a lock toggle hit area. */
export interface LockAreaProvider {
  inLockArea(pos: CellPoint, size: SurfaceSize): boolean;
}

export function isTapHandler<S extends object>(screen: S): screen is S & TapHandler {
  return "handleTap" in screen && typeof screen.handleTap === "function";
}

export function hasLockArea<S extends object>(screen: S): screen is S & LockAreaProvider {
  return "inLockArea" in screen && typeof screen.inLockArea === "function";
}

export type StatsData = Readonly<{ summary: Summary; ipAddress: string }>;

export type SettingsViewData = Readonly<{ settings: SettingsRecord; locked: boolean }>;

export type ScreenDataMap = {
  stats: StatsData;
  history: readonly HistoryPoint[];
  "top-blocked": TopList;
  "top-clients": TopList;
  system: SystemMetrics;
  settings: SettingsViewData;
};

export type DashboardScreens = { readonly [K in ScreenId]: Screen<ScreenDataMap[K]> };
