/**
 * packages/core/src/app/controller.ts — Dashboard runtime controller.
 *
 * Owns every piece of mutable dashboard state and advances it one tick at a
 * time:
 *
 *   drain input -> navigation / screen taps -> scheduler -> screen updates
 *     -> idle check -> render (skipped while asleep)
 *
 * The controller never sleeps or reads the clock itself; the frame loop
 * passes `nowMs` and the input drained since the previous tick.
 */

import type { DashboardConfig } from "../config/config.js";
import { describeError } from "../errors.js";
import { type Surface, pixelToCell } from "../drawApi.js";
import type { InputEvent, Point } from "../input/events.js";
import { createGestureClassifier } from "../input/gesture.js";
import { resolveKeyCommand } from "../input/keybindings.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import {
  type NavigationAction,
  type NavigationState,
  SCREEN_COUNT,
  type ScreenId,
  createNavigationState,
  currentScreenId,
  isTapAllowed,
  reduceNavigation,
} from "../navigation/navigation.js";
import type { PowerManager } from "../power/powerManager.js";
import type { BacklightControl } from "../power/types.js";
import {
  type RefreshHandle,
  type RefreshScheduler,
  createRefreshScheduler,
} from "../scheduler/refreshScheduler.js";
import { drawFps, drawIndicators, drawScanlines } from "../screens/chrome.js";
import { createScreens } from "../screens/index.js";
import {
  type DashboardScreens,
  type ScreenCommand,
  hasLockArea,
  isTapHandler,
} from "../screens/types.js";
import type { SettingsStore } from "../settings/store.js";
import type { SettingsAction, SettingsRecord } from "../settings/types.js";
import {
  EMPTY_HISTORY,
  EMPTY_SUMMARY,
  EMPTY_SYSTEM_METRICS,
  EMPTY_TOP_LIST,
  type HistoryPoint,
  type StatisticsClient,
  type Summary,
  type SystemMetrics,
  type SystemMetricsSource,
  type TopList,
} from "../stats/types.js";
import { type Theme, themeByName } from "../theme/index.js";

const FPS_WINDOW = 30;

export type DashboardControllerDeps = Readonly<{
  config: DashboardConfig;
  settings: SettingsStore;
  stats: StatisticsClient;
  system: SystemMetricsSource;
  power: PowerManager;
  surface: Surface;
  backlight?: BacklightControl;
  logger?: Logger;
  scheduler?: RefreshScheduler;
  screens?: DashboardScreens;
  version?: string;
}>;

export type TickResult = Readonly<{
  rendered: boolean;
  quit: boolean;
  /** Refresh classes fetched during this tick. */
  fetched: readonly string[];
}>;

export interface DashboardController {
  /** Apply startup side effects (initial backlight level). */
  start(): Promise<void>;
  tick(nowMs: number, events: readonly InputEvent[]): Promise<TickResult>;
  navigation(): NavigationState;
  currentScreen(): ScreenId;
  theme(): Theme;
  /** Frames per second over the recent render window; 0 before two frames. */
  fps(): number;
}

type DataHandles = Readonly<{
  summary: RefreshHandle<Summary>;
  history: RefreshHandle<readonly HistoryPoint[]>;
  topBlocked: RefreshHandle<TopList>;
  topClients: RefreshHandle<TopList>;
  system: RefreshHandle<SystemMetrics>;
}>;

function registerDataClasses(
  scheduler: RefreshScheduler,
  deps: DashboardControllerDeps,
  apiIntervalMs: number,
): DataHandles {
  const { stats, system, config } = deps;
  return Object.freeze({
    summary: scheduler.register("summary", {
      intervalMs: apiIntervalMs,
      initial: EMPTY_SUMMARY,
      fetch: () => stats.getSummary(),
    }),
    history: scheduler.register("history", {
      intervalMs: apiIntervalMs,
      initial: EMPTY_HISTORY,
      fetch: () => stats.getHistory(),
    }),
    topBlocked: scheduler.register("top-blocked", {
      intervalMs: apiIntervalMs,
      initial: EMPTY_TOP_LIST,
      fetch: () => stats.getTopBlocked(config.topCount),
    }),
    topClients: scheduler.register("top-clients", {
      intervalMs: apiIntervalMs,
      initial: EMPTY_TOP_LIST,
      fetch: () => stats.getTopClients(config.topCount),
    }),
    system: scheduler.register("system", {
      intervalMs: config.systemIntervalMs,
      initial: EMPTY_SYSTEM_METRICS,
      fetch: () => system.read(),
    }),
  });
}

export function createDashboardController(deps: DashboardControllerDeps): DashboardController {
  const logger = (deps.logger ?? silentLogger).child("controller");
  const { power, surface, config } = deps;
  const scheduler = deps.scheduler ?? createRefreshScheduler({ logger });
  const screens = deps.screens ?? createScreens({ version: deps.version ?? "0.0.0" });
  const gesture = createGestureClassifier(config.swipeThreshold);
  const handles = registerDataClasses(scheduler, deps, deps.settings.get().apiInterval * 1000);

  let nav = createNavigationState();
  let theme = themeByName(deps.settings.get().theme);
  const frameTimes: number[] = [];

  const navigate = (action: NavigationAction): void => {
    nav = reduceNavigation(nav, action);
    logger.debug("navigate", { screen: currentScreenId(nav) });
  };

  const applyBrightness = async (percent: number): Promise<void> => {
    if (!deps.backlight) return;
    try {
      const ok = await deps.backlight.setPercent(percent);
      if (!ok) logger.debug("no backlight device accepted brightness", { percent });
    } catch (error: unknown) {
      logger.warn("backlight update failed", { percent, error: describeError(error) });
    }
  };

  const propagate = async (before: SettingsRecord, after: SettingsRecord): Promise<void> => {
    if (after.theme !== before.theme) {
      theme = themeByName(after.theme);
    }
    if (after.apiInterval !== before.apiInterval) {
      const intervalMs = after.apiInterval * 1000;
      handles.summary.setInterval(intervalMs);
      handles.history.setInterval(intervalMs);
      handles.topBlocked.setInterval(intervalMs);
      handles.topClients.setInterval(intervalMs);
    }
    if (after.brightness !== before.brightness) {
      await applyBrightness(after.brightness);
    }
  };

  const applySettingsAction = async (action: SettingsAction): Promise<void> => {
    const before = deps.settings.get();
    const after = deps.settings.apply(action);
    if (after !== before) await propagate(before, after);
  };

  const runCommand = async (command: ScreenCommand): Promise<void> => {
    switch (command.kind) {
      case "settings":
        await applySettingsAction(command.action);
        return;
      case "toggle-lock": {
        const wasLocked = nav.locked;
        navigate({ type: "toggle-lock" });
        if (!wasLocked && nav.locked) {
          await deps.settings.persist();
        }
        return;
      }
      default: {
        const unhandled: never = command;
        void unhandled;
      }
    }
  };

  const syncSettingsScreen = (nowMs: number): void => {
    screens.settings.update({ settings: deps.settings.get(), locked: nav.locked }, nowMs);
  };

  const handleTap = async (pos: Point, nowMs: number): Promise<void> => {
    // Earlier events in this batch may have changed the lock or the values.
    syncSettingsScreen(nowMs);
    const cell = pixelToCell(pos, config.display, surface);
    const screen = screens[currentScreenId(nav)];
    const inLockArea = hasLockArea(screen) && screen.inLockArea(cell, surface);
    if (!isTapAllowed(nav, inLockArea)) {
      logger.debug("tap ignored while locked", { col: cell.col, row: cell.row });
      return;
    }
    if (!isTapHandler(screen)) return;
    const command = screen.handleTap(cell, surface);
    if (command) await runCommand(command);
  };

  const handleKey = (key: string): boolean => {
    switch (resolveKeyCommand(key)) {
      case "next-screen":
        navigate({ type: "next" });
        return false;
      case "previous-screen":
        navigate({ type: "previous" });
        return false;
      case "quit":
        return true;
      case undefined:
        return false;
    }
  };

  /** Returns true when the event asks the controller to stop. */
  const handleEvent = async (event: InputEvent, nowMs: number): Promise<boolean> => {
    if (event.kind === "quit") return true;
    power.recordActivity(nowMs);

    if (power.isAsleep()) {
      // The waking event only wakes; it never reaches navigation or screens.
      if (event.kind === "pointer-down" || event.kind === "key-down") {
        gesture.cancel();
        await power.wake();
      }
      return false;
    }

    switch (event.kind) {
      case "pointer-down":
        gesture.pointerDown(event.pos);
        return false;
      case "pointer-up": {
        const result = gesture.pointerUp(event.pos);
        if (result === null) return false;
        if (result.kind === "swipe-left") navigate({ type: "next" });
        else if (result.kind === "swipe-right") navigate({ type: "previous" });
        else await handleTap(result.pos, nowMs);
        return false;
      }
      case "key-down":
        return handleKey(event.key);
    }
  };

  const updateScreens = (nowMs: number): void => {
    const system = handles.system.value;
    screens.stats.update({ summary: handles.summary.value, ipAddress: system.ipAddress }, nowMs);
    screens.history.update(handles.history.value, nowMs);
    screens["top-blocked"].update(handles.topBlocked.value, nowMs);
    screens["top-clients"].update(handles.topClients.value, nowMs);
    screens.system.update(system, nowMs);
    syncSettingsScreen(nowMs);
  };

  const measureFps = (): number => {
    const first = frameTimes[0];
    const last = frameTimes[frameTimes.length - 1];
    if (first === undefined || last === undefined || last <= first) return 0;
    return ((frameTimes.length - 1) * 1000) / (last - first);
  };

  const render = (nowMs: number): void => {
    frameTimes.push(nowMs);
    if (frameTimes.length > FPS_WINDOW) frameTimes.shift();

    const current = deps.settings.get();
    screens[currentScreenId(nav)].draw(surface, theme, { nowMs });
    drawIndicators(surface, theme, nav.current, SCREEN_COUNT);
    if (current.scanlines) drawScanlines(surface);
    if (current.showFps) drawFps(surface, theme, measureFps());
    surface.present();
  };

  return {
    async start() {
      const { brightness } = deps.settings.get();
      if (brightness !== 100) await applyBrightness(brightness);
    },
    async tick(nowMs, events) {
      let quit = false;
      for (const event of events) {
        if (await handleEvent(event, nowMs)) {
          quit = true;
          break;
        }
      }
      if (quit) return Object.freeze({ rendered: false, quit: true, fetched: [] });
      if (power.isAsleep()) return Object.freeze({ rendered: false, quit: false, fetched: [] });

      const fetched = await scheduler.tick(nowMs);
      updateScreens(nowMs);

      if (power.shouldSleep(nowMs, deps.settings.get().screenTimeout)) {
        await power.sleep();
        frameTimes.length = 0;
        return Object.freeze({ rendered: false, quit: false, fetched });
      }

      render(nowMs);
      return Object.freeze({ rendered: true, quit: false, fetched });
    },
    navigation() {
      return nav;
    },
    currentScreen() {
      return currentScreenId(nav);
    },
    theme() {
      return theme;
    },
    fps() {
      return measureFps();
    },
  };
}
