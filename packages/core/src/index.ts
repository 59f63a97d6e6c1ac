/**
 * @dnsboard/core
 *
 * Runtime-agnostic dashboard state and rendering logic.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors and logging
// =============================================================================

export { DashboardError, describeError, type DashboardErrorCode } from "./errors.js";
export {
  createLogger,
  isLogLevel,
  silentLogger,
  type CreateLoggerOptions,
  type LogFieldValue,
  type LogFields,
  type LogLevel,
  type LogRecord,
  type LogSink,
  type Logger,
} from "./logger.js";

// =============================================================================
// Drawing
// =============================================================================

export { pixelToCell, type CellPoint, type DisplaySize, type Surface } from "./drawApi.js";
export { mergeStyle, rgb, rgbB, rgbG, rgbR, type Rgb24, type TextStyle } from "./style.js";
export * from "./theme/index.js";

// =============================================================================
// Input and navigation
// =============================================================================

export type { Gesture, InputEvent, Point } from "./input/events.js";
export {
  DEFAULT_SWIPE_THRESHOLD,
  classifyGesture,
  createGestureClassifier,
  type GestureClassifier,
} from "./input/gesture.js";
export { resolveKeyCommand, type KeyCommand } from "./input/keybindings.js";
export {
  SCREEN_COUNT,
  SCREEN_ORDER,
  createNavigationState,
  currentScreenId,
  isTapAllowed,
  reduceNavigation,
  type NavigationAction,
  type NavigationState,
  type ScreenId,
} from "./navigation/navigation.js";

// =============================================================================
// Settings and configuration
// =============================================================================

export * from "./settings/types.js";
export {
  clampBrightness,
  isApiInterval,
  isScreenTimeout,
  reduceSettings,
  stepOption,
} from "./settings/reducer.js";
export { isValidKey, parseKeyValue, rewriteKeyValue } from "./settings/kvFile.js";
export {
  createSettingsStore,
  settingsToEntries,
  type CreateSettingsStoreOptions,
  type SettingsFile,
  type SettingsStore,
} from "./settings/store.js";
export {
  CONFIG_KEYS,
  DEFAULT_API_URL,
  DEFAULT_DISPLAY,
  DEFAULT_FPS,
  DEFAULT_SYSTEM_INTERVAL_S,
  DEFAULT_TOP_COUNT,
  parseDashboardConfig,
  type ConfigSource,
  type DashboardConfig,
} from "./config/config.js";

// =============================================================================
// Data, scheduling and power
// =============================================================================

export * from "./stats/types.js";
export {
  createRefreshScheduler,
  type RefreshClassSpec,
  type RefreshHandle,
  type RefreshScheduler,
} from "./scheduler/refreshScheduler.js";
export type {
  BacklightControl,
  DisplayPowerStrategy,
  PowerState,
  SavedBrightness,
  StrategyOutcome,
} from "./power/types.js";
export {
  createPowerManager,
  type CreatePowerManagerOptions,
  type PowerManager,
} from "./power/powerManager.js";

// =============================================================================
// Screens and controller
// =============================================================================

export * from "./screens/index.js";
export {
  createDashboardController,
  type DashboardController,
  type DashboardControllerDeps,
  type TickResult,
} from "./app/controller.js";
