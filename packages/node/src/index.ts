/**
 * @dnsboard/node
 *
 * Node.js backend: hardware access, input devices, terminal output and the
 * frame loop that drives the core controller.
 */

export {
  REQUEST_TIMEOUT_MS,
  createStatsClient,
  normalizeHistory,
  normalizeSummary,
  normalizeTopBlocked,
  normalizeTopClients,
  type FetchLike,
  type StatsClientOptions,
  type StatsHttpClient,
} from "./api/statsClient.js";
export {
  CONFIG_FILE_ENV,
  loadDashboardConfig,
  resolveSettingsPath,
  type LoadedConfig,
} from "./config/loadConfig.js";
export * from "./input/evdev.js";
export {
  DEFAULT_QUEUE_LIMIT,
  createInputQueue,
  type InputQueue,
} from "./input/inputQueue.js";
export {
  cellCenterToPixel,
  decodeTerminalInput,
  type CellToPixel,
} from "./input/terminalInput.js";
export {
  DEFAULT_LOG_PATH,
  createFileSink,
  createLoggerFromEnv,
  createStreamSink,
  formatLogLine,
  type LineWriter,
  type LoggerFromEnvOptions,
} from "./logging/logSinks.js";
export {
  FAN_RPM_PATHS,
  cpuPercentBetween,
  createSystemMetricsSource,
  firstIpv4,
  parseCpuSample,
  parseMeminfo,
  type CpuSample,
  type DiskUsage,
  type SystemMetricsOptions,
} from "./metrics/systemMetrics.js";
export { BRIGHTNESS_DEVICES, createBacklightControl, scaleBrightness } from "./power/backlight.js";
export {
  BACKLIGHT_CLASS_DIR,
  BACKLIGHT_DEVICES,
  DPMS_TIMEOUT_MS,
  FRAMEBUFFER_BLANK_PATH,
  createBacklightBrightnessStrategy,
  createBacklightPowerStrategy,
  createDisplayPowerStrategies,
  createDpmsStrategy,
  createFramebufferStrategy,
  execFileRunner,
  type CommandRunner,
  type SysfsStrategyOptions,
} from "./power/sysfsStrategies.js";
export {
  frameIntervalMs,
  runFrameLoop,
  type FrameLoopOptions,
  type FrameLoopResult,
} from "./runtime/frameLoop.js";
export {
  DEFAULT_SETTINGS_PATH,
  createSettingsFile,
  isNotFound,
} from "./settings/settingsFile.js";
export {
  createTerminalSurface,
  serializeRow,
  styleToSgr,
  type TerminalSurface,
  type TerminalSurfaceOptions,
  type TerminalWriter,
} from "./terminal/terminalSurface.js";
