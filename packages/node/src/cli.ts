#!/usr/bin/env -S node --import tsx
/**
 * packages/node/src/cli.ts — Kiosk entry point.
 *
 * Wires configuration, hardware, the statistics API and the terminal into a
 * dashboard controller, then runs the frame loop until quit or a signal.
 * The terminal is always restored on the way out.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { argv, env, exit, stderr, stdin, stdout } from "node:process";
import { fileURLToPath } from "node:url";
import {
  DashboardError,
  type Logger,
  createDashboardController,
  createPowerManager,
  createSettingsStore,
  describeError,
} from "@dnsboard/core";
import terminalSize from "terminal-size";
import { createStatsClient } from "./api/statsClient.js";
import { loadDashboardConfig } from "./config/loadConfig.js";
import { type EvdevSource, createEvdevDecoder, openEvdevSource } from "./input/evdev.js";
import { createInputQueue } from "./input/inputQueue.js";
import { cellCenterToPixel, decodeTerminalInput } from "./input/terminalInput.js";
import { createLoggerFromEnv } from "./logging/logSinks.js";
import { createSystemMetricsSource } from "./metrics/systemMetrics.js";
import { createBacklightControl } from "./power/backlight.js";
import { createDisplayPowerStrategies } from "./power/sysfsStrategies.js";
import { runFrameLoop } from "./runtime/frameLoop.js";
import { createSettingsFile } from "./settings/settingsFile.js";
import { createTerminalSurface } from "./terminal/terminalSurface.js";

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../package.json", import.meta.url), "utf8"),
    );
    if (typeof raw === "object" && raw !== null && "version" in raw) {
      const { version } = raw;
      if (typeof version === "string") return version;
    }
  } catch (error: unknown) {
    stderr.write(`dnsboard: could not read package version: ${describeError(error)}\n`);
  }
  return "0.0.0";
}

export async function runDashboard(logger: Logger): Promise<void> {
  if (!stdout.isTTY) {
    throw new DashboardError("STARTUP_FAILED", "stdout is not a terminal");
  }

  const { config, settingsPath } = loadDashboardConfig(env, logger);
  const size = terminalSize();
  const useMouse = config.touchDevice === null;
  const queue = createInputQueue();
  const surface = createTerminalSurface({
    cols: size.columns,
    rows: size.rows,
    output: stdout,
    mouse: useMouse,
  });
  const settings = createSettingsStore({
    initial: config.settings,
    file: createSettingsFile(settingsPath),
    logger: logger.child("settings"),
  });
  const power = createPowerManager({
    strategies: createDisplayPowerStrategies(),
    now: Date.now,
    logger: logger.child("power"),
  });
  const controller = createDashboardController({
    config,
    settings,
    stats: createStatsClient({
      baseUrl: config.apiUrl,
      password: config.apiPassword,
      logger: logger.child("api"),
    }),
    system: createSystemMetricsSource({ logger: logger.child("system") }),
    power,
    surface,
    backlight: createBacklightControl({ logger: logger.child("backlight") }),
    logger,
    version: readVersion(),
  });

  const abort = new AbortController();
  const stop = (): void => abort.abort();
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);

  const toPixel = cellCenterToPixel(config.display, surface);
  const onKeys = (data: string): void => {
    queue.push(decodeTerminalInput(data, useMouse ? toPixel : undefined));
  };

  let touch: EvdevSource | null = null;
  if (config.touchDevice !== null) {
    const decoder = createEvdevDecoder({ touchMax: config.touchMax, display: config.display });
    touch = openEvdevSource(config.touchDevice, decoder, (events) => queue.push(events), logger);
  }

  if (stdin.isTTY) stdin.setRawMode(true);
  stdin.setEncoding("utf8");
  stdin.on("data", onKeys);
  surface.open();

  try {
    await controller.start();
    const result = await runFrameLoop({
      controller,
      queue,
      fps: config.fps,
      signal: abort.signal,
      logger,
    });
    logger.info("dashboard stopped", { reason: result.reason, frames: result.frames });
  } finally {
    surface.close();
    stdin.off("data", onKeys);
    if (stdin.isTTY) stdin.setRawMode(false);
    stdin.pause();
    touch?.close();
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
    if (power.isAsleep()) await power.wake();
  }
}

const isMain = argv[1] !== undefined && fileURLToPath(import.meta.url) === resolve(argv[1]);
if (isMain) {
  const logger = createLoggerFromEnv({ env });
  runDashboard(logger).catch((err: unknown) => {
    logger.error("dashboard failed", { error: describeError(err) });
    stderr.write(`dnsboard error: ${err instanceof Error ? err.message : String(err)}\n`);
    exit(1);
  });
}
