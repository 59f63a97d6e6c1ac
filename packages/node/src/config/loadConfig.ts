/**
 * packages/node/src/config/loadConfig.ts — Startup configuration.
 *
 * Precedence: defaults < process environment < settings file. The settings
 * file is what the dashboard itself writes on lock, so saved values win over
 * a stale environment.
 */

import { readFileSync } from "node:fs";
import {
  type ConfigSource,
  type DashboardConfig,
  type Logger,
  describeError,
  parseDashboardConfig,
  parseKeyValue,
} from "@dnsboard/core";
import { DEFAULT_SETTINGS_PATH, isNotFound } from "../settings/settingsFile.js";

export const CONFIG_FILE_ENV = "DNSBOARD_CONFIG_FILE";

export type LoadedConfig = Readonly<{
  config: DashboardConfig;
  settingsPath: string;
}>;

export function resolveSettingsPath(env: ConfigSource): string {
  return env[CONFIG_FILE_ENV]?.trim() || DEFAULT_SETTINGS_PATH;
}

function readSettingsEntries(path: string, logger: Logger): ReadonlyMap<string, string> {
  try {
    return parseKeyValue(readFileSync(path, "utf8"));
  } catch (error: unknown) {
    if (!isNotFound(error)) {
      logger.warn("settings file unreadable, using environment only", {
        path,
        error: describeError(error),
      });
    }
    return new Map();
  }
}

export function loadDashboardConfig(env: ConfigSource, logger: Logger): LoadedConfig {
  const settingsPath = resolveSettingsPath(env);
  const merged: Record<string, string | undefined> = { ...env };
  for (const [key, value] of readSettingsEntries(settingsPath, logger)) {
    merged[key] = value;
  }
  return Object.freeze({ config: parseDashboardConfig(merged, logger), settingsPath });
}
