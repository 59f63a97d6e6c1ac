/**
 * packages/core/src/settings/store.ts — In-memory settings with
 * merge-on-write persistence.
 *
 * `persist()` re-reads the file right before writing so keys this store
 * does not manage (API credentials, display size, ...) survive untouched.
 */

import { describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { rewriteKeyValue } from "./kvFile.js";
import { reduceSettings } from "./reducer.js";
import {
  type PersistResult,
  SETTINGS_KEYS,
  type SettingsAction,
  type SettingsRecord,
} from "./types.js";

/** Backing storage for the settings file. */
export interface SettingsFile {
  readonly path: string;
  /** Current contents, or null when the file does not exist yet. */
  read(): Promise<string | null>;
  write(text: string): Promise<void>;
}

export interface SettingsStore {
  get(): SettingsRecord;
  /** Apply one action; returns the resulting record. */
  apply(action: SettingsAction): SettingsRecord;
  persist(): Promise<PersistResult>;
}

export type CreateSettingsStoreOptions = Readonly<{
  initial: SettingsRecord;
  file: SettingsFile;
  logger?: Logger;
}>;

export function settingsToEntries(record: SettingsRecord): Record<string, string> {
  return {
    [SETTINGS_KEYS.theme]: record.theme,
    [SETTINGS_KEYS.apiInterval]: String(record.apiInterval),
    [SETTINGS_KEYS.screenTimeout]: String(record.screenTimeout),
    [SETTINGS_KEYS.scanlines]: record.scanlines ? "1" : "0",
    [SETTINGS_KEYS.showFps]: record.showFps ? "1" : "0",
    [SETTINGS_KEYS.brightness]: String(record.brightness),
  };
}

export function createSettingsStore(opts: CreateSettingsStoreOptions): SettingsStore {
  const logger = opts.logger ?? silentLogger;
  let current: SettingsRecord = Object.freeze({ ...opts.initial });

  return {
    get() {
      return current;
    },
    apply(action) {
      const next = reduceSettings(current, action);
      if (next !== current) {
        logger.debug("settings changed", { action: action.type });
      }
      current = next;
      return current;
    },
    async persist() {
      try {
        const existing = await opts.file.read();
        await opts.file.write(rewriteKeyValue(existing ?? "", settingsToEntries(current)));
        logger.info("settings saved", { path: opts.file.path });
        return Object.freeze({ ok: true, path: opts.file.path });
      } catch (error: unknown) {
        const detail = describeError(error);
        logger.warn("settings save failed", { path: opts.file.path, error: detail });
        return Object.freeze({ ok: false, error: detail });
      }
    },
  };
}
