/**
 * packages/node/src/settings/settingsFile.ts — Settings file on disk.
 *
 * Writes go to a sibling temp file that is renamed over the target, so a
 * crash mid-write never leaves a truncated settings file behind. A temp file
 * whose rename failed is removed before the error is raised.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { DashboardError, type SettingsFile, describeError } from "@dnsboard/core";

export const DEFAULT_SETTINGS_PATH = "/etc/dnsboard/config";

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function createSettingsFile(path: string = DEFAULT_SETTINGS_PATH): SettingsFile {
  return {
    path,
    async read() {
      try {
        return await readFile(path, "utf8");
      } catch (error: unknown) {
        if (isNotFound(error)) return null;
        throw new DashboardError("IO_FAILED", `cannot read ${path}: ${describeError(error)}`, {
          cause: error,
        });
      }
    },
    async write(text) {
      const tmp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
      let tmpWritten = false;
      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(tmp, text, { encoding: "utf8", mode: 0o600 });
        tmpWritten = true;
        await rename(tmp, path);
      } catch (error: unknown) {
        if (tmpWritten) await rm(tmp, { force: true });
        throw new DashboardError("IO_FAILED", `cannot write ${path}: ${describeError(error)}`, {
          cause: error,
        });
      }
    },
  };
}
