/**
 * packages/node/src/power/backlight.ts — Brightness setting to hardware.
 *
 * The percent is scaled by the device's max_brightness; the first device
 * that accepts the write wins.
 */

import { type BacklightControl, type Logger, describeError, silentLogger } from "@dnsboard/core";
import { readInt, underRoot, writeValue } from "./sysfs.js";
import { BACKLIGHT_CLASS_DIR } from "./sysfsStrategies.js";

export const BRIGHTNESS_DEVICES = Object.freeze(["rpi_backlight", "10-0045", "backlight"] as const);

/** Raw device level for `percent` of `max` (truncated). */
export function scaleBrightness(percent: number, max: number): number {
  const clamped = Math.min(100, Math.max(0, percent));
  return Math.floor((clamped / 100) * max);
}

export function createBacklightControl(
  opts: Readonly<{ root?: string; logger?: Logger }> = {},
): BacklightControl {
  const root = opts.root ?? "";
  const logger = opts.logger ?? silentLogger;

  return {
    async setPercent(percent) {
      for (const device of BRIGHTNESS_DEVICES) {
        const dir = underRoot(root, `${BACKLIGHT_CLASS_DIR}/${device}`);
        try {
          const max = await readInt(`${dir}/max_brightness`);
          const value = scaleBrightness(percent, max);
          await writeValue(`${dir}/brightness`, value);
          logger.debug("backlight set", { device, percent, value });
          return true;
        } catch (error: unknown) {
          logger.debug("backlight device unavailable", { device, error: describeError(error) });
        }
      }
      return false;
    },
  };
}
