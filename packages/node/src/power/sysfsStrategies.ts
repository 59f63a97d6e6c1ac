/**
 * packages/node/src/power/sysfsStrategies.ts — Display blanking strategies.
 *
 * Default order (sleep runs it forwards, wake backwards):
 *   1. framebuffer blank         /sys/class/graphics/fb0/blank
 *   2. backlight power           /sys/class/backlight/<dev>/bl_power
 *   3. backlight brightness -> 0 /sys/class/backlight/<dev>/brightness (value saved)
 *   4. DPMS                      xset dpms force off|on on DISPLAY=:0
 *
 * Within one strategy, candidate devices are tried in order until one
 * accepts the write.
 */

import { execFile } from "node:child_process";
import {
  type DisplayPowerStrategy,
  type SavedBrightness,
  type StrategyOutcome,
  describeError,
} from "@dnsboard/core";
import { readInt, underRoot, writeValue } from "./sysfs.js";

export const FRAMEBUFFER_BLANK_PATH = "/sys/class/graphics/fb0/blank";
export const BACKLIGHT_CLASS_DIR = "/sys/class/backlight";
export const BACKLIGHT_DEVICES = Object.freeze([
  "rpi_backlight",
  "10-0045",
  "soc:backlight",
  "backlight",
] as const);
export const DPMS_TIMEOUT_MS = 2000;

export type CommandRunner = (
  command: string,
  args: readonly string[],
  opts: Readonly<{ env: NodeJS.ProcessEnv; timeoutMs: number }>,
) => Promise<void>;

export type SysfsStrategyOptions = Readonly<{
  /** Prefix for every device path; tests point this at a temp directory. */
  root?: string;
  /** Runs the DPMS command. */
  run?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}>;

const OK: StrategyOutcome = Object.freeze({ ok: true });

function failed(reason: string): StrategyOutcome {
  return Object.freeze({ ok: false, reason });
}

export const execFileRunner: CommandRunner = (command, args, opts) =>
  new Promise((resolve, reject) => {
    execFile(command, [...args], { env: opts.env, timeout: opts.timeoutMs }, (error) => {
      if (error) reject(error);
      else resolve();
    });
  });

async function firstAccepting(
  paths: readonly string[],
  attempt: (path: string) => Promise<StrategyOutcome>,
): Promise<StrategyOutcome> {
  const reasons: string[] = [];
  for (const path of paths) {
    try {
      const outcome = await attempt(path);
      if (outcome.ok) return outcome;
      reasons.push(outcome.reason);
    } catch (error: unknown) {
      reasons.push(describeError(error));
    }
  }
  return failed(reasons.length > 0 ? reasons.join("; ") : "no candidate devices");
}

function backlightPaths(root: string, file: string): readonly string[] {
  return BACKLIGHT_DEVICES.map((device) =>
    underRoot(root, `${BACKLIGHT_CLASS_DIR}/${device}/${file}`),
  );
}

export function createFramebufferStrategy(opts: SysfsStrategyOptions = {}): DisplayPowerStrategy {
  const path = underRoot(opts.root ?? "", FRAMEBUFFER_BLANK_PATH);
  return {
    name: "framebuffer",
    sleep: () =>
      firstAccepting([path], async (p) => {
        await writeValue(p, 1);
        return OK;
      }),
    wake: () =>
      firstAccepting([path], async (p) => {
        await writeValue(p, 0);
        return OK;
      }),
  };
}

export function createBacklightPowerStrategy(opts: SysfsStrategyOptions = {}): DisplayPowerStrategy {
  const paths = backlightPaths(opts.root ?? "", "bl_power");
  return {
    name: "backlight-power",
    sleep: () =>
      firstAccepting(paths, async (p) => {
        await writeValue(p, 1);
        return OK;
      }),
    wake: () =>
      firstAccepting(paths, async (p) => {
        await writeValue(p, 0);
        return OK;
      }),
  };
}

export function createBacklightBrightnessStrategy(
  opts: SysfsStrategyOptions = {},
): DisplayPowerStrategy {
  const paths = backlightPaths(opts.root ?? "", "brightness");
  return {
    name: "backlight-brightness",
    sleep: () =>
      firstAccepting(paths, async (p) => {
        const previous = await readInt(p);
        await writeValue(p, 0);
        const saved: SavedBrightness = Object.freeze({ path: p, value: previous });
        return Object.freeze({ ok: true, saved });
      }),
    async wake(saved) {
      if (saved === null) return failed("no saved brightness");
      return firstAccepting([saved.path], async (p) => {
        await writeValue(p, saved.value);
        return OK;
      });
    },
  };
}

export function createDpmsStrategy(opts: SysfsStrategyOptions = {}): DisplayPowerStrategy {
  const run = opts.run ?? execFileRunner;
  const env: NodeJS.ProcessEnv = { ...(opts.env ?? process.env), DISPLAY: ":0" };
  const force = async (state: "on" | "off"): Promise<StrategyOutcome> => {
    try {
      await run("xset", ["dpms", "force", state], { env, timeoutMs: DPMS_TIMEOUT_MS });
      return OK;
    } catch (error: unknown) {
      return failed(describeError(error));
    }
  };
  return {
    name: "dpms",
    sleep: () => force("off"),
    wake: () => force("on"),
  };
}

/** Every strategy in default order. */
export function createDisplayPowerStrategies(
  opts: SysfsStrategyOptions = {},
): readonly DisplayPowerStrategy[] {
  return Object.freeze([
    createFramebufferStrategy(opts),
    createBacklightPowerStrategy(opts),
    createBacklightBrightnessStrategy(opts),
    createDpmsStrategy(opts),
  ]);
}
