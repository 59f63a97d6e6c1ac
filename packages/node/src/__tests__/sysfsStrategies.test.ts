import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { createPowerManager } from "@dnsboard/core";
import { assert, describe, test, withTempDir } from "@dnsboard/testkit";
import {
  type CommandRunner,
  createBacklightBrightnessStrategy,
  createBacklightPowerStrategy,
  createDisplayPowerStrategies,
  createDpmsStrategy,
  createFramebufferStrategy,
} from "../power/sysfsStrategies.js";

function put(root: string, path: string, text: string): string {
  const full = join(root, path);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, text);
  return full;
}

const read = (path: string) => readFileSync(path, "utf8");

function recordingRunner(fail = false) {
  const calls: string[] = [];
  const run: CommandRunner = async (command, args, opts) => {
    calls.push(`${command} ${args.join(" ")} DISPLAY=${opts.env.DISPLAY ?? ""}`);
    if (fail) throw new Error("xset: unable to open display");
  };
  return { calls, run };
}

describe("framebuffer strategy", () => {
  test("writes 1 to blank and 0 to unblank", async () => {
    await withTempDir(async (root) => {
      const blank = put(root, "/sys/class/graphics/fb0/blank", "0");
      const strategy = createFramebufferStrategy({ root });
      assert.deepEqual(await strategy.sleep(), { ok: true });
      assert.equal(read(blank), "1");
      assert.deepEqual(await strategy.wake(null), { ok: true });
      assert.equal(read(blank), "0");
    });
  });

  test("reports failure when the device is missing", async () => {
    await withTempDir(async (root) => {
      const outcome = await createFramebufferStrategy({ root }).sleep();
      assert.equal(outcome.ok, false);
    });
  });
});

describe("backlight power strategy", () => {
  test("uses the first device that accepts the write", async () => {
    await withTempDir(async (root) => {
      mkdirSync(join(root, "/sys/class/backlight/10-0045"), { recursive: true });
      const strategy = createBacklightPowerStrategy({ root });
      assert.deepEqual(await strategy.sleep(), { ok: true });
      assert.equal(read(join(root, "/sys/class/backlight/10-0045/bl_power")), "1");
      await strategy.wake(null);
      assert.equal(read(join(root, "/sys/class/backlight/10-0045/bl_power")), "0");
    });
  });

  test("joins every candidate's reason when none accepts", async () => {
    await withTempDir(async (root) => {
      const outcome = await createBacklightPowerStrategy({ root }).sleep();
      assert.equal(outcome.ok, false);
      if (!outcome.ok) assert.equal(outcome.reason.split("; ").length, 4);
    });
  });
});

describe("backlight brightness strategy", () => {
  test("saves the level on sleep and restores it to the same device", async () => {
    await withTempDir(async (root) => {
      const level = put(root, "/sys/class/backlight/rpi_backlight/brightness", "180\n");
      const strategy = createBacklightBrightnessStrategy({ root });
      const outcome = await strategy.sleep();
      assert.deepEqual(outcome, { ok: true, saved: { path: level, value: 180 } });
      assert.equal(read(level), "0");

      assert.deepEqual(await strategy.wake({ path: level, value: 180 }), { ok: true });
      assert.equal(read(level), "180");
    });
  });

  test("wake without a saved level fails", async () => {
    const outcome = await createBacklightBrightnessStrategy({ root: "/nonexistent" }).wake(null);
    assert.deepEqual(outcome, { ok: false, reason: "no saved brightness" });
  });

  test("an unreadable level is a failure", async () => {
    await withTempDir(async (root) => {
      put(root, "/sys/class/backlight/rpi_backlight/brightness", "bright");
      const outcome = await createBacklightBrightnessStrategy({ root }).sleep();
      assert.equal(outcome.ok, false);
    });
  });
});

describe("dpms strategy", () => {
  test("forces the display off and on with DISPLAY=:0", async () => {
    const runner = recordingRunner();
    const strategy = createDpmsStrategy({ run: runner.run, env: { DISPLAY: ":1" } });
    assert.deepEqual(await strategy.sleep(), { ok: true });
    assert.deepEqual(await strategy.wake(null), { ok: true });
    assert.deepEqual(runner.calls, [
      "xset dpms force off DISPLAY=:0",
      "xset dpms force on DISPLAY=:0",
    ]);
  });

  test("a failing command is reported, not thrown", async () => {
    const runner = recordingRunner(true);
    const outcome = await createDpmsStrategy({ run: runner.run, env: {} }).sleep();
    assert.deepEqual(outcome, { ok: false, reason: "Error: xset: unable to open display" });
  });
});

describe("power manager over real strategies", () => {
  test("sleep and wake round-trip the saved brightness", async () => {
    await withTempDir(async (root) => {
      const blank = put(root, "/sys/class/graphics/fb0/blank", "0");
      const level = put(root, "/sys/class/backlight/rpi_backlight/brightness", "200");
      const power = put(root, "/sys/class/backlight/rpi_backlight/bl_power", "0");
      const runner = recordingRunner(true);
      const manager = createPowerManager({
        strategies: createDisplayPowerStrategies({ root, run: runner.run, env: {} }),
        now: () => 0,
      });

      assert.equal(await manager.sleep(), true);
      assert.equal(manager.isAsleep(), true);
      assert.equal(read(blank), "1");
      assert.equal(read(power), "1");
      assert.equal(read(level), "0");

      assert.equal(await manager.wake(), true);
      assert.equal(manager.isAsleep(), false);
      assert.equal(read(blank), "0");
      assert.equal(read(power), "0");
      assert.equal(read(level), "200");
    });
  });
});
