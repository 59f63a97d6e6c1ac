import { assert, describe, test } from "@dnsboard/testkit";
import { createLogger } from "../../logger.js";
import { createMemorySink } from "../../testing/index.js";
import { parseKeyValue } from "../kvFile.js";
import { type SettingsFile, createSettingsStore, settingsToEntries } from "../store.js";
import { DEFAULT_SETTINGS } from "../types.js";

function memoryFile(initial: string | null): SettingsFile & { text: string | null; writes: number } {
  return {
    path: "/tmp/dnsboard.env",
    text: initial,
    writes: 0,
    async read() {
      return this.text;
    },
    async write(text: string) {
      this.writes += 1;
      this.text = text;
    },
  };
}

describe("settings store", () => {
  test("apply routes actions through the reducer", () => {
    const store = createSettingsStore({ initial: DEFAULT_SETTINGS, file: memoryFile(null) });
    store.apply({ type: "set-brightness", value: 150 });
    store.apply({ type: "change-theme", theme: "matrix" });
    assert.equal(store.get().brightness, 100);
    assert.equal(store.get().theme, "matrix");
  });

  test("persist writes the six managed keys into a new file", async () => {
    const file = memoryFile(null);
    const store = createSettingsStore({ initial: DEFAULT_SETTINGS, file });
    const result = await store.persist();
    assert.deepEqual(result, { ok: true, path: "/tmp/dnsboard.env" });
    assert.equal(
      file.text,
      [
        'DNSBOARD_API_INTERVAL="5"',
        'DNSBOARD_BRIGHTNESS="100"',
        'DNSBOARD_SCANLINES="1"',
        'DNSBOARD_SCREEN_TIMEOUT="0"',
        'DNSBOARD_SHOW_FPS="0"',
        'DNSBOARD_THEME="default"',
        "",
      ].join("\n"),
    );
  });

  test("persist keeps unmanaged keys and reproduces the managed values", async () => {
    const file = memoryFile('# appliance\nDNSBOARD_API_PASSWORD="test-secret"\nDNSBOARD_THEME="ocean"\n');
    const store = createSettingsStore({ initial: DEFAULT_SETTINGS, file });
    store.apply({ type: "set-timeout", value: 5 });
    store.apply({ type: "toggle-fps" });
    await store.persist();

    const reread = parseKeyValue(file.text ?? "");
    assert.equal(reread.get("DNSBOARD_API_PASSWORD"), "test-secret");
    for (const [key, value] of Object.entries(settingsToEntries(store.get()))) {
      assert.equal(reread.get(key), value);
    }
    assert.equal(reread.get("DNSBOARD_THEME"), "default");
    assert.equal(reread.get("DNSBOARD_SCREEN_TIMEOUT"), "5");
    assert.equal(reread.get("DNSBOARD_SHOW_FPS"), "1");
  });

  test("persist leaves unusual keys and comments exactly as they were", async () => {
    const file = memoryFile(
      [
        "# credentials",
        'my-key="v1"',
        "export TOKEN=abc",
        'api.password="test-secret"',
        "# theme below",
        "DNSBOARD_THEME=ocean",
        'KEEP="x"',
        "",
      ].join("\n"),
    );
    const store = createSettingsStore({ initial: DEFAULT_SETTINGS, file });
    store.apply({ type: "change-theme", theme: "matrix" });
    await store.persist();

    assert.equal(
      file.text,
      [
        "# credentials",
        'my-key="v1"',
        "export TOKEN=abc",
        'api.password="test-secret"',
        "# theme below",
        'DNSBOARD_THEME="matrix"',
        'KEEP="x"',
        'DNSBOARD_API_INTERVAL="5"',
        'DNSBOARD_BRIGHTNESS="100"',
        'DNSBOARD_SCANLINES="1"',
        'DNSBOARD_SCREEN_TIMEOUT="0"',
        'DNSBOARD_SHOW_FPS="0"',
        "",
      ].join("\n"),
    );
  });

  test("a commented-out managed key is not treated as a setting", async () => {
    const file = memoryFile('#DNSBOARD_THEME="neon"\n');
    const store = createSettingsStore({ initial: DEFAULT_SETTINGS, file });
    await store.persist();
    const lines = (file.text ?? "").split("\n");
    assert.equal(lines[0], '#DNSBOARD_THEME="neon"');
    assert.equal(parseKeyValue(file.text ?? "").get("DNSBOARD_THEME"), "default");
  });

  test("persist failures are reported and logged, state is kept", async () => {
    const mem = createMemorySink();
    const file: SettingsFile = {
      path: "/ro/dnsboard.env",
      read: async () => null,
      write: async () => {
        throw new Error("EACCES: permission denied");
      },
    };
    const store = createSettingsStore({
      initial: DEFAULT_SETTINGS,
      file,
      logger: createLogger({ sink: mem.sink }),
    });
    store.apply({ type: "toggle-scanlines" });
    const result = await store.persist();
    assert.deepEqual(result, { ok: false, error: "Error: EACCES: permission denied" });
    assert.deepEqual(mem.messages("warn"), ["settings save failed"]);
    assert.equal(store.get().scanlines, false);
  });
});
