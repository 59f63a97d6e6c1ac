import { assert, describe, test } from "@dnsboard/testkit";
import { cellCenterToPixel, decodeTerminalInput } from "../input/terminalInput.js";

const toPixel = cellCenterToPixel({ width: 480, height: 320 }, { cols: 60, rows: 20 });

describe("terminal input", () => {
  test("arrow keys, letters and escape", () => {
    assert.deepEqual(decodeTerminalInput("\u001b[C\u001b[DQ\u001b[A\u001b[B"), [
      { kind: "key-down", key: "right" },
      { kind: "key-down", key: "left" },
      { kind: "key-down", key: "q" },
      { kind: "key-down", key: "up" },
      { kind: "key-down", key: "down" },
    ]);
    assert.deepEqual(decodeTerminalInput("\u001b"), [{ kind: "key-down", key: "escape" }]);
    assert.deepEqual(decodeTerminalInput("\r"), [{ kind: "key-down", key: "enter" }]);
  });

  test("Ctrl+C is a quit event", () => {
    assert.deepEqual(decodeTerminalInput("a\u0003"), [
      { kind: "key-down", key: "a" },
      { kind: "quit" },
    ]);
  });

  test("unknown CSI sequences and control bytes are dropped", () => {
    assert.deepEqual(decodeTerminalInput("\u001b[5~\u001b[1;5H\u0001\u007f"), []);
  });

  test("cellCenterToPixel maps 1-based cells to pixel centers", () => {
    assert.deepEqual(toPixel(1, 1), { x: 4, y: 8 });
    assert.deepEqual(toPixel(10, 5), { x: 76, y: 72 });
  });

  test("SGR mouse press and release become pointer events", () => {
    assert.deepEqual(decodeTerminalInput("\u001b[<0;10;5M\u001b[<0;30;5m", toPixel), [
      { kind: "pointer-down", pos: { x: 76, y: 72 } },
      { kind: "pointer-up", pos: { x: 236, y: 72 } },
    ]);
  });

  test("mouse reports are ignored without a mapping or for other buttons", () => {
    assert.deepEqual(decodeTerminalInput("\u001b[<0;10;5M"), []);
    assert.deepEqual(decodeTerminalInput("\u001b[<64;10;5M\u001b[<2;1;1M", toPixel), []);
  });
});
