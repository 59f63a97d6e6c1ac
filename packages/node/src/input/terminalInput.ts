/**
 * packages/node/src/input/terminalInput.ts — Keyboard and mouse input from a
 * raw-mode TTY.
 *
 * Recognised sequences:
 *   ESC [ A/B/C/D          up/down/right/left
 *   ESC alone              escape
 *   Ctrl+C (0x03)          quit event
 *   printable characters   key-down with the lowercased character
 *   ESC [ < b ; x ; y M/m  SGR mouse press/release, button 0 only
 */

import type { InputEvent, Point } from "@dnsboard/core";

const ARROWS: Readonly<Record<string, string>> = Object.freeze({
  A: "up",
  B: "down",
  C: "right",
  D: "left",
});

// SGR mouse reports: ESC [ < button ; col ; row (M = press, m = release)
const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;
const CSI_ARROW = /^\x1b\[([ABCD])/;
const CSI_OTHER = /^\x1b\[[0-9;?]*[A-Za-z~]/;

/** Map a 1-based terminal cell to a display pixel. */
export type CellToPixel = (col: number, row: number) => Point;

export function decodeTerminalInput(data: string, cellToPixel?: CellToPixel): InputEvent[] {
  const out: InputEvent[] = [];
  let rest = data;
  while (rest.length > 0) {
    const mouse = SGR_MOUSE.exec(rest);
    if (mouse) {
      const button = Number(mouse[1]);
      if (cellToPixel && button === 0) {
        const pos = cellToPixel(Number(mouse[2]), Number(mouse[3]));
        out.push(Object.freeze({ kind: mouse[4] === "M" ? "pointer-down" : "pointer-up", pos }));
      }
      rest = rest.slice(mouse[0].length);
      continue;
    }
    const arrow = CSI_ARROW.exec(rest);
    const arrowKey = arrow?.[1] === undefined ? undefined : ARROWS[arrow[1]];
    if (arrow && arrowKey !== undefined) {
      out.push(Object.freeze({ kind: "key-down", key: arrowKey }));
      rest = rest.slice(arrow[0].length);
      continue;
    }
    const other = CSI_OTHER.exec(rest);
    if (other) {
      rest = rest.slice(other[0].length);
      continue;
    }

    const ch = rest.charAt(0);
    rest = rest.slice(1);
    if (ch === "\x03") {
      out.push(Object.freeze({ kind: "quit" }));
    } else if (ch === "\x1b") {
      out.push(Object.freeze({ kind: "key-down", key: "escape" }));
    } else if (ch === "\r" || ch === "\n") {
      out.push(Object.freeze({ kind: "key-down", key: "enter" }));
    } else if (ch >= " " && ch !== "\x7f") {
      out.push(Object.freeze({ kind: "key-down", key: ch.toLowerCase() }));
    }
  }
  return out;
}

/** Pixel at the center of a 1-based cell. */
export function cellCenterToPixel(
  display: Readonly<{ width: number; height: number }>,
  size: Readonly<{ cols: number; rows: number }>,
): CellToPixel {
  return (col, row) =>
    Object.freeze({
      x: Math.floor(((col - 0.5) * display.width) / size.cols),
      y: Math.floor(((row - 0.5) * display.height) / size.rows),
    });
}
