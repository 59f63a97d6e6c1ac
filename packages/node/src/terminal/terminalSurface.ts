/**
 * packages/node/src/terminal/terminalSurface.ts — Surface over a truecolor
 * terminal.
 *
 * Screens draw into a cell grid; `present()` serializes each row to ANSI and
 * only rewrites rows that changed since the previous frame. Every styled row
 * opens with a full SGR (reset first, so attributes never bleed) and closes
 * with a reset.
 */

import { type Surface, type TextStyle, mergeStyle, rgbB, rgbG, rgbR } from "@dnsboard/core";

const ESC = "\u001b";
const RESET = `${ESC}[0m`;
const ENTER_SCREEN = `${ESC}[?1049h${ESC}[?25l${ESC}[2J`;
const LEAVE_SCREEN = `${ESC}[?25h${ESC}[?1049l`;
const MOUSE_ON = `${ESC}[?1000h${ESC}[?1006h`;
const MOUSE_OFF = `${ESC}[?1006l${ESC}[?1000l`;

export type TerminalWriter = Readonly<{ write: (chunk: string) => unknown }>;

export type TerminalSurfaceOptions = Readonly<{
  cols: number;
  rows: number;
  output: TerminalWriter;
  /** Report mouse clicks as SGR sequences (used when no touch device is attached). */
  mouse?: boolean;
}>;

export interface TerminalSurface extends Surface {
  /** Switch to the alternate screen and hide the cursor. */
  open(): void;
  /** Restore the terminal. Safe to call more than once. */
  close(): void;
}

export type TerminalCell = { char: string; style: TextStyle };

const EMPTY_STYLE: TextStyle = Object.freeze({});

export function styleToSgr(style: TextStyle): string {
  let sgr = `${ESC}[0`;
  if (style.bold) sgr += ";1";
  if (style.dim) sgr += ";2";
  if (style.fg !== undefined) {
    sgr += `;38;2;${rgbR(style.fg)};${rgbG(style.fg)};${rgbB(style.fg)}`;
  }
  if (style.bg !== undefined) {
    sgr += `;48;2;${rgbR(style.bg)};${rgbG(style.bg)};${rgbB(style.bg)}`;
  }
  return `${sgr}m`;
}

function stylesEqual(a: TextStyle | undefined, b: TextStyle): boolean {
  if (a === b) return true;
  if (a === undefined) return false;
  return a.fg === b.fg && a.bg === b.bg && a.bold === b.bold && a.dim === b.dim;
}

export function serializeRow(row: readonly TerminalCell[]): string {
  let out = "";
  let active: TextStyle | undefined;
  for (const cell of row) {
    if (!stylesEqual(active, cell.style)) {
      out += styleToSgr(cell.style);
      active = cell.style;
    }
    out += cell.char;
  }
  return active === undefined ? out : out + RESET;
}

export function createTerminalSurface(opts: TerminalSurfaceOptions): TerminalSurface {
  const cols = Math.max(1, Math.trunc(opts.cols));
  const rows = Math.max(1, Math.trunc(opts.rows));
  const blankRow = (style: TextStyle): TerminalCell[] =>
    Array.from({ length: cols }, () => ({ char: " ", style }));
  let grid: TerminalCell[][] = Array.from({ length: rows }, () => blankRow(EMPTY_STYLE));
  let previous: (string | null)[] = new Array<string | null>(rows).fill(null);
  let opened = false;

  const eachCell = (
    x: number,
    y: number,
    w: number,
    h: number,
    fn: (cell: TerminalCell, col: number) => void,
  ): void => {
    const x0 = Math.max(0, Math.trunc(x));
    const y0 = Math.max(0, Math.trunc(y));
    const x1 = Math.min(cols, Math.trunc(x + w));
    const y1 = Math.min(rows, Math.trunc(y + h));
    for (let r = y0; r < y1; r += 1) {
      const row = grid[r];
      if (!row) continue;
      for (let c = x0; c < x1; c += 1) {
        const cell = row[c];
        if (cell) fn(cell, c);
      }
    }
  };

  return {
    cols,
    rows,
    clear(style) {
      const base = style ?? EMPTY_STYLE;
      grid = Array.from({ length: rows }, () => blankRow(base));
    },
    fillRect(x, y, w, h, style) {
      const base = style ?? EMPTY_STYLE;
      eachCell(x, y, w, h, (cell) => {
        cell.char = " ";
        cell.style = base;
      });
    },
    drawText(x, y, text, style) {
      const row = grid[Math.trunc(y)];
      if (!row) return;
      let col = Math.trunc(x);
      for (const ch of text) {
        const cell = col >= 0 ? row[col] : undefined;
        if (cell) {
          cell.char = ch;
          cell.style = mergeStyle(cell.style, style);
        }
        col += 1;
      }
    },
    tint(x, y, w, h, style) {
      eachCell(x, y, w, h, (cell) => {
        cell.style = mergeStyle(cell.style, style);
      });
    },
    present() {
      let payload = "";
      grid.forEach((row, index) => {
        const line = serializeRow(row);
        if (previous[index] === line) return;
        previous[index] = line;
        payload += `${ESC}[${index + 1};1H${line}`;
      });
      if (payload.length > 0) opts.output.write(payload);
    },
    open() {
      if (opened) return;
      opened = true;
      previous = new Array<string | null>(rows).fill(null);
      opts.output.write(opts.mouse ? ENTER_SCREEN + MOUSE_ON : ENTER_SCREEN);
    },
    close() {
      if (!opened) return;
      opened = false;
      opts.output.write(`${opts.mouse ? MOUSE_OFF : ""}${RESET}${LEAVE_SCREEN}`);
    },
  };
}
