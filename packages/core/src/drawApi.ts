/**
 * Draw surface used by screens.
 *
 * All coordinates are in cell units (column, row). Draw calls that fall
 * outside the surface are clipped, never rejected.
 */

import type { TextStyle } from "./style.js";

export type CellPoint = Readonly<{ col: number; row: number }>;

export interface Surface {
  /** Width in columns. */
  readonly cols: number;
  /** Height in rows. */
  readonly rows: number;

  /** Reset every cell to a blank with the given style. */
  clear(style?: TextStyle): void;

  /** Fill a rectangle with spaces in the given style. */
  fillRect(x: number, y: number, w: number, h: number, style?: TextStyle): void;

  /** Draw a single line of text starting at (x, y). */
  drawText(x: number, y: number, text: string, style?: TextStyle): void;

  /**
   * Merge style attributes onto existing cells without touching their
   * characters. Used for overlays such as scanlines.
   */
  tint(x: number, y: number, w: number, h: number, style: TextStyle): void;

  /** Hand the finished frame to the output device. */
  present(): void;
}

export type DisplaySize = Readonly<{ width: number; height: number }>;

/**
 * Map a pointer position in display pixels to the cell under it.
 */
export function pixelToCell(
  pos: Readonly<{ x: number; y: number }>,
  display: DisplaySize,
  surface: Pick<Surface, "cols" | "rows">,
): CellPoint {
  const width = display.width > 0 ? display.width : 1;
  const height = display.height > 0 ? display.height : 1;
  const col = Math.floor((pos.x * surface.cols) / width);
  const row = Math.floor((pos.y * surface.rows) / height);
  return Object.freeze({
    col: Math.min(Math.max(0, col), Math.max(0, surface.cols - 1)),
    row: Math.min(Math.max(0, row), Math.max(0, surface.rows - 1)),
  });
}
