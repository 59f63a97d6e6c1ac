/**
 * Input events drained by the controller once per tick.
 */

/** Pointer position in display pixels. */
export type Point = Readonly<{ x: number; y: number }>;

export type InputEvent =
  | Readonly<{ kind: "pointer-down"; pos: Point }>
  | Readonly<{ kind: "pointer-up"; pos: Point }>
  | Readonly<{
      kind: "key-down";
      /** Normalized key name, e.g. "left", "right", "escape", "q". */
      key: string;
    }>
  | Readonly<{ kind: "quit" }>;

export type Gesture =
  | Readonly<{ kind: "tap"; pos: Point }>
  | Readonly<{ kind: "swipe-left" }>
  | Readonly<{ kind: "swipe-right" }>;
