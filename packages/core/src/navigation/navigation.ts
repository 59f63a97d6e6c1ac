/**
 * packages/core/src/navigation/navigation.ts — Screen navigation state machine.
 *
 * Screens form a ring: swipe-left (or the right arrow) moves to the next
 * screen, swipe-right (or the left arrow) to the previous one. The `locked`
 * flag only matters while Settings is showing; it gates every tap there
 * except the one on the lock toggle itself.
 */

export const SCREEN_ORDER = Object.freeze([
  "stats",
  "history",
  "top-blocked",
  "top-clients",
  "system",
  "settings",
] as const);

export type ScreenId = (typeof SCREEN_ORDER)[number];

export const SCREEN_COUNT = SCREEN_ORDER.length;

export type NavigationState = Readonly<{
  current: number;
  locked: boolean;
}>;

export type NavigationAction =
  | Readonly<{ type: "next" }>
  | Readonly<{ type: "previous" }>
  | Readonly<{ type: "toggle-lock" }>;

export function createNavigationState(): NavigationState {
  return Object.freeze({ current: 0, locked: true });
}

function wrapIndex(index: number): number {
  return ((index % SCREEN_COUNT) + SCREEN_COUNT) % SCREEN_COUNT;
}

export function reduceNavigation(state: NavigationState, action: NavigationAction): NavigationState {
  switch (action.type) {
    case "next":
      return Object.freeze({ ...state, current: wrapIndex(state.current + 1) });
    case "previous":
      return Object.freeze({ ...state, current: wrapIndex(state.current - 1) });
    case "toggle-lock":
      return Object.freeze({ ...state, locked: !state.locked });
    default: {
      const unhandled: never = action;
      void unhandled;
      return state;
    }
  }
}

export function currentScreenId(state: NavigationState): ScreenId {
  return SCREEN_ORDER[wrapIndex(state.current)] ?? "stats";
}

/**
 * Whether a tap on the active screen may reach its handler.
 *
 * @param inLockArea - the tap landed on the Settings lock toggle
 */
export function isTapAllowed(state: NavigationState, inLockArea: boolean): boolean {
  if (currentScreenId(state) !== "settings") return true;
  if (!state.locked) return true;
  return inLockArea;
}
