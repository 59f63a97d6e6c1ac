import { assert, createRng, describe, test } from "@dnsboard/testkit";
import {
  SCREEN_COUNT,
  SCREEN_ORDER,
  type NavigationState,
  createNavigationState,
  currentScreenId,
  isTapAllowed,
  reduceNavigation,
} from "../navigation.js";

function repeat(state: NavigationState, type: "next" | "previous", times: number): NavigationState {
  let next = state;
  for (let i = 0; i < times; i++) next = reduceNavigation(next, { type });
  return next;
}

describe("navigation", () => {
  test("starts on the first screen, locked", () => {
    const state = createNavigationState();
    assert.deepEqual(state, { current: 0, locked: true });
    assert.equal(currentScreenId(state), "stats");
    assert.equal(SCREEN_COUNT, 6);
  });

  test("next and previous wrap around the ring", () => {
    const start = createNavigationState();
    const back = reduceNavigation(start, { type: "previous" });
    assert.equal(back.current, 5);
    assert.equal(currentScreenId(back), "settings");
    assert.equal(reduceNavigation(back, { type: "next" }).current, 0);
  });

  test("visits screens in the fixed order", () => {
    let state = createNavigationState();
    const seen: string[] = [];
    for (let i = 0; i < SCREEN_COUNT; i++) {
      seen.push(currentScreenId(state));
      state = reduceNavigation(state, { type: "next" });
    }
    assert.deepEqual(seen, [...SCREEN_ORDER]);
  });

  test("k nexts then k previouses return to the start, index stays in range", () => {
    const rng = createRng(7);
    for (let round = 0; round < 50; round++) {
      const start = repeat(createNavigationState(), "next", rng.int(0, 5));
      const k = rng.int(0, 40);
      const forward = repeat(start, "next", k);
      assert.ok(forward.current >= 0 && forward.current < SCREEN_COUNT);
      assert.equal(repeat(forward, "previous", k).current, start.current);
    }
  });

  test("toggle-lock flips only the lock flag", () => {
    const state = reduceNavigation(createNavigationState(), { type: "toggle-lock" });
    assert.deepEqual(state, { current: 0, locked: false });
  });

  test("unknown actions leave the state untouched", () => {
    const state = createNavigationState();
    const bogus = JSON.parse('{"type":"jump"}');
    assert.equal(reduceNavigation(state, bogus), state);
  });
});

describe("isTapAllowed", () => {
  const onSettings = repeat(createNavigationState(), "previous", 1);

  test("taps always pass outside settings", () => {
    assert.equal(isTapAllowed(createNavigationState(), false), true);
  });

  test("locked settings only accept the lock area", () => {
    assert.equal(isTapAllowed(onSettings, false), false);
    assert.equal(isTapAllowed(onSettings, true), true);
  });

  test("unlocked settings accept every tap", () => {
    const unlocked = reduceNavigation(onSettings, { type: "toggle-lock" });
    assert.equal(isTapAllowed(unlocked, false), true);
  });
});
