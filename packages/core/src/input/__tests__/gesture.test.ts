import { assert, createRng, describe, test } from "@dnsboard/testkit";
import { DEFAULT_SWIPE_THRESHOLD, classifyGesture, createGestureClassifier } from "../gesture.js";

const at = (x: number, y = 100) => ({ x, y });

describe("classifyGesture", () => {
  test("dx beyond -threshold is a swipe left", () => {
    assert.deepEqual(classifyGesture(at(200), at(149), 50), { kind: "swipe-left" });
  });

  test("dx beyond +threshold is a swipe right", () => {
    assert.deepEqual(classifyGesture(at(100), at(151), 50), { kind: "swipe-right" });
  });

  test("small dx is a tap at the release position", () => {
    assert.deepEqual(classifyGesture(at(100), at(149, 40), 50), { kind: "tap", pos: at(149, 40) });
  });

  test("|dx| equal to the threshold is a tap in both directions", () => {
    assert.equal(classifyGesture(at(100), at(150), 50).kind, "tap");
    assert.equal(classifyGesture(at(100), at(50), 50).kind, "tap");
  });

  test("vertical movement alone never swipes", () => {
    assert.equal(classifyGesture(at(100, 0), at(100, 300), 50).kind, "tap");
  });
});

describe("createGestureClassifier", () => {
  test("pointer-up without an anchor yields null", () => {
    const g = createGestureClassifier();
    assert.equal(g.pointerUp(at(10)), null);
  });

  test("a gesture is reported once per down/up pair", () => {
    const g = createGestureClassifier(50);
    g.pointerDown(at(300));
    assert.equal(g.pending(), true);
    assert.deepEqual(g.pointerUp(at(100)), { kind: "swipe-left" });
    assert.equal(g.pending(), false);
    assert.equal(g.pointerUp(at(100)), null);
  });

  test("a second pointer-down replaces the first anchor", () => {
    const g = createGestureClassifier(50);
    g.pointerDown(at(0));
    g.pointerDown(at(200));
    assert.equal(g.pointerUp(at(210))?.kind, "tap");
  });

  test("cancel drops the pending anchor", () => {
    const g = createGestureClassifier(50);
    g.pointerDown(at(0));
    g.cancel();
    assert.equal(g.pointerUp(at(300)), null);
  });

  test("invalid thresholds fall back to the default", () => {
    assert.equal(createGestureClassifier(-1).threshold, DEFAULT_SWIPE_THRESHOLD);
    assert.equal(createGestureClassifier(Number.NaN).threshold, DEFAULT_SWIPE_THRESHOLD);
    assert.equal(createGestureClassifier(80).threshold, 80);
  });
});

describe("classifyGesture: seeded property", () => {
  test("only horizontal displacement decides, for any pair of points", () => {
    const rng = createRng(0x5eed);
    for (let i = 0; i < 500; i++) {
      const start = { x: rng.int(0, 479), y: rng.int(0, 319) };
      const end = { x: rng.int(0, 479), y: rng.int(0, 319) };
      const threshold = rng.pick([0, 10, 50, 120]);
      const dx = end.x - start.x;
      const expected = dx < -threshold ? "swipe-left" : dx > threshold ? "swipe-right" : "tap";
      assert.equal(classifyGesture(start, end, threshold).kind, expected);
      assert.equal(classifyGesture(start, { x: end.x, y: start.y }, threshold).kind, expected);
    }
  });
});
