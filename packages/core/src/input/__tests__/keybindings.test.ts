import { assert, describe, test } from "@dnsboard/testkit";
import { resolveKeyCommand } from "../keybindings.js";

describe("resolveKeyCommand", () => {
  test("arrows and vi keys navigate", () => {
    assert.equal(resolveKeyCommand("right"), "next-screen");
    assert.equal(resolveKeyCommand("l"), "next-screen");
    assert.equal(resolveKeyCommand("left"), "previous-screen");
    assert.equal(resolveKeyCommand("h"), "previous-screen");
  });

  test("escape and q quit, case-insensitively", () => {
    assert.equal(resolveKeyCommand("escape"), "quit");
    assert.equal(resolveKeyCommand("Q"), "quit");
  });

  test("unbound keys resolve to undefined", () => {
    assert.equal(resolveKeyCommand("space"), undefined);
    assert.equal(resolveKeyCommand("constructor"), undefined);
  });
});
