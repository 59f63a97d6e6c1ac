import { assert, describe, test } from "@dnsboard/testkit";
import { isValidKey, parseKeyValue, rewriteKeyValue } from "../kvFile.js";

describe("parseKeyValue", () => {
  test("reads quoted, single-quoted and bare values", () => {
    const entries = parseKeyValue(
      ['A="one"', "B='two words'", "C=3", '  D = "spaced"  ', ""].join("\n"),
    );
    assert.deepEqual([...entries], [
      ["A", "one"],
      ["B", "two words"],
      ["C", "3"],
      ["D", "spaced"],
    ]);
  });

  test("skips comments, blank lines and malformed keys", () => {
    const entries = parseKeyValue("# comment\n\n=nokey\n1BAD=x\nno equals\nOK=yes\r\n");
    assert.deepEqual([...entries], [["OK", "yes"]]);
  });

  test("unescapes quotes and backslashes inside double quotes", () => {
    const entries = parseKeyValue('P="a\\"b\\\\c"');
    assert.equal(entries.get("P"), 'a"b\\c');
  });

  test("later duplicates win", () => {
    assert.equal(parseKeyValue("K=1\nK=2").get("K"), "2");
  });
});

describe("rewriteKeyValue", () => {
  test("a new file gets the keys sorted with every value quoted", () => {
    const text = rewriteKeyValue("", { ZED: "z", ALPHA: 'say "hi"' });
    assert.equal(text, 'ALPHA="say \\"hi\\""\nZED="z"\n');
  });

  test("no lines and no updates give an empty string", () => {
    assert.equal(rewriteKeyValue("", {}), "");
  });

  test("values survive a write/read cycle", () => {
    const text = rewriteKeyValue("", { PASSWORD: 'p"a\\ss word', EMPTY: "" });
    assert.deepEqual(parseKeyValue(text), new Map([
      ["EMPTY", ""],
      ["PASSWORD", 'p"a\\ss word'],
    ]));
  });

  test("updated keys are replaced in place and every other line is kept verbatim", () => {
    const existing = [
      "# appliance",
      'my-key="v1"',
      "export TOKEN=abc",
      "THEME=old",
      'api.password="test-secret"',
      "",
      "THEME=duplicate",
      "",
    ].join("\n");
    const text = rewriteKeyValue(existing, { THEME: "new", ADDED: "1" });
    assert.equal(
      text,
      [
        "# appliance",
        'my-key="v1"',
        "export TOKEN=abc",
        'THEME="new"',
        'api.password="test-secret"',
        "",
        'ADDED="1"',
        "",
      ].join("\n"),
    );
  });

  test("a file without a trailing newline gets one", () => {
    assert.equal(rewriteKeyValue("A=1", { B: "2" }), 'A=1\nB="2"\n');
  });
});

test("isValidKey", () => {
  assert.equal(isValidKey("DNSBOARD_THEME"), true);
  assert.equal(isValidKey("_x1"), true);
  assert.equal(isValidKey("9x"), false);
  assert.equal(isValidKey("A-B"), false);
});
