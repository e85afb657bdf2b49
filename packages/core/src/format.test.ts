/**
 * Tests for text helpers.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { formatArgHelp, formatTable, formatValue, joinStrings, joinWith } from "./format.js";
import { UNSET } from "./types.js";

describe("joinStrings", () => {
  it("skips empty parts", () => {
    assert.equal(joinStrings("demo", undefined, "", "greet"), "demo greet");
    assert.equal(joinWith("\n", "a", null, "b"), "a\nb");
  });
});

describe("formatArgHelp", () => {
  it("keeps short descriptions", () => {
    assert.equal(formatArgHelp("Say hello"), "Say hello");
    assert.equal(formatArgHelp(undefined), "");
  });

  it("cuts long descriptions at the last sentence", () => {
    assert.equal(formatArgHelp("Convert the input files. " + "x".repeat(60)), "Convert the input files.");
  });

  it("cuts long descriptions at the last word otherwise", () => {
    const text = "word ".repeat(20).trim();
    assert.equal(formatArgHelp(text), Array(14).fill("word").join(" ") + "...");
  });
});

describe("formatTable", () => {
  it("pads columns and trims trailing space", () => {
    const table = formatTable([
      ["  greet", "Say hello."],
      ["  build", "Build it."],
      ["", "Subcommands: a"],
    ]);
    assert.equal(table, "\n  greet   Say hello.\n  build   Build it.\n          Subcommands: a\n");
  });
});

describe("formatValue", () => {
  it("renders defaults for help text", () => {
    assert.equal(formatValue("yo"), "yo");
    assert.equal(formatValue(3), "3");
    assert.equal(formatValue(null), "null");
    assert.equal(formatValue(["a", "b"]), '["a","b"]');
    assert.equal(formatValue(UNSET), "");
  });
});
