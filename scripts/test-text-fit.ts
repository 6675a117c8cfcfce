import assert from "node:assert/strict";
import { test } from "node:test";
import { measureTextWidth } from "../lib/fonts";
import { cleanCopy, fitHeadline, trimLineWithEllipsis, wrapText } from "../lib/text-fit";

test("measureTextWidth weighs uppercase, narrow and wide glyphs", () => {
  assert.equal(measureTextWidth("Ab", "Arial", 10), 12);
  assert.equal(measureTextWidth("", "Arial", 10), 0);
  assert(measureTextWidth("MW", "Arial", 20) > measureTextWidth("il", "Arial", 20));
  assert(measureTextWidth("text", "Verdana", 20) > measureTextWidth("text", "Times", 20));
});

test("wrapText breaks greedily at word boundaries", () => {
  assert.deepEqual(wrapText("aaaa bbbb cccc", "Arial", 10, 45), ["aaaa bbbb", "cccc"]);
  assert.deepEqual(wrapText("  spaced\n\tout  ", "Arial", 10, 1000), ["spaced out"]);
  assert.deepEqual(wrapText("", "Arial", 10, 100), []);
});

test("wrapText never splits a word wider than the column", () => {
  assert.deepEqual(wrapText("supercalifragilistic ok", "Arial", 10, 20), ["supercalifragilistic", "ok"]);
});

test("fitHeadline keeps the configured size when the text fits", () => {
  assert.deepEqual(fitHeadline("SALE", "Arial-Bold", 72, 1000), {
    lines: ["SALE"],
    fontSize: 72,
    shrunk: false,
    truncated: false
  });
});

test("fitHeadline shrinks in 2px steps until every line fits", () => {
  assert.deepEqual(fitHeadline("HELLO WORLD", "Arial-Bold", 40, 100), {
    lines: ["HELLO", "WORLD"],
    fontSize: 26,
    shrunk: true,
    truncated: false
  });
});

test("fitHeadline clamps to three lines with an ellipsis at the minimum size", () => {
  const fit = fitHeadline("ONE TWO THREE FOUR FIVE SIX SEVEN", "Arial-Bold", 24, 60);

  assert.equal(fit.fontSize, 24);
  assert.equal(fit.truncated, true);
  assert.equal(fit.lines.length, 3);
  assert(fit.lines[2].endsWith("…"), `Expected an ellipsis on the last line, got ${fit.lines[2]}`);
  for (const line of fit.lines) {
    assert(measureTextWidth(line, "Arial-Bold", 24) <= 60, `Line "${line}" is wider than the column.`);
  }
});

test("trimLineWithEllipsis appends or shortens to fit", () => {
  assert.equal(trimLineWithEllipsis("Hello world", "Arial", 10, 1000), "Hello world…");

  const trimmed = trimLineWithEllipsis("Hello world", "Arial", 10, 30);
  assert(trimmed.endsWith("…"));
  assert(trimmed.length < "Hello world…".length);
  assert(measureTextWidth(trimmed, "Arial", 10) <= 30);
});

test("cleanCopy drops characters XML cannot carry and collapses whitespace", () => {
  assert.equal(cleanCopy("Hi\u0001there\u0000 \uFFFF ok"), "Hithere ok");
  assert.equal(cleanCopy("a\tb\nc\r\nd"), "a b c d");
  assert.equal(cleanCopy(undefined), "");
});
