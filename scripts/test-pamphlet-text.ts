import assert from "node:assert/strict";
import { test } from "node:test";
import { isPamphletError } from "../lib/pamphlet-errors";
import {
  NO_REMOVALS,
  buildFallbackCopy,
  createTextContent,
  isTextContentEmpty,
  parseTextContent,
  refinePamphletCopy,
  toTextContentPayload
} from "../lib/pamphlet-text";

test("parseTextContent maps the editor payload onto text content", () => {
  const text = parseTextContent({
    headline: "  Summer   Sale ",
    tagline: "Hot deals",
    description: "Everything\nmust go",
    features: ["Free shipping", "  ", "Easy returns"],
    call_to_action: "Shop now",
    customText: ["Store open 9-5", ""],
    removeLines: { tagline: true, call_to_action: true }
  });

  assert.deepEqual(text, {
    headline: "Summer Sale",
    tagline: "Hot deals",
    description: "Everything must go",
    features: ["Free shipping", "Easy returns"],
    callToAction: "Shop now",
    customLines: ["Store open 9-5"],
    removed: {
      headline: false,
      tagline: true,
      description: false,
      callToAction: true,
      custom: false
    }
  });
});

test("parseTextContent treats a missing payload as empty content", () => {
  const text = parseTextContent(undefined);
  assert.equal(isTextContentEmpty(text), true);
  assert.deepEqual(text.removed, NO_REMOVALS);
});

test("parseTextContent rejects malformed payloads", () => {
  assert.throws(
    () => parseTextContent({ features: "Fast" }),
    (error: unknown) => isPamphletError(error) && error.kind === "InvalidConfiguration"
  );
});

test("toTextContentPayload writes the editor field names back", () => {
  const text = createTextContent({ headline: "Launch", callToAction: "Join", removed: { custom: true } });
  const payload = toTextContentPayload(text);

  assert.equal(payload.call_to_action, "Join");
  assert.equal(payload.removeLines.custom, true);
  assert.deepEqual(parseTextContent(payload), text);
});

test("refinePamphletCopy caps the headline at eight words", () => {
  const refined = refinePamphletCopy(createTextContent({ headline: "one two three four five six seven eight nine ten" }));
  assert.equal(refined.headline, "one two three four five six seven eight");
});

test("refinePamphletCopy cuts long descriptions on a word boundary", () => {
  const description = "abcd ".repeat(100).trim();
  const refined = refinePamphletCopy(createTextContent({ description }));

  assert.equal(description.length, 499);
  assert.equal(refined.description.length, 480);
  assert.equal(refined.description, `${"abcd ".repeat(96).trim()}…`);
});

test("refinePamphletCopy leaves short copy alone", () => {
  const text = createTextContent({ headline: "Fresh bread", description: "Baked daily." });
  assert.deepEqual(refinePamphletCopy(text), text);
});

test("buildFallbackCopy derives copy from the request", () => {
  const text = buildFallbackCopy({
    productName: "Solar Lamp",
    keyFeatures: ["Bright", "Portable", "Durable", "Cheap"],
    callToAction: ""
  });

  assert.equal(text.headline, "Solar Lamp");
  assert.equal(text.tagline, "Solar Lamp");
  assert.equal(text.description, "Discover Solar Lamp: Bright, Portable, Durable. Learn more today");
  assert.equal(text.callToAction, "Learn more today");
  assert.deepEqual(text.features, ["Bright", "Portable", "Durable", "Cheap"]);
});
