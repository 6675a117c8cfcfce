import assert from "node:assert/strict";
import { test } from "node:test";
import { resolveStyle } from "../lib/design-config";
import { computePamphletLayout, deriveSizes, hasOverflow, type PamphletLayout, type TextBlock } from "../lib/pamphlet-layout";
import { reviewPamphlet } from "../lib/pamphlet-review";
import type { StyleOverrides } from "../lib/pamphlet-style";
import { buildCtaSvg, buildDecorSvg, buildTextSvg, escapeXml } from "../lib/pamphlet-svg";
import { REMOVABLE_FIELD_VALUES, createTextContent, type RemovableField, type RemovalFlags, type TextContent } from "../lib/pamphlet-text";

function saleText(removed: Partial<RemovalFlags> = {}) {
  return createTextContent({
    headline: "SALE",
    tagline: "",
    description: "Big savings today",
    features: ["Fast", "Easy"],
    callToAction: "Buy Now",
    removed
  });
}

function saleStyle(overrides: StyleOverrides = {}) {
  return resolveStyle("modern", "professional", {
    size: { width: 1200, height: 1600 },
    layout: "centered",
    imageFilter: "none",
    ...overrides
  });
}

function block(layout: PamphletLayout, key: TextBlock["key"]): TextBlock {
  const found = layout.blocks.find((candidate) => candidate.key === key);
  assert(found, `Expected a ${key} block.`);
  return found;
}

test("sale scenario lays out headline, description, two features and the CTA", () => {
  const layout = computePamphletLayout(saleText(), saleStyle());

  assert.deepEqual(
    layout.blocks.map((candidate) => candidate.key),
    ["headline", "description", "featuresTitle", "features", "cta"]
  );
  assert.deepEqual(block(layout, "headline").lines.map((line) => line.text), ["SALE"]);
  assert.deepEqual(block(layout, "features").lines.map((line) => line.text), ["• Fast", "• Easy"]);
  assert.deepEqual(block(layout, "cta").lines.map((line) => line.text), ["BUY NOW"]);
  assert(layout.cta, "Expected a CTA button.");
  assert.equal(hasOverflow(layout.overflow), false);
  assert.deepEqual(layout.columns, [{ x: 96, y: 128, width: 1008, height: 1280 }]);
});

test("blocks stack top to bottom without overlapping", () => {
  const layout = computePamphletLayout(saleText(), saleStyle());
  for (let index = 1; index < layout.blocks.length; index += 1) {
    const previous = layout.blocks[index - 1].box;
    assert(layout.blocks[index].box.y >= previous.y + previous.height, `Block ${index} overlaps the one above.`);
  }
});

const FULL_COPY = {
  headline: "SALE",
  tagline: "Summer only",
  description: "Big savings today",
  features: ["Fast", "Easy"],
  callToAction: "Buy Now",
  customLines: ["Ends Sunday"]
};

const REMOVE_ONE: Record<RemovableField, Partial<RemovalFlags>> = {
  headline: { headline: true },
  tagline: { tagline: true },
  description: { description: true },
  callToAction: { callToAction: true },
  custom: { custom: true }
};

const EMPTY_ONE: Record<RemovableField, Partial<TextContent>> = {
  headline: { headline: "" },
  tagline: { tagline: "" },
  description: { description: "" },
  callToAction: { callToAction: "" },
  custom: { customLines: [] }
};

test("a removed field lays out exactly like an empty one", () => {
  const style = saleStyle();

  for (const field of REMOVABLE_FIELD_VALUES) {
    const removed = computePamphletLayout(createTextContent({ ...FULL_COPY, removed: REMOVE_ONE[field] }), style);
    const empty = computePamphletLayout(createTextContent({ ...FULL_COPY, ...EMPTY_ONE[field] }), style);
    assert.deepEqual(removed, empty, `Removing ${field} differs from leaving it empty.`);
  }
});

test("removing the headline drops its glyphs and collapses the stack", () => {
  const style = saleStyle();
  const shown = computePamphletLayout(saleText(), style);
  const hidden = computePamphletLayout(saleText({ headline: true }), style);

  assert.deepEqual(
    hidden.blocks.map((candidate) => candidate.key),
    ["description", "featuresTitle", "features", "cta"]
  );
  assert.equal(buildTextSvg(hidden, 0)?.includes(">SALE<"), false);
  assert.equal(buildTextSvg(shown, 0)?.includes(">SALE<"), true);
  assert.equal(hidden.overflow.headlineShrunk, false);
});

test("removing the CTA also removes the button shape", () => {
  const layout = computePamphletLayout(saleText({ callToAction: true }), saleStyle());

  assert.equal(layout.cta, null);
  assert.equal(buildCtaSvg(layout), null);
  assert.equal(buildTextSvg(layout, 0)?.includes("BUY NOW"), false);
  assert.equal(buildDecorSvg(layout), buildDecorSvg(computePamphletLayout({ ...saleText(), callToAction: "" }, saleStyle())));
});

test("split overflow trims only the column that runs out of space", () => {
  const style = saleStyle({ layout: "split", size: { width: 800, height: 600 } });
  const layout = computePamphletLayout(
    createTextContent({ headline: "Notes", description: "word ".repeat(400), features: ["Fast", "Easy"] }),
    style
  );
  const [left, right] = layout.columns;

  assert.equal(layout.overflow.bodySize, 12);
  assert.equal(layout.overflow.hiddenFeatures, 0);
  assert(layout.overflow.droppedDescriptionLines > 0);
  assert.equal(block(layout, "description").size, 12);
  assert(block(layout, "description").box.y + block(layout, "description").box.height <= left.y + left.height);

  assert.deepEqual(block(layout, "features").lines.map((line) => line.text), ["• Fast", "• Easy"]);
  assert.equal(block(layout, "features").size, deriveSizes(style.headline.size, style.body.size).feature);
  assert(block(layout, "features").box.x >= right.x);
});

test("split layout puts the headline left of the feature list", () => {
  const layout = computePamphletLayout(saleText(), saleStyle({ layout: "split" }));

  assert.equal(layout.columns.length, 2);
  assert.equal(block(layout, "headline").align, "start");
  assert.equal(block(layout, "features").align, "end");
  assert(block(layout, "headline").box.x < block(layout, "features").box.x);
  assert.equal(layout.panels.length, 2);
});

test("right-aligned layout anchors a 70% column to the right margin", () => {
  const layout = computePamphletLayout(saleText(), saleStyle({ layout: "right-aligned" }));
  assert.deepEqual(layout.columns, [{ x: 398, y: 128, width: 706, height: 1280 }]);
  assert.equal(block(layout, "headline").align, "end");
});

test("text placement moves the stack vertically", () => {
  const top = computePamphletLayout(saleText(), saleStyle({ textPlacement: "top" }));
  const middle = computePamphletLayout(saleText(), saleStyle({ textPlacement: "middle" }));
  const bottom = computePamphletLayout(saleText(), saleStyle({ textPlacement: "bottom" }));

  const topY = block(top, "headline").box.y;
  const middleY = block(middle, "headline").box.y;
  const bottomY = block(bottom, "headline").box.y;
  assert(topY < middleY && middleY < bottomY, `Expected ${topY} < ${middleY} < ${bottomY}.`);
});

test("panel opacity follows backgroundOpacity and is capped", () => {
  assert.equal(computePamphletLayout(saleText(), saleStyle()).panels[0].opacity, 0.35);
  assert.equal(computePamphletLayout(saleText(), saleStyle({ backgroundOpacity: 100 })).panels[0].opacity, 0.92);

  const clear = computePamphletLayout(saleText(), saleStyle({ backgroundOpacity: 0 }));
  assert.deepEqual(clear.panels, []);
  assert.equal(clear.featurePanel, null);
});

test("a long feature list shrinks body text and then hides trailing features", () => {
  const features = Array.from({ length: 60 }, (_, index) => `Feature number ${index + 1}`);
  const layout = computePamphletLayout(
    createTextContent({ headline: "Catalog", description: "Everything we sell", features, callToAction: "Order" }),
    saleStyle({ size: { width: 400, height: 500 } })
  );
  const { overflow } = layout;

  assert.equal(overflow.bodySize, 12);
  assert.equal(overflow.bodyShrunk, true);
  assert(overflow.hiddenFeatures > 0 && overflow.hiddenFeatures < 60, `Hidden features: ${overflow.hiddenFeatures}`);
  assert.equal(block(layout, "features").lines.length, 60 - overflow.hiddenFeatures);

  const column = layout.columns[0];
  for (const candidate of layout.blocks) {
    assert(candidate.box.y >= column.y, `${candidate.key} starts above its column.`);
    assert(candidate.box.y + candidate.box.height <= column.y + column.height, `${candidate.key} runs past its column.`);
  }
});

test("an empty text content yields no text blocks", () => {
  const layout = computePamphletLayout(createTextContent(), saleStyle());
  assert.deepEqual(layout.blocks, []);
  assert.equal(layout.cta, null);
  assert.equal(buildTextSvg(layout, 50), null);
});

test("the review headline preview never splits a surrogate pair", () => {
  const headline = "🚀".repeat(81);
  const text = createTextContent({ headline });
  const review = reviewPamphlet(computePamphletLayout(text, saleStyle()), text);

  assert.equal(review.headlinePreview, "🚀".repeat(80));
});

test("escapeXml escapes markup and strips invalid code points", () => {
  assert.equal(escapeXml("a\u0002<b> & \"c\""), "a&lt;b&gt; &amp; &quot;c&quot;");
});
