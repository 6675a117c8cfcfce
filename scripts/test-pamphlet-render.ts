import assert from "node:assert/strict";
import { test } from "node:test";
import sharp from "sharp";
import { DEFAULT_STYLE_CONFIGURATION, resolveStyle } from "../lib/design-config";
import { isPamphletError } from "../lib/pamphlet-errors";
import { render, renderPng } from "../lib/pamphlet-render";
import type { StyleOverrides } from "../lib/pamphlet-style";
import { createTextContent, type RemovalFlags } from "../lib/pamphlet-text";
import type { Bitmap } from "../lib/raster";

function baseBitmap(width = 80, height = 60): Bitmap {
  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const offset = (y * width + x) * 3;
      data[offset] = (x * 3) % 256;
      data[offset + 1] = (y * 4) % 256;
      data[offset + 2] = 128;
    }
  }

  return { width, height, channels: 3, data };
}

function saleText(removed: Partial<RemovalFlags> = {}) {
  return createTextContent({
    headline: "SALE",
    description: "Big savings today",
    features: ["Fast", "Easy"],
    callToAction: "Buy Now",
    removed
  });
}

function style(overrides: StyleOverrides = {}) {
  return resolveStyle("modern", "professional", {
    size: { width: 300, height: 400 },
    layout: "centered",
    imageFilter: "none",
    ...overrides
  });
}

test("both layers match the configured canvas size", async () => {
  const base = baseBitmap(800, 600);
  const result = await render(base, saleText(), style({ size: { width: 1200, height: 1600 } }));

  for (const layer of [result.textlessLayer, result.finalLayer]) {
    assert.equal(layer.width, 1200);
    assert.equal(layer.height, 1600);
    assert.equal(layer.channels, 4);
    assert.equal(layer.data.length, 1200 * 1600 * 4);
  }
  assert.deepEqual(
    result.layout.blocks.map((block) => block.key),
    ["headline", "description", "featuresTitle", "features", "cta"]
  );
});

test("rendering twice yields byte-identical layers", async () => {
  const base = baseBitmap();
  const first = await render(base, saleText(), style({ shadowIntensity: 60, textShadow: 40 }));
  const second = await render(base, saleText(), style({ shadowIntensity: 60, textShadow: 40 }));

  assert(first.textlessLayer.data.equals(second.textlessLayer.data));
  assert(first.finalLayer.data.equals(second.finalLayer.data));
});

test("a render does not depend on earlier renders or mutate the base", async () => {
  const base = baseBitmap();
  const pristine = Buffer.from(base.data);

  await render(base, saleText(), style({ imageFilter: "sepia", filterIntensity: 80, overallBrightness: 140 }));
  const replayed = await render(base, saleText(), style({ layout: "split" }));
  const direct = await render(baseBitmap(), saleText(), style({ layout: "split" }));

  assert(base.data.equals(pristine));
  assert(replayed.finalLayer.data.equals(direct.finalLayer.data));
  assert(replayed.textlessLayer.data.equals(direct.textlessLayer.data));
});

test("empty text content makes the final layer equal the textless layer", async () => {
  const result = await render(baseBitmap(), createTextContent(), style());
  assert(result.finalLayer.data.equals(result.textlessLayer.data));
});

test("removing the headline renders exactly like an empty headline", async () => {
  const removed = await render(baseBitmap(), saleText({ headline: true }), style());
  const empty = await render(baseBitmap(), { ...saleText(), headline: "" }, style());

  assert(removed.textlessLayer.data.equals(empty.textlessLayer.data));
  assert(removed.finalLayer.data.equals(empty.finalLayer.data));
  assert.deepEqual(removed.layout, empty.layout);
});

test("control characters in copy never reach the SVG rasteriser", async () => {
  const cleaned = await render(baseBitmap(), createTextContent({ headline: "Hi\u0001there", tagline: "a\u0000b" }), style());
  assert.deepEqual(cleaned.layout.blocks[0].lines.map((line) => line.text), ["HITHERE"]);

  const raw = await render(baseBitmap(), { ...saleText(), headline: "Hi\u0001there\uFFFF" }, style());
  assert.equal(raw.finalLayer.width, 300);
  assert.equal(raw.finalLayer.data.length, 300 * 400 * 4);
});

test("rounded corners are transparent on both layers", async () => {
  const result = await render(baseBitmap(), saleText(), style({ borderRadius: 20 }));

  assert.equal(result.textlessLayer.data[3], 0);
  assert.equal(result.finalLayer.data[3], 0);
  const center = (200 * 300 + 150) * 4 + 3;
  assert.equal(result.textlessLayer.data[center], 255);
});

test("grayscale at full intensity leaves a gray background", async () => {
  const result = await render(
    baseBitmap(),
    createTextContent(),
    style({ imageFilter: "grayscale", filterIntensity: 100, backgroundOpacity: 0, borderRadius: 0 })
  );
  const { data } = result.finalLayer;

  for (let offset = 0; offset < data.length; offset += 4) {
    assert(Math.abs(data[offset] - data[offset + 1]) <= 1 && Math.abs(data[offset + 1] - data[offset + 2]) <= 1);
  }
});

test("encoded PNG layers decode to the canvas size", async () => {
  const png = await sharp({ create: { width: 64, height: 48, channels: 3, background: { r: 10, g: 120, b: 200 } } })
    .png()
    .toBuffer();
  const result = await renderPng(png, saleText(), style({ size: { width: 240, height: 320 } }));

  for (const layer of [result.textlessPng, result.finalPng]) {
    const metadata = await sharp(layer).metadata();
    assert.equal(metadata.format, "png");
    assert.equal(metadata.width, 240);
    assert.equal(metadata.height, 320);
    assert.equal(metadata.channels, 4);
  }
});

test("undecodable bytes raise a DecodeFailure", async () => {
  await assert.rejects(
    render(Buffer.from("definitely not an image"), saleText(), style()),
    (error: unknown) => isPamphletError(error) && error.kind === "DecodeFailure"
  );
});

test("an out-of-range style is rejected before rendering", async () => {
  await assert.rejects(
    render(baseBitmap(), saleText(), { ...DEFAULT_STYLE_CONFIGURATION, backgroundOpacity: 101 }),
    (error: unknown) => isPamphletError(error) && error.kind === "InvalidConfiguration"
  );
});
