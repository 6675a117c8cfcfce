import assert from "node:assert/strict";
import { test } from "node:test";
import { IMAGE_FILTER_VALUES } from "../lib/pamphlet-style";
import { applyFilter, applyGlobalBrightness } from "../lib/image-filters";
import { bitmapToSharp, toBitmap, type Bitmap } from "../lib/raster";

function gradientBitmap(width = 16, height = 12): Bitmap {
  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const offset = (y * width + x) * 3;
      data[offset] = (x * 15) % 256;
      data[offset + 1] = (y * 21) % 256;
      data[offset + 2] = ((x + y) * 9) % 256;
    }
  }

  return { width, height, channels: 3, data };
}

function solidBitmap(rgb: [number, number, number], width = 4, height = 4): Bitmap {
  const data = Buffer.alloc(width * height * 3);
  for (let offset = 0; offset < data.length; offset += 3) {
    data[offset] = rgb[0];
    data[offset + 1] = rgb[1];
    data[offset + 2] = rgb[2];
  }

  return { width, height, channels: 3, data };
}

test("the none filter returns an identical copy for any intensity", async () => {
  const image = gradientBitmap();
  for (const intensity of [0, 37, 100]) {
    const filtered = await applyFilter(image, "none", intensity);
    assert.deepEqual(filtered, image);
    assert.notEqual(filtered.data, image.data);
  }
});

test("full grayscale makes every channel equal", async () => {
  const filtered = await applyFilter(gradientBitmap(), "grayscale", 100);

  assert.equal(filtered.channels, 3);
  for (let offset = 0; offset < filtered.data.length; offset += 3) {
    const [r, g, b] = [filtered.data[offset], filtered.data[offset + 1], filtered.data[offset + 2]];
    assert(Math.abs(r - g) <= 1 && Math.abs(g - b) <= 1, `Pixel ${offset / 3} is not gray: ${r},${g},${b}`);
  }
});

test("every filter keeps the bitmap dimensions and leaves the input untouched", async () => {
  const image = gradientBitmap();
  const before = Buffer.from(image.data);

  for (const name of IMAGE_FILTER_VALUES) {
    const filtered = await applyFilter(image, name, 60);
    assert.equal(filtered.width, image.width, `${name} changed the width`);
    assert.equal(filtered.height, image.height, `${name} changed the height`);
  }
  assert.deepEqual(image.data, before);
});

test("blur below the minimum radius is a copy", async () => {
  const image = gradientBitmap();
  assert.deepEqual(await applyFilter(image, "blur", 2), image);
});

function firstPixel(image: Bitmap): number[] {
  return [...image.data.subarray(0, 3)];
}

function assertNear(actual: number[], expected: number[], tolerance = 1): void {
  actual.forEach((value, index) => {
    assert(Math.abs(value - expected[index]) <= tolerance, `Expected ${expected.join(",")}, got ${actual.join(",")}`);
  });
}

test("brightness scales channels to (100 + intensity)%", async () => {
  assert.deepEqual(firstPixel(await applyFilter(solidBitmap([100, 40, 0]), "brightness", 50)), [150, 60, 0]);
  assert.deepEqual(await applyFilter(solidBitmap([100, 40, 0]), "brightness", 0), solidBitmap([100, 40, 0]));
});

test("contrast stretches channels around mid-gray by (100 + intensity)%", async () => {
  assert.deepEqual(firstPixel(await applyFilter(solidBitmap([100, 200, 50]), "contrast", 50)), [86, 236, 11]);
  assert.deepEqual(firstPixel(await applyFilter(solidBitmap([128, 128, 128]), "contrast", 100)), [128, 128, 128]);
});

test("saturate leaves gray alone and spreads colored channels", async () => {
  assertNear(firstPixel(await applyFilter(solidBitmap([100, 100, 100]), "saturate", 80)), [100, 100, 100]);

  const spread = (pixel: number[]) => Math.max(...pixel) - Math.min(...pixel);
  const saturated = firstPixel(await applyFilter(solidBitmap([150, 100, 100]), "saturate", 100));
  assert(spread(saturated) > 50, `Expected a wider channel spread, got ${saturated.join(",")}`);
});

test("blur uses a sigma of intensity / 10", async () => {
  const image = gradientBitmap();
  const expected = await toBitmap(bitmapToSharp(image).blur(3));
  assert.deepEqual(await applyFilter(image, "blur", 30), expected);
});

test("sepia blends toward the sepia matrix by intensity / 100", async () => {
  const gray = solidBitmap([100, 100, 100]);

  assert.deepEqual(await applyFilter(gray, "sepia", 0), gray);
  assertNear(firstPixel(await applyFilter(gray, "sepia", 100)), [135, 120, 94]);
  assertNear(firstPixel(await applyFilter(gray, "sepia", 50)), [118, 110, 97]);
});

test("global brightness scales each channel by pct/100", async () => {
  const image = solidBitmap([200, 40, 90]);

  assert.deepEqual(await applyGlobalBrightness(image, 100), image);

  const darker = await applyGlobalBrightness(image, 50);
  assert.deepEqual([...darker.data.subarray(0, 3)], [100, 20, 45]);
});
