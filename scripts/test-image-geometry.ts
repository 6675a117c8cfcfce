import assert from "node:assert/strict";
import { test } from "node:test";
import { computeAspectCrop, computeContainPlacement, fitToCanvas } from "../lib/image-cover";
import { applyDropShadow, applyRoundedCorners, dropShadowGeometry } from "../lib/image-effects";
import { CROP_MODE_VALUES } from "../lib/pamphlet-style";
import type { Bitmap } from "../lib/raster";

function solidBitmap(rgb: [number, number, number], width: number, height: number): Bitmap {
  const data = Buffer.alloc(width * height * 3);
  for (let offset = 0; offset < data.length; offset += 3) {
    data[offset] = rgb[0];
    data[offset + 1] = rgb[1];
    data[offset + 2] = rgb[2];
  }

  return { width, height, channels: 3, data };
}

function pixel(image: Bitmap, x: number, y: number): number[] {
  const offset = (y * image.width + x) * image.channels;
  return [...image.data.subarray(offset, offset + image.channels)];
}

test("computeAspectCrop slides the crop toward the focal point", () => {
  assert.deepEqual(computeAspectCrop(800, 600, 1, { x: 0.5, y: 0.5 }), { left: 100, top: 0, width: 600, height: 600 });
  assert.deepEqual(computeAspectCrop(800, 600, 3 / 4, { x: 0.1, y: 0.5 }), { left: 35, top: 0, width: 450, height: 600 });
  assert.deepEqual(computeAspectCrop(600, 800, 4 / 3, { x: 0.5, y: 0.9 }), { left: 0, top: 315, width: 600, height: 450 });
});

test("computeContainPlacement letterboxes inside the target", () => {
  assert.deepEqual(computeContainPlacement(800, 600, 1200, 1600, { x: 0.5, y: 0.5 }), {
    left: 0,
    top: 350,
    width: 1200,
    height: 900
  });
});

test("fitToCanvas always produces the requested size", async () => {
  const image = solidBitmap([200, 40, 90], 80, 60);
  for (const cropMode of CROP_MODE_VALUES) {
    const fitted = await fitToCanvas(image, 33, 51, cropMode, "top");
    assert.equal(fitted.width, 33, `${cropMode} width`);
    assert.equal(fitted.height, 51, `${cropMode} height`);
  }
});

test("crop mode none letterboxes with black bars", async () => {
  const fitted = await fitToCanvas(solidBitmap([200, 40, 90], 80, 60), 120, 160, "none", "center");

  assert.deepEqual(pixel(fitted, 0, 0), [0, 0, 0]);
  assert.deepEqual(pixel(fitted, 60, 159), [0, 0, 0]);
  const [r, g, b] = pixel(fitted, 60, 80);
  assert(Math.abs(r - 200) <= 2 && Math.abs(g - 40) <= 2 && Math.abs(b - 90) <= 2, `Unexpected center ${r},${g},${b}`);
});

test("rounded corners make the corners transparent", async () => {
  const image = solidBitmap([255, 255, 255], 40, 40);

  assert.deepEqual(await applyRoundedCorners(image, 0), image);

  const rounded = await applyRoundedCorners(image, 10);
  assert.equal(rounded.channels, 4);
  assert.equal(pixel(rounded, 0, 0)[3], 0);
  assert.equal(pixel(rounded, 39, 39)[3], 0);
  assert.equal(pixel(rounded, 20, 20)[3], 255);
});

test("drop shadow geometry scales with intensity", () => {
  assert.deepEqual(dropShadowGeometry(0), { offsetX: 0, offsetY: 0, blur: 4, opacity: 0 });
  assert.deepEqual(dropShadowGeometry(50), { offsetX: 2, offsetY: 5, blur: 11, opacity: 0.35 });
  assert.deepEqual(dropShadowGeometry(100), { offsetX: 4, offsetY: 10, blur: 18, opacity: 0.7 });
});

test("drop shadow darkens the area behind the content only when enabled", async () => {
  const canvas = solidBitmap([255, 255, 255], 100, 100);
  const bounds = { x: 20, y: 20, width: 40, height: 30 };

  assert.deepEqual(await applyDropShadow(canvas, bounds, 0), canvas);

  const shadowed = await applyDropShadow(canvas, bounds, 100);
  assert(pixel(shadowed, 44, 45)[0] < 230, `Expected a darker pixel, got ${pixel(shadowed, 44, 45).join(",")}`);
  assert.deepEqual(pixel(canvas, 44, 45), [255, 255, 255]);
});
