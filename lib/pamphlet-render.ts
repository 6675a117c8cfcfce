import { assertStyleConfiguration } from "@/lib/design-config";
import { fitToCanvas } from "@/lib/image-cover";
import { applyDropShadow, applyRoundedCorners } from "@/lib/image-effects";
import { applyFilter, applyGlobalBrightness } from "@/lib/image-filters";
import { PamphletError } from "@/lib/pamphlet-errors";
import { computePamphletLayout, type PamphletLayout } from "@/lib/pamphlet-layout";
import type { StyleConfiguration } from "@/lib/pamphlet-style";
import { buildCtaSvg, buildDecorSvg, buildTextSvg } from "@/lib/pamphlet-svg";
import type { TextContent } from "@/lib/pamphlet-text";
import { cloneBitmap, compositeSvg, decodeImage, encodePng, ensureAlpha, flattenBitmap, type Bitmap } from "@/lib/raster";

export type RenderResult = {
  textlessLayer: Bitmap;
  finalLayer: Bitmap;
  layout: PamphletLayout;
};

export type RenderedPngs = {
  textlessPng: Buffer;
  finalPng: Buffer;
  layout: PamphletLayout;
};

function assertBitmap(image: Bitmap): Bitmap {
  const expected = image.width * image.height * image.channels;
  if (image.width < 1 || image.height < 1 || image.data.length !== expected) {
    throw new PamphletError("DecodeFailure", "Background bitmap dimensions do not match its pixel data", [
      `expected ${expected} bytes for ${image.width}x${image.height}x${image.channels}, received ${image.data.length}`
    ]);
  }

  return image;
}

async function prepareBackground(baseImage: Bitmap, style: StyleConfiguration): Promise<Bitmap> {
  const fitted = await fitToCanvas(baseImage, style.canvas.width, style.canvas.height, style.cropMode, style.imagePosition);
  const filtered = await applyFilter(fitted, style.imageFilter.name, style.imageFilter.intensity);
  return applyGlobalBrightness(filtered, style.overallBrightness);
}

async function drawDecor(background: Bitmap, layout: PamphletLayout, style: StyleConfiguration): Promise<Bitmap> {
  let canvas = await ensureAlpha(background);

  for (const panel of layout.panels) {
    canvas = await applyDropShadow(canvas, panel, style.shadowIntensity);
  }

  const decorSvg = buildDecorSvg(layout);
  if (decorSvg) {
    canvas = await compositeSvg(canvas, decorSvg);
  }

  const ctaSvg = buildCtaSvg(layout);
  if (layout.cta && ctaSvg) {
    canvas = await applyDropShadow(canvas, { ...layout.cta.box, radius: layout.cta.radius }, style.shadowIntensity);
    canvas = await compositeSvg(canvas, ctaSvg);
  }

  return canvas;
}

/**
 * Renders both output layers from the original background. Nothing from a previous render is
 * reused, so identical inputs always produce identical pixels.
 *
 * Order: fit to canvas → named filter → global brightness → panel shadows and panels →
 * CTA shadow and button (textless layer) → glyphs (final layer) → rounded corners on both.
 */
export async function render(baseImage: Bitmap | Buffer, text: TextContent, style: StyleConfiguration): Promise<RenderResult> {
  const startedAt = Date.now();
  assertStyleConfiguration(style);

  const source = Buffer.isBuffer(baseImage) ? await decodeImage(baseImage) : await flattenBitmap(assertBitmap(baseImage));
  const background = await prepareBackground(source, style);
  const layout = computePamphletLayout(text, style);
  const decorated = await drawDecor(background, layout, style);

  const textSvg = buildTextSvg(layout, style.textShadowIntensity);
  const textlessLayer = await applyRoundedCorners(decorated, style.borderRadius);
  const finalLayer = textSvg
    ? await applyRoundedCorners(await compositeSvg(decorated, textSvg), style.borderRadius)
    : cloneBitmap(textlessLayer);

  console.info(
    `[pamphlet-render] ${style.canvas.width}x${style.canvas.height} ${style.layout} rendered in ${Date.now() - startedAt}ms`
  );

  return {
    textlessLayer: await ensureAlpha(textlessLayer),
    finalLayer: await ensureAlpha(finalLayer),
    layout
  };
}

export async function renderPng(baseImage: Bitmap | Buffer, text: TextContent, style: StyleConfiguration): Promise<RenderedPngs> {
  const result = await render(baseImage, text, style);
  const [textlessPng, finalPng] = await Promise.all([encodePng(result.textlessLayer), encodePng(result.finalLayer)]);

  return {
    textlessPng,
    finalPng,
    layout: result.layout
  };
}
