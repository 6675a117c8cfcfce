import { bitmapToSharp, cloneBitmap, compositeSvg, toBitmap, type Bitmap } from "@/lib/raster";

export type ContentBounds = {
  x: number;
  y: number;
  width: number;
  height: number;
  radius?: number;
};

export type DropShadowGeometry = {
  offsetX: number;
  offsetY: number;
  blur: number;
  opacity: number;
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function effectiveCornerRadius(width: number, height: number, radius: number): number {
  return clamp(Math.round(radius), 0, Math.floor(Math.min(width, height) / 2));
}

export function dropShadowGeometry(intensity: number): DropShadowGeometry {
  const strength = clamp(intensity, 0, 100) / 100;
  return {
    offsetX: Math.round(4 * strength),
    offsetY: Math.round(10 * strength),
    blur: Math.round((4 + 14 * strength) * 10) / 10,
    opacity: Math.round(0.7 * strength * 100) / 100
  };
}

/**
 * Masks the bitmap to a rounded rectangle; the cut corners become fully transparent.
 */
export async function applyRoundedCorners(image: Bitmap, radiusPx: number): Promise<Bitmap> {
  const radius = effectiveCornerRadius(image.width, image.height, radiusPx);
  if (radius === 0) {
    return cloneBitmap(image);
  }

  const mask = Buffer.from(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${image.width}" height="${image.height}">` +
      `<rect x="0" y="0" width="${image.width}" height="${image.height}" rx="${radius}" ry="${radius}" fill="#FFFFFF" />` +
      "</svg>"
  );

  return toBitmap(
    bitmapToSharp(image)
      .ensureAlpha()
      .composite([{ input: mask, blend: "dest-in" }])
  );
}

export function buildDropShadowSvg(canvasWidth: number, canvasHeight: number, bounds: ContentBounds, intensity: number): string {
  const shadow = dropShadowGeometry(intensity);
  const radius = effectiveCornerRadius(bounds.width, bounds.height, bounds.radius ?? 0);

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${canvasWidth}" height="${canvasHeight}" viewBox="0 0 ${canvasWidth} ${canvasHeight}">`,
    "<defs>",
    `<filter id="drop-shadow" filterUnits="userSpaceOnUse" x="0" y="0" width="${canvasWidth}" height="${canvasHeight}">`,
    `<feGaussianBlur stdDeviation="${shadow.blur}" />`,
    "</filter>",
    "</defs>",
    `<rect x="${bounds.x + shadow.offsetX}" y="${bounds.y + shadow.offsetY}" width="${bounds.width}" height="${bounds.height}" rx="${radius}" ry="${radius}" fill="#000000" fill-opacity="${shadow.opacity}" filter="url(#drop-shadow)" />`,
    "</svg>"
  ].join("\n");
}

/**
 * Composites a soft shadow behind `contentBounds`. Offset, blur and opacity scale with intensity/100;
 * intensity 0 returns an unchanged copy.
 */
export async function applyDropShadow(canvas: Bitmap, contentBounds: ContentBounds, intensity: number): Promise<Bitmap> {
  if (intensity <= 0 || contentBounds.width <= 0 || contentBounds.height <= 0) {
    return cloneBitmap(canvas);
  }

  const svg = buildDropShadowSvg(canvas.width, canvas.height, contentBounds, intensity);
  return compositeSvg(canvas, svg);
}
