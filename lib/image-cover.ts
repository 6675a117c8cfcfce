import { bitmapToSharp, toBitmap, type Bitmap } from "@/lib/raster";
import type { CropMode, ImageAnchor } from "@/lib/pamphlet-style";

export type FocalPoint = {
  x: number;
  y: number;
};

export type CropRegion = {
  left: number;
  top: number;
  width: number;
  height: number;
};

export const ANCHOR_FOCAL_POINTS: Record<ImageAnchor, FocalPoint> = {
  center: { x: 0.5, y: 0.5 },
  top: { x: 0.5, y: 0.1 },
  bottom: { x: 0.5, y: 0.9 },
  left: { x: 0.1, y: 0.5 },
  right: { x: 0.9, y: 0.5 }
};

const CROP_ASPECT_RATIOS: Record<Exclude<CropMode, "none">, number> = {
  square: 1,
  portrait: 3 / 4,
  landscape: 4 / 3
};

const LETTERBOX_COLOR = { r: 0, g: 0, b: 0 };

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Largest region of the given aspect ratio (width / height) inside the source, slid toward the focal point.
 */
export function computeAspectCrop(sourceWidth: number, sourceHeight: number, aspect: number, focal: FocalPoint): CropRegion {
  const sourceAspect = sourceWidth / sourceHeight;

  if (sourceAspect > aspect) {
    const width = clamp(Math.round(sourceHeight * aspect), 1, sourceWidth);
    return {
      left: Math.round((sourceWidth - width) * focal.x),
      top: 0,
      width,
      height: sourceHeight
    };
  }

  const height = clamp(Math.round(sourceWidth / aspect), 1, sourceHeight);
  return {
    left: 0,
    top: Math.round((sourceHeight - height) * focal.y),
    width: sourceWidth,
    height
  };
}

export function computeContainPlacement(sourceWidth: number, sourceHeight: number, targetWidth: number, targetHeight: number, focal: FocalPoint): CropRegion {
  const scale = Math.min(targetWidth / sourceWidth, targetHeight / sourceHeight);
  const width = clamp(Math.round(sourceWidth * scale), 1, targetWidth);
  const height = clamp(Math.round(sourceHeight * scale), 1, targetHeight);

  return {
    left: Math.round((targetWidth - width) * focal.x),
    top: Math.round((targetHeight - height) * focal.y),
    width,
    height
  };
}

async function extractRegion(image: Bitmap, region: CropRegion): Promise<Bitmap> {
  if (region.left === 0 && region.top === 0 && region.width === image.width && region.height === image.height) {
    return image;
  }

  return toBitmap(bitmapToSharp(image).extract(region));
}

export async function resizeCoverWithFocalPoint(params: {
  input: Bitmap;
  width: number;
  height: number;
  focal?: FocalPoint;
}): Promise<Bitmap> {
  const focal = params.focal ?? ANCHOR_FOCAL_POINTS.center;
  const region = computeAspectCrop(params.input.width, params.input.height, params.width / params.height, focal);
  const cropped = await extractRegion(params.input, region);

  return toBitmap(
    bitmapToSharp(cropped).resize({
      width: params.width,
      height: params.height,
      fit: "fill"
    })
  );
}

async function resizeContainWithFocalPoint(params: {
  input: Bitmap;
  width: number;
  height: number;
  focal: FocalPoint;
}): Promise<Bitmap> {
  const placement = computeContainPlacement(params.input.width, params.input.height, params.width, params.height, params.focal);

  return toBitmap(
    bitmapToSharp(params.input)
      .resize({
        width: placement.width,
        height: placement.height,
        fit: "fill"
      })
      .extend({
        top: placement.top,
        left: placement.left,
        bottom: params.height - placement.height - placement.top,
        right: params.width - placement.width - placement.left,
        background: LETTERBOX_COLOR
      })
  );
}

/**
 * Places the background on a `targetWidth`×`targetHeight` canvas. `none` letterboxes the whole image;
 * the other crop modes first cut the source to 1:1, 3:4 or 4:3 around the anchor and then cover the canvas.
 * The input bitmap is never modified.
 */
export async function fitToCanvas(
  image: Bitmap,
  targetWidth: number,
  targetHeight: number,
  cropMode: CropMode,
  anchor: ImageAnchor
): Promise<Bitmap> {
  const focal = ANCHOR_FOCAL_POINTS[anchor];

  if (cropMode === "none") {
    return resizeContainWithFocalPoint({ input: image, width: targetWidth, height: targetHeight, focal });
  }

  const region = computeAspectCrop(image.width, image.height, CROP_ASPECT_RATIOS[cropMode], focal);
  const cropped = await extractRegion(image, region);
  return resizeCoverWithFocalPoint({ input: cropped, width: targetWidth, height: targetHeight, focal });
}
