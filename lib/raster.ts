import sharp from "sharp";
import { PamphletError } from "@/lib/pamphlet-errors";

export type BitmapChannels = 3 | 4;

export type Bitmap = {
  width: number;
  height: number;
  channels: BitmapChannels;
  data: Buffer;
};

const SUPPORTED_FORMATS = new Set(["jpeg", "png", "gif", "webp"]);

function normalizeChannels(channels: number): BitmapChannels {
  if (channels === 3 || channels === 4) {
    return channels;
  }

  throw new Error(`Unexpected channel count ${channels} in raw pipeline output`);
}

export function bitmapToSharp(bitmap: Bitmap): sharp.Sharp {
  return sharp(bitmap.data, {
    raw: {
      width: bitmap.width,
      height: bitmap.height,
      channels: bitmap.channels
    }
  });
}

export async function toBitmap(pipeline: sharp.Sharp): Promise<Bitmap> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return {
    width: info.width,
    height: info.height,
    channels: normalizeChannels(info.channels),
    data
  };
}

export function cloneBitmap(bitmap: Bitmap): Bitmap {
  return {
    width: bitmap.width,
    height: bitmap.height,
    channels: bitmap.channels,
    data: Buffer.from(bitmap.data)
  };
}

/**
 * Decodes a JPEG, PNG, GIF (first frame) or WebP upload into an opaque sRGB bitmap.
 * Transparent pixels are flattened onto black.
 */
export async function decodeImage(input: Buffer): Promise<Bitmap> {
  if (input.length === 0) {
    throw new PamphletError("DecodeFailure", "Background image is empty");
  }

  let format: string | undefined;
  try {
    const metadata = await sharp(input, { failOn: "error" }).metadata();
    format = metadata.format;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PamphletError("DecodeFailure", "Background image could not be decoded", [message]);
  }

  if (!format || !SUPPORTED_FORMATS.has(format)) {
    throw new PamphletError("DecodeFailure", `Unsupported background image format: ${format ?? "unknown"}`);
  }

  try {
    return await toBitmap(
      sharp(input, { failOn: "error" }).flatten({ background: "#000000" }).toColourspace("srgb").removeAlpha()
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PamphletError("DecodeFailure", "Background image could not be decoded", [message]);
  }
}

export async function encodePng(bitmap: Bitmap): Promise<Buffer> {
  return bitmapToSharp(bitmap).png().toBuffer();
}

export async function ensureAlpha(bitmap: Bitmap): Promise<Bitmap> {
  if (bitmap.channels === 4) {
    return bitmap;
  }

  return toBitmap(bitmapToSharp(bitmap).ensureAlpha());
}

export async function compositeSvg(bitmap: Bitmap, svg: string): Promise<Bitmap> {
  return toBitmap(bitmapToSharp(bitmap).composite([{ input: Buffer.from(svg), top: 0, left: 0 }]));
}

// Caller-supplied bitmaps may carry alpha; backgrounds are always opaque.
export async function flattenBitmap(bitmap: Bitmap): Promise<Bitmap> {
  if (bitmap.channels === 3) {
    return bitmap;
  }

  return toBitmap(bitmapToSharp(bitmap).flatten({ background: "#000000" }));
}
