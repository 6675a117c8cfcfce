import { bitmapToSharp, cloneBitmap, toBitmap, type Bitmap } from "@/lib/raster";
import type { ImageFilterName } from "@/lib/pamphlet-style";

type Matrix3 = [[number, number, number], [number, number, number], [number, number, number]];

const IDENTITY_MATRIX: Matrix3 = [
  [1, 0, 0],
  [0, 1, 0],
  [0, 0, 1]
];

const SEPIA_MATRIX: Matrix3 = [
  [0.393, 0.769, 0.189],
  [0.349, 0.686, 0.168],
  [0.272, 0.534, 0.131]
];

const GRAYSCALE_MATRIX: Matrix3 = [
  [0.2126, 0.7152, 0.0722],
  [0.2126, 0.7152, 0.0722],
  [0.2126, 0.7152, 0.0722]
];

// libvips rejects smaller gaussian sigmas.
const MIN_BLUR_SIGMA = 0.3;

function blendMatrix(target: Matrix3, amount: number): Matrix3 {
  const mix = (row: number, column: number) =>
    IDENTITY_MATRIX[row][column] + (target[row][column] - IDENTITY_MATRIX[row][column]) * amount;

  return [
    [mix(0, 0), mix(0, 1), mix(0, 2)],
    [mix(1, 0), mix(1, 1), mix(1, 2)],
    [mix(2, 0), mix(2, 1), mix(2, 2)]
  ];
}

function percentFactor(intensity: number): number {
  return (100 + intensity) / 100;
}

/**
 * Applies one named filter at an intensity of 0–100 and returns a new bitmap.
 * brightness/contrast/saturate scale to (100 + intensity)%, blur uses intensity/10 px,
 * sepia and grayscale blend between the original and fully filtered pixels.
 */
export async function applyFilter(image: Bitmap, filterName: ImageFilterName, intensity: number): Promise<Bitmap> {
  switch (filterName) {
    case "none":
      return cloneBitmap(image);
    case "brightness":
      return toBitmap(bitmapToSharp(image).linear(percentFactor(intensity), 0));
    case "contrast": {
      const factor = percentFactor(intensity);
      return toBitmap(bitmapToSharp(image).linear(factor, 128 * (1 - factor)));
    }
    case "saturate":
      return toBitmap(bitmapToSharp(image).modulate({ saturation: percentFactor(intensity) }));
    case "blur": {
      const sigma = intensity / 10;
      if (sigma < MIN_BLUR_SIGMA) {
        return cloneBitmap(image);
      }
      return toBitmap(bitmapToSharp(image).blur(sigma));
    }
    case "sepia":
      return toBitmap(bitmapToSharp(image).recomb(blendMatrix(SEPIA_MATRIX, intensity / 100)));
    case "grayscale":
      return toBitmap(bitmapToSharp(image).recomb(blendMatrix(GRAYSCALE_MATRIX, intensity / 100)));
  }
}

/**
 * Multiplies every color channel by pct/100; 100 leaves the pixels untouched.
 */
export async function applyGlobalBrightness(image: Bitmap, pct: number): Promise<Bitmap> {
  if (pct === 100) {
    return cloneBitmap(image);
  }

  return toBitmap(bitmapToSharp(image).linear(pct / 100, 0));
}
