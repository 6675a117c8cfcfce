import type { RgbColor } from "@/lib/pamphlet-style";

export const COLOR_SCHEME_VALUES = ["modern", "elegant", "minimal"] as const;
export type ColorSchemeName = (typeof COLOR_SCHEME_VALUES)[number];

export type ColorScheme = {
  text: RgbColor;
  accent: RgbColor;
  cta: RgbColor;
  ctaText: RgbColor;
  panel: RgbColor;
};

export const DEFAULT_COLOR_SCHEME: ColorSchemeName = "modern";

const COLOR_SCHEMES: Record<ColorSchemeName, ColorScheme> = {
  modern: {
    text: [240, 247, 255],
    accent: [111, 203, 255],
    cta: [255, 102, 102],
    ctaText: [255, 255, 255],
    panel: [12, 24, 42]
  },
  elegant: {
    text: [255, 255, 255],
    accent: [255, 215, 0],
    cta: [194, 24, 91],
    ctaText: [255, 255, 255],
    panel: [35, 22, 58]
  },
  minimal: {
    text: [38, 38, 38],
    accent: [18, 132, 108],
    cta: [0, 112, 201],
    ctaText: [255, 255, 255],
    panel: [245, 245, 245]
  }
};

export function isColorSchemeName(value: string): value is ColorSchemeName {
  return Object.prototype.hasOwnProperty.call(COLOR_SCHEMES, value);
}

// Unknown names resolve to the modern palette.
export function getColorScheme(name: string | null | undefined): ColorScheme {
  const key = typeof name === "string" ? name.trim().toLowerCase() : "";
  return isColorSchemeName(key) ? COLOR_SCHEMES[key] : COLOR_SCHEMES[DEFAULT_COLOR_SCHEME];
}
