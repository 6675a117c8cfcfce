import type { FontKey, ImageFilterName, TextPlacement } from "@/lib/pamphlet-style";

export const STYLE_PRESET_VALUES = ["professional", "creative", "bold", "luxury"] as const;
export type StylePresetName = (typeof STYLE_PRESET_VALUES)[number];

export type StylePreset = {
  headlineFont: FontKey;
  headlineSize: number;
  bodyFont: FontKey;
  bodySize: number;
  textPlacement?: TextPlacement;
  backgroundOpacity?: number;
  shadowIntensity?: number;
  borderRadius?: number;
  textShadowIntensity?: number;
  imageFilter?: {
    name: ImageFilterName;
    intensity: number;
  };
};

export const DEFAULT_STYLE_PRESET: StylePresetName = "professional";

const STYLE_PRESETS: Record<StylePresetName, StylePreset> = {
  professional: {
    headlineFont: "Arial-Bold",
    headlineSize: 70,
    bodyFont: "Arial",
    bodySize: 28,
    backgroundOpacity: 35,
    shadowIntensity: 30,
    borderRadius: 28,
    textShadowIntensity: 30
  },
  creative: {
    headlineFont: "Georgia-Bold",
    headlineSize: 76,
    bodyFont: "Verdana",
    bodySize: 26,
    textPlacement: "middle",
    backgroundOpacity: 25,
    shadowIntensity: 40,
    borderRadius: 36,
    textShadowIntensity: 45,
    imageFilter: {
      name: "saturate",
      intensity: 20
    }
  },
  bold: {
    headlineFont: "Helvetica-Bold",
    headlineSize: 96,
    bodyFont: "Helvetica",
    bodySize: 30,
    backgroundOpacity: 50,
    shadowIntensity: 55,
    borderRadius: 8,
    textShadowIntensity: 60,
    imageFilter: {
      name: "contrast",
      intensity: 15
    }
  },
  luxury: {
    headlineFont: "Times-Bold",
    headlineSize: 68,
    bodyFont: "Georgia",
    bodySize: 26,
    textPlacement: "bottom",
    backgroundOpacity: 45,
    shadowIntensity: 20,
    borderRadius: 4,
    textShadowIntensity: 25
  }
};

export function isStylePresetName(value: string): value is StylePresetName {
  return Object.prototype.hasOwnProperty.call(STYLE_PRESETS, value);
}

// Unknown names resolve to the professional preset.
export function getStylePreset(name: string | null | undefined): StylePreset {
  const key = typeof name === "string" ? name.trim().toLowerCase() : "";
  return isStylePresetName(key) ? STYLE_PRESETS[key] : STYLE_PRESETS[DEFAULT_STYLE_PRESET];
}
