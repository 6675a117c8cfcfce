import { getColorScheme } from "@/lib/color-schemes";
import { invalidConfiguration } from "@/lib/pamphlet-errors";
import {
  LAYOUT_MODE_VALUES,
  StyleConfigurationSchema,
  StyleOverridesSchema,
  parseHexColor,
  type LayoutMode,
  type StyleConfiguration,
  type StyleOverrides
} from "@/lib/pamphlet-style";
import { getStylePreset } from "@/lib/style-presets";

export const DEFAULT_STYLE_CONFIGURATION: StyleConfiguration = {
  canvas: {
    width: 1200,
    height: 1600
  },
  layout: "centered",
  textPlacement: "top",
  backgroundOpacity: 35,
  headline: {
    font: "Arial-Bold",
    size: 72,
    color: [255, 255, 255]
  },
  body: {
    font: "Arial",
    size: 28,
    color: [255, 255, 255]
  },
  cta: {
    backgroundColor: [255, 100, 100],
    textColor: [255, 255, 255]
  },
  panelColor: [0, 0, 0],
  imageFilter: {
    name: "none",
    intensity: 50
  },
  cropMode: "none",
  imagePosition: "center",
  shadowIntensity: 0,
  borderRadius: 12,
  textShadowIntensity: 0,
  overallBrightness: 100
};

/**
 * Cycles centered → split → left-aligned → right-aligned for successive regenerations.
 */
export function nextLayoutMode(regenerationIndex: number): LayoutMode {
  if (!Number.isInteger(regenerationIndex) || regenerationIndex < 0) {
    throw invalidConfiguration(`Regeneration index must be a non-negative integer, received ${regenerationIndex}`);
  }

  return LAYOUT_MODE_VALUES[regenerationIndex % LAYOUT_MODE_VALUES.length];
}

export function parseStyleOverrides(input: unknown): StyleOverrides {
  const parsed = StyleOverridesSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw invalidConfiguration("Style overrides are invalid", parsed.error);
  }

  return parsed.data;
}

export function assertStyleConfiguration(style: StyleConfiguration): StyleConfiguration {
  const parsed = StyleConfigurationSchema.safeParse(style);
  if (!parsed.success) {
    throw invalidConfiguration("Style configuration is invalid", parsed.error);
  }

  return style;
}

function resolveBaseStyle(colorSchemeName: string | null | undefined, stylePresetName: string | null | undefined): StyleConfiguration {
  const scheme = getColorScheme(colorSchemeName);
  const preset = getStylePreset(stylePresetName);
  const defaults = DEFAULT_STYLE_CONFIGURATION;

  return {
    ...defaults,
    textPlacement: preset.textPlacement ?? defaults.textPlacement,
    backgroundOpacity: preset.backgroundOpacity ?? defaults.backgroundOpacity,
    headline: {
      font: preset.headlineFont,
      size: preset.headlineSize,
      color: scheme.accent
    },
    body: {
      font: preset.bodyFont,
      size: preset.bodySize,
      color: scheme.text
    },
    cta: {
      backgroundColor: scheme.cta,
      textColor: scheme.ctaText
    },
    panelColor: scheme.panel,
    imageFilter: preset.imageFilter ?? defaults.imageFilter,
    shadowIntensity: preset.shadowIntensity ?? defaults.shadowIntensity,
    borderRadius: preset.borderRadius ?? defaults.borderRadius,
    textShadowIntensity: preset.textShadowIntensity ?? defaults.textShadowIntensity
  };
}

/**
 * Resolves a complete style: explicit override, then the scheme/preset value, then the built-in default.
 * Throws an `InvalidConfiguration` error when an override is outside its documented range.
 */
export function resolveStyle(
  colorSchemeName: string | null | undefined,
  stylePresetName: string | null | undefined,
  overrides: unknown = {}
): StyleConfiguration {
  const base = resolveBaseStyle(colorSchemeName, stylePresetName);
  const edits = parseStyleOverrides(overrides);

  return {
    canvas: edits.size ? { width: edits.size.width, height: edits.size.height } : base.canvas,
    layout: edits.layout ?? base.layout,
    textPlacement: edits.textPlacement ?? base.textPlacement,
    backgroundOpacity: edits.backgroundOpacity ?? base.backgroundOpacity,
    headline: {
      font: edits.headlineFont ?? base.headline.font,
      size: edits.headlineSize ?? base.headline.size,
      color: edits.headlineColor ? parseHexColor(edits.headlineColor) : base.headline.color
    },
    body: {
      font: edits.bodyFont ?? base.body.font,
      size: edits.bodySize ?? base.body.size,
      color: edits.bodyColor ? parseHexColor(edits.bodyColor) : base.body.color
    },
    cta: {
      backgroundColor: edits.ctaBgColor ? parseHexColor(edits.ctaBgColor) : base.cta.backgroundColor,
      textColor: edits.ctaTextColor ? parseHexColor(edits.ctaTextColor) : base.cta.textColor
    },
    panelColor: base.panelColor,
    imageFilter: {
      name: edits.imageFilter ?? base.imageFilter.name,
      intensity: edits.filterIntensity ?? base.imageFilter.intensity
    },
    cropMode: edits.imageCrop ?? base.cropMode,
    imagePosition: edits.imagePosition ?? base.imagePosition,
    shadowIntensity: edits.shadowIntensity ?? base.shadowIntensity,
    borderRadius: edits.borderRadius ?? base.borderRadius,
    textShadowIntensity: edits.textShadow ?? base.textShadowIntensity,
    overallBrightness: edits.overallBrightness ?? base.overallBrightness
  };
}
