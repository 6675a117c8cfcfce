import { z } from "zod";

export const LAYOUT_MODE_VALUES = ["centered", "split", "left-aligned", "right-aligned"] as const;
export type LayoutMode = (typeof LAYOUT_MODE_VALUES)[number];

export const TEXT_PLACEMENT_VALUES = ["top", "middle", "bottom"] as const;
export type TextPlacement = (typeof TEXT_PLACEMENT_VALUES)[number];

export const IMAGE_FILTER_VALUES = ["none", "brightness", "contrast", "saturate", "blur", "sepia", "grayscale"] as const;
export type ImageFilterName = (typeof IMAGE_FILTER_VALUES)[number];

export const CROP_MODE_VALUES = ["none", "square", "portrait", "landscape"] as const;
export type CropMode = (typeof CROP_MODE_VALUES)[number];

export const IMAGE_ANCHOR_VALUES = ["center", "top", "bottom", "left", "right"] as const;
export type ImageAnchor = (typeof IMAGE_ANCHOR_VALUES)[number];

export const FONT_KEY_VALUES = [
  "Arial",
  "Arial-Bold",
  "Helvetica",
  "Helvetica-Bold",
  "Times",
  "Times-Bold",
  "Georgia",
  "Georgia-Bold",
  "Verdana",
  "Verdana-Bold"
] as const;
export type FontKey = (typeof FONT_KEY_VALUES)[number];

export const MAX_CANVAS_SIDE = 4096;
export const HEADLINE_SIZE_RANGE = { min: 24, max: 120 } as const;
export const BODY_SIZE_RANGE = { min: 12, max: 48 } as const;

export type RgbColor = readonly [number, number, number];

export type TypographyStyle = {
  font: FontKey;
  size: number;
  color: RgbColor;
};

export type StyleConfiguration = {
  canvas: {
    width: number;
    height: number;
  };
  layout: LayoutMode;
  textPlacement: TextPlacement;
  backgroundOpacity: number;
  headline: TypographyStyle;
  body: TypographyStyle;
  cta: {
    backgroundColor: RgbColor;
    textColor: RgbColor;
  };
  panelColor: RgbColor;
  imageFilter: {
    name: ImageFilterName;
    intensity: number;
  };
  cropMode: CropMode;
  imagePosition: ImageAnchor;
  shadowIntensity: number;
  borderRadius: number;
  textShadowIntensity: number;
  overallBrightness: number;
};

export const LayoutModeSchema = z.enum(LAYOUT_MODE_VALUES);
export const TextPlacementSchema = z.enum(TEXT_PLACEMENT_VALUES);
export const ImageFilterSchema = z.enum(IMAGE_FILTER_VALUES);
export const CropModeSchema = z.enum(CROP_MODE_VALUES);
export const ImageAnchorSchema = z.enum(IMAGE_ANCHOR_VALUES);
export const FontKeySchema = z.enum(FONT_KEY_VALUES);

const HEX_COLOR_REGEX = /^#[0-9a-fA-F]{6}$/;
const HexColorSchema = z.string().regex(HEX_COLOR_REGEX, "Expected a #RRGGBB color");
const PercentSchema = z.number().int().min(0).max(100);
const CanvasSideSchema = z.number().int().min(1).max(MAX_CANVAS_SIDE);

// Wire format sent by the editor; every field is optional and only present fields replace the base.
export const StyleOverridesSchema = z
  .object({
    size: z
      .object({
        width: CanvasSideSchema,
        height: CanvasSideSchema
      })
      .strict(),
    layout: LayoutModeSchema,
    textPlacement: TextPlacementSchema,
    backgroundOpacity: PercentSchema,
    headlineFont: FontKeySchema,
    headlineSize: z.number().int().min(HEADLINE_SIZE_RANGE.min).max(HEADLINE_SIZE_RANGE.max),
    headlineColor: HexColorSchema,
    bodyFont: FontKeySchema,
    bodySize: z.number().int().min(BODY_SIZE_RANGE.min).max(BODY_SIZE_RANGE.max),
    bodyColor: HexColorSchema,
    ctaBgColor: HexColorSchema,
    ctaTextColor: HexColorSchema,
    imageFilter: ImageFilterSchema,
    filterIntensity: PercentSchema,
    imageCrop: CropModeSchema,
    imagePosition: ImageAnchorSchema,
    shadowIntensity: PercentSchema,
    borderRadius: z.number().int().min(0).max(50),
    textShadow: PercentSchema,
    overallBrightness: z.number().int().min(50).max(150)
  })
  .partial()
  .strict();

export type StyleOverrides = z.infer<typeof StyleOverridesSchema>;

const RgbColorSchema = z.tuple([
  z.number().int().min(0).max(255),
  z.number().int().min(0).max(255),
  z.number().int().min(0).max(255)
]);

const TypographySchema = (range: { min: number; max: number }) =>
  z.object({
    font: FontKeySchema,
    size: z.number().int().min(range.min).max(range.max),
    color: RgbColorSchema
  });

export const StyleConfigurationSchema = z.object({
  canvas: z.object({
    width: CanvasSideSchema,
    height: CanvasSideSchema
  }),
  layout: LayoutModeSchema,
  textPlacement: TextPlacementSchema,
  backgroundOpacity: PercentSchema,
  headline: TypographySchema(HEADLINE_SIZE_RANGE),
  body: TypographySchema(BODY_SIZE_RANGE),
  cta: z.object({
    backgroundColor: RgbColorSchema,
    textColor: RgbColorSchema
  }),
  panelColor: RgbColorSchema,
  imageFilter: z.object({
    name: ImageFilterSchema,
    intensity: PercentSchema
  }),
  cropMode: CropModeSchema,
  imagePosition: ImageAnchorSchema,
  shadowIntensity: PercentSchema,
  borderRadius: z.number().int().min(0).max(50),
  textShadowIntensity: PercentSchema,
  overallBrightness: z.number().int().min(50).max(150)
});

export function parseHexColor(input: string): RgbColor {
  const normalized = input.trim().replace(/^#/, "");
  return [
    Number.parseInt(normalized.slice(0, 2), 16),
    Number.parseInt(normalized.slice(2, 4), 16),
    Number.parseInt(normalized.slice(4, 6), 16)
  ];
}

export function rgbToCss(color: RgbColor): string {
  return `rgb(${color[0]},${color[1]},${color[2]})`;
}
