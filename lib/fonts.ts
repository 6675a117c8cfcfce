import type { FontKey } from "@/lib/pamphlet-style";

export type FontFace = {
  family: string;
  weight: number;
  // Average lowercase advance as a fraction of the font size.
  widthFactor: number;
};

const SANS_FALLBACK = "'DejaVu Sans', 'Liberation Sans', sans-serif";
const SERIF_FALLBACK = "'DejaVu Serif', 'Liberation Serif', serif";

const FONT_FACES: Record<FontKey, FontFace> = {
  Arial: { family: `Arial, ${SANS_FALLBACK}`, weight: 400, widthFactor: 0.52 },
  "Arial-Bold": { family: `Arial, ${SANS_FALLBACK}`, weight: 700, widthFactor: 0.56 },
  Helvetica: { family: `Helvetica, ${SANS_FALLBACK}`, weight: 400, widthFactor: 0.52 },
  "Helvetica-Bold": { family: `Helvetica, ${SANS_FALLBACK}`, weight: 700, widthFactor: 0.56 },
  Times: { family: `'Times New Roman', Times, ${SERIF_FALLBACK}`, weight: 400, widthFactor: 0.46 },
  "Times-Bold": { family: `'Times New Roman', Times, ${SERIF_FALLBACK}`, weight: 700, widthFactor: 0.5 },
  Georgia: { family: `Georgia, ${SERIF_FALLBACK}`, weight: 400, widthFactor: 0.5 },
  "Georgia-Bold": { family: `Georgia, ${SERIF_FALLBACK}`, weight: 700, widthFactor: 0.55 },
  Verdana: { family: `Verdana, ${SANS_FALLBACK}`, weight: 400, widthFactor: 0.58 },
  "Verdana-Bold": { family: `Verdana, ${SANS_FALLBACK}`, weight: 700, widthFactor: 0.63 }
};

const NARROW_GLYPHS = new Set([..."iljtfI.,;:!|'`()[]"]);
const WIDE_GLYPHS = new Set([..."mwMW@%"]);

function glyphWeight(char: string): number {
  if (char === " ") {
    return 0.55;
  }
  if (NARROW_GLYPHS.has(char)) {
    return 0.55;
  }
  if (WIDE_GLYPHS.has(char)) {
    return 1.5;
  }
  if (char >= "A" && char <= "Z") {
    return 1.25;
  }

  return 1;
}

export function getFontFace(font: FontKey): FontFace {
  return FONT_FACES[font];
}

/**
 * Estimated advance width in pixels. Rendering goes through librsvg, so this is a stable
 * approximation rather than a shaped measurement; layout only depends on this value.
 */
export function measureTextWidth(text: string, font: FontKey, size: number): number {
  const face = FONT_FACES[font];
  let units = 0;
  for (const char of text) {
    units += glyphWeight(char);
  }

  return Math.ceil(units * face.widthFactor * size);
}
