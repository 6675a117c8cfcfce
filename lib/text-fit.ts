import { measureTextWidth } from "@/lib/fonts";
import type { FontKey } from "@/lib/pamphlet-style";

export const ELLIPSIS = "…";
export const HEADLINE_MAX_LINES = 3;
export const HEADLINE_MIN_SIZE = 24;
export const SIZE_STEP = 2;

export type HeadlineFit = {
  lines: string[];
  fontSize: number;
  shrunk: boolean;
  truncated: boolean;
};

// Code points XML 1.0 cannot carry; librsvg refuses the whole SVG when one appears.
const XML_INVALID_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

export function stripXmlInvalid(value: string): string {
  return value.replace(XML_INVALID_CHARS, "");
}

export function cleanCopy(value: string | null | undefined): string {
  return typeof value === "string" ? stripXmlInvalid(value).replace(/\s+/g, " ").trim() : "";
}

/**
 * Greedy word wrap against the measured width. Words are never split; a word wider than
 * `maxWidth` occupies a line of its own.
 */
export function wrapText(text: string, font: FontKey, size: number, maxWidth: number): string[] {
  const words = cleanCopy(text).split(" ").filter(Boolean);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (!current || measureTextWidth(candidate, font, size) <= maxWidth) {
      current = candidate;
      continue;
    }

    lines.push(current);
    current = word;
  }

  if (current) {
    lines.push(current);
  }

  return lines;
}

export function linesFit(lines: string[], font: FontKey, size: number, maxWidth: number): boolean {
  return lines.every((line) => measureTextWidth(line, font, size) <= maxWidth);
}

/**
 * Shortens a line from the end until it plus an ellipsis fits; used for the last visible line of
 * clamped text and for single words wider than the column.
 */
export function trimLineWithEllipsis(line: string, font: FontKey, size: number, maxWidth: number): string {
  let chars = [...line];
  while (chars.length > 0) {
    const candidate = `${chars.join("").trimEnd().replace(/[.,;:!?-]+$/, "")}${ELLIPSIS}`;
    if (measureTextWidth(candidate, font, size) <= maxWidth) {
      return candidate;
    }
    chars = chars.slice(0, -1);
  }

  return ELLIPSIS;
}

export function clampLines(lines: string[], maxLines: number, font: FontKey, size: number, maxWidth: number): string[] {
  const fitted = lines.map((line) =>
    measureTextWidth(line, font, size) <= maxWidth ? line : trimLineWithEllipsis(line, font, size, maxWidth)
  );
  if (fitted.length <= maxLines) {
    return fitted;
  }

  const kept = fitted.slice(0, maxLines);
  const last = kept.length - 1;
  kept[last] = trimLineWithEllipsis(kept[last], font, size, maxWidth);
  return kept;
}

/**
 * Starts at the configured size and steps down by 2 px until the headline wraps into at most
 * three lines that all fit. Below 24 px it stops shrinking and clamps with an ellipsis instead.
 */
export function fitHeadline(text: string, font: FontKey, size: number, maxWidth: number): HeadlineFit {
  const minSize = Math.min(size, HEADLINE_MIN_SIZE);

  for (let fontSize = size; fontSize >= minSize; fontSize -= SIZE_STEP) {
    const lines = wrapText(text, font, fontSize, maxWidth);
    if (lines.length <= HEADLINE_MAX_LINES && linesFit(lines, font, fontSize, maxWidth)) {
      return {
        lines,
        fontSize,
        shrunk: fontSize !== size,
        truncated: false
      };
    }
  }

  const lines = wrapText(text, font, minSize, maxWidth);
  return {
    lines: clampLines(lines, HEADLINE_MAX_LINES, font, minSize, maxWidth),
    fontSize: minSize,
    shrunk: minSize !== size,
    truncated: true
  };
}
