import { getFontFace } from "@/lib/fonts";
import { visibleTextBlocks, type PamphletLayout, type PanelShape, type TextBlock } from "@/lib/pamphlet-layout";
import { rgbToCss } from "@/lib/pamphlet-style";
import { stripXmlInvalid } from "@/lib/text-fit";

export type TextShadowGeometry = {
  offset: number;
  blur: number;
  opacity: number;
  outlineWidth: number;
  outlineOpacity: number;
};

export function escapeXml(input: string): string {
  return stripXmlInvalid(input)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function svgOpen(width: number, height: number): string {
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`;
}

function panelRect(panel: PanelShape): string {
  return `<rect x="${panel.x}" y="${panel.y}" width="${panel.width}" height="${panel.height}" rx="${panel.radius}" ry="${panel.radius}" fill="${rgbToCss(panel.color)}" fill-opacity="${panel.opacity}" />`;
}

export function textShadowGeometry(intensity: number): TextShadowGeometry {
  const strength = Math.min(100, Math.max(0, intensity)) / 100;
  return {
    offset: Math.round(1 + 3 * strength),
    blur: Math.round((1 + 3 * strength) * 10) / 10,
    opacity: Math.round(strength * 100) / 100,
    outlineWidth: strength > 0 ? 1 : 0,
    outlineOpacity: Math.round(0.6 * strength * 100) / 100
  };
}

/**
 * Column panels and the feature-list panel. Returns null when nothing would be drawn.
 */
export function buildDecorSvg(layout: PamphletLayout): string | null {
  const shapes = layout.featurePanel ? [...layout.panels, layout.featurePanel] : layout.panels;
  if (shapes.length === 0) {
    return null;
  }

  return [svgOpen(layout.canvas.width, layout.canvas.height), ...shapes.map(panelRect), "</svg>"].join("\n");
}

export function buildCtaSvg(layout: PamphletLayout): string | null {
  const cta = layout.cta;
  if (!cta) {
    return null;
  }

  const { box, radius } = cta;
  return [
    svgOpen(layout.canvas.width, layout.canvas.height),
    `<rect x="${box.x}" y="${box.y}" width="${box.width}" height="${box.height}" rx="${radius}" ry="${radius}" fill="${rgbToCss(cta.backgroundColor)}" />`,
    "</svg>"
  ].join("\n");
}

function textElement(block: TextBlock, attributes: string, dx = 0, dy = 0): string {
  const face = getFontFace(block.font);
  const parts = [
    `<text font-family="${escapeXml(face.family)}" font-size="${block.size}" font-weight="${face.weight}" text-anchor="${block.align}" ${attributes}>`
  ];
  for (const line of block.lines) {
    parts.push(`<tspan x="${line.x + dx}" y="${line.baseline + dy}">${escapeXml(line.text)}</tspan>`);
  }
  parts.push("</text>");
  return parts.join("");
}

/**
 * Glyphs for every visible block. A text shadow draws a blurred offset copy plus a thin dark outline
 * underneath the fill.
 */
export function buildTextSvg(layout: PamphletLayout, textShadowIntensity: number): string | null {
  const blocks = visibleTextBlocks(layout);
  if (blocks.length === 0) {
    return null;
  }

  const shadow = textShadowGeometry(textShadowIntensity);
  const parts = [svgOpen(layout.canvas.width, layout.canvas.height)];

  if (shadow.opacity > 0) {
    parts.push(
      "<defs>",
      `<filter id="text-shadow" x="-10%" y="-10%" width="120%" height="120%">`,
      `<feGaussianBlur stdDeviation="${shadow.blur}" />`,
      "</filter>",
      "</defs>"
    );
  }

  for (const block of blocks) {
    if (shadow.opacity > 0) {
      parts.push(
        textElement(block, `fill="#000000" fill-opacity="${shadow.opacity}" filter="url(#text-shadow)"`, shadow.offset, shadow.offset)
      );
      parts.push(
        textElement(
          block,
          `fill="none" stroke="#000000" stroke-opacity="${shadow.outlineOpacity}" stroke-width="${shadow.outlineWidth * 2}" stroke-linejoin="round"`
        )
      );
    }
    parts.push(textElement(block, `fill="${rgbToCss(block.color)}"`));
  }

  parts.push("</svg>");
  return parts.join("\n");
}
