import { measureTextWidth } from "@/lib/fonts";
import type { TextContent } from "@/lib/pamphlet-text";
import type { FontKey, LayoutMode, RgbColor, StyleConfiguration, TextPlacement } from "@/lib/pamphlet-style";
import { SIZE_STEP, fitHeadline, trimLineWithEllipsis, wrapText } from "@/lib/text-fit";

export type TextAlign = "start" | "middle" | "end";

export type LayoutBox = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type PanelShape = LayoutBox & {
  radius: number;
  color: RgbColor;
  opacity: number;
};

export const TEXT_BLOCK_KEYS = ["headline", "tagline", "description", "featuresTitle", "features", "cta", "custom"] as const;
export type TextBlockKey = (typeof TEXT_BLOCK_KEYS)[number];

export type TextLine = {
  text: string;
  x: number;
  baseline: number;
};

export type TextBlock = {
  key: TextBlockKey;
  box: LayoutBox;
  lines: TextLine[];
  font: FontKey;
  size: number;
  color: RgbColor;
  align: TextAlign;
};

export type CtaButton = {
  box: LayoutBox;
  radius: number;
  backgroundColor: RgbColor;
  label: TextBlock;
};

export type OverflowReport = {
  headlineShrunk: boolean;
  headlineTruncated: boolean;
  bodySize: number;
  bodyShrunk: boolean;
  hiddenFeatures: number;
  hiddenCustomLines: number;
  droppedDescriptionLines: number;
  hiddenBlocks: TextBlockKey[];
};

export type PamphletLayout = {
  canvas: {
    width: number;
    height: number;
  };
  mode: LayoutMode;
  placement: TextPlacement;
  columns: LayoutBox[];
  panels: PanelShape[];
  featurePanel: PanelShape | null;
  cta: CtaButton | null;
  blocks: TextBlock[];
  overflow: OverflowReport;
};

export const FEATURES_TITLE = "Key Features";
export const FEATURE_BULLET = "•";
export const MIN_BODY_SIZE = 12;
export const MAX_PANEL_ALPHA = 0.92;
export const CTA_PADDING = { x: 32, y: 18 } as const;

const MARGINS = { side: 0.08, top: 0.08, bottom: 0.12 } as const;
const SPLIT_GUTTER = 0.04;
const SINGLE_COLUMN_SHARE = 0.7;
const LINE_HEIGHT = 1.25;
const BASELINE_OFFSET = 0.95;
const PANEL_RADIUS_EXTRA = 12;

type DerivedSizes = {
  headline: number;
  tagline: number;
  body: number;
  feature: number;
  cta: number;
};

type Column = {
  box: LayoutBox;
  textX: number;
  textWidth: number;
  align: TextAlign;
  contentTop: number;
  contentHeight: number;
};

// One element of a column stack before vertical placement.
type StackItem = {
  key: TextBlockKey;
  rawLines: string[];
  font: FontKey;
  size: number;
  color: RgbColor;
  align: TextAlign;
  gapAfter: number;
  button?: {
    width: number;
    height: number;
    textColor: RgbColor;
  };
};

type CopyBudget = {
  bodySize: number;
  featureCount: number;
  customCount: number;
  descriptionLineCap: number | null;
  hiddenBlocks: TextBlockKey[];
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function lineHeight(size: number): number {
  return Math.round(size * LINE_HEIGHT);
}

export function deriveSizes(headlineSize: number, bodySize: number): DerivedSizes {
  return {
    headline: headlineSize,
    tagline: clamp(bodySize + 6, 20, 60),
    body: bodySize,
    feature: Math.max(18, bodySize - 2),
    cta: Math.max(22, bodySize + 4)
  };
}

export function panelAlpha(backgroundOpacity: number): number {
  return Math.min(MAX_PANEL_ALPHA, clamp(backgroundOpacity, 0, 100) / 100);
}

function columnPadding(width: number): number {
  return Math.max(8, Math.round(width * 0.06));
}

function buildColumn(box: LayoutBox, align: TextAlign): Column {
  const padding = Math.min(columnPadding(box.width), Math.floor(box.width / 4), Math.floor(box.height / 4));
  return {
    box,
    textX: box.x + padding,
    textWidth: Math.max(1, box.width - padding * 2),
    align,
    contentTop: box.y + padding,
    contentHeight: Math.max(1, box.height - padding * 2)
  };
}

/**
 * Splits the inner canvas (8% sides, 8% top, 12% bottom) into the text columns for a layout mode.
 */
export function computeColumns(mode: LayoutMode, canvasWidth: number, canvasHeight: number): Column[] {
  const side = Math.round(canvasWidth * MARGINS.side);
  const top = Math.round(canvasHeight * MARGINS.top);
  const bottom = Math.round(canvasHeight * MARGINS.bottom);
  const innerWidth = Math.max(1, canvasWidth - side * 2);
  const innerHeight = Math.max(1, canvasHeight - top - bottom);

  switch (mode) {
    case "centered":
      return [buildColumn({ x: side, y: top, width: innerWidth, height: innerHeight }, "middle")];
    case "left-aligned": {
      const width = Math.max(1, Math.round(innerWidth * SINGLE_COLUMN_SHARE));
      return [buildColumn({ x: side, y: top, width, height: innerHeight }, "start")];
    }
    case "right-aligned": {
      const width = Math.max(1, Math.round(innerWidth * SINGLE_COLUMN_SHARE));
      return [buildColumn({ x: side + innerWidth - width, y: top, width, height: innerHeight }, "end")];
    }
    case "split": {
      const gutter = Math.round(canvasWidth * SPLIT_GUTTER);
      const width = Math.max(1, Math.floor((innerWidth - gutter) / 2));
      return [
        buildColumn({ x: side, y: top, width, height: innerHeight }, "start"),
        buildColumn({ x: side + innerWidth - width, y: top, width, height: innerHeight }, "end")
      ];
    }
  }
}

function fitLines(lines: string[], font: FontKey, size: number, maxWidth: number): string[] {
  return lines.map((line) =>
    measureTextWidth(line, font, size) <= maxWidth ? line : trimLineWithEllipsis(line, font, size, maxWidth)
  );
}

function wrapFitted(text: string, font: FontKey, size: number, maxWidth: number): string[] {
  return fitLines(wrapText(text, font, size, maxWidth), font, size, maxWidth);
}

function stackHeight(items: StackItem[]): number {
  return items.reduce((total, item, index) => {
    const gap = index < items.length - 1 ? item.gapAfter : 0;
    return total + itemHeight(item) + gap;
  }, 0);
}

function itemHeight(item: StackItem): number {
  if (item.button) {
    return item.button.height;
  }

  return item.rawLines.length * lineHeight(item.size);
}

type StackContext = {
  text: TextContent;
  style: StyleConfiguration;
  sizes: DerivedSizes;
  headlineLines: string[];
  mode: LayoutMode;
};

function buildStackItems(context: StackContext, column: Column, keys: readonly TextBlockKey[], budget: CopyBudget): StackItem[] {
  const { text, style, sizes } = context;
  const width = column.textWidth;
  const listAlign: TextAlign = context.mode === "centered" ? "start" : column.align;
  const items: StackItem[] = [];

  for (const key of keys) {
    if (budget.hiddenBlocks.includes(key)) {
      continue;
    }

    switch (key) {
      case "headline":
        if (context.headlineLines.length > 0) {
          items.push({
            key,
            rawLines: context.headlineLines,
            font: style.headline.font,
            size: sizes.headline,
            color: style.headline.color,
            align: column.align,
            gapAfter: Math.round(sizes.headline * 0.3)
          });
        }
        break;
      case "tagline":
        if (text.tagline && !text.removed.tagline) {
          items.push({
            key,
            rawLines: wrapFitted(text.tagline.toUpperCase(), style.body.font, sizes.tagline, width),
            font: style.body.font,
            size: sizes.tagline,
            color: style.body.color,
            align: column.align,
            gapAfter: Math.round(sizes.tagline * 0.4)
          });
        }
        break;
      case "description":
        if (text.description && !text.removed.description) {
          let lines = wrapFitted(text.description, style.body.font, sizes.body, width);
          if (budget.descriptionLineCap !== null && lines.length > budget.descriptionLineCap) {
            lines = lines.slice(0, budget.descriptionLineCap);
            const last = lines.length - 1;
            if (last >= 0) {
              lines[last] = trimLineWithEllipsis(lines[last], style.body.font, sizes.body, width);
            }
          }
          if (lines.length > 0) {
            items.push({
              key,
              rawLines: lines,
              font: style.body.font,
              size: sizes.body,
              color: style.body.color,
              align: column.align,
              gapAfter: Math.round(sizes.body * 0.8)
            });
          }
        }
        break;
      case "featuresTitle":
        if (text.features.length > 0 && budget.featureCount > 0) {
          items.push({
            key,
            rawLines: wrapFitted(FEATURES_TITLE.toUpperCase(), style.body.font, sizes.tagline, width),
            font: style.body.font,
            size: sizes.tagline,
            color: style.headline.color,
            align: listAlign,
            gapAfter: Math.round(sizes.feature * 0.4)
          });
        }
        break;
      case "features": {
        const visible = text.features.slice(0, budget.featureCount);
        if (visible.length > 0) {
          items.push({
            key,
            rawLines: visible.flatMap((feature) =>
              wrapFitted(`${FEATURE_BULLET} ${feature}`, style.body.font, sizes.feature, width)
            ),
            font: style.body.font,
            size: sizes.feature,
            color: style.body.color,
            align: listAlign,
            gapAfter: Math.round(sizes.body * 0.8)
          });
        }
        break;
      }
      case "cta":
        if (text.callToAction && !text.removed.callToAction) {
          const maxLabelWidth = Math.max(1, width - CTA_PADDING.x * 2);
          const label = fitLines([text.callToAction.toUpperCase()], style.headline.font, sizes.cta, maxLabelWidth);
          const labelWidth = measureTextWidth(label[0] ?? "", style.headline.font, sizes.cta);
          items.push({
            key,
            rawLines: label,
            font: style.headline.font,
            size: sizes.cta,
            color: style.cta.textColor,
            align: column.align,
            gapAfter: Math.round(sizes.body * 0.6),
            button: {
              width: Math.min(width, labelWidth + CTA_PADDING.x * 2),
              height: lineHeight(sizes.cta) + CTA_PADDING.y * 2,
              textColor: style.cta.textColor
            }
          });
        }
        break;
      case "custom": {
        const lines = (text.removed.custom ? [] : text.customLines)
          .slice(0, budget.customCount)
          .flatMap((line) => wrapFitted(line, style.body.font, sizes.body, width));
        if (lines.length > 0) {
          items.push({
            key,
            rawLines: lines,
            font: style.body.font,
            size: sizes.body,
            color: style.body.color,
            align: column.align,
            gapAfter: 0
          });
        }
        break;
      }
    }
  }

  return items;
}

function columnKeys(mode: LayoutMode): Array<readonly TextBlockKey[]> {
  if (mode === "split") {
    return [
      ["headline", "tagline", "description"],
      ["featuresTitle", "features", "cta", "custom"]
    ];
  }

  return [TEXT_BLOCK_KEYS];
}

function descriptionLineCount(items: StackItem[]): number {
  return items.find((item) => item.key === "description")?.rawLines.length ?? 0;
}

// Removal order once shrinking is exhausted: whole blocks from the bottom of the stack upward.
const BLOCK_DROP_ORDER: readonly TextBlockKey[] = ["custom", "cta", "features", "featuresTitle", "description", "tagline", "headline"];

function alignedX(column: Column, align: TextAlign, contentWidth = 0): number {
  switch (align) {
    case "start":
      return column.textX;
    case "middle":
      return column.textX + Math.round((column.textWidth - contentWidth) / 2);
    case "end":
      return column.textX + column.textWidth - contentWidth;
  }
}

function startY(column: Column, height: number, placement: TextPlacement): number {
  const free = Math.max(0, column.contentHeight - height);
  switch (placement) {
    case "top":
      return column.contentTop;
    case "middle":
      return column.contentTop + Math.floor(free / 2);
    case "bottom":
      return column.contentTop + free;
  }
}

function placeLines(rawLines: string[], x: number, top: number, size: number): TextLine[] {
  const step = lineHeight(size);
  return rawLines.map((line, index) => ({
    text: line,
    x,
    baseline: top + index * step + Math.round(size * BASELINE_OFFSET)
  }));
}

function placeStack(
  items: StackItem[],
  column: Column,
  style: StyleConfiguration
): { blocks: TextBlock[]; cta: CtaButton | null } {
  const blocks: TextBlock[] = [];
  let cta: CtaButton | null = null;
  let cursor = startY(column, stackHeight(items), style.textPlacement);

  for (const item of items) {
    const height = itemHeight(item);

    if (item.button) {
      const x = alignedX(column, item.align, item.button.width);
      const box = { x, y: cursor, width: item.button.width, height };
      const labelTop = cursor + CTA_PADDING.y;
      const label: TextBlock = {
        key: "cta",
        box: { x, y: labelTop, width: item.button.width, height: lineHeight(item.size) },
        lines: placeLines(item.rawLines, x + Math.round(item.button.width / 2), labelTop, item.size),
        font: item.font,
        size: item.size,
        color: item.button.textColor,
        align: "middle"
      };
      cta = {
        box,
        radius: Math.min(style.borderRadius, Math.floor(height / 2)),
        backgroundColor: style.cta.backgroundColor,
        label
      };
      blocks.push(label);
    } else {
      blocks.push({
        key: item.key,
        box: { x: column.textX, y: cursor, width: column.textWidth, height },
        lines: placeLines(item.rawLines, alignedX(column, item.align), cursor, item.size),
        font: item.font,
        size: item.size,
        color: item.color,
        align: item.align
      });
    }

    cursor += height + item.gapAfter;
  }

  return { blocks, cta };
}

function buildPanels(columns: Column[], style: StyleConfiguration): PanelShape[] {
  const opacity = panelAlpha(style.backgroundOpacity);
  if (opacity <= 0) {
    return [];
  }

  return columns.map((column) => ({
    ...column.box,
    radius: style.borderRadius + PANEL_RADIUS_EXTRA,
    color: style.panelColor,
    opacity
  }));
}

function lighten(color: RgbColor, amount: number): RgbColor {
  return [
    Math.round(color[0] + (255 - color[0]) * amount),
    Math.round(color[1] + (255 - color[1]) * amount),
    Math.round(color[2] + (255 - color[2]) * amount)
  ];
}

function buildFeaturePanel(blocks: TextBlock[], style: StyleConfiguration): PanelShape | null {
  const opacity = panelAlpha(style.backgroundOpacity);
  const title = blocks.find((block) => block.key === "featuresTitle");
  const list = blocks.find((block) => block.key === "features");
  if (opacity <= 0 || !list) {
    return null;
  }

  const first = title ?? list;
  const inset = Math.round(list.size * 0.5);
  return {
    x: first.box.x - inset,
    y: first.box.y - inset,
    width: list.box.width + inset * 2,
    height: list.box.y + list.box.height - first.box.y + inset * 2,
    radius: style.borderRadius,
    color: lighten(style.panelColor, 0.2),
    opacity: Math.round(opacity * 0.6 * 100) / 100
  };
}

type ColumnContext = Omit<StackContext, "sizes"> & {
  headlineSize: number;
};

type FittedColumn = {
  items: StackItem[];
  bodySize: number;
  hiddenFeatures: number;
  hiddenCustomLines: number;
  droppedDescriptionLines: number;
  hiddenBlocks: TextBlockKey[];
};

// Overflow steps for a single column; only copy that lives in this column is shrunk or dropped.
function fitColumnStack(context: ColumnContext, column: Column, keys: readonly TextBlockKey[]): FittedColumn {
  const { text, style } = context;
  const minBodySize = Math.min(style.body.size, MIN_BODY_SIZE);
  const featureTotal = keys.includes("features") ? text.features.length : 0;
  const customTotal = keys.includes("custom") ? text.customLines.length : 0;
  const budget: CopyBudget = {
    bodySize: style.body.size,
    featureCount: featureTotal,
    customCount: customTotal,
    descriptionLineCap: null,
    hiddenBlocks: []
  };

  const build = (): StackItem[] =>
    buildStackItems({ ...context, sizes: deriveSizes(context.headlineSize, budget.bodySize) }, column, keys, budget);
  const fits = (candidate: StackItem[]): boolean => stackHeight(candidate) <= column.contentHeight;

  let items = build();
  while (!fits(items) && budget.bodySize - SIZE_STEP >= minBodySize) {
    budget.bodySize -= SIZE_STEP;
    items = build();
  }
  while (!fits(items) && budget.featureCount > 0) {
    budget.featureCount -= 1;
    items = build();
  }
  while (!fits(items) && budget.customCount > 0) {
    budget.customCount -= 1;
    items = build();
  }

  const wrappedDescriptionLines = descriptionLineCount(items);
  let descriptionLines = wrappedDescriptionLines;
  while (!fits(items) && descriptionLines > 0) {
    descriptionLines -= 1;
    budget.descriptionLineCap = descriptionLines;
    items = build();
  }
  for (const key of BLOCK_DROP_ORDER) {
    if (fits(items)) {
      break;
    }
    if (keys.includes(key)) {
      budget.hiddenBlocks.push(key);
      items = build();
    }
  }

  return {
    items,
    bodySize: budget.bodySize,
    hiddenFeatures: featureTotal - budget.featureCount,
    hiddenCustomLines: customTotal - budget.customCount,
    droppedDescriptionLines: budget.descriptionLineCap === null ? 0 : wrappedDescriptionLines - budget.descriptionLineCap,
    hiddenBlocks: budget.hiddenBlocks
  };
}

/**
 * Computes every panel, button and text line position for one render.
 *
 * The headline is fitted first (shrink in 2 px steps to 24 px, then clamp to three lines).
 * When a column stack is taller than its content area, that column alone steps its body size down to 12 px,
 * then trailing features, trailing custom lines and description lines are dropped in that order,
 * and finally whole blocks from the bottom of the stack. Each step taken is recorded in `overflow`.
 */
export function computePamphletLayout(text: TextContent, style: StyleConfiguration): PamphletLayout {
  const { width, height } = style.canvas;
  const columns = computeColumns(style.layout, width, height);
  const keysByColumn = columnKeys(style.layout);
  const headlineColumn = columns[0];

  const headline =
    text.headline && !text.removed.headline
      ? fitHeadline(text.headline.toUpperCase(), style.headline.font, style.headline.size, headlineColumn.textWidth)
      : null;

  const context: ColumnContext = {
    text,
    style,
    headlineLines: headline?.lines ?? [],
    headlineSize: headline?.fontSize ?? style.headline.size,
    mode: style.layout
  };
  const fitted = columns.map((column, index) => fitColumnStack(context, column, keysByColumn[index]));

  const blocks: TextBlock[] = [];
  let cta: CtaButton | null = null;
  for (const [index, entry] of fitted.entries()) {
    const placed = placeStack(entry.items, columns[index], style);
    blocks.push(...placed.blocks);
    cta = placed.cta ?? cta;
  }

  const bodySize = Math.min(...fitted.map((entry) => entry.bodySize));
  const total = (pick: (entry: FittedColumn) => number) => fitted.reduce((sum, entry) => sum + pick(entry), 0);

  return {
    canvas: { width, height },
    mode: style.layout,
    placement: style.textPlacement,
    columns: columns.map((column) => column.box),
    panels: buildPanels(columns, style),
    featurePanel: buildFeaturePanel(blocks, style),
    cta,
    blocks,
    overflow: {
      headlineShrunk: headline?.shrunk ?? false,
      headlineTruncated: headline?.truncated ?? false,
      bodySize,
      bodyShrunk: bodySize !== style.body.size,
      hiddenFeatures: total((entry) => entry.hiddenFeatures),
      hiddenCustomLines: total((entry) => entry.hiddenCustomLines),
      droppedDescriptionLines: total((entry) => entry.droppedDescriptionLines),
      hiddenBlocks: fitted.flatMap((entry) => entry.hiddenBlocks)
    }
  };
}

export function hasOverflow(overflow: OverflowReport): boolean {
  return (
    overflow.headlineShrunk ||
    overflow.headlineTruncated ||
    overflow.bodyShrunk ||
    overflow.hiddenFeatures > 0 ||
    overflow.hiddenCustomLines > 0 ||
    overflow.droppedDescriptionLines > 0 ||
    overflow.hiddenBlocks.length > 0
  );
}

export function visibleTextBlocks(layout: PamphletLayout): TextBlock[] {
  return layout.blocks.filter((block) => block.lines.length > 0);
}
