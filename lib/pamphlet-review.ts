import { hasOverflow, type PamphletLayout } from "@/lib/pamphlet-layout";
import type { TextContent } from "@/lib/pamphlet-text";

export type PamphletReview = {
  status: "reviewed";
  issuesDetected: boolean;
  notes: string[];
  headlinePreview: string;
};

const HEADLINE_PREVIEW_CHARS = 80;

export function reviewPamphlet(layout: PamphletLayout, text: TextContent): PamphletReview {
  const { overflow } = layout;
  const notes: string[] = [];

  if (overflow.headlineShrunk) {
    notes.push("Headline size reduced to fit the column.");
  }
  if (overflow.headlineTruncated) {
    notes.push("Headline clamped to three lines.");
  }
  if (overflow.bodyShrunk) {
    notes.push(`Body size reduced to ${overflow.bodySize}px.`);
  }
  if (overflow.hiddenFeatures > 0) {
    notes.push(`${overflow.hiddenFeatures} feature(s) hidden.`);
  }
  if (overflow.hiddenCustomLines > 0) {
    notes.push(`${overflow.hiddenCustomLines} custom line(s) hidden.`);
  }
  if (overflow.droppedDescriptionLines > 0) {
    notes.push(`${overflow.droppedDescriptionLines} description line(s) dropped.`);
  }
  if (overflow.hiddenBlocks.length > 0) {
    notes.push(`Hidden for lack of space: ${overflow.hiddenBlocks.join(", ")}.`);
  }
  if (notes.length === 0) {
    notes.push("All text fits its panel.");
  }

  return {
    status: "reviewed",
    issuesDetected: hasOverflow(overflow),
    notes,
    headlinePreview: [...text.headline].slice(0, HEADLINE_PREVIEW_CHARS).join("")
  };
}
