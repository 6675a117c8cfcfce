import { z } from "zod";
import { invalidConfiguration } from "@/lib/pamphlet-errors";
import type { PamphletRequest } from "@/lib/pamphlet-request";
import { ELLIPSIS, cleanCopy } from "@/lib/text-fit";

export const REMOVABLE_FIELD_VALUES = ["headline", "tagline", "description", "callToAction", "custom"] as const;
export type RemovableField = (typeof REMOVABLE_FIELD_VALUES)[number];

export type RemovalFlags = Record<RemovableField, boolean>;

export type TextContent = {
  headline: string;
  tagline: string;
  description: string;
  features: string[];
  callToAction: string;
  customLines: string[];
  removed: RemovalFlags;
};

export const MAX_HEADLINE_WORDS = 8;
export const MAX_DESCRIPTION_CHARS = 480;
export const DEFAULT_CALL_TO_ACTION = "Learn more today";

export const NO_REMOVALS: RemovalFlags = {
  headline: false,
  tagline: false,
  description: false,
  callToAction: false,
  custom: false
};

const copyField = z.string().max(4000).optional();

// Editor payload. `call_to_action`, `customText` and `removeLines` are the names the browser client sends.
export const TextContentPayloadSchema = z.object({
  headline: copyField,
  tagline: copyField,
  description: copyField,
  features: z.array(z.string().max(400)).max(64).optional(),
  call_to_action: copyField,
  customText: z.array(z.string().max(1000)).max(64).optional(),
  removeLines: z
    .object({
      headline: z.boolean(),
      tagline: z.boolean(),
      description: z.boolean(),
      call_to_action: z.boolean(),
      custom: z.boolean()
    })
    .partial()
    .optional()
});

export type TextContentPayload = z.infer<typeof TextContentPayloadSchema>;

function cleanList(values: readonly string[] | undefined): string[] {
  return (values ?? []).map((value) => cleanCopy(value)).filter((value) => value.length > 0);
}

export function createTextContent(input: Partial<Omit<TextContent, "removed">> & { removed?: Partial<RemovalFlags> } = {}): TextContent {
  return {
    headline: cleanCopy(input.headline),
    tagline: cleanCopy(input.tagline),
    description: cleanCopy(input.description),
    features: cleanList(input.features),
    callToAction: cleanCopy(input.callToAction),
    customLines: cleanList(input.customLines),
    removed: {
      ...NO_REMOVALS,
      ...input.removed
    }
  };
}

export function parseTextContent(input: unknown): TextContent {
  const parsed = TextContentPayloadSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw invalidConfiguration("Text content is invalid", parsed.error);
  }

  const payload = parsed.data;
  const removals = payload.removeLines;
  return createTextContent({
    headline: payload.headline,
    tagline: payload.tagline,
    description: payload.description,
    features: payload.features,
    callToAction: payload.call_to_action,
    customLines: payload.customText,
    removed: {
      headline: removals?.headline ?? false,
      tagline: removals?.tagline ?? false,
      description: removals?.description ?? false,
      callToAction: removals?.call_to_action ?? false,
      custom: removals?.custom ?? false
    }
  });
}

export function toTextContentPayload(text: TextContent): Required<TextContentPayload> {
  return {
    headline: text.headline,
    tagline: text.tagline,
    description: text.description,
    features: [...text.features],
    call_to_action: text.callToAction,
    customText: [...text.customLines],
    removeLines: {
      headline: text.removed.headline,
      tagline: text.removed.tagline,
      description: text.removed.description,
      call_to_action: text.removed.callToAction,
      custom: text.removed.custom
    }
  };
}

export function isTextContentEmpty(text: TextContent): boolean {
  return (
    !text.headline &&
    !text.tagline &&
    !text.description &&
    text.features.length === 0 &&
    !text.callToAction &&
    text.customLines.length === 0
  );
}

function truncateAtWord(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }

  const cut = value.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(" ");
  const trimmed = lastSpace > 0 ? cut.slice(0, lastSpace) : cut;
  return `${trimmed}${ELLIPSIS}`;
}

/**
 * Layout-oriented copy edit: whitespace collapsed everywhere, headline capped at 8 words,
 * description capped at 480 characters on a word boundary.
 */
export function refinePamphletCopy(text: TextContent): TextContent {
  const cleaned = createTextContent(text);
  const headlineWords = cleaned.headline.split(" ").filter(Boolean);

  return {
    ...cleaned,
    headline: headlineWords.slice(0, MAX_HEADLINE_WORDS).join(" "),
    description: truncateAtWord(cleaned.description, MAX_DESCRIPTION_CHARS)
  };
}

// Used when no upstream copy accompanies a generate request.
export function buildFallbackCopy(request: Pick<PamphletRequest, "productName" | "keyFeatures" | "callToAction">): TextContent {
  const name = cleanCopy(request.productName);
  const features = cleanList(request.keyFeatures);
  const callToAction = cleanCopy(request.callToAction) || DEFAULT_CALL_TO_ACTION;

  return createTextContent({
    headline: name,
    tagline: name,
    description: `Discover ${name}: ${features.slice(0, 3).join(", ")}. ${callToAction}`,
    features,
    callToAction
  });
}
