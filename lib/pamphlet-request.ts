import { z } from "zod";
import { invalidConfiguration } from "@/lib/pamphlet-errors";

export const IMAGE_SOURCE_VALUES = ["ai_generated", "custom_upload"] as const;

const optionalText = (max: number) => z.string().trim().max(max).optional().default("");

export const PamphletRequestSchema = z.object({
  productName: z.string().trim().min(1, "Product name is required").max(120),
  description: optionalText(2000),
  tone: optionalText(120),
  targetAudience: optionalText(240),
  keyFeatures: z.array(z.string().trim().max(200)).max(24).optional().default([]),
  callToAction: optionalText(160),
  colorScheme: z.string().trim().max(40).optional().default("modern"),
  style: z.string().trim().max(40).optional().default("professional"),
  imageSource: z.enum(IMAGE_SOURCE_VALUES).optional().default("ai_generated"),
  imagePrompt: optionalText(1000),
  regenerationIndex: z.number().int().min(0).optional().default(0)
});

export type PamphletRequest = z.infer<typeof PamphletRequestSchema>;

export function parsePamphletRequest(input: unknown): PamphletRequest {
  const parsed = PamphletRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw invalidConfiguration("Pamphlet request is invalid", parsed.error);
  }

  return {
    ...parsed.data,
    keyFeatures: parsed.data.keyFeatures.filter((feature) => feature.length > 0)
  };
}
