import { nextLayoutMode, parseStyleOverrides, resolveStyle } from "@/lib/design-config";
import { decodeBase64Image, errorResponse, readJsonBody, toBase64Png } from "@/lib/pamphlet-api";
import { PamphletError } from "@/lib/pamphlet-errors";
import { renderPng } from "@/lib/pamphlet-render";
import { parsePamphletRequest } from "@/lib/pamphlet-request";
import { reviewPamphlet } from "@/lib/pamphlet-review";
import { savePamphletImage } from "@/lib/pamphlet-store";
import { buildFallbackCopy, parseTextContent, refinePamphletCopy, toTextContentPayload } from "@/lib/pamphlet-text";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: Request) {
  const parsedBody = await readJsonBody(request);
  if (!parsedBody.ok) {
    return parsedBody.response;
  }

  const { body } = parsedBody;

  try {
    const pamphletRequest = parsePamphletRequest(body);

    if (body.customImage === undefined || body.customImage === null || body.customImage === "") {
      throw new PamphletError(
        "InvalidConfiguration",
        pamphletRequest.imageSource === "ai_generated"
          ? "No background image supplied; AI image generation is not available on this server"
          : "customImage is required when imageSource is custom_upload"
      );
    }

    const background = decodeBase64Image(body.customImage, "customImage");
    const upstream = body.textContent === undefined ? buildFallbackCopy(pamphletRequest) : parseTextContent(body.textContent);
    const textContent = refinePamphletCopy({
      ...upstream,
      features: upstream.features.length > 0 ? upstream.features : pamphletRequest.keyFeatures
    });

    // The rotation picks the layout unless the caller pins one explicitly.
    const overrides = parseStyleOverrides(body.overrides);
    const style = resolveStyle(pamphletRequest.colorScheme, pamphletRequest.style, {
      ...overrides,
      layout: overrides.layout ?? nextLayoutMode(pamphletRequest.regenerationIndex)
    });

    const rendered = await renderPng(background, textContent, style);
    const filename = await savePamphletImage(rendered.finalPng, {
      prefix: "pamphlet",
      productName: pamphletRequest.productName
    });

    return Response.json({
      success: true,
      image: toBase64Png(rendered.finalPng),
      layoutBaseImage: toBase64Png(rendered.textlessPng),
      textContent: toTextContentPayload(textContent),
      filename,
      layout: rendered.layout,
      review: reviewPamphlet(rendered.layout, textContent)
    });
  } catch (error) {
    return errorResponse(error, "pamphlets/generate");
  }
}
