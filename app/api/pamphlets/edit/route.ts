import { resolveStyle } from "@/lib/design-config";
import { decodeBase64Image, errorResponse, optionalString, readJsonBody, toBase64Png } from "@/lib/pamphlet-api";
import { renderPng } from "@/lib/pamphlet-render";
import { savePamphletImage } from "@/lib/pamphlet-store";
import { parseTextContent } from "@/lib/pamphlet-text";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

// Every save re-renders from the original background; the previous edited image is never an input.
export async function POST(request: Request) {
  const parsedBody = await readJsonBody(request);
  if (!parsedBody.ok) {
    return parsedBody.response;
  }

  const { body } = parsedBody;

  try {
    const background = decodeBase64Image(body.originalImage, "originalImage");
    const style = resolveStyle(optionalString(body.colorScheme), optionalString(body.style), body.edits);
    const textContent = parseTextContent(body.textContent);

    const rendered = await renderPng(background, textContent, style);
    const filename = await savePamphletImage(rendered.finalPng, {
      prefix: "edited",
      productName: optionalString(body.productName) ?? "pamphlet"
    });

    return Response.json({
      success: true,
      editedImage: toBase64Png(rendered.finalPng),
      layoutBaseImage: toBase64Png(rendered.textlessPng),
      filename,
      layout: rendered.layout
    });
  } catch (error) {
    return errorResponse(error, "pamphlets/edit");
  }
}
