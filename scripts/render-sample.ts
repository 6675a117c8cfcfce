import { readFile } from "fs/promises";
import sharp from "sharp";
import { nextLayoutMode, resolveStyle } from "../lib/design-config";
import { renderPng } from "../lib/pamphlet-render";
import { reviewPamphlet } from "../lib/pamphlet-review";
import { savePamphletImage } from "../lib/pamphlet-store";
import { buildFallbackCopy, refinePamphletCopy } from "../lib/pamphlet-text";

const SAMPLE_REQUEST = {
  productName: "Harbor Coffee Roasters",
  keyFeatures: ["Small-batch roasting", "Direct trade beans", "Free local delivery"],
  callToAction: "Order your first bag"
};

async function loadBackground(imagePath: string | undefined): Promise<Buffer> {
  if (imagePath) {
    return readFile(imagePath);
  }

  return sharp({ create: { width: 1024, height: 768, channels: 3, background: { r: 62, g: 44, b: 36 } } })
    .png()
    .toBuffer();
}

// Usage: npm run render:sample -- [background.png]
async function main(): Promise<void> {
  const background = await loadBackground(process.argv[2]);
  const text = refinePamphletCopy(buildFallbackCopy(SAMPLE_REQUEST));

  for (let index = 0; index < 4; index += 1) {
    const style = resolveStyle("elegant", "creative", { layout: nextLayoutMode(index) });
    const rendered = await renderPng(background, text, style);
    const filename = await savePamphletImage(rendered.finalPng, { prefix: "pamphlet", productName: SAMPLE_REQUEST.productName });
    const review = reviewPamphlet(rendered.layout, text);
    console.log(`${style.layout}: ${filename} (${review.notes.join(" ")})`);
  }
}

main().catch((error: unknown) => {
  console.error("[render-sample]", error);
  process.exitCode = 1;
});
