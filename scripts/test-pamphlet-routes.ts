import assert from "node:assert/strict";
import { mkdtemp, rm } from "fs/promises";
import { after, before, test } from "node:test";
import os from "os";
import path from "path";
import sharp from "sharp";
import { GET as health } from "../app/api/health/route";
import { GET as download } from "../app/api/pamphlets/download/[filename]/route";
import { POST as edit } from "../app/api/pamphlets/edit/route";
import { POST as generate } from "../app/api/pamphlets/generate/route";

let directory = "";
let background = "";
const previousOutputDir = process.env.PAMPHLET_OUTPUT_DIR;

before(async () => {
  directory = await mkdtemp(path.join(os.tmpdir(), "pamphlet-routes-"));
  process.env.PAMPHLET_OUTPUT_DIR = directory;
  const png = await sharp({ create: { width: 64, height: 48, channels: 3, background: { r: 30, g: 90, b: 160 } } })
    .png()
    .toBuffer();
  background = png.toString("base64");
});

after(async () => {
  if (previousOutputDir === undefined) {
    delete process.env.PAMPHLET_OUTPUT_DIR;
  } else {
    process.env.PAMPHLET_OUTPUT_DIR = previousOutputDir;
  }
  await rm(directory, { recursive: true, force: true });
});

function jsonRequest(url: string, body: unknown): Request {
  return new Request(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body)
  });
}

function downloadContext(filename: string) {
  return { params: Promise.resolve({ filename }) };
}

test("health reports healthy", async () => {
  const response = await health();
  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), { status: "healthy" });
});

test("generate renders, persists and rotates the layout", async () => {
  const response = await generate(
    jsonRequest("http://localhost/api/pamphlets/generate", {
      productName: "Trail Mug",
      keyFeatures: ["Insulated", "Leakproof"],
      callToAction: "Shop now",
      imageSource: "custom_upload",
      customImage: `data:image/png;base64,${background}`,
      overrides: { size: { width: 240, height: 320 } },
      regenerationIndex: 1
    })
  );
  assert.equal(response.status, 200);

  const payload = await response.json();
  assert.equal(payload.layout.mode, "split");
  assert.match(payload.filename, /^pamphlet_trail-mug_[a-f0-9]{8}\.png$/);
  assert.equal(payload.textContent.headline, "Trail Mug");
  assert.deepEqual(payload.textContent.features, ["Insulated", "Leakproof"]);
  assert.equal(payload.review.status, "reviewed");
  assert.equal(payload.review.headlinePreview, "Trail Mug");

  const image = await sharp(Buffer.from(payload.image, "base64")).metadata();
  assert.equal(image.width, 240);
  assert.equal(image.height, 320);

  const stored = await download(new Request(`http://localhost/api/pamphlets/download/${payload.filename}`), downloadContext(payload.filename));
  assert.equal(stored.status, 200);
  assert.equal(stored.headers.get("Content-Type"), "image/png");
  assert.deepEqual(Buffer.from(await stored.arrayBuffer()), Buffer.from(payload.image, "base64"));
});

test("generate without a background for AI images answers 400", async () => {
  const response = await generate(
    jsonRequest("http://localhost/api/pamphlets/generate", { productName: "Trail Mug", imageSource: "ai_generated" })
  );
  assert.equal(response.status, 400);
  assert.equal((await response.json()).kind, "InvalidConfiguration");
});

test("generate rejects malformed JSON", async () => {
  const response = await generate(
    new Request("http://localhost/api/pamphlets/generate", { method: "POST", body: "{not json" })
  );
  assert.equal(response.status, 400);
});

test("edit re-renders from the original background", async () => {
  const response = await edit(
    jsonRequest("http://localhost/api/pamphlets/edit", {
      originalImage: background,
      edits: { size: { width: 200, height: 260 }, layout: "left-aligned", headlineColor: "#FFEEDD" },
      textContent: { headline: "Fresh", call_to_action: "Visit", removeLines: { call_to_action: true } },
      productName: "Trail Mug"
    })
  );
  assert.equal(response.status, 200);

  const payload = await response.json();
  assert.equal(payload.layout.mode, "left-aligned");
  assert.equal(payload.layout.cta, null);
  assert.match(payload.filename, /^edited_trail-mug_[a-f0-9]{8}\.png$/);

  const edited = await sharp(Buffer.from(payload.editedImage, "base64")).metadata();
  assert.equal(edited.width, 200);
  assert.equal(edited.height, 260);
});

test("edit rejects out-of-range values with their paths", async () => {
  const response = await edit(
    jsonRequest("http://localhost/api/pamphlets/edit", {
      originalImage: background,
      edits: { backgroundOpacity: 150 },
      textContent: {}
    })
  );
  assert.equal(response.status, 400);

  const payload = await response.json();
  assert.equal(payload.kind, "InvalidConfiguration");
  assert.equal(payload.issues.length, 1);
  assert.match(payload.issues[0], /^backgroundOpacity: /);
});

test("edit answers 422 when the background cannot be decoded", async () => {
  const response = await edit(
    jsonRequest("http://localhost/api/pamphlets/edit", {
      originalImage: Buffer.from("hello").toString("base64"),
      edits: {},
      textContent: {}
    })
  );
  assert.equal(response.status, 422);
  assert.equal((await response.json()).kind, "DecodeFailure");
});

test("download answers 404 for unknown files", async () => {
  const response = await download(
    new Request("http://localhost/api/pamphlets/download/pamphlet_none_00000000.png"),
    downloadContext("pamphlet_none_00000000.png")
  );
  assert.equal(response.status, 404);
});
