import assert from "node:assert/strict";
import { mkdtemp, rm } from "fs/promises";
import { after, before, test } from "node:test";
import os from "os";
import path from "path";
import {
  buildPamphletFilename,
  isPamphletFilename,
  readPamphletImage,
  resolveOutputDirectory,
  sanitizeProductName,
  savePamphletImage
} from "../lib/pamphlet-store";

let directory = "";

before(async () => {
  directory = await mkdtemp(path.join(os.tmpdir(), "pamphlet-store-"));
});

after(async () => {
  await rm(directory, { recursive: true, force: true });
});

test("sanitizeProductName produces a filesystem-safe slug", () => {
  assert.equal(sanitizeProductName("Eco Clean 3000!"), "eco-clean-3000");
  assert.equal(sanitizeProductName("Café Déjà Vu"), "cafe-deja-vu");
  assert.equal(sanitizeProductName("../../etc/passwd"), "etc-passwd");
  assert.equal(sanitizeProductName("   "), "untitled");
  assert.equal(sanitizeProductName("x".repeat(80)).length, 48);
});

test("pamphlet filenames carry the prefix, slug and token", () => {
  assert.equal(buildPamphletFilename("pamphlet", "Eco Clean", "abcdef12"), "pamphlet_eco-clean_abcdef12.png");
  assert.match(buildPamphletFilename("edited", "Eco Clean"), /^edited_eco-clean_[a-f0-9]{8}\.png$/);
  assert.equal(isPamphletFilename("pamphlet_eco-clean_abcdef12.png"), true);
  assert.equal(isPamphletFilename("../pamphlet_eco-clean_abcdef12.png"), false);
  assert.equal(isPamphletFilename("pamphlet_eco-clean_abcdef12.jpg"), false);
});

test("the output directory comes from the option, then the environment", () => {
  const previous = process.env.PAMPHLET_OUTPUT_DIR;
  try {
    process.env.PAMPHLET_OUTPUT_DIR = "  /tmp/pamphlets-env  ";
    assert.equal(resolveOutputDirectory(), path.resolve("/tmp/pamphlets-env"));
    assert.equal(resolveOutputDirectory({ directory: "/srv/out" }), "/srv/out");

    delete process.env.PAMPHLET_OUTPUT_DIR;
    assert.equal(resolveOutputDirectory(), path.join(process.cwd(), "public", "pamphlets"));
  } finally {
    if (previous === undefined) {
      delete process.env.PAMPHLET_OUTPUT_DIR;
    } else {
      process.env.PAMPHLET_OUTPUT_DIR = previous;
    }
  }
});

test("saved images can be read back by filename", async () => {
  const png = Buffer.from("fake-png-bytes");
  const filename = await savePamphletImage(png, { prefix: "pamphlet", productName: "Trail Mug" }, { directory });

  assert.match(filename, /^pamphlet_trail-mug_[a-f0-9]{8}\.png$/);
  assert.deepEqual(await readPamphletImage(filename, { directory }), png);
});

test("two saves for the same product never collide", async () => {
  const first = await savePamphletImage(Buffer.from("a"), { prefix: "edited", productName: "Mug" }, { directory });
  const second = await savePamphletImage(Buffer.from("b"), { prefix: "edited", productName: "Mug" }, { directory });
  assert.notEqual(first, second);
});

test("a taken filename is retried with a fresh token", async () => {
  const tokens = ["0000beef", "0000beef", "0000cafe"];
  const createToken = () => tokens.shift() ?? "ffffffff";

  const first = await savePamphletImage(Buffer.from("a"), { prefix: "pamphlet", productName: "Lamp" }, { directory, createToken });
  const second = await savePamphletImage(Buffer.from("b"), { prefix: "pamphlet", productName: "Lamp" }, { directory, createToken });

  assert.equal(first, "pamphlet_lamp_0000beef.png");
  assert.equal(second, "pamphlet_lamp_0000cafe.png");
  assert.deepEqual(await readPamphletImage(first, { directory }), Buffer.from("a"));
  assert.deepEqual(await readPamphletImage(second, { directory }), Buffer.from("b"));
});

test("saving gives up when every token is taken", async () => {
  const createToken = () => "0000dead";
  await savePamphletImage(Buffer.from("a"), { prefix: "edited", productName: "Lamp" }, { directory, createToken });

  await assert.rejects(
    savePamphletImage(Buffer.from("b"), { prefix: "edited", productName: "Lamp" }, { directory, createToken }),
    (error: unknown) => error instanceof Error && "code" in error && error.code === "EEXIST"
  );
});

test("unknown or malformed names read as null", async () => {
  assert.equal(await readPamphletImage("pamphlet_missing_00000000.png", { directory }), null);
  assert.equal(await readPamphletImage("../../secret.png", { directory }), null);
});
