import assert from "node:assert/strict";
import { test } from "node:test";
import { DEFAULT_STYLE_CONFIGURATION, assertStyleConfiguration, nextLayoutMode, resolveStyle } from "../lib/design-config";
import { isPamphletError, type PamphletError } from "../lib/pamphlet-errors";

function expectInvalid(run: () => unknown): PamphletError {
  let caught: unknown;
  try {
    run();
  } catch (error) {
    caught = error;
  }

  assert(isPamphletError(caught), "Expected a PamphletError to be thrown.");
  assert.equal(caught.kind, "InvalidConfiguration");
  return caught;
}

test("nextLayoutMode cycles through the four layouts", () => {
  assert.deepEqual(
    [0, 1, 2, 3, 4, 7].map(nextLayoutMode),
    ["centered", "split", "left-aligned", "right-aligned", "centered", "right-aligned"]
  );
});

test("nextLayoutMode rejects negative and fractional indexes", () => {
  expectInvalid(() => nextLayoutMode(-1));
  expectInvalid(() => nextLayoutMode(1.5));
});

test("unknown scheme and preset names fall back to modern/professional", () => {
  assert.deepEqual(resolveStyle("neon", "grunge"), resolveStyle("modern", "professional"));
});

test("preset values fill in typography and effects", () => {
  const style = resolveStyle("elegant", "bold");

  assert.equal(style.headline.font, "Helvetica-Bold");
  assert.equal(style.headline.size, 96);
  assert.deepEqual(style.headline.color, [255, 215, 0]);
  assert.equal(style.body.size, 30);
  assert.equal(style.backgroundOpacity, 50);
  assert.equal(style.textShadowIntensity, 60);
  assert.deepEqual(style.imageFilter, { name: "contrast", intensity: 15 });
  assert.deepEqual(style.canvas, DEFAULT_STYLE_CONFIGURATION.canvas);
});

test("only fields present in overrides replace the resolved base", () => {
  const base = resolveStyle("minimal", "luxury");
  const style = resolveStyle("minimal", "luxury", {
    headlineSize: 80,
    ctaBgColor: "#112233",
    size: { width: 640, height: 480 }
  });

  assert.equal(style.headline.size, 80);
  assert.deepEqual(style.cta.backgroundColor, [17, 34, 51]);
  assert.deepEqual(style.canvas, { width: 640, height: 480 });
  assert.equal(style.textPlacement, "bottom");
  assert.equal(style.headline.font, base.headline.font);
  assert.deepEqual(style.body, base.body);
  assert.equal(style.borderRadius, base.borderRadius);
});

test("out-of-range overrides are rejected rather than clamped", () => {
  const error = expectInvalid(() => resolveStyle("modern", "professional", { backgroundOpacity: 101 }));
  assert.equal(error.issues.length, 1);
  assert(error.issues[0].startsWith("backgroundOpacity:"), `Unexpected issue: ${error.issues[0]}`);

  expectInvalid(() => resolveStyle("modern", "professional", { imageFilter: "vintage" }));
  expectInvalid(() => resolveStyle("modern", "professional", { headlineSize: 20 }));
  expectInvalid(() => resolveStyle("modern", "professional", { size: { width: 0, height: 100 } }));
  expectInvalid(() => resolveStyle("modern", "professional", { headlineColor: "red" }));
  expectInvalid(() => resolveStyle("modern", "professional", { sparkle: true }));
});

test("assertStyleConfiguration accepts the defaults and rejects broken values", () => {
  assert.equal(assertStyleConfiguration(DEFAULT_STYLE_CONFIGURATION), DEFAULT_STYLE_CONFIGURATION);
  expectInvalid(() => assertStyleConfiguration({ ...DEFAULT_STYLE_CONFIGURATION, overallBrightness: 151 }));
});
