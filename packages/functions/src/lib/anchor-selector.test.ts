import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  DARK_PASSES,
  LIGHT_PASSES,
  colorPass,
  fixColors,
  saturationLuma,
  selectDarkAnchor,
  selectLightAnchor,
} from "./anchor-selector";
import { toBytes, toUnit } from "./color-space";
import { SchemeError } from "./errors";
import { SchemeLogger } from "./scheme-logger";

const WHITE = toUnit({ r: 255, g: 255, b: 255 });
const BLACK = toUnit({ r: 0, g: 0, b: 0 });
const RED = toUnit({ r: 255, g: 0, b: 0 });
const GREEN = toUnit({ r: 0, g: 255, b: 0 });
const DARK_MAROON = toUnit({ r: 60, g: 30, b: 30 });

function assertClose(actual: number, expected: number, tolerance = 1e-4) {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `expected ${actual} to be within ${tolerance} of ${expected}`
  );
}

describe("saturationLuma", () => {
  it("reads HSL saturation and relative luminance", () => {
    const { saturation, luma } = saturationLuma(DARK_MAROON);
    assertClose(saturation, 1 / 3);
    assertClose(luma, 0.01983);
  });
});

describe("colorPass", () => {
  it("returns the first candidate inside the window", () => {
    assert.equal(colorPass([RED, GREEN, WHITE], { description: "bright", minLuma: 0.7 }), GREEN);
  });

  it("returns undefined when nothing matches", () => {
    assert.equal(colorPass([RED], { description: "dark", maxLuma: 0.1 }), undefined);
  });
});

describe("selectLightAnchor", () => {
  it("prefers a light, unsaturated color on the first pass", () => {
    const selection = selectLightAnchor([DARK_MAROON, WHITE]);
    assert.equal(selection.color, WHITE);
    assert.equal(selection.pass, 1);
  });

  it("accepts saturated colors on a later pass", () => {
    const selection = selectLightAnchor([RED, GREEN]);
    assert.equal(selection.color, GREEN);
    assert.equal(selection.pass, 6);
    assert.equal(selection.description, LIGHT_PASSES[5].description);
  });

  it("falls back to the most dominant color", () => {
    const selection = selectLightAnchor([BLACK, DARK_MAROON]);
    assert.equal(selection.color, BLACK);
    assert.equal(selection.pass, LIGHT_PASSES.length + 1);
  });

  it("reports NoColors for an empty list", () => {
    assert.throws(
      () => selectLightAnchor([]),
      (error: unknown) => error instanceof SchemeError && error.kind === "NoColors"
    );
  });

  it("records the winning pass at debug level", () => {
    const logger = new SchemeLogger({ sink: { log: () => {}, warn: () => {}, error: () => {} } });
    selectLightAnchor([WHITE], logger);

    const [entry] = logger.getEntries();
    assert.equal(entry.level, "debug");
    assert.deepEqual(entry.data, { pass: 1, description: LIGHT_PASSES[0].description });
  });
});

describe("selectDarkAnchor", () => {
  it("prefers a dark color with a bit of saturation", () => {
    const selection = selectDarkAnchor([WHITE, DARK_MAROON]);
    assert.equal(selection.color, DARK_MAROON);
    assert.equal(selection.pass, 1);
  });

  it("accepts very dark colors on the last pass", () => {
    const selection = selectDarkAnchor([WHITE, BLACK]);
    assert.equal(selection.color, BLACK);
    assert.equal(selection.pass, 3);
  });

  it("falls back to the most dominant color", () => {
    const selection = selectDarkAnchor([RED, GREEN]);
    assert.equal(selection.color, RED);
    assert.equal(selection.pass, DARK_PASSES.length + 1);
  });

  it("reports NoColors for an empty list", () => {
    assert.throws(
      () => selectDarkAnchor([]),
      (error: unknown) => error instanceof SchemeError && error.kind === "NoColors"
    );
  });
});

describe("fixColors", () => {
  it("leaves anchors that already satisfy the dark variant", () => {
    const { background, foreground } = fixColors(DARK_MAROON, WHITE, "dark");
    assert.deepEqual(toBytes(background), { r: 60, g: 30, b: 30 });
    assert.deepEqual(toBytes(foreground), { r: 255, g: 255, b: 255 });
  });

  it("pushes a bright dark-variant background down to the luma ceiling", () => {
    const { background } = fixColors(WHITE, WHITE, "dark");
    assertClose(saturationLuma(background).luma, 0.02);
    assert.deepEqual(toBytes(background), { r: 39, g: 39, b: 39 });
  });

  it("caps dark-variant foreground saturation keeping hue and lightness", () => {
    const { foreground } = fixColors(DARK_MAROON, GREEN, "dark");
    assert.deepEqual(toBytes(foreground), { r: 108, g: 147, b: 108 });
  });

  it("swaps roles for the light variant", () => {
    const { background, foreground } = fixColors(DARK_MAROON, WHITE, "light");
    assert.deepEqual(toBytes(background), { r: 255, g: 255, b: 255 });
    assertClose(saturationLuma(foreground).luma, 0.015);
    assert.deepEqual(toBytes(foreground), { r: 52, g: 25, b: 25 });
  });

  it("sets a saturated light-variant background to 0.15 saturation", () => {
    const { background } = fixColors(DARK_MAROON, toUnit({ r: 255, g: 230, b: 230 }), "light");
    assertClose(saturationLuma(background).saturation, 0.15);
    assert.deepEqual(toBytes(background), { r: 244, g: 241, b: 241 });
  });

  it("lifts a dim light-variant background to the luma floor", () => {
    const { background } = fixColors(BLACK, toUnit({ r: 128, g: 128, b: 128 }), "light");
    assertClose(saturationLuma(background).luma, 0.75);
  });
});
