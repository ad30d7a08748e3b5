import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  hslToRgb,
  rgbToHex,
  rgbToHsl,
  toBytes,
  truncateToBytes,
  unitToYxy,
  yxyToUnit,
} from "./color-space";

function assertClose(actual: number, expected: number, tolerance = 1e-6) {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `expected ${actual} to be within ${tolerance} of ${expected}`
  );
}

describe("rgbToHex", () => {
  it("returns six uppercase digits without a leading #", () => {
    assert.equal(rgbToHex({ r: 0, g: 10, b: 255 }), "000AFF");
  });
});

describe("HSL conversion", () => {
  it("converts primaries", () => {
    assert.deepEqual(rgbToHsl({ r: 0, g: 255, b: 0 }), { h: 120, s: 1, l: 0.5 });
    assert.deepEqual(hslToRgb({ h: 240, s: 1, l: 0.5 }), { r: 0, g: 0, b: 255 });
  });

  it("round-trips byte colors", () => {
    const samples = [
      { r: 12, g: 180, b: 220 },
      { r: 128, g: 128, b: 128 },
      { r: 128, g: 64, b: 32 },
    ];
    for (const rgb of samples) {
      assert.deepEqual(hslToRgb(rgbToHsl(rgb)), rgb);
    }
  });

  it("truncates channels that land just below a whole byte", () => {
    assert.deepEqual(hslToRgb(rgbToHsl({ r: 60, g: 30, b: 30 })), { r: 60, g: 29, b: 29 });
  });
});

describe("byte conversion", () => {
  it("rounds in toBytes and truncates in truncateToBytes", () => {
    const unit = { r: 0.5, g: 0.999, b: 0 };
    assert.deepEqual(toBytes(unit), { r: 128, g: 255, b: 0 });
    assert.deepEqual(truncateToBytes(unit), { r: 127, g: 254, b: 0 });
  });

  it("clamps out-of-gamut channels and maps NaN to zero", () => {
    assert.deepEqual(truncateToBytes({ r: 1.2, g: -0.1, b: Number.NaN }), { r: 255, g: 0, b: 0 });
  });
});

describe("Yxy conversion", () => {
  it("gives black the D65 white point chromaticity", () => {
    const yxy = unitToYxy({ r: 0, g: 0, b: 0 });
    assertClose(yxy.x, 0.31271, 1e-4);
    assertClose(yxy.y, 0.32902, 1e-4);
    assert.equal(yxy.Y, 0);
  });

  it("round-trips through XYZ", () => {
    const unit = { r: 0.2, g: 0.4, b: 0.6 };
    const back = yxyToUnit(unitToYxy(unit));
    assertClose(back.r, unit.r, 1e-5);
    assertClose(back.g, unit.g, 1e-5);
    assertClose(back.b, unit.b, 1e-5);
  });

  it("scales gray luminance without shifting its hue", () => {
    const gray = yxyToUnit({ ...unitToYxy({ r: 1, g: 1, b: 1 }), Y: 0.02 });
    assert.deepEqual(toBytes(gray), { r: 39, g: 39, b: 39 });
  });
});
