import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { PURE_COLORS } from "imagescheme-shared";
import { colorFromPure } from "./color";
import { rawImageSource } from "./image-source";
import { scanPalette } from "./palette-scanner";

function imageFromPixels(width: number, pixels: Array<[number, number, number, number]>) {
  return rawImageSource(width, pixels.length / width, Uint8Array.from(pixels.flat()));
}

describe("scanPalette", () => {
  it("returns one entry per anchor in anchor order", () => {
    const palette = scanPalette(imageFromPixels(1, [[10, 20, 30, 255]]));
    assert.deepEqual(
      palette.map((color) => color.hue),
      [...PURE_COLORS]
    );
  });

  it("keeps the closest pixel to each anchor with its distance", () => {
    const palette = scanPalette(
      imageFromPixels(2, [
        [250, 10, 0, 255],
        [0, 0, 200, 255],
        [255, 0, 0, 255],
        [100, 100, 100, 255],
      ])
    );
    const red = palette.find((color) => color.hue === "red");
    const blue = palette.find((color) => color.hue === "blue");

    assert.deepEqual(red, { hue: "red", value: { r: 255, g: 0, b: 0 }, distance: 0 });
    assert.deepEqual(blue, { hue: "blue", value: { r: 0, g: 0, b: 200 }, distance: 55 * 55 });
  });

  it("resolves ties to the first pixel in row-major order", () => {
    // Yellow is equally far from pure green and pure red.
    const greenFirst = scanPalette(imageFromPixels(2, [[0, 255, 0, 255], [255, 0, 0, 255]]));
    const redFirst = scanPalette(imageFromPixels(2, [[255, 0, 0, 255], [0, 255, 0, 255]]));

    assert.deepEqual(greenFirst.find((color) => color.hue === "yellow")?.value, { r: 0, g: 255, b: 0 });
    assert.deepEqual(redFirst.find((color) => color.hue === "yellow")?.value, { r: 255, g: 0, b: 0 });
  });

  it("ignores alpha", () => {
    const palette = scanPalette(imageFromPixels(1, [[0, 255, 0, 0]]));
    assert.equal(palette.find((color) => color.hue === "green")?.distance, 0);
  });

  it("returns the anchors themselves for an empty image", () => {
    const palette = scanPalette(rawImageSource(0, 0, new Uint8Array(0)));
    assert.deepEqual(palette, PURE_COLORS.map((hue) => colorFromPure(hue)));
  });
});
