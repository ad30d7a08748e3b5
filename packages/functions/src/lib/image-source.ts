import sharp from "sharp";
import { ImageDecodeError } from "./errors";

export interface Pixel {
  x: number;
  y: number;
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * Decoded image. `rgba` is tightly packed, row-major, 4 bytes per pixel,
 * and `pixels()` walks it in the same order every time it is called.
 */
export interface ImageSource {
  readonly width: number;
  readonly height: number;
  readonly rgba: Uint8Array;
  pixels(): Iterable<Pixel>;
}

function* walkPixels(width: number, height: number, rgba: Uint8Array): Generator<Pixel> {
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const offset = (y * width + x) * 4;
      yield {
        x,
        y,
        r: rgba[offset],
        g: rgba[offset + 1],
        b: rgba[offset + 2],
        a: rgba[offset + 3],
      };
    }
  }
}

export function rawImageSource(width: number, height: number, rgba: Uint8Array): ImageSource {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new ImageDecodeError(`Invalid image dimensions ${width}x${height}`);
  }
  if (rgba.length !== width * height * 4) {
    throw new ImageDecodeError(
      `Expected ${width * height * 4} RGBA bytes for ${width}x${height}, got ${rgba.length}`
    );
  }

  return {
    width,
    height,
    rgba,
    pixels: () => walkPixels(width, height, rgba),
  };
}

/**
 * Decode PNG/JPEG/WebP/GIF/etc. into RGBA. Animated inputs yield their first frame.
 */
export async function decodeImage(bytes: Uint8Array): Promise<ImageSource> {
  try {
    const { data, info } = await sharp(bytes, { failOn: "none" })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 4) {
      throw new ImageDecodeError(`Unexpected channel count ${info.channels}`);
    }

    return rawImageSource(info.width, info.height, new Uint8Array(data));
  } catch (error) {
    if (error instanceof ImageDecodeError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ImageDecodeError(`Unable to decode image: ${message}`);
  }
}
