import { findInvalidPixel, kTransparentPixel } from "./nibbleCodec";

// side of the square tile every fragment dimension is a multiple of
export const kTileSize = 8;

// row-major 4-bit pixel image
export interface PixelImage {
  width: number;
  height: number;
  pixels: Uint8Array;
}

export function createPixelImage(width: number, height: number, pixels?: Uint8Array): PixelImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new Error(`Invalid image size ${width}x${height}`);
  }
  if (!pixels) {
    return { width, height, pixels: new Uint8Array(width * height) };
  }
  if (pixels.length !== width * height) {
    throw new Error(`Image ${width}x${height} needs ${width * height} pixels, got ${pixels.length}`);
  }
  const badIndex = findInvalidPixel(pixels);
  if (badIndex !== -1) {
    throw new Error(`Pixel ${badIndex} has value ${pixels[badIndex]}, expected 0..15`);
  }
  return { width, height, pixels: pixels.slice() };
}

export function roundUpToTile(value: number): number {
  return Math.ceil(value / kTileSize) * kTileSize;
}

export function isTileAligned(image: PixelImage): boolean {
  return image.width % kTileSize === 0 && image.height % kTileSize === 0;
}

export function isImageTransparent(image: PixelImage): boolean {
  return image.pixels.every((p) => p === kTransparentPixel);
}

export function imagesEqual(a: PixelImage, b: PixelImage): boolean {
  if (a.width !== b.width || a.height !== b.height) {
    return false;
  }
  for (let i = 0; i < a.pixels.length; i++) {
    if (a.pixels[i] !== b.pixels[i]) {
      return false;
    }
  }
  return true;
}

// copies a width x height window at (x, y); anything outside the source reads as transparent.
export function cropImage(image: PixelImage, x: number, y: number, width: number, height: number): PixelImage {
  const out = createPixelImage(width, height);
  for (let row = 0; row < height; row++) {
    const srcY = y + row;
    if (srcY < 0 || srcY >= image.height) {
      continue;
    }
    for (let col = 0; col < width; col++) {
      const srcX = x + col;
      if (srcX < 0 || srcX >= image.width) {
        continue;
      }
      out.pixels[row * width + col] = image.pixels[srcY * image.width + srcX];
    }
  }
  return out;
}

// draws `source` onto `target` at (x, y), clipped to the target. transparent source pixels are skipped.
export function blitImage(target: PixelImage, source: PixelImage, x: number, y: number): void {
  for (let row = 0; row < source.height; row++) {
    const dstY = y + row;
    if (dstY < 0 || dstY >= target.height) {
      continue;
    }
    for (let col = 0; col < source.width; col++) {
      const dstX = x + col;
      const value = source.pixels[row * source.width + col];
      if (dstX < 0 || dstX >= target.width || value === kTransparentPixel) {
        continue;
      }
      target.pixels[dstY * target.width + dstX] = value;
    }
  }
}

// grows the image to whole tiles: transparent columns on the right, transparent rows at the bottom.
export function padToTileUnit(image: PixelImage): PixelImage {
  if (isTileAligned(image)) {
    return { width: image.width, height: image.height, pixels: image.pixels.slice() };
  }
  return cropImage(image, 0, 0, roundUpToTile(image.width), roundUpToTile(image.height));
}

// row-major -> tile-major: tiles left to right then top to bottom, each tile's 64 pixels row-major.
export function toTileOrder(image: PixelImage): Uint8Array {
  if (!isTileAligned(image)) {
    throw new Error(`Tile order needs a multiple of ${kTileSize} on both sides, got ${image.width}x${image.height}`);
  }
  const out = new Uint8Array(image.pixels.length);
  const tilesPerRow = image.width / kTileSize;
  let cursor = 0;
  for (let tileY = 0; tileY < image.height / kTileSize; tileY++) {
    for (let tileX = 0; tileX < tilesPerRow; tileX++) {
      for (let row = 0; row < kTileSize; row++) {
        const start = (tileY * kTileSize + row) * image.width + tileX * kTileSize;
        out.set(image.pixels.subarray(start, start + kTileSize), cursor);
        cursor += kTileSize;
      }
    }
  }
  return out;
}

export function fromTileOrder(pixels: Uint8Array, width: number, height: number): PixelImage {
  if (width % kTileSize !== 0 || height % kTileSize !== 0) {
    throw new Error(`Tile order needs a multiple of ${kTileSize} on both sides, got ${width}x${height}`);
  }
  if (pixels.length !== width * height) {
    throw new Error(`Image ${width}x${height} needs ${width * height} pixels, got ${pixels.length}`);
  }
  const image = createPixelImage(width, height);
  const tilesPerRow = width / kTileSize;
  let cursor = 0;
  for (let tileY = 0; tileY < height / kTileSize; tileY++) {
    for (let tileX = 0; tileX < tilesPerRow; tileX++) {
      for (let row = 0; row < kTileSize; row++) {
        const start = (tileY * kTileSize + row) * width + tileX * kTileSize;
        image.pixels.set(pixels.subarray(cursor, cursor + kTileSize), start);
        cursor += kTileSize;
      }
    }
  }
  return image;
}
