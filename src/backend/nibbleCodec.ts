// 4-bit palette index pixels, two per byte. the first pixel of a pair goes in the high nibble.

export const kMaxPixelValue = 0x0f;
export const kTransparentPixel = 0;

export function isValidPixel(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= kMaxPixelValue;
}

// index of the first pixel outside 0..15, or -1.
export function findInvalidPixel(pixels: Uint8Array): number {
  for (let i = 0; i < pixels.length; i++) {
    if (pixels[i] > kMaxPixelValue) {
      return i;
    }
  }
  return -1;
}

export function packPixelPair(high: number, low: number): number {
  if (!isValidPixel(high) || !isValidPixel(low)) {
    throw new Error(`Nibble pack: pixel out of range (${high}, ${low})`);
  }
  return (high << 4) | low;
}

// packs pixels[start, start + count) into count / 2 bytes.
export function packPixels(pixels: Uint8Array, start: number = 0, count: number = pixels.length - start): Uint8Array {
  if (count % 2 !== 0) {
    throw new Error(`Nibble pack: odd pixel count ${count}`);
  }
  if (start < 0 || start + count > pixels.length) {
    throw new Error(`Nibble pack: range ${start}+${count} outside ${pixels.length} pixels`);
  }
  const out = new Uint8Array(count / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = packPixelPair(pixels[start + i * 2], pixels[start + i * 2 + 1]);
  }
  return out;
}

export function unpackPixels(bytes: Uint8Array, pixelCount: number = bytes.length * 2): Uint8Array {
  if (pixelCount > bytes.length * 2) {
    throw new Error(`Nibble unpack: ${pixelCount} pixels requested from ${bytes.length} bytes`);
  }
  const out = new Uint8Array(pixelCount);
  for (let i = 0; i < pixelCount; i++) {
    const byte = bytes[i >> 1];
    out[i] = (i & 1) === 0 ? byte >> 4 : byte & 0x0f;
  }
  return out;
}

export function isTransparentRun(pixels: Uint8Array, start: number, count: number): boolean {
  if (start + count > pixels.length) {
    return false;
  }
  for (let i = start; i < start + count; i++) {
    if (pixels[i] !== kTransparentPixel) {
      return false;
    }
  }
  return true;
}
