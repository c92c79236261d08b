import { defineEnum } from "../utils/enum";
import { createPixelImage, PixelImage } from "./pixelImage";

// the four mirrorings a frame can apply to a fragment. value = flip bits as stored per fragment (h = bit 0, v = bit 1).
export const kFragmentFlip = defineEnum({
  standard: { value: 0, horizontal: false, vertical: false },
  flipHorizontal: { value: 1, horizontal: true, vertical: false },
  flipVertical: { value: 2, horizontal: false, vertical: true },
  flipBoth: { value: 3, horizontal: true, vertical: true },
} as const);

export type FragmentFlip = typeof kFragmentFlip.$key;

// search order of the fragment finder
export const kFlipSearchOrder: readonly FragmentFlip[] = ["standard", "flipHorizontal", "flipVertical", "flipBoth"];

export function flipFromBits(horizontal: boolean, vertical: boolean): FragmentFlip {
  if (horizontal) {
    return vertical ? "flipBoth" : "flipHorizontal";
  }
  return vertical ? "flipVertical" : "standard";
}

export function flipToBits(flip: FragmentFlip): { horizontal: boolean; vertical: boolean } {
  const info = kFragmentFlip.infoByKey[flip];
  return { horizontal: info.horizontal, vertical: info.vertical };
}

// mirrored copy; each flip undoes itself.
export function applyFlip(image: PixelImage, flip: FragmentFlip): PixelImage {
  const { horizontal, vertical } = flipToBits(flip);
  const { width, height } = image;
  const out = createPixelImage(width, height);
  for (let y = 0; y < height; y++) {
    const srcY = vertical ? height - 1 - y : y;
    for (let x = 0; x < width; x++) {
      const srcX = horizontal ? width - 1 - x : x;
      out.pixels[y * width + x] = image.pixels[srcY * width + srcX];
    }
  }
  return out;
}
