import { applyFlip, FragmentFlip, kFlipSearchOrder } from "./fragmentFlip";
import { imagesEqual, padToTileUnit, PixelImage } from "./pixelImage";

export type FragmentMatch<R> = {
  reference: R;
  flip: FragmentFlip;
};

type RegisteredFragment<R> = {
  reference: R;
  image: PixelImage; // canonical (tile padded) pixels
};

function contentKey(image: PixelImage): string {
  return `${image.width}x${image.height}:${Buffer.from(image.pixels).toString("hex")}`;
}

// Fragments already written to the archive, kept in registration order.
// `R` is whatever the assembling layer uses to point at a fragment (an index, a record...).
export class FragmentLibrary<R> {
  private readonly fragments: RegisteredFragment<R>[] = [];
  // content key -> registration indices, ascending
  private readonly index = new Map<string, number[]>();

  get size(): number {
    return this.fragments.length;
  }

  // stores the padded copy; returns a copy of its canonical pixels.
  register(reference: R, image: PixelImage): PixelImage {
    const canonical = padToTileUnit(image);
    const key = contentKey(canonical);
    const bucket = this.index.get(key);
    if (bucket) {
      bucket.push(this.fragments.length);
    } else {
      this.index.set(key, [this.fragments.length]);
    }
    this.fragments.push({ reference, image: canonical });
    return { ...canonical, pixels: canonical.pixels.slice() };
  }

  // earliest registration whose pixels equal `image` exactly
  firstIndexOf(image: PixelImage): number | undefined {
    const bucket = this.index.get(contentKey(image));
    if (!bucket) {
      return undefined;
    }
    return bucket.find((position) => imagesEqual(this.fragments[position].image, image));
  }

  referenceAt(position: number): R {
    const fragment = this.fragments[position];
    if (!fragment) {
      throw new Error(`No fragment registered at ${position}`);
    }
    return fragment.reference;
  }
}

// Looks for a registered fragment that reproduces `candidate` under one of the four flips.
// The earliest registered fragment wins; for that fragment the earliest flip in kFlipSearchOrder.
// undefined means nothing matches and the caller should register a new fragment.
export function findMatchingFragment<R>(library: FragmentLibrary<R>, candidate: PixelImage): FragmentMatch<R> | undefined {
  const padded = padToTileUnit(candidate);
  let best: { position: number; flip: FragmentFlip } | undefined;
  for (const flip of kFlipSearchOrder) {
    const position = library.firstIndexOf(applyFlip(padded, flip));
    if (position !== undefined && (best === undefined || position < best.position)) {
      best = { position, flip };
    }
  }
  if (!best) {
    return undefined;
  }
  return { reference: library.referenceAt(best.position), flip: best.flip };
}
