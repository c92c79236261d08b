import * as cons from "../utils/console";
import { ByteSink, ByteSource } from "../utils/byteStream";
import { err, ok, Result } from "../utils/errorHandling";
import { AssemblyEntry, CompressionStrategy, describeStrategy } from "./assemblyTypes";
import { DecodeError, EncodeError } from "./codecErrors";
import { findMatchingFragment, FragmentLibrary } from "./fragmentFinder";
import { applyFlip, FragmentFlip } from "./fragmentFlip";
import { describeFragmentResolutions, fragmentResolutionOf } from "./fragmentResolution";
import {
  blitImage,
  createPixelImage,
  cropImage,
  fromTileOrder,
  isImageTransparent,
  PixelImage,
  toTileOrder,
} from "./pixelImage";
import { compress } from "./runAssembler";
import { decompress } from "./runDisassembler";

export interface FrameAssemblerOptions {
  strategy: CompressionStrategy;
  fragmentWidth: number;
  fragmentHeight: number;
  zIndex?: number;
}

// pixels of one fragment as stored in the archive: tile order, compressed by `entries`
export type EncodedFragment = {
  width: number;
  height: number;
  entries: AssemblyEntry[];
};

// one fragment drawn into a frame. the fragment's pixels, mirrored by `flip`, land at (x, y).
export type FramePiece = {
  x: number;
  y: number;
  fragmentIndex: number;
  flip: FragmentFlip;
};

export type AssembledFrame = {
  width: number;
  height: number;
  pieces: FramePiece[];
};

// Cuts images into fragments, reusing fragments already written (under any flip) and compressing the rest into the
// sink. One assembler is meant to be fed every frame of a sprite so that frames share fragments.
export class FrameAssembler {
  readonly fragments: EncodedFragment[] = [];
  private readonly library = new FragmentLibrary<number>();
  private reusedCount = 0;

  constructor(
    private readonly sink: ByteSink,
    private readonly options: FrameAssemblerOptions,
  ) {
    const { fragmentWidth, fragmentHeight } = options;
    if (!fragmentResolutionOf(fragmentWidth, fragmentHeight)) {
      throw new Error(
        `Fragment size ${fragmentWidth}x${fragmentHeight} is not a WAN fragment resolution (expected one of ${describeFragmentResolutions()})`,
      );
    }
  }

  get reused(): number {
    return this.reusedCount;
  }

  addImage(image: PixelImage): Result<AssembledFrame, EncodeError> {
    const { fragmentWidth, fragmentHeight } = this.options;
    const pieces: FramePiece[] = [];

    for (let y = 0; y < image.height; y += fragmentHeight) {
      for (let x = 0; x < image.width; x += fragmentWidth) {
        const piece = cropImage(image, x, y, fragmentWidth, fragmentHeight);
        if (isImageTransparent(piece)) {
          continue;
        }

        const match = findMatchingFragment(this.library, piece);
        if (match) {
          cons.dim(`(${x},${y}) reuses fragment #${match.reference} (${match.flip})`);
          this.reusedCount++;
          pieces.push({ x, y, fragmentIndex: match.reference, flip: match.flip });
          continue;
        }

        const fragmentIndex = this.fragments.length;
        const entries = compress(this.options.strategy, toTileOrder(piece), this.sink, { zIndex: this.options.zIndex });
        if (!entries.ok) {
          return entries;
        }
        cons.dim(
          `(${x},${y}) new fragment #${fragmentIndex}: ${entries.value.length} entries, ${describeStrategy(this.options.strategy)}`,
        );
        this.fragments.push({ width: piece.width, height: piece.height, entries: entries.value });
        this.library.register(fragmentIndex, piece);
        pieces.push({ x, y, fragmentIndex, flip: "standard" });
      }
    }

    return ok({ width: image.width, height: image.height, pieces });
  }
}

export function decodeFragment(fragment: EncodedFragment, source: ByteSource): Result<PixelImage, DecodeError> {
  if (!fragmentResolutionOf(fragment.width, fragment.height)) {
    return err(
      new DecodeError("inconsistent-entry", `Fragment size ${fragment.width}x${fragment.height} is not a WAN fragment resolution`),
    );
  }
  const pixels = decompress(fragment.entries, source, fragment.width * fragment.height);
  if (!pixels.ok) {
    return pixels;
  }
  return ok(fromTileOrder(pixels.value, fragment.width, fragment.height));
}

// Rebuilds a frame from its pieces and the archive bytes.
export function renderFrame(
  frame: AssembledFrame,
  fragments: readonly EncodedFragment[],
  source: ByteSource,
): Result<PixelImage, DecodeError> {
  const decoded = new Map<number, PixelImage>();
  const canvas = createPixelImage(frame.width, frame.height);

  for (const piece of frame.pieces) {
    let image = decoded.get(piece.fragmentIndex);
    if (!image) {
      const fragment = fragments[piece.fragmentIndex];
      if (!fragment) {
        return err(new DecodeError("inconsistent-entry", `Frame piece refers to missing fragment #${piece.fragmentIndex}`));
      }
      const result = decodeFragment(fragment, source);
      if (!result.ok) {
        return result;
      }
      image = result.value;
      decoded.set(piece.fragmentIndex, image);
    }
    blitImage(canvas, applyFlip(image, piece.flip), piece.x, piece.y);
  }

  return ok(canvas);
}
