import { ByteSink } from "../utils/byteStream";
import { assert, assertUnreachable, describeError, err, ok, Result } from "../utils/errorHandling";
import {
  AssemblyEntry,
  CompressionStrategy,
  fillerEntry,
  literalEntry,
  OptimisedStrategy,
} from "./assemblyTypes";
import { EncodeError } from "./codecErrors";
import { findInvalidPixel, isTransparentRun, kTransparentPixel, packPixels } from "./nibbleCodec";

// an 8x8 tile; the unit the original strategy works in.
export const kTilePixels = 64;
export const kTileBytes = kTilePixels / 2;

export interface CompressOptions {
  zIndex?: number;
}

// Compresses a flat pixel buffer into `sink`, returning the assembly table that replays it.
// Pixels must already be in the order the decoder will lay them out (tile order for "original").
// On error the sink may hold a partial write; the caller throws it away.
export function compress(
  strategy: CompressionStrategy,
  pixels: Uint8Array,
  sink: ByteSink,
  options: CompressOptions = {},
): Result<AssemblyEntry[], EncodeError> {
  const invalid = validateInput(strategy, pixels);
  if (invalid) {
    return err(invalid);
  }
  const zIndex = options.zIndex ?? 0;

  try {
    switch (strategy.kind) {
      case "original":
        return ok(compressOriginal(pixels, sink, zIndex));
      case "optimised":
        return ok(compressOptimised(strategy, pixels, sink, zIndex));
      case "none":
        return ok(compressNone(pixels, sink, zIndex));
      default:
        return assertUnreachable(strategy, "compression strategy");
    }
  } catch (error) {
    if (error instanceof EncodeError) {
      return err(error);
    }
    throw error;
  }
}

function validateInput(strategy: CompressionStrategy, pixels: Uint8Array): EncodeError | undefined {
  if (pixels.length % 2 !== 0) {
    return new EncodeError("unaligned-pixels", `Pixel count must be even, got ${pixels.length}`);
  }
  if (strategy.kind === "original" && pixels.length % kTilePixels !== 0) {
    return new EncodeError(
      "untiled-pixels",
      `Pixel count must be a multiple of ${kTilePixels} for the original strategy, got ${pixels.length}`,
    );
  }
  if (strategy.kind === "optimised") {
    const { multipleOfValue, minTransparentToCompress } = strategy;
    if (!Number.isInteger(multipleOfValue) || multipleOfValue <= 0 || multipleOfValue % 2 !== 0) {
      return new EncodeError("invalid-strategy", `multipleOfValue must be a positive even integer, got ${multipleOfValue}`);
    }
    if (!Number.isInteger(minTransparentToCompress) || minTransparentToCompress <= 0) {
      return new EncodeError(
        "invalid-strategy",
        `minTransparentToCompress must be a positive integer, got ${minTransparentToCompress}`,
      );
    }
  }
  const badIndex = findInvalidPixel(pixels);
  if (badIndex !== -1) {
    return new EncodeError("invalid-pixel", `Pixel ${badIndex} has value ${pixels[badIndex]}, expected 0..15`);
  }
  return undefined;
}

// sink failures surface as io errors; anything else thrown in here is a bug and propagates as is.
function sinkPosition(sink: ByteSink): number {
  try {
    return sink.position;
  } catch (error) {
    throw new EncodeError("io", `Sink position query failed: ${describeError(error)}`, error);
  }
}

function sinkWrite(sink: ByteSink, bytes: Uint8Array): void {
  try {
    sink.write(bytes);
  } catch (error) {
    throw new EncodeError("io", `Sink write failed: ${describeError(error)}`, error);
  }
}

////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// original: runs of 8x8 tiles with the same nullity

type OpenTileEntry =
  | { kind: "closed" }
  | { kind: "filler"; pixelCount: number }
  | { kind: "literal"; sourceOffset: number; pixelCount: number };

type TileStep = {
  open: OpenTileEntry;
  closed?: AssemblyEntry;
};

function openTileEntry(isNull: boolean, sourceOffset: number): OpenTileEntry {
  return isNull ? { kind: "filler", pixelCount: kTilePixels } : { kind: "literal", sourceOffset, pixelCount: kTilePixels };
}

function closeTileEntry(open: OpenTileEntry, zIndex: number): AssemblyEntry | undefined {
  switch (open.kind) {
    case "closed":
      return undefined;
    case "filler":
      return fillerEntry(open.pixelCount, zIndex);
    case "literal":
      return literalEntry(open.sourceOffset, open.pixelCount, zIndex);
    default:
      return assertUnreachable(open, "open tile entry");
  }
}

// a tile of the same nullity extends the open entry; a change closes it and opens a new one at `sourceOffset`.
function advanceTile(open: OpenTileEntry, isNull: boolean, sourceOffset: number, zIndex: number): TileStep {
  switch (open.kind) {
    case "closed":
      return { open: openTileEntry(isNull, sourceOffset) };
    case "filler":
      if (isNull) {
        return { open: { ...open, pixelCount: open.pixelCount + kTilePixels } };
      }
      break;
    case "literal":
      if (!isNull) {
        return { open: { ...open, pixelCount: open.pixelCount + kTilePixels } };
      }
      break;
    default:
      return assertUnreachable(open, "open tile entry");
  }
  return { open: openTileEntry(isNull, sourceOffset), closed: closeTileEntry(open, zIndex) };
}

function compressOriginal(pixels: Uint8Array, sink: ByteSink, zIndex: number): AssemblyEntry[] {
  const table: AssemblyEntry[] = [];
  let open: OpenTileEntry = { kind: "closed" };

  for (let start = 0; start < pixels.length; start += kTilePixels) {
    const isNull = isTransparentRun(pixels, start, kTilePixels);
    const sourceOffset = sinkPosition(sink);
    if (!isNull) {
      sinkWrite(sink, packPixels(pixels, start, kTilePixels));
    }
    const step = advanceTile(open, isNull, sourceOffset, zIndex);
    if (step.closed) {
      table.push(step.closed);
    }
    open = step.open;
  }

  const last = closeTileEntry(open, zIndex);
  if (last) {
    table.push(last);
  }
  return table;
}

////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// optimised: pixel-granular, transparent runs aligned to multipleOfValue

// length of the transparent run starting at `start`, cut back so it ends on a multiple of `multipleOf`.
// `start` is itself a multiple, so the result is too (possibly 0).
function alignedTransparentRun(pixels: Uint8Array, start: number, multipleOf: number): number {
  let end = start;
  while (end < pixels.length && pixels[end] === kTransparentPixel) {
    end++;
  }
  return end - (end % multipleOf) - start;
}

function compressOptimised(
  strategy: OptimisedStrategy,
  pixels: Uint8Array,
  sink: ByteSink,
  zIndex: number,
): AssemblyEntry[] {
  const { multipleOfValue, minTransparentToCompress } = strategy;
  const table: AssemblyEntry[] = [];

  // the open literal entry is always a contiguous pixel range
  let literalFrom = 0;
  let literalPixels = 0;

  const flushLiteral = () => {
    if (literalPixels === 0) {
      return;
    }
    const sourceOffset = sinkPosition(sink);
    sinkWrite(sink, packPixels(pixels, literalFrom, literalPixels));
    table.push(literalEntry(sourceOffset, literalPixels, zIndex));
    literalPixels = 0;
  };

  let index = 0;
  while (index < pixels.length) {
    assert(index % 2 === 0, `optimised scan left pair alignment at pixel ${index}`);

    const runLength =
      index % multipleOfValue === 0 && isTransparentRun(pixels, index, minTransparentToCompress)
        ? alignedTransparentRun(pixels, index, multipleOfValue)
        : 0;

    if (runLength > 0) {
      flushLiteral();
      table.push(fillerEntry(runLength, zIndex));
      index += runLength;
      continue;
    }

    if (literalPixels === 0) {
      literalFrom = index;
    }
    literalPixels += 2;
    index += 2;
  }

  flushLiteral();
  return table;
}

////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// none: one literal entry

function compressNone(pixels: Uint8Array, sink: ByteSink, zIndex: number): AssemblyEntry[] {
  if (pixels.length === 0) {
    return [];
  }
  const sourceOffset = sinkPosition(sink);
  sinkWrite(sink, packPixels(pixels));
  return [literalEntry(sourceOffset, pixels.length, zIndex)];
}
