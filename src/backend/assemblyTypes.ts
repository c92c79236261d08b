import { defineEnum } from "../utils/enum";

// One row of an assembly table. Replaying rows in order rebuilds the pixel buffer:
// a literal row reads byteCount packed bytes from sourceOffset,
// a filler row stands for pixelCount transparent pixels that were never written.
// Fillers carry no offset at all: 0 is a real offset (first byte of the archive).
export type LiteralEntry = {
  kind: "literal";
  sourceOffset: number;
  pixelCount: number;
  byteCount: number;
  zIndex: number;
};

export type FillerEntry = {
  kind: "filler";
  pixelCount: number;
  byteCount: number;
  zIndex: number;
};

export type AssemblyEntry = LiteralEntry | FillerEntry;

export function literalEntry(sourceOffset: number, pixelCount: number, zIndex: number): LiteralEntry {
  return { kind: "literal", sourceOffset, pixelCount, byteCount: pixelCount / 2, zIndex };
}

export function fillerEntry(pixelCount: number, zIndex: number): FillerEntry {
  return { kind: "filler", pixelCount, byteCount: pixelCount / 2, zIndex };
}

export function totalPixelCount(entries: readonly AssemblyEntry[]): number {
  return entries.reduce((sum, entry) => sum + entry.pixelCount, 0);
}

// bytes that actually reached the sink
export function totalWrittenBytes(entries: readonly AssemblyEntry[]): number {
  return entries.reduce((sum, entry) => sum + (entry.kind === "literal" ? entry.byteCount : 0), 0);
}

export const kCompressionMethod = defineEnum({
  original: { value: "original", title: "8x8 tiles, null tiles skipped" },
  optimised: { value: "optimised", title: "aligned transparent runs skipped" },
  none: { value: "none", title: "no compression" },
} as const);

export type CompressionMethodKey = typeof kCompressionMethod.$key;

export type OriginalStrategy = { kind: "original" };
export type OptimisedStrategy = {
  kind: "optimised";
  // transparent runs start and end on multiples of this (in pixels)
  multipleOfValue: number;
  // shortest transparent stretch worth turning into a filler row
  minTransparentToCompress: number;
};
export type NoCompressionStrategy = { kind: "none" };

export type CompressionStrategy = OriginalStrategy | OptimisedStrategy | NoCompressionStrategy;

export const kDefaultOptimisedStrategy: OptimisedStrategy = {
  kind: "optimised",
  multipleOfValue: 64,
  minTransparentToCompress: 64,
};

export function describeStrategy(strategy: CompressionStrategy): string {
  switch (strategy.kind) {
    case "original":
    case "none":
      return strategy.kind;
    case "optimised":
      return `optimised(multipleOf=${strategy.multipleOfValue}, minTransparent=${strategy.minTransparentToCompress})`;
  }
}
