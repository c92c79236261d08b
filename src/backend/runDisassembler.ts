import { ByteSource, ByteStreamError } from "../utils/byteStream";
import { describeError, err, ok, Result } from "../utils/errorHandling";
import { AssemblyEntry, LiteralEntry, totalPixelCount } from "./assemblyTypes";
import { DecodeError } from "./codecErrors";
import { unpackPixels } from "./nibbleCodec";

// Replays an assembly table against `source`. Filler rows are synthesized without touching the source.
// The same replay serves every compression strategy.
export function decompress(
  entries: readonly AssemblyEntry[],
  source: ByteSource,
  expectedPixelCount: number,
): Result<Uint8Array, DecodeError> {
  for (const [index, entry] of entries.entries()) {
    const { pixelCount, byteCount } = entry;
    if (!Number.isInteger(byteCount) || byteCount < 0 || byteCount * 2 !== pixelCount) {
      return err(
        new DecodeError(
          "inconsistent-entry",
          `Entry ${index}: ${pixelCount} pixels do not fit ${byteCount} bytes`,
        ),
      );
    }
  }

  const total = totalPixelCount(entries);
  if (total !== expectedPixelCount) {
    return err(
      new DecodeError("length-mismatch", `Assembly table rebuilds ${total} pixels, expected ${expectedPixelCount}`),
    );
  }

  const out = new Uint8Array(expectedPixelCount);
  let cursor = 0;
  for (const [index, entry] of entries.entries()) {
    if (entry.kind === "literal") {
      const pixels = readLiteral(entry, index, source);
      if (!pixels.ok) {
        return pixels;
      }
      out.set(pixels.value, cursor);
    }
    // filler: out is already zeroed
    cursor += entry.pixelCount;
  }
  return ok(out);
}

function readLiteral(entry: LiteralEntry, index: number, source: ByteSource): Result<Uint8Array, DecodeError> {
  const { sourceOffset, byteCount } = entry;
  if (!Number.isInteger(sourceOffset) || sourceOffset < 0 || sourceOffset + byteCount > source.length) {
    return err(
      new DecodeError(
        "out-of-bounds",
        `Entry ${index}: bytes ${sourceOffset}..${sourceOffset + byteCount} outside source of ${source.length} bytes`,
      ),
    );
  }

  try {
    source.seek(sourceOffset);
    return ok(unpackPixels(source.read(byteCount), entry.pixelCount));
  } catch (error) {
    if (error instanceof ByteStreamError) {
      return err(new DecodeError("out-of-bounds", `Entry ${index}: ${error.message}`, error));
    }
    return err(new DecodeError("io", `Entry ${index}: source read failed: ${describeError(error)}`, error));
  }
}
