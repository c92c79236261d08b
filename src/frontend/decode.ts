import * as path from "path";

import { renderFrame } from "../backend/fragmentAssembler";
import { PackFile, parsePackFile } from "../backend/packFile";
import { PixelImage } from "../backend/pixelImage";
import { MemoryByteSource } from "../utils/byteStream";
import * as cons from "../utils/console";
import { readBinaryFileAsync, readTextFileAsync, writeBinaryFile } from "../utils/fileSystem";
import { DecodeCommandLineOptions, parseDecodeOptions } from "./parseOptions";

// Rebuilds the image described by a pack file from its payload bytes.
export function decodePack(pack: PackFile, payload: Uint8Array): PixelImage {
  const image = renderFrame(pack.frame, pack.fragments, new MemoryByteSource(payload));
  if (!image.ok) {
    throw image.error;
  }
  return image.value;
}

export async function decodeCommand(packPath: string, cmd?: DecodeCommandLineOptions): Promise<void> {
  const options = parseDecodeOptions(packPath, cmd);
  cons.setVerbose(options.verbose);

  const pack = parsePackFile(await readTextFileAsync(options.packPath));
  const payloadPath = path.resolve(path.dirname(options.packPath), pack.payload);
  cons.h1(`Decoding ${options.packPath}`);
  cons.dim(`Payload: ${payloadPath}`);

  const payload = await readBinaryFileAsync(payloadPath);
  const image = decodePack(pack, payload);
  await writeBinaryFile(options.outputPath, image.pixels);
  cons.success(`Wrote ${options.outputPath} (${image.width}x${image.height}, one byte per pixel)`);
}
