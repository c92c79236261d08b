import * as path from "path";

import { describeStrategy, totalWrittenBytes } from "../backend/assemblyTypes";
import { resolveAndLoadConfig, strategyFromConfig } from "../backend/configLoader";
import { WanpackConfig } from "../backend/configTypes";
import { FrameAssembler } from "../backend/fragmentAssembler";
import { PackFile, serializePackFile } from "../backend/packFile";
import { createPixelImage } from "../backend/pixelImage";
import { MemoryByteSink } from "../utils/byteStream";
import * as cons from "../utils/console";
import { readBinaryFileAsync, replaceExtension, writeBinaryFile, writeTextFile } from "../utils/fileSystem";
import { formatBytes, formatRatio } from "../utils/utils";
import { EncodeCommandLineOptions, EncodeOptions, parseEncodeOptions } from "./parseOptions";

export interface EncodeResult {
  pack: PackFile;
  payload: Uint8Array;
}

// cli flags win over the config file
function effectiveConfig(options: EncodeOptions): WanpackConfig {
  const config = resolveAndLoadConfig(options.configPath);
  if (options.strategyOverride && options.strategyOverride !== config.strategy.kind) {
    return { ...config, strategy: strategyFromConfig(options.strategyOverride) };
  }
  return config;
}

// Encodes one raw image (one byte per pixel, row-major) into payload bytes plus the pack description.
export function encodeRawImage(raw: Uint8Array, options: EncodeOptions, config: WanpackConfig): EncodeResult {
  const image = createPixelImage(options.width, options.height, raw);
  const sink = new MemoryByteSink();
  const assembler = new FrameAssembler(sink, {
    strategy: config.strategy,
    fragmentWidth: config.fragmentWidth,
    fragmentHeight: config.fragmentHeight,
    zIndex: config.zIndex,
  });

  const frame = assembler.addImage(image);
  if (!frame.ok) {
    throw frame.error;
  }

  const pack: PackFile = {
    version: 1,
    payload: path.basename(replaceExtension(options.outputPath, ".bin")),
    strategy: describeStrategy(config.strategy),
    frame: frame.value,
    fragments: assembler.fragments,
  };
  return { pack, payload: sink.toBytes() };
}

export async function encodeCommand(inputPath: string, cmd?: EncodeCommandLineOptions): Promise<void> {
  const options = parseEncodeOptions(inputPath, cmd);
  cons.setVerbose(options.verbose);
  const config = effectiveConfig(options);
  if (config.logFile) {
    cons.setLogFile(config.logFile);
  }

  cons.h1(`Encoding ${options.inputPath} (${options.width}x${options.height})`);
  cons.dim(config.filePath ? `Config: ${config.filePath}` : "Config: built-in defaults");

  const raw = await readBinaryFileAsync(options.inputPath);
  const { pack, payload } = encodeRawImage(raw, options, config);

  const payloadPath = path.join(path.dirname(options.outputPath), pack.payload);
  await writeBinaryFile(payloadPath, payload);
  await writeTextFile(options.outputPath, serializePackFile(pack));

  if (pack.frame.pieces.length === 0) {
    cons.warning(`${options.inputPath} is fully transparent, no fragments written`);
  }
  const written = pack.fragments.reduce((sum, f) => sum + totalWrittenBytes(f.entries), 0);
  const unpacked = raw.length / 2;
  cons.info(
    `${pack.frame.pieces.length} pieces, ${pack.fragments.length} fragments (${pack.strategy})`,
  );
  cons.success(
    `Wrote ${payloadPath}: ${formatBytes(written)} (${formatRatio(written, unpacked)} of ${formatBytes(unpacked)} packed)`,
  );
}
