#!/usr/bin/env node

import { Command } from "commander";
import { kCompressionMethod } from "./backend/assemblyTypes";
import { decodeCommand } from "./frontend/decode";
import { encodeCommand } from "./frontend/encode";
import { DecodeCommandLineOptions, EncodeCommandLineOptions } from "./frontend/parseOptions";
import * as cons from "./utils/console";
import { describeError } from "./utils/errorHandling";

const kVersion = "0.1.0";

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("wanpack")
    .description("Compress 4-bit sprite images into WAN fragment pixel data, and back")
    .version(kVersion, "-V, --version", "Output version information");

  program
    .command("encode <raw>")
    .alias("e")
    .description("Cut a raw image (one byte per pixel, row-major) into fragments and compress them")
    .requiredOption("-W, --width <pixels>", "Image width")
    .requiredOption("-H, --height <pixels>", "Image height")
    .option("-o, --out <file>", "Output pack description (.json); the payload is written beside it as .bin")
    .option("-c, --config <path>", "Config file, or directory holding a *.wanpack.jsonc")
    .option("-s, --strategy <name>", `Compression strategy (${kCompressionMethod.keys.join(", ")})`)
    .option("--verbose", "Print per-fragment traces")
    .action(async (raw: string, options: EncodeCommandLineOptions) => {
      await encodeCommand(raw, options);
    });

  program
    .command("decode <pack>")
    .alias("d")
    .description("Rebuild the raw image from a pack description and its payload")
    .option("-o, --out <file>", "Output raw image (one byte per pixel)")
    .option("--verbose", "Print per-fragment traces")
    .action(async (pack: string, options: DecodeCommandLineOptions) => {
      await decodeCommand(pack, options);
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  cons.error(describeError(error));
  process.exitCode = 1;
});
