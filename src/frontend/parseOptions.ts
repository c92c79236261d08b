import * as path from "path";

import { CompressionMethodKey, kCompressionMethod } from "../backend/assemblyTypes";
import { replaceExtension } from "../utils/fileSystem";
import { TryParseInt } from "../utils/utils";

// raw commander output
export interface EncodeCommandLineOptions {
  width?: string;
  height?: string;
  out?: string;
  config?: string;
  strategy?: string;
  verbose?: boolean;
}

export interface DecodeCommandLineOptions {
  out?: string;
  verbose?: boolean;
}

export interface EncodeOptions {
  inputPath: string;
  width: number;
  height: number;
  // json path; the payload goes next to it with a .bin extension
  outputPath: string;
  configPath?: string;
  strategyOverride?: CompressionMethodKey;
  verbose: boolean;
}

export interface DecodeOptions {
  packPath: string;
  outputPath: string;
  verbose: boolean;
}

function parseDimension(name: string, value: string | undefined): number {
  const parsed = TryParseInt(value);
  if (parsed === null || parsed <= 0) {
    throw new Error(`Invalid --${name}: ${value ?? "(missing)"} (expected a positive integer)`);
  }
  return parsed;
}

export function parseEncodeOptions(inputPath: string, cmd: EncodeCommandLineOptions = {}): EncodeOptions {
  const options: EncodeOptions = {
    inputPath: path.resolve(inputPath),
    width: parseDimension("width", cmd.width),
    height: parseDimension("height", cmd.height),
    outputPath: path.resolve(cmd.out ?? replaceExtension(inputPath, ".json")),
    verbose: cmd.verbose ?? false,
  };
  if (cmd.config) {
    options.configPath = cmd.config;
  }
  if (cmd.strategy) {
    const method = kCompressionMethod.coerceByKey(cmd.strategy);
    if (!method) {
      throw new Error(`Unknown strategy: ${cmd.strategy} (expected one of ${kCompressionMethod.keys.join(", ")})`);
    }
    options.strategyOverride = method.key;
  }
  return options;
}

export function parseDecodeOptions(packPath: string, cmd: DecodeCommandLineOptions = {}): DecodeOptions {
  return {
    packPath: path.resolve(packPath),
    outputPath: path.resolve(cmd.out ?? replaceExtension(packPath, ".raw")),
    verbose: cmd.verbose ?? false,
  };
}
