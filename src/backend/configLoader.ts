import Ajv from "ajv";
import * as fs from "fs";
import { parse as parseJsonc, ParseError, printParseErrorCode } from "jsonc-parser";
import * as path from "path";

import configSchema from "../../schemas/wanpack.schema.json";

import { CompressionMethodKey, CompressionStrategy, kDefaultOptimisedStrategy } from "./assemblyTypes";
import { kDefaultFragmentSize, WanpackConfig, WanpackConfigFile } from "./configTypes";
import { describeFragmentResolutions, fragmentResolutionOf } from "./fragmentResolution";
import { isDirectory } from "../utils/fileSystem";

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public errors: unknown[],
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "ConfigLoadError";
  }
}

const kConfigSuffixes = [".wanpack.jsonc", ".wanpack.json"];

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<WanpackConfigFile>(configSchema);

// Finds the first *.wanpack.jsonc file in a directory.
export function findConfigInDirectory(directory: string): string | undefined {
  try {
    const files = fs.readdirSync(directory);
    const configFile = files.find((file) => kConfigSuffixes.some((suffix) => file.endsWith(suffix)));
    return configFile ? path.join(directory, configFile) : undefined;
  } catch (error) {
    throw new ConfigLoadError(`Failed to search directory: ${directory}`, error instanceof Error ? error : undefined);
  }
}

export function strategyFromConfig(
  method: CompressionMethodKey,
  compression: WanpackConfigFile["compression"] = { method },
): CompressionStrategy {
  switch (method) {
    case "original":
      return { kind: "original" };
    case "none":
      return { kind: "none" };
    case "optimised":
      return {
        kind: "optimised",
        multipleOfValue: compression.multipleOfValue ?? kDefaultOptimisedStrategy.multipleOfValue,
        minTransparentToCompress: compression.minTransparentToCompress ?? kDefaultOptimisedStrategy.minTransparentToCompress,
      };
  }
}

// applies defaults and checks the fragment size pair; relative logFile paths are taken from the config file's directory.
export function resolveConfig(file: WanpackConfigFile, filePath?: string): WanpackConfig {
  const baseDir = filePath ? path.dirname(path.resolve(filePath)) : process.cwd();
  const fragmentWidth = file.fragment?.width ?? kDefaultFragmentSize;
  const fragmentHeight = file.fragment?.height ?? kDefaultFragmentSize;
  if (!fragmentResolutionOf(fragmentWidth, fragmentHeight)) {
    throw new ConfigValidationError(
      `Config validation failed:\n/fragment ${fragmentWidth}x${fragmentHeight} is not a WAN fragment resolution (expected one of ${describeFragmentResolutions()})`,
      [],
    );
  }
  return {
    strategy: strategyFromConfig(file.compression?.method ?? "optimised", file.compression),
    fragmentWidth,
    fragmentHeight,
    zIndex: file.zIndex ?? 0,
    logFile: file.logFile ? path.resolve(baseDir, file.logFile) : undefined,
    filePath: filePath ? path.resolve(filePath) : undefined,
  };
}

export function parseConfigText(text: string, filePath: string): WanpackConfigFile {
  const parseErrors: ParseError[] = [];
  const parsed: unknown = parseJsonc(text, parseErrors, { allowTrailingComma: true });
  if (parseErrors.length > 0) {
    const details = parseErrors.map((e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`);
    throw new ConfigLoadError(`Failed to parse config file ${filePath}: ${details.join(", ")}`);
  }

  if (!validateConfigFile(parsed)) {
    const errors = validateConfigFile.errors ?? [];
    const messages = errors.map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
    throw new ConfigValidationError(`Config validation failed:\n${messages.join("\n")}`, errors);
  }
  return parsed;
}

// Loads, validates and resolves a config file.
export function loadConfig(filePath: string): WanpackConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigLoadError(`Failed to read config file: ${filePath}`, error instanceof Error ? error : undefined);
  }
  return resolveConfig(parseConfigText(text, filePath), filePath);
}

// configPath - file, or directory to search. without one, the cwd is searched and defaults apply when nothing is found.
export function resolveAndLoadConfig(configPath?: string): WanpackConfig {
  if (configPath) {
    const absolutePath = path.resolve(configPath);
    if (!isDirectory(absolutePath)) {
      return loadConfig(absolutePath);
    }
    const found = findConfigInDirectory(absolutePath);
    if (!found) {
      throw new ConfigLoadError(`No config file found in directory: ${absolutePath}`);
    }
    return loadConfig(found);
  }

  const found = findConfigInDirectory(process.cwd());
  return found ? loadConfig(found) : resolveConfig({});
}
