import { CompressionMethodKey, CompressionStrategy } from "./assemblyTypes";

// shape of a *.wanpack.jsonc file (see schemas/wanpack.schema.json)
export interface WanpackConfigFile {
  $schema?: string;
  compression?: {
    method: CompressionMethodKey;
    multipleOfValue?: number;
    minTransparentToCompress?: number;
  };
  fragment?: {
    width?: number;
    height?: number;
  };
  zIndex?: number;
  logFile?: string;
}

// config with defaults applied and paths resolved
export interface WanpackConfig {
  strategy: CompressionStrategy;
  fragmentWidth: number;
  fragmentHeight: number;
  zIndex: number;
  logFile?: string;
  // file it came from, undefined for built-in defaults
  filePath?: string;
}

export const kDefaultFragmentSize = 32;
