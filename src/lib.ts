// library entry point: the pixel codec without the cli

export * from "./backend/assemblyTypes";
export * from "./backend/codecErrors";
export * from "./backend/configLoader";
export * from "./backend/configTypes";
export * from "./backend/fragmentAssembler";
export * from "./backend/fragmentFinder";
export * from "./backend/fragmentFlip";
export * from "./backend/fragmentResolution";
export * from "./backend/nibbleCodec";
export * from "./backend/packFile";
export * from "./backend/pixelImage";
export { compress, CompressOptions, kTileBytes, kTilePixels } from "./backend/runAssembler";
export { decompress } from "./backend/runDisassembler";
export * from "./utils/byteStream";
export { err, ok, Result, unwrap } from "./utils/errorHandling";
