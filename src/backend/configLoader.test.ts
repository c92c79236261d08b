import * as fs from "fs";
import * as path from "path";

import {
  ConfigLoadError,
  ConfigValidationError,
  findConfigInDirectory,
  loadConfig,
  parseConfigText,
  resolveConfig,
} from "./configLoader";

// Mock fs module
jest.mock("fs");
const mockFs = fs as jest.Mocked<typeof fs>;

describe("Config loader", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("findConfigInDirectory", () => {
    it("should find a .wanpack.jsonc file", () => {
      (mockFs.readdirSync as jest.Mock).mockReturnValue(["notes.txt", "sprite.wanpack.jsonc"]);
      expect(findConfigInDirectory("/test/dir")).toBe(path.join("/test/dir", "sprite.wanpack.jsonc"));
    });

    it("should return undefined when there is none", () => {
      (mockFs.readdirSync as jest.Mock).mockReturnValue(["notes.txt", "config.json"]);
      expect(findConfigInDirectory("/test/dir")).toBeUndefined();
    });

    it("should wrap directory errors", () => {
      (mockFs.readdirSync as jest.Mock).mockImplementation(() => {
        throw new Error("ENOENT");
      });
      expect(() => findConfigInDirectory("/missing")).toThrow(ConfigLoadError);
    });
  });

  describe("parseConfigText", () => {
    it("should accept comments and trailing commas", () => {
      const text = `{
        // tighter runs for small sprites
        "compression": { "method": "optimised", "multipleOfValue": 8, "minTransparentToCompress": 16, },
        "fragment": { "width": 16 },
      }`;
      expect(parseConfigText(text, "a.wanpack.jsonc")).toEqual({
        compression: { method: "optimised", multipleOfValue: 8, minTransparentToCompress: 16 },
        fragment: { width: 16 },
      });
    });

    it("should reject an unknown compression method", () => {
      expect(() => parseConfigText(`{ "compression": { "method": "zip" } }`, "a.wanpack.jsonc")).toThrow(
        ConfigValidationError,
      );
    });

    it("should reject fragment sides WAN cannot store", () => {
      expect(() => parseConfigText(`{ "fragment": { "width": 12 } }`, "a.wanpack.jsonc")).toThrow(ConfigValidationError);
      expect(() => parseConfigText(`{ "fragment": { "height": 24 } }`, "a.wanpack.jsonc")).toThrow(ConfigValidationError);
    });

    it("should reject an odd alignment", () => {
      const text = `{ "compression": { "method": "optimised", "multipleOfValue": 3 } }`;
      expect(() => parseConfigText(text, "a.wanpack.jsonc")).toThrow(ConfigValidationError);
    });

    it("should report syntax errors", () => {
      expect(() => parseConfigText(`{ "zIndex": `, "broken.wanpack.jsonc")).toThrow(
        "Failed to parse config file broken.wanpack.jsonc",
      );
    });
  });

  describe("resolveConfig", () => {
    it("should apply defaults", () => {
      expect(resolveConfig({})).toEqual({
        strategy: { kind: "optimised", multipleOfValue: 64, minTransparentToCompress: 64 },
        fragmentWidth: 32,
        fragmentHeight: 32,
        zIndex: 0,
        logFile: undefined,
        filePath: undefined,
      });
    });

    it("should resolve paths against the config file", () => {
      const config = resolveConfig(
        { compression: { method: "original" }, fragment: { width: 16 }, zIndex: 3, logFile: "logs/wanpack.log" },
        "/proj/sprites.wanpack.jsonc",
      );
      expect(config.strategy).toEqual({ kind: "original" });
      expect(config.fragmentWidth).toBe(16);
      expect(config.fragmentHeight).toBe(32);
      expect(config.zIndex).toBe(3);
      expect(config.logFile).toBe(path.resolve("/proj", "logs/wanpack.log"));
      expect(config.filePath).toBe(path.resolve("/proj/sprites.wanpack.jsonc"));
    });

    it("should reject a fragment size pair that WAN cannot store", () => {
      expect(() => resolveConfig({ fragment: { width: 16, height: 64 } })).toThrow(ConfigValidationError);
      expect(() => resolveConfig({ fragment: { width: 8, height: 64 } })).toThrow(
        "/fragment 8x64 is not a WAN fragment resolution",
      );
    });

    it("should accept a wide fragment size", () => {
      const config = resolveConfig({ fragment: { width: 64, height: 32 } });
      expect([config.fragmentWidth, config.fragmentHeight]).toEqual([64, 32]);
    });

    it("should fill in missing optimised parameters", () => {
      const config = resolveConfig({ compression: { method: "optimised", multipleOfValue: 16 } });
      expect(config.strategy).toEqual({ kind: "optimised", multipleOfValue: 16, minTransparentToCompress: 64 });
    });
  });

  describe("loadConfig", () => {
    it("should read, validate and resolve a file", () => {
      (mockFs.readFileSync as jest.Mock).mockReturnValue(`{ "compression": { "method": "none" } }`);
      const config = loadConfig("/proj/a.wanpack.jsonc");
      expect(config.strategy).toEqual({ kind: "none" });
      expect(config.filePath).toBe(path.resolve("/proj/a.wanpack.jsonc"));
    });

    it("should wrap read errors", () => {
      (mockFs.readFileSync as jest.Mock).mockImplementation(() => {
        throw new Error("EACCES");
      });
      expect(() => loadConfig("/proj/a.wanpack.jsonc")).toThrow("Failed to read config file: /proj/a.wanpack.jsonc");
    });
  });
});
