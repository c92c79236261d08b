import { resolveConfig } from "../backend/configLoader";
import { parsePackFile, serializePackFile } from "../backend/packFile";
import { decodePack } from "./decode";
import { encodeRawImage } from "./encode";
import { EncodeOptions } from "./parseOptions";

function rawSprite(width: number, height: number): Uint8Array {
  const raw = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      // a filled circle-ish blob on a transparent background
      const dx = x - width / 2;
      const dy = y - height / 2;
      raw[y * width + x] = dx * dx + dy * dy < 36 ? ((x + y) % 15) + 1 : 0;
    }
  }
  return raw;
}

describe("encode / decode commands", () => {
  const options: EncodeOptions = {
    inputPath: "/art/hero.raw",
    width: 20,
    height: 12,
    outputPath: "/out/hero.json",
    verbose: false,
  };

  it.each(["original", "optimised", "none"] as const)("should round trip a raw image (%s)", (method) => {
    const config = resolveConfig({ compression: { method }, fragment: { width: 8, height: 8 } });
    const raw = rawSprite(20, 12);
    const { pack, payload } = encodeRawImage(raw, options, config);

    expect(pack.payload).toBe("hero.bin");
    expect(pack.version).toBe(1);

    const image = decodePack(parsePackFile(serializePackFile(pack)), payload);
    expect(image.width).toBe(20);
    expect(image.height).toBe(12);
    expect(image.pixels).toEqual(raw);
  });

  it("should record the strategy it used", () => {
    const config = resolveConfig({ compression: { method: "optimised", multipleOfValue: 8, minTransparentToCompress: 8 } });
    const { pack } = encodeRawImage(rawSprite(20, 12), options, config);
    expect(pack.strategy).toBe("optimised(multipleOf=8, minTransparent=8)");
  });

  it("should reject raw data of the wrong size", () => {
    const config = resolveConfig({});
    expect(() => encodeRawImage(new Uint8Array(10), options, config)).toThrow("Image 20x12 needs 240 pixels, got 10");
  });
});
