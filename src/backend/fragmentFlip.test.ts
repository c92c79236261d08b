import { applyFlip, flipFromBits, flipToBits, kFragmentFlip } from "./fragmentFlip";
import { createPixelImage, imagesEqual } from "./pixelImage";

describe("Fragment flips", () => {
  const image = createPixelImage(3, 2, new Uint8Array([1, 2, 3, 4, 5, 6]));

  it("should mirror columns for a horizontal flip", () => {
    expect(applyFlip(image, "flipHorizontal").pixels).toEqual(new Uint8Array([3, 2, 1, 6, 5, 4]));
  });

  it("should mirror rows for a vertical flip", () => {
    expect(applyFlip(image, "flipVertical").pixels).toEqual(new Uint8Array([4, 5, 6, 1, 2, 3]));
  });

  it("should mirror both ways", () => {
    expect(applyFlip(image, "flipBoth").pixels).toEqual(new Uint8Array([6, 5, 4, 3, 2, 1]));
  });

  it("should undo itself", () => {
    for (const flip of kFragmentFlip.keys) {
      expect(imagesEqual(applyFlip(applyFlip(image, flip), flip), image)).toBe(true);
    }
  });

  it("should convert to and from flip bits", () => {
    expect(flipFromBits(false, false)).toBe("standard");
    expect(flipFromBits(true, false)).toBe("flipHorizontal");
    expect(flipFromBits(false, true)).toBe("flipVertical");
    expect(flipFromBits(true, true)).toBe("flipBoth");
    expect(flipToBits("flipVertical")).toEqual({ horizontal: false, vertical: true });
    expect(kFragmentFlip.coerceByValue(3)?.key).toBe("flipBoth");
  });
});
