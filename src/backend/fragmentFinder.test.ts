import { findMatchingFragment, FragmentLibrary } from "./fragmentFinder";
import { applyFlip } from "./fragmentFlip";
import { createPixelImage, PixelImage } from "./pixelImage";

// 8x8, no symmetry: first row 1..8, second row 9..15,1 and so on
function asymmetricFragment(): PixelImage {
  return createPixelImage(8, 8, Uint8Array.from({ length: 64 }, (_, i) => (i % 15) + 1));
}

describe("Fragment finder", () => {
  it("should find a registered fragment without flipping", () => {
    const library = new FragmentLibrary<string>();
    const fragment = asymmetricFragment();
    library.register("body", fragment);
    expect(findMatchingFragment(library, fragment)).toEqual({ reference: "body", flip: "standard" });
  });

  it("should find flipped copies", () => {
    const library = new FragmentLibrary<string>();
    const fragment = asymmetricFragment();
    library.register("body", fragment);
    expect(findMatchingFragment(library, applyFlip(fragment, "flipHorizontal"))).toEqual({
      reference: "body",
      flip: "flipHorizontal",
    });
    expect(findMatchingFragment(library, applyFlip(fragment, "flipVertical"))?.flip).toBe("flipVertical");
    expect(findMatchingFragment(library, applyFlip(fragment, "flipBoth"))?.flip).toBe("flipBoth");
  });

  it("should report no match when a single pixel differs", () => {
    const library = new FragmentLibrary<number>();
    const fragment = asymmetricFragment();
    library.register(0, fragment);
    const candidate = createPixelImage(8, 8, fragment.pixels);
    candidate.pixels[0] = 0;
    expect(findMatchingFragment(library, candidate)).toBeUndefined();
  });

  it("should report no match in an empty library", () => {
    expect(findMatchingFragment(new FragmentLibrary<number>(), asymmetricFragment())).toBeUndefined();
  });

  it("should prefer the earliest registered fragment", () => {
    const library = new FragmentLibrary<string>();
    const fragment = asymmetricFragment();
    library.register("mirrored", applyFlip(fragment, "flipHorizontal"));
    library.register("exact", fragment);
    library.register("duplicate", fragment);
    expect(findMatchingFragment(library, fragment)).toEqual({ reference: "mirrored", flip: "flipHorizontal" });
  });

  it("should prefer the standard orientation for a symmetric fragment", () => {
    const library = new FragmentLibrary<number>();
    const solid = createPixelImage(8, 8, new Uint8Array(64).fill(3));
    library.register(7, solid);
    expect(findMatchingFragment(library, solid)).toEqual({ reference: 7, flip: "standard" });
  });

  it("should pad candidates and registrations to whole tiles", () => {
    const library = new FragmentLibrary<number>();
    const small = createPixelImage(5, 3, Uint8Array.from({ length: 15 }, (_, i) => (i % 4) + 1));
    const canonical = library.register(1, small);
    expect(canonical.width).toBe(8);
    expect(canonical.height).toBe(8);
    expect(library.size).toBe(1);
    expect(findMatchingFragment(library, small)).toEqual({ reference: 1, flip: "standard" });
    expect(findMatchingFragment(library, canonical)).toEqual({ reference: 1, flip: "standard" });
  });

  it("should keep its stored pixels when the returned image is changed", () => {
    const library = new FragmentLibrary<number>();
    const fragment = asymmetricFragment();
    const canonical = library.register(4, fragment);
    canonical.pixels.fill(0);
    expect(findMatchingFragment(library, fragment)).toEqual({ reference: 4, flip: "standard" });
    expect(findMatchingFragment(library, canonical)).toBeUndefined();
  });

  it("should not match fragments of a different size", () => {
    const library = new FragmentLibrary<number>();
    library.register(0, createPixelImage(16, 8, new Uint8Array(128).fill(2)));
    expect(findMatchingFragment(library, createPixelImage(8, 16, new Uint8Array(128).fill(2)))).toBeUndefined();
  });
});
