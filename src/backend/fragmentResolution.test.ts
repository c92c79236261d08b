import { fragmentResolutionOf, kFragmentResolution } from "./fragmentResolution";

describe("Fragment resolution", () => {
  it("should list twelve sizes with distinct header values", () => {
    expect(kFragmentResolution.keys.length).toBe(12);
    expect(new Set(kFragmentResolution.values).size).toBe(12);
  });

  it("should look sizes up by width and height", () => {
    expect(fragmentResolutionOf(32, 8)).toBe("32x8");
    expect(fragmentResolutionOf(8, 32)).toBe("8x32");
    expect(kFragmentResolution.infoByKey["64x32"].value).toBe(0b0111);
  });

  it("should not know sizes WAN cannot store", () => {
    expect(fragmentResolutionOf(24, 40)).toBeUndefined();
    expect(fragmentResolutionOf(64, 8)).toBeUndefined();
    expect(fragmentResolutionOf(5, 8)).toBeUndefined();
  });
});
