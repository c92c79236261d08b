import { formatBytes, formatRatio, TryParseInt } from "./utils";

describe("utils", () => {
  it("should parse integers from strings and numbers", () => {
    expect(TryParseInt("42")).toBe(42);
    expect(TryParseInt(" 7 ")).toBe(7);
    expect(TryParseInt(3.9)).toBe(3);
    expect(TryParseInt("12px")).toBeNull();
    expect(TryParseInt(undefined)).toBeNull();
  });

  it("should format byte counts", () => {
    expect(formatBytes(null)).toBe("...");
    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(2048)).toBe("2.0 KB");
  });

  it("should format ratios", () => {
    expect(formatRatio(1, 4)).toBe("25.0%");
    expect(formatRatio(3, 0)).toBe("0%");
  });
});
