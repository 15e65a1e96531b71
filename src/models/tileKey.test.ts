import { describe, it, expect } from "vitest";
import { TileKey, hashString } from "./tileKey";

describe("TileKey", () => {
  it("keeps only the base name", () => {
    expect(TileKey.fromFilename("srtm/N45E005.hgt").baseName).toBe("N45E005.hgt");
    expect(TileKey.fromFilename("/data/srtm/N45E005.hgt").baseName).toBe("N45E005.hgt");
    expect(TileKey.fromFilename("N45E005.hgt").baseName).toBe("N45E005.hgt");
  });

  it("accepts backslash separated paths", () => {
    expect(TileKey.fromFilename("srtm\\gl1\\N45E005.hgt").baseName).toBe("N45E005.hgt");
  });

  it("treats the same base name in different directories as one tile", () => {
    const a = TileKey.fromFilename("srtm/N45E005.hgt");
    const b = TileKey.fromFilename("backup/N45E005.hgt");

    expect(a.equals(b)).toBe(true);
    expect(a.hash()).toBe(b.hash());
  });

  it("is case sensitive", () => {
    const upper = TileKey.fromFilename("N45E005.hgt");
    const lower = TileKey.fromFilename("n45e005.hgt");

    expect(upper.equals(lower)).toBe(false);
    expect(upper.hash()).not.toBe(lower.hash());
  });

  it("is never equal to an absent key", () => {
    expect(TileKey.fromFilename("N45E005.hgt").equals(undefined)).toBe(false);
    expect(TileKey.fromFilename("N45E005.hgt").equals(null)).toBe(false);
  });
});

describe("hashString", () => {
  it("computes the 31 multiplier string hash", () => {
    expect(hashString("")).toBe(0);
    expect(hashString("a")).toBe(97);
    expect(hashString("ab")).toBe(31 * 97 + 98);
  });

  it("wraps to a 32-bit signed integer", () => {
    const hash = hashString("a rather long tile file name that overflows.tif");
    expect(Number.isInteger(hash)).toBe(true);
    expect(hash).toBeGreaterThanOrEqual(-2147483648);
    expect(hash).toBeLessThanOrEqual(2147483647);
  });
});
