import { describe, it, expect } from "vitest";
import { createSrtmTile, sequentialIds } from "../__tests__/fixtures/tiles";
import { NoDataValueFormatError } from "../utils/errors";
import { BoundingBox } from "./boundingBox";
import { DEMFileFormats } from "./demFileFormat";
import { TILE_METADATA_VERSION } from "./schemaVersion";
import { TileMetadata, parseNoDataValue } from "./tileMetadata";

describe("TileMetadata", () => {
  describe("construction", () => {
    it("defaults to the current schema version and empty layout", () => {
      const tile = new TileMetadata("N45E005.hgt", DEMFileFormats.SRTM_HGT);

      expect(tile.version).toBe(TILE_METADATA_VERSION);
      expect(tile.fileFormat).toBe(DEMFileFormats.SRTM_HGT);
      expect(tile.virtualMetadata).toBe(false);
      expect(tile.height).toBe(0);
      expect(tile.width).toBe(0);
      expect(tile.noDataValue).toBe("");
      expect(tile.worldUnits).toBe("");
    });

    it("keeps an explicit version", () => {
      const tile = new TileMetadata("N45E005.hgt", DEMFileFormats.SRTM_HGT, "2.1");
      expect(tile.version).toBe("2.1");
    });

    it("applies the given layout", () => {
      const tile = createSrtmTile("N45E005.hgt", 5, 45);

      expect(tile.height).toBe(3601);
      expect(tile.dataStartLat).toBe(46);
      expect(tile.dataEndLon).toBe(6);
      expect(tile.layout().scanlineSize).toBe(7202);
    });
  });

  describe("boundingBox", () => {
    it.each([
      ["ascending", { dataStartLat: 45, dataEndLat: 46, dataStartLon: 5, dataEndLon: 6 }],
      ["descending", { dataStartLat: 46, dataEndLat: 45, dataStartLon: 6, dataEndLon: 5 }],
      ["north-up", { dataStartLat: 46, dataEndLat: 45, dataStartLon: 5, dataEndLon: 6 }],
      ["mixed", { dataStartLat: 45, dataEndLat: 46, dataStartLon: 6, dataEndLon: 5 }],
    ])("normalizes %s extrema", (_, extrema) => {
      const tile = new TileMetadata("N45E005.hgt", DEMFileFormats.SRTM_HGT, undefined, extrema);

      expect(tile.boundingBox().equals(new BoundingBox(5, 6, 45, 46))).toBe(true);
    });

    it("returns the same instance on every call", () => {
      const tile = createSrtmTile("N45E005.hgt", 5, 45);
      const first = tile.boundingBox();

      expect(tile.boundingBox()).toBe(first);
    });

    it("yields a point box for all-zero extrema", () => {
      const tile = new TileMetadata("empty.tif", DEMFileFormats.GEOTIFF_CELL);

      expect(tile.boundingBox().toJSON()).toEqual({ xMin: 0, xMax: 0, yMin: 0, yMax: 0 });
    });

    it("uses data extrema, not physical extrema", () => {
      const tile = createSrtmTile("N45E005.tif", 5, 45, {
        physicalStartLon: 4.9995,
        physicalEndLat: 44.9995,
      });

      expect(tile.boundingBox().toJSON()).toEqual({ xMin: 5, xMax: 6, yMin: 45, yMax: 46 });
    });
  });

  describe("identity", () => {
    it("treats the same base name in different directories as equal", () => {
      const a = createSrtmTile("srtm/N45E005.hgt", 5, 45);
      const b = createSrtmTile("backup/N45E005.hgt", 7, 47);

      expect(a.equals(b)).toBe(true);
      expect(a.hash()).toBe(b.hash());
    });

    it("distinguishes different base names", () => {
      const a = createSrtmTile("N45E005.hgt", 5, 45);
      const b = createSrtmTile("N45E006.hgt", 6, 45);

      expect(a.equals(b)).toBe(false);
    });

    it("is never equal to an absent value", () => {
      const tile = createSrtmTile("N45E005.hgt", 5, 45);

      expect(tile.equals(undefined)).toBe(false);
      expect(tile.equals(null)).toBe(false);
      expect(TileMetadata.hashOf(undefined)).toBe(0);
      expect(TileMetadata.hashOf(tile)).toBe(tile.hash());
    });

    it("formats the base name and bounding box", () => {
      const tile = createSrtmTile("srtm/N45E005.hgt", 5, 45);

      expect(tile.toString()).toBe("N45E005.hgt: Xmin: 5, Xmax: 6, Ymin: 45, Ymax: 46");
    });
  });

  describe("noDataValueAsNumber", () => {
    it("parses the text once and caches the result", () => {
      const tile = createSrtmTile("N45E005.hgt", 5, 45, { noDataValue: "-9999" });

      expect(tile.noDataValueAsNumber()).toBe(-9999);
      tile.noDataValue = "0";
      expect(tile.noDataValueAsNumber()).toBe(-9999);
    });

    it("surfaces malformed text as a format error", () => {
      const tile = createSrtmTile("N45E005.hgt", 5, 45, { noDataValue: "n/a" });

      expect(() => tile.noDataValueAsNumber()).toThrow(NoDataValueFormatError);
      // nothing was cached
      tile.noDataValue = "-1";
      expect(tile.noDataValueAsNumber()).toBe(-1);
    });

    it("takes a number set directly without parsing", () => {
      const tile = createSrtmTile("N45E005.hgt", 5, 45, { noDataValue: "not a number" });

      tile.setNoDataValueNumber(-32768);
      expect(tile.noDataValueAsNumber()).toBe(-32768);
    });
  });

  describe("cloneAsVirtual", () => {
    it("copies the layout under a new synthetic name", () => {
      const tile = createSrtmTile("srtm/N45E005.hgt", 5, 45);
      const clone = tile.cloneAsVirtual();

      expect(clone.filename).not.toBe(tile.filename);
      expect(clone.filename).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
      );
      expect(clone.virtualMetadata).toBe(true);
      expect(tile.virtualMetadata).toBe(false);
      expect(clone.equals(tile)).toBe(false);
      expect(clone.layout()).toEqual(tile.layout());
      expect(clone.fileFormat).toBe(tile.fileFormat);
      expect(clone.version).toBe(tile.version);
    });

    it("computes its own bounding box equal to the source's", () => {
      const tile = createSrtmTile("N45E005.hgt", 5, 45);
      const sourceBox = tile.boundingBox();
      const clone = tile.cloneAsVirtual();

      expect(clone.boundingBox()).not.toBe(sourceBox);
      expect(clone.boundingBox().equals(sourceBox)).toBe(true);
    });

    it("never reuses a name across clones", () => {
      const tile = createSrtmTile("N45E005.hgt", 5, 45);
      const names = new Set(
        Array.from({ length: 20 }, () => tile.cloneAsVirtual().filename)
      );

      expect(names.size).toBe(20);
    });

    it("uses the given id generator", () => {
      const tile = createSrtmTile("N45E005.hgt", 5, 45);
      const generateId = sequentialIds("gap");

      expect(tile.cloneAsVirtual({ generateId }).filename).toBe("gap-1");
      expect(tile.cloneAsVirtual({ generateId }).filename).toBe("gap-2");
    });

    it("moves data and physical extrema by the offset", () => {
      const tile = createSrtmTile("N45E005.hgt", 5, 45);
      const clone = tile.cloneAsVirtual({ offset: { lon: 2, lat: -1 } });

      expect(clone.boundingBox().toJSON()).toEqual({ xMin: 7, xMax: 8, yMin: 44, yMax: 45 });
      expect(clone.physicalStartLon).toBe(7);
      expect(clone.physicalEndLat).toBe(44);
      expect(tile.boundingBox().toJSON()).toEqual({ xMin: 5, xMax: 6, yMin: 45, yMax: 46 });
    });

    it("carries a cached no-data number over", () => {
      const tile = createSrtmTile("N45E005.hgt", 5, 45, { noDataValue: "" });
      tile.setNoDataValueNumber(-9999);

      expect(tile.cloneAsVirtual().noDataValueAsNumber()).toBe(-9999);
    });
  });
});

describe("parseNoDataValue", () => {
  it.each([
    ["-9999", -9999],
    ["−9999", -9999],
    ["-32768", -32768],
    [" 0 ", 0],
    ["3.4028235e+38", 3.4028235e38],
    ["-1.5", -1.5],
    [".5", 0.5],
    ["+12", 12],
    ["-inf", Number.NEGATIVE_INFINITY],
    ["Infinity", Number.POSITIVE_INFINITY],
  ])("parses %j", (text, expected) => {
    expect(parseNoDataValue(text)).toBe(expected);
  });

  it("parses nan", () => {
    expect(parseNoDataValue("nan")).toBeNaN();
    expect(parseNoDataValue("NaN")).toBeNaN();
  });

  it.each(["", "   ", "abc", "0x10", "1,5", "12m", "--1"])("rejects %j", (text) => {
    expect(() => parseNoDataValue(text)).toThrow(NoDataValueFormatError);
  });

  it("keeps the offending text on the error", () => {
    try {
      parseNoDataValue("n/a");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NoDataValueFormatError);
      expect(error).toMatchObject({ noDataValue: "n/a", code: "NO_DATA_VALUE_FORMAT" });
    }
  });
});
