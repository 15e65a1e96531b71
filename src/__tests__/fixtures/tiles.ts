import { DEMFileFormats } from "../../models/demFileFormat";
import type { TileLayout } from "../../models/tileMetadata";
import { TileMetadata } from "../../models/tileMetadata";

/**
 * One degree SRTM style tile whose south-west corner is (lon, lat).
 */
export function createSrtmTile(
  filename: string,
  lon: number,
  lat: number,
  overrides: Partial<TileLayout> = {}
): TileMetadata {
  return new TileMetadata(filename, DEMFileFormats.SRTM_HGT, undefined, {
    height: 3601,
    width: 3601,
    pixelScaleX: 1 / 3600,
    pixelScaleY: 1 / 3600,
    pixelSizeX: 1 / 3600,
    pixelSizeY: 1 / 3600,
    dataStartLat: lat + 1,
    dataStartLon: lon,
    dataEndLat: lat,
    dataEndLon: lon + 1,
    physicalStartLat: lat + 1,
    physicalStartLon: lon,
    physicalEndLat: lat,
    physicalEndLon: lon + 1,
    bitsPerSample: 16,
    scanlineSize: 7202,
    worldUnits: "meter",
    sampleFormat: "INTEGER",
    noDataValue: "-32768",
    minimumAltitude: 120,
    maximumAltitude: 2400,
    ...overrides,
  });
}

export function sequentialIds(prefix = "virtual"): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
