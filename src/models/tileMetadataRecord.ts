import { z } from "zod";
import {
  MetadataRegenerationRequiredError,
  TileMetadataRecordError,
  VirtualMetadataPersistError,
  errorMessage,
} from "../utils/errors";
import { createFileFormat } from "./demFileFormat";
import { checkSchemaVersion } from "./schemaVersion";
import { TileMetadata } from "./tileMetadata";

export const DEMFileFormatSchema = z.object({
  name: z.string(),
  type: z.enum(["GeoTiff", "SRTM_HGT", "GTX", "ASCIIGrid", "netCDF"]),
  extension: z.string(),
  registration: z.enum(["Cell", "Grid"]),
});

const finiteNumber = z.number().finite();

/**
 * Persisted form of a tile. The virtual flag and the bounding box are not
 * part of it: both are rebuilt from the stored fields.
 */
export const TileMetadataRecordSchema = z.object({
  version: z.string(),
  filename: z.string().min(1),
  height: z.number().int(),
  width: z.number().int(),
  pixelScaleX: finiteNumber,
  pixelScaleY: finiteNumber,
  dataStartLat: finiteNumber,
  dataStartLon: finiteNumber,
  dataEndLat: finiteNumber,
  dataEndLon: finiteNumber,
  bitsPerSample: z.number().int(),
  worldUnits: z.string(),
  sampleFormat: z.string(),
  noDataValue: z.string(),
  scanlineSize: z.number().int(),
  physicalStartLon: finiteNumber,
  physicalStartLat: finiteNumber,
  physicalEndLon: finiteNumber,
  physicalEndLat: finiteNumber,
  pixelSizeX: finiteNumber,
  pixelSizeY: finiteNumber,
  fileFormat: DEMFileFormatSchema,
  minimumAltitude: finiteNumber,
  maximumAltitude: finiteNumber,
});

export type TileMetadataRecord = z.infer<typeof TileMetadataRecordSchema>;

/**
 * Stable field tags. Records are written with their keys in tag order.
 * Tag 1 is reserved. Never renumber a field; a new field takes the next tag.
 */
export const TILE_METADATA_FIELD_TAGS = {
  version: 2,
  filename: 3,
  height: 4,
  width: 5,
  pixelScaleX: 6,
  pixelScaleY: 7,
  dataStartLat: 8,
  dataStartLon: 9,
  dataEndLat: 10,
  dataEndLon: 11,
  bitsPerSample: 12,
  worldUnits: 13,
  sampleFormat: 14,
  noDataValue: 15,
  scanlineSize: 16,
  physicalStartLon: 17,
  physicalStartLat: 18,
  physicalEndLon: 19,
  physicalEndLat: 20,
  pixelSizeX: 21,
  pixelSizeY: 22,
  fileFormat: 23,
  minimumAltitude: 24,
  maximumAltitude: 25,
} as const satisfies Record<keyof TileMetadataRecord, number>;

const VersionProbeSchema = z.object({ version: z.string() });

/**
 * Builds the persisted form of a real tile. A tile whose fields the record
 * cannot hold, such as a NaN altitude, is refused with TileMetadataRecordError.
 */
export function encodeTileMetadata(metadata: TileMetadata): TileMetadataRecord {
  if (metadata.virtualMetadata) {
    throw new VirtualMetadataPersistError(metadata.filename);
  }

  const parsed = TileMetadataRecordSchema.safeParse({
    version: metadata.version,
    filename: metadata.filename,
    height: metadata.height,
    width: metadata.width,
    pixelScaleX: metadata.pixelScaleX,
    pixelScaleY: metadata.pixelScaleY,
    dataStartLat: metadata.dataStartLat,
    dataStartLon: metadata.dataStartLon,
    dataEndLat: metadata.dataEndLat,
    dataEndLon: metadata.dataEndLon,
    bitsPerSample: metadata.bitsPerSample,
    worldUnits: metadata.worldUnits,
    sampleFormat: metadata.sampleFormat,
    noDataValue: metadata.noDataValue,
    scanlineSize: metadata.scanlineSize,
    physicalStartLon: metadata.physicalStartLon,
    physicalStartLat: metadata.physicalStartLat,
    physicalEndLon: metadata.physicalEndLon,
    physicalEndLat: metadata.physicalEndLat,
    pixelSizeX: metadata.pixelSizeX,
    pixelSizeY: metadata.pixelSizeY,
    fileFormat: {
      name: metadata.fileFormat.name,
      type: metadata.fileFormat.type,
      extension: metadata.fileFormat.extension,
      registration: metadata.fileFormat.registration,
    },
    minimumAltitude: metadata.minimumAltitude,
    maximumAltitude: metadata.maximumAltitude,
  });
  if (!parsed.success) {
    throw new TileMetadataRecordError(formatIssues(parsed.error), metadata.filename);
  }
  return parsed.data;
}

/**
 * Rebuilds a tile from its persisted form.
 *
 * The version is checked before the shape: a record from another schema
 * version fails with MetadataRegenerationRequiredError even when its fields
 * no longer match.
 */
export function decodeTileMetadata(input: unknown, source?: string): TileMetadata {
  const probe = VersionProbeSchema.safeParse(input);
  if (!probe.success) {
    throw new TileMetadataRecordError(formatIssues(probe.error), source);
  }

  const check = checkSchemaVersion(probe.data.version);
  if (check.status !== "current") {
    throw new MetadataRegenerationRequiredError(check, source);
  }

  const parsed = TileMetadataRecordSchema.safeParse(input);
  if (!parsed.success) {
    throw new TileMetadataRecordError(formatIssues(parsed.error), source);
  }

  const { version, filename, fileFormat, ...layout } = parsed.data;
  return new TileMetadata(filename, createFileFormat(fileFormat), version, layout);
}

export function serializeTileMetadata(metadata: TileMetadata): string {
  return JSON.stringify(encodeTileMetadata(metadata), null, 2);
}

export function deserializeTileMetadata(json: string, source?: string): TileMetadata {
  let input: unknown;
  try {
    input = JSON.parse(json);
  } catch (error) {
    throw new TileMetadataRecordError([`invalid JSON: ${errorMessage(error)}`], source);
  }
  return decodeTileMetadata(input, source);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
