import { v4 as uuidv4 } from "uuid";
import { NoDataValueFormatError } from "../utils/errors";
import { BoundingBox } from "./boundingBox";
import type { DEMFileFormat } from "./demFileFormat";
import { TILE_METADATA_VERSION } from "./schemaVersion";
import { TileKey } from "./tileKey";

/**
 * Raster layout and placement facts of a tile, as read from the raster header.
 */
export interface TileLayout {
  height: number;
  width: number;
  /** Scale factor used by the geo transform. */
  pixelScaleX: number;
  pixelScaleY: number;
  /** Ground size of one pixel. Kept apart from pixelScale; see DESIGN.md. */
  pixelSizeX: number;
  pixelSizeY: number;
  /**
   * Data point extrema (used for the bounding box). A cell centered image may
   * start half a pixel before its first data point; that data belongs to the
   * neighbouring tile. Start/end are not ordered.
   */
  dataStartLat: number;
  dataStartLon: number;
  dataEndLat: number;
  dataEndLon: number;
  /** Physical image extrema, offset by up to one pixel for cell centered images. */
  physicalStartLat: number;
  physicalStartLon: number;
  physicalEndLat: number;
  physicalEndLon: number;
  bitsPerSample: number;
  scanlineSize: number;
  worldUnits: string;
  sampleFormat: string;
  /** Kept as text: rasters encode it as int, float or "nan". */
  noDataValue: string;
  minimumAltitude: number;
  maximumAltitude: number;
}

export interface VirtualCloneOptions {
  /** Synthetic file name factory. Defaults to a random UUID. */
  generateId?: () => string;
  /** Translation applied to every data and physical extremum. */
  offset?: { lon: number; lat: number };
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const SPECIAL_VALUES: Record<string, number> = {
  nan: Number.NaN,
  inf: Number.POSITIVE_INFINITY,
  infinity: Number.POSITIVE_INFINITY,
};

export function parseNoDataValue(text: string): number {
  const normalized = text.trim().replace(/^−/, "-");
  if (NUMBER_PATTERN.test(normalized)) {
    return Number(normalized);
  }

  const sign = normalized.startsWith("-") ? -1 : 1;
  const unsigned = normalized.replace(/^[+-]/, "").toLowerCase();
  if (Object.prototype.hasOwnProperty.call(SPECIAL_VALUES, unsigned)) {
    return sign * SPECIAL_VALUES[unsigned];
  }
  throw new NoDataValueFormatError(text);
}

/**
 * Metadata of one elevation raster tile, extracted once so that tiles can be
 * indexed and queried without opening the raster again.
 *
 * Equality is by {@link TileKey} (file base name), not by geometry.
 * The bounding box and the numeric no-data value are computed on first access
 * and never recomputed: layout fields must be final before either is read.
 */
export class TileMetadata implements TileLayout {
  readonly filename: string;
  readonly fileFormat: DEMFileFormat;
  readonly version: string;
  /**
   * Synthetic tile with no backing file, generated to cover a gap in a
   * coverage query. Never persisted.
   */
  readonly virtualMetadata: boolean;
  readonly tileKey: TileKey;

  height = 0;
  width = 0;
  pixelScaleX = 0;
  pixelScaleY = 0;
  pixelSizeX = 0;
  pixelSizeY = 0;
  dataStartLat = 0;
  dataStartLon = 0;
  dataEndLat = 0;
  dataEndLon = 0;
  physicalStartLat = 0;
  physicalStartLon = 0;
  physicalEndLat = 0;
  physicalEndLon = 0;
  bitsPerSample = 0;
  scanlineSize = 0;
  worldUnits = "";
  sampleFormat = "";
  noDataValue = "";
  minimumAltitude = 0;
  maximumAltitude = 0;

  private cachedBoundingBox?: BoundingBox;
  private cachedNoDataValue?: number;

  constructor(
    filename: string,
    fileFormat: DEMFileFormat,
    version: string = TILE_METADATA_VERSION,
    layout: Partial<TileLayout> = {},
    virtualMetadata = false
  ) {
    this.filename = filename;
    this.fileFormat = fileFormat;
    this.version = version;
    this.virtualMetadata = virtualMetadata;
    this.tileKey = TileKey.fromFilename(filename);
    this.applyLayout(layout);
  }

  /**
   * Normalized data extent, whatever the orientation of the start/end fields.
   * Memoized: repeated calls return the same instance.
   */
  boundingBox(): BoundingBox {
    if (!this.cachedBoundingBox) {
      this.cachedBoundingBox = new BoundingBox(
        Math.min(this.dataStartLon, this.dataEndLon),
        Math.max(this.dataStartLon, this.dataEndLon),
        Math.min(this.dataStartLat, this.dataEndLat),
        Math.max(this.dataStartLat, this.dataEndLat)
      );
    }
    return this.cachedBoundingBox;
  }

  /**
   * Parses {@link noDataValue} on first call only.
   * @throws NoDataValueFormatError when the text is not a number
   */
  noDataValueAsNumber(): number {
    if (this.cachedNoDataValue === undefined) {
      this.cachedNoDataValue = parseNoDataValue(this.noDataValue);
    }
    return this.cachedNoDataValue;
  }

  setNoDataValueNumber(value: number): void {
    this.cachedNoDataValue = value;
  }

  equals(other: TileMetadata | null | undefined): boolean {
    if (!other) {
      return false;
    }
    return this.tileKey.equals(other.tileKey);
  }

  hash(): number {
    return this.tileKey.hash();
  }

  static hashOf(metadata: TileMetadata | null | undefined): number {
    return metadata ? metadata.hash() : 0;
  }

  layout(): TileLayout {
    return {
      height: this.height,
      width: this.width,
      pixelScaleX: this.pixelScaleX,
      pixelScaleY: this.pixelScaleY,
      pixelSizeX: this.pixelSizeX,
      pixelSizeY: this.pixelSizeY,
      dataStartLat: this.dataStartLat,
      dataStartLon: this.dataStartLon,
      dataEndLat: this.dataEndLat,
      dataEndLon: this.dataEndLon,
      physicalStartLat: this.physicalStartLat,
      physicalStartLon: this.physicalStartLon,
      physicalEndLat: this.physicalEndLat,
      physicalEndLon: this.physicalEndLon,
      bitsPerSample: this.bitsPerSample,
      scanlineSize: this.scanlineSize,
      worldUnits: this.worldUnits,
      sampleFormat: this.sampleFormat,
      noDataValue: this.noDataValue,
      minimumAltitude: this.minimumAltitude,
      maximumAltitude: this.maximumAltitude,
    };
  }

  /**
   * Copies this tile under a fresh synthetic name, flagged virtual.
   * The clone computes its own bounding box on first access.
   */
  cloneAsVirtual(options: VirtualCloneOptions = {}): TileMetadata {
    const generateId = options.generateId ?? uuidv4;
    const layout = this.layout();

    if (options.offset) {
      const { lon, lat } = options.offset;
      layout.dataStartLon += lon;
      layout.dataEndLon += lon;
      layout.physicalStartLon += lon;
      layout.physicalEndLon += lon;
      layout.dataStartLat += lat;
      layout.dataEndLat += lat;
      layout.physicalStartLat += lat;
      layout.physicalEndLat += lat;
    }

    const clone = new TileMetadata(
      generateId(),
      this.fileFormat,
      this.version,
      layout,
      true
    );
    if (this.cachedNoDataValue !== undefined) {
      clone.setNoDataValueNumber(this.cachedNoDataValue);
    }
    return clone;
  }

  toString(): string {
    return `${this.tileKey.baseName}: ${this.boundingBox()}`;
  }

  private applyLayout(layout: Partial<TileLayout>): void {
    this.height = layout.height ?? this.height;
    this.width = layout.width ?? this.width;
    this.pixelScaleX = layout.pixelScaleX ?? this.pixelScaleX;
    this.pixelScaleY = layout.pixelScaleY ?? this.pixelScaleY;
    this.pixelSizeX = layout.pixelSizeX ?? this.pixelSizeX;
    this.pixelSizeY = layout.pixelSizeY ?? this.pixelSizeY;
    this.dataStartLat = layout.dataStartLat ?? this.dataStartLat;
    this.dataStartLon = layout.dataStartLon ?? this.dataStartLon;
    this.dataEndLat = layout.dataEndLat ?? this.dataEndLat;
    this.dataEndLon = layout.dataEndLon ?? this.dataEndLon;
    this.physicalStartLat = layout.physicalStartLat ?? this.physicalStartLat;
    this.physicalStartLon = layout.physicalStartLon ?? this.physicalStartLon;
    this.physicalEndLat = layout.physicalEndLat ?? this.physicalEndLat;
    this.physicalEndLon = layout.physicalEndLon ?? this.physicalEndLon;
    this.bitsPerSample = layout.bitsPerSample ?? this.bitsPerSample;
    this.scanlineSize = layout.scanlineSize ?? this.scanlineSize;
    this.worldUnits = layout.worldUnits ?? this.worldUnits;
    this.sampleFormat = layout.sampleFormat ?? this.sampleFormat;
    this.noDataValue = layout.noDataValue ?? this.noDataValue;
    this.minimumAltitude = layout.minimumAltitude ?? this.minimumAltitude;
    this.maximumAltitude = layout.maximumAltitude ?? this.maximumAltitude;
  }
}
