import type { SchemaVersionCheck } from "../models/schemaVersion";

/**
 * Thrown when the textual no-data sentinel of a tile is not a number.
 */
export class NoDataValueFormatError extends Error {
  readonly code = "NO_DATA_VALUE_FORMAT";

  constructor(readonly noDataValue: string) {
    super(`No-data value is not a number: "${noDataValue}"`);
    this.name = "NoDataValueFormatError";
  }
}

/**
 * Thrown when a persisted record was written by another schema version.
 * The metadata index must be regenerated from the source rasters.
 */
export class MetadataRegenerationRequiredError extends Error {
  readonly code = "METADATA_REGENERATION_REQUIRED";

  constructor(
    readonly check: Exclude<SchemaVersionCheck, { status: "current" }>,
    readonly source?: string
  ) {
    super(
      `Tile metadata version ${check.version} is ${check.status}` +
        (source ? ` (${source})` : "") +
        ". Regenerate the metadata index from the source rasters."
    );
    this.name = "MetadataRegenerationRequiredError";
  }
}

export class TileMetadataRecordError extends Error {
  readonly code = "TILE_METADATA_RECORD_INVALID";

  constructor(readonly issues: string[], readonly source?: string) {
    super(
      `Invalid tile metadata record${source ? ` (${source})` : ""}: ${issues.join("; ")}`
    );
    this.name = "TileMetadataRecordError";
  }
}

export class VirtualMetadataPersistError extends Error {
  readonly code = "VIRTUAL_METADATA_PERSIST";

  constructor(readonly filename: string) {
    super(`Virtual tile metadata cannot be persisted or indexed: ${filename}`);
    this.name = "VirtualMetadataPersistError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

export class CoverageQueryTooLargeError extends Error {
  readonly code = "COVERAGE_QUERY_TOO_LARGE";

  constructor(readonly cellCount: number, readonly maxCells: number) {
    super(
      `Coverage query spans ${cellCount} tile cells, more than the limit of ${maxCells}`
    );
    this.name = "CoverageQueryTooLargeError";
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
