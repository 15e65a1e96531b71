/*
 * Tile metadata schema history
 *
 *  2.1 : file names are relative to the data directory
 *  2.2 : [metadata regeneration required] file format is a full definition
 *        (name, type, extension, registration) instead of name + extension,
 *        lat/lon bound fields renamed to data/physical start/end
 *
 * There is no migration between versions. Any record not written with the
 * current version must be regenerated from its source raster.
 */
export const KNOWN_SCHEMA_VERSIONS = ["2.1", "2.2"] as const;

export type SchemaVersion = (typeof KNOWN_SCHEMA_VERSIONS)[number];

export const TILE_METADATA_VERSION: SchemaVersion = "2.2";

export type SchemaVersionCheck =
  | { status: "current"; version: SchemaVersion }
  | { status: "outdated"; version: SchemaVersion }
  | { status: "unknown"; version: string };

function isKnownSchemaVersion(version: string): version is SchemaVersion {
  return KNOWN_SCHEMA_VERSIONS.some((known) => known === version);
}

export function checkSchemaVersion(version: string): SchemaVersionCheck {
  if (!isKnownSchemaVersion(version)) {
    return { status: "unknown", version };
  }
  if (version === TILE_METADATA_VERSION) {
    return { status: "current", version };
  }
  return { status: "outdated", version };
}
