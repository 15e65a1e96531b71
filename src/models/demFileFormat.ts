export type DEMFileType = "GeoTiff" | "SRTM_HGT" | "GTX" | "ASCIIGrid" | "netCDF";

/**
 * Cell registration: pixel values describe the area of the cell (pixel is area).
 * Grid registration: pixel values sit on the grid nodes (pixel is point).
 */
export type DEMFileRegistrationMode = "Cell" | "Grid";

export interface DEMFileFormat {
  readonly name: string;
  readonly type: DEMFileType;
  readonly extension: string;
  readonly registration: DEMFileRegistrationMode;
}

function defineFormat(format: DEMFileFormat): DEMFileFormat {
  return Object.freeze({ ...format });
}

export const DEMFileFormats = {
  SRTM_HGT: defineFormat({
    name: "SRTM HGT",
    type: "SRTM_HGT",
    extension: ".hgt",
    registration: "Grid",
  }),
  GEOTIFF_CELL: defineFormat({
    name: "GeoTIFF (cell registered)",
    type: "GeoTiff",
    extension: ".tif",
    registration: "Cell",
  }),
  GEOTIFF_GRID: defineFormat({
    name: "GeoTIFF (grid registered)",
    type: "GeoTiff",
    extension: ".tif",
    registration: "Grid",
  }),
  ASCII_GRID: defineFormat({
    name: "Esri ASCII Grid",
    type: "ASCIIGrid",
    extension: ".asc",
    registration: "Cell",
  }),
  NETCDF: defineFormat({
    name: "netCDF",
    type: "netCDF",
    extension: ".nc",
    registration: "Grid",
  }),
} as const;

export function createFileFormat(format: DEMFileFormat): DEMFileFormat {
  return defineFormat(format);
}
