import * as fs from "fs";
import * as path from "path";
import { BoundingBox } from "../models/boundingBox";
import { TileKey } from "../models/tileKey";
import type { TileMetadata } from "../models/tileMetadata";
import {
  deserializeTileMetadata,
  serializeTileMetadata,
} from "../models/tileMetadataRecord";
import {
  CoverageQueryTooLargeError,
  MetadataRegenerationRequiredError,
  VirtualMetadataPersistError,
  errorMessage,
  isErrnoException,
} from "../utils/errors";
import { createLogger } from "../utils/logger";
import { MetricsCalculator } from "../utils/metricsCalculator";

const logger = createLogger("metadataIndex");

export const DEFAULT_MAX_COVERAGE_CELLS = 10000;

export interface MetadataLoadSummary {
  loaded: number;
  skipped: number;
  regenerationRequired: number;
  collisions: number;
  durationMs: number;
}

export interface CoverageOptions {
  /** Add virtual tiles for grid cells no real tile covers. */
  fillGaps?: boolean;
  /** Synthetic file name factory for virtual tiles. */
  generateId?: () => string;
  maxCells?: number;
}

export interface CoverageResult {
  /** Real and virtual tiles, north to south then west to east. */
  tiles: TileMetadata[];
  virtualCount: number;
  fullyCovered: boolean;
}

export interface SaveResult {
  metadata: TileMetadata;
  filePath: string;
  /** An indexed tile with the same base name was replaced. */
  replaced: boolean;
}

export class MetadataIndexService {
  private readonly metadataDir: string;
  private tiles = new Map<string, TileMetadata>();
  /** Tiles registered while a load is running, one map per running load. */
  private readonly loadsInFlight = new Set<Map<string, TileMetadata>>();

  constructor(metadataDir: string) {
    this.metadataDir = metadataDir;
  }

  get size(): number {
    return this.tiles.size;
  }

  /**
   * Rebuilds the index from the metadata directory. The previous content is
   * replaced only once every file has been read. Tiles registered while the
   * load runs are kept in the new index.
   */
  public async load(requestId?: string): Promise<MetadataLoadSummary> {
    const registeredDuringLoad = new Map<string, TileMetadata>();
    this.loadsInFlight.add(registeredDuringLoad);
    try {
      return await this.loadDirectory(registeredDuringLoad, requestId);
    } finally {
      this.loadsInFlight.delete(registeredDuringLoad);
    }
  }

  private async loadDirectory(
    registeredDuringLoad: Map<string, TileMetadata>,
    requestId?: string
  ): Promise<MetadataLoadSummary> {
    const startTime = Date.now();
    const summary: MetadataLoadSummary = {
      loaded: 0,
      skipped: 0,
      regenerationRequired: 0,
      collisions: 0,
      durationMs: 0,
    };

    let files: string[];
    try {
      files = (await fs.promises.readdir(this.metadataDir))
        .filter((file) => file.toLowerCase().endsWith(".json"))
        .sort();
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        logger.warn(
          {
            requestId,
            metadataDir: this.metadataDir,
            action: "index_load_missing_directory",
          },
          "Metadata directory does not exist, no files to load"
        );
        files = [];
      } else {
        throw error;
      }
    }

    logger.info(
      {
        requestId,
        metadataDir: this.metadataDir,
        totalFiles: files.length,
        action: "index_load_start",
      },
      `Loading ${files.length} metadata files`
    );

    const tiles = new Map<string, TileMetadata>();
    let bytesRead = 0;
    let lastLoggedProgress = 0;

    for (const [index, file] of files.entries()) {
      const filePath = path.join(this.metadataDir, file);

      try {
        const content = await fs.promises.readFile(filePath, "utf-8");
        bytesRead += Buffer.byteLength(content);
        const metadata = deserializeTileMetadata(content, file);
        if (this.addTile(tiles, metadata, requestId)) {
          summary.collisions++;
        }
        summary.loaded++;
      } catch (error) {
        if (error instanceof MetadataRegenerationRequiredError) {
          summary.regenerationRequired++;
          logger.warn(
            {
              requestId,
              file,
              version: error.check.version,
              versionStatus: error.check.status,
              action: "index_load_regeneration_required",
            },
            error.message
          );
        } else {
          summary.skipped++;
          logger.error(
            {
              requestId,
              file,
              error: errorMessage(error),
              action: "index_load_file_error",
            },
            "Skipping unreadable metadata file"
          );
        }
      }

      const metrics = MetricsCalculator.calculateLoadMetrics(
        index + 1,
        files.length,
        bytesRead,
        startTime
      );
      if (
        MetricsCalculator.shouldLogProgress(metrics.progress, lastLoggedProgress, 25)
      ) {
        lastLoggedProgress = metrics.progress;
        logger.debug(
          {
            requestId,
            progress: metrics.progress,
            filesProcessed: metrics.filesProcessed,
            totalFiles: metrics.totalFiles,
            elapsed: MetricsCalculator.formatDuration(metrics.elapsedTime),
            filesPerSecond: metrics.filesPerSecond.toFixed(1),
            throughput: metrics.throughputFormatted,
            action: "index_load_progress",
          },
          `Index load progress: ${metrics.progress}%`
        );
      }
    }

    for (const [key, metadata] of registeredDuringLoad) {
      tiles.set(key, metadata);
    }
    this.tiles = tiles;
    summary.durationMs = Date.now() - startTime;

    logger.info(
      {
        requestId,
        ...summary,
        bytesRead: MetricsCalculator.formatFileSize(bytesRead),
        duration: MetricsCalculator.formatDuration(summary.durationMs / 1000),
        action: "index_load_complete",
      },
      `Indexed ${summary.loaded} tiles`
    );

    if (summary.regenerationRequired > 0) {
      logger.warn(
        {
          requestId,
          regenerationRequired: summary.regenerationRequired,
          action: "index_regeneration_required",
        },
        "Some metadata files were written by another schema version, regenerate the metadata index"
      );
    }

    return summary;
  }

  /**
   * Adds a real tile. Returns true when a tile with the same base name was replaced.
   */
  public register(metadata: TileMetadata, requestId?: string): boolean {
    const replaced = this.addTile(this.tiles, metadata, requestId);
    for (const registeredDuringLoad of this.loadsInFlight) {
      registeredDuringLoad.set(metadata.tileKey.baseName, metadata);
    }
    return replaced;
  }

  /**
   * Writes the tile's record into the metadata directory, then indexes it.
   */
  public async save(metadata: TileMetadata, requestId?: string): Promise<SaveResult> {
    const json = serializeTileMetadata(metadata);
    const filePath = path.join(this.metadataDir, `${metadata.tileKey.baseName}.json`);

    await fs.promises.mkdir(this.metadataDir, { recursive: true });
    await fs.promises.writeFile(filePath, json);

    logger.info(
      {
        requestId,
        filename: metadata.filename,
        filePath,
        action: "metadata_saved",
      },
      `Metadata saved for ${metadata.tileKey.baseName}`
    );

    const replaced = this.register(metadata, requestId);
    return { metadata, filePath, replaced };
  }

  public get(filename: string): TileMetadata | undefined {
    return this.tiles.get(TileKey.fromFilename(filename).baseName);
  }

  public list(): TileMetadata[] {
    return [...this.tiles.values()].sort((a, b) =>
      a.tileKey.baseName < b.tileKey.baseName ? -1 : a.tileKey.baseName > b.tileKey.baseName ? 1 : 0
    );
  }

  /**
   * Tiles intersecting `bbox`. With `fillGaps`, cells of the grid defined by
   * the first real tile that no real tile covers get a virtual copy of that
   * tile moved onto the cell.
   */
  public findCovering(
    bbox: BoundingBox,
    options: CoverageOptions = {},
    requestId?: string
  ): CoverageResult {
    const realTiles = [...this.tiles.values()]
      .filter((tile) => tile.boundingBox().intersects(bbox))
      .sort(compareTilePosition);

    const reference = realTiles[0];
    if (!reference) {
      logger.info(
        { requestId, bbox: bbox.toJSON(), action: "coverage_no_tiles" },
        "No tile intersects the requested area"
      );
      return { tiles: [], virtualCount: 0, fullyCovered: false };
    }

    const referenceBox = reference.boundingBox();
    if (referenceBox.width <= 0 || referenceBox.height <= 0) {
      logger.warn(
        {
          requestId,
          reference: reference.filename,
          action: "coverage_degenerate_reference",
        },
        "Reference tile has an empty extent, gaps cannot be located"
      );
      return { tiles: realTiles, virtualCount: 0, fullyCovered: false };
    }

    const maxCells = options.maxCells ?? DEFAULT_MAX_COVERAGE_CELLS;
    const grid = gridSpan(bbox, referenceBox);

    if (grid.cellCount > maxCells) {
      if (options.fillGaps) {
        throw new CoverageQueryTooLargeError(grid.cellCount, maxCells);
      }
      // Too many cells to check: coverage stays unknown, reported as not covered.
      logger.debug(
        {
          requestId,
          cellCount: grid.cellCount,
          maxCells,
          action: "coverage_check_skipped",
        },
        "Coverage check skipped for a large query"
      );
      return { tiles: realTiles, virtualCount: 0, fullyCovered: false };
    }

    const gaps = gridCells(grid, referenceBox).filter(
      (cell) =>
        !realTiles.some((tile) =>
          tile.boundingBox().containsPoint(cell.center.lon, cell.center.lat)
        )
    );

    if (!options.fillGaps || gaps.length === 0) {
      return { tiles: realTiles, virtualCount: 0, fullyCovered: gaps.length === 0 };
    }

    const virtualTiles = gaps.map((cell) =>
      reference.cloneAsVirtual({
        generateId: options.generateId,
        offset: {
          lon: cell.xMin - referenceBox.xMin,
          lat: cell.yMin - referenceBox.yMin,
        },
      })
    );

    logger.info(
      {
        requestId,
        bbox: bbox.toJSON(),
        realTiles: realTiles.length,
        virtualTiles: virtualTiles.length,
        action: "coverage_gaps_filled",
      },
      `Filled ${virtualTiles.length} coverage gaps with virtual tiles`
    );

    return {
      tiles: [...realTiles, ...virtualTiles].sort(compareTilePosition),
      virtualCount: virtualTiles.length,
      fullyCovered: false,
    };
  }

  private addTile(
    tiles: Map<string, TileMetadata>,
    metadata: TileMetadata,
    requestId?: string
  ): boolean {
    if (metadata.virtualMetadata) {
      throw new VirtualMetadataPersistError(metadata.filename);
    }

    const key = metadata.tileKey.baseName;
    const existing = tiles.get(key);
    tiles.set(key, metadata);

    if (existing) {
      logger.warn(
        {
          requestId,
          tileKey: key,
          previousFilename: existing.filename,
          filename: metadata.filename,
          action: "index_tile_collision",
        },
        "Tile with the same base name replaced in the index"
      );
      return true;
    }
    return false;
  }
}

interface GridSpan {
  iStart: number;
  iEnd: number;
  jStart: number;
  jEnd: number;
  cellCount: number;
}

/** Cell index range of the reference tile's grid that `bbox` touches. */
function gridSpan(bbox: BoundingBox, referenceBox: BoundingBox): GridSpan {
  const { xMin: originLon, yMin: originLat, width, height } = referenceBox;
  const iStart = Math.floor((bbox.xMin - originLon) / width);
  const iEnd = Math.max(iStart, Math.ceil((bbox.xMax - originLon) / width) - 1);
  const jStart = Math.floor((bbox.yMin - originLat) / height);
  const jEnd = Math.max(jStart, Math.ceil((bbox.yMax - originLat) / height) - 1);

  return {
    iStart,
    iEnd,
    jStart,
    jEnd,
    cellCount: (iEnd - iStart + 1) * (jEnd - jStart + 1),
  };
}

function gridCells(grid: GridSpan, referenceBox: BoundingBox): BoundingBox[] {
  const { xMin: originLon, yMin: originLat, width, height } = referenceBox;
  const cells: BoundingBox[] = [];
  for (let j = grid.jStart; j <= grid.jEnd; j++) {
    for (let i = grid.iStart; i <= grid.iEnd; i++) {
      cells.push(
        new BoundingBox(
          originLon + i * width,
          originLon + (i + 1) * width,
          originLat + j * height,
          originLat + (j + 1) * height
        )
      );
    }
  }
  return cells;
}

function compareTilePosition(a: TileMetadata, b: TileMetadata): number {
  const boxA = a.boundingBox();
  const boxB = b.boundingBox();
  return boxB.yMin - boxA.yMin || boxA.xMin - boxB.xMin;
}
