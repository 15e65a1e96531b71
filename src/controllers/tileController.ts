import type { Request, Response } from "express";
import { z } from "zod";
import { BoundingBox } from "../models/boundingBox";
import type { DEMFileFormat } from "../models/demFileFormat";
import type { TileLayout, TileMetadata } from "../models/tileMetadata";
import { decodeTileMetadata } from "../models/tileMetadataRecord";
import type { MetadataIndexService } from "../services/metadataIndexService";
import {
  CoverageQueryTooLargeError,
  MetadataRegenerationRequiredError,
  TileMetadataRecordError,
  errorMessage,
} from "../utils/errors";
import { createLogger } from "../utils/logger";
import { MetricsCalculator } from "../utils/metricsCalculator";

const logger = createLogger("tileController");

export const CoverageQuerySchema = z
  .object({
    minLon: z.coerce.number().min(-180).max(180),
    maxLon: z.coerce.number().min(-180).max(180),
    minLat: z.coerce.number().min(-90).max(90),
    maxLat: z.coerce.number().min(-90).max(90),
    fillGaps: z
      .enum(["true", "false"])
      .optional()
      .transform((value) => value === "true"),
  })
  .refine((query) => query.minLon < query.maxLon && query.minLat < query.maxLat, {
    message: "minLon must be less than maxLon and minLat less than maxLat",
  });

export interface TileView extends TileLayout {
  filename: string;
  version: string;
  fileFormat: DEMFileFormat;
  virtual: boolean;
  boundingBox: ReturnType<BoundingBox["toJSON"]>;
}

export function toTileView(metadata: TileMetadata): TileView {
  return {
    filename: metadata.filename,
    version: metadata.version,
    fileFormat: metadata.fileFormat,
    ...metadata.layout(),
    virtual: metadata.virtualMetadata,
    boundingBox: metadata.boundingBox().toJSON(),
  };
}

export class TileController {
  private metadataIndex: MetadataIndexService;

  constructor(metadataIndex: MetadataIndexService) {
    this.metadataIndex = metadataIndex;
  }

  /**
   * @swagger
   * /tiles:
   *   get:
   *     tags: [Tiles]
   *     summary: List indexed tiles
   *     description: Returns every indexed tile, sorted by file base name
   *     responses:
   *       200:
   *         description: Indexed tiles
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/TileListResponse'
   */
  public listTiles = (req: Request, res: Response): void => {
    const tiles = this.metadataIndex.list().map(toTileView);

    logger.info(
      {
        requestId: req.requestId,
        count: tiles.length,
        action: "list_tiles",
      },
      `Listing ${tiles.length} tiles`
    );

    res.status(200).json({ count: tiles.length, tiles, requestId: req.requestId });
  };

  /**
   * @swagger
   * /tiles/{filename}/metadata:
   *   get:
   *     tags: [Tiles]
   *     summary: Get tile metadata
   *     description: Looks a tile up by file name. Only the base name is compared.
   *     parameters:
   *       - $ref: '#/components/parameters/Filename'
   *     responses:
   *       200:
   *         description: Tile metadata
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Tile'
   *       404:
   *         $ref: '#/components/responses/NotFound'
   */
  public getTileMetadata = (req: Request, res: Response): void => {
    const { filename } = req.params;
    const requestId = req.requestId;
    const metadata = this.metadataIndex.get(filename);

    if (!metadata) {
      logger.info(
        { requestId, filename, action: "get_metadata_not_found" },
        "Tile not found"
      );
      res.status(404).json({ error: `Tile not found: ${filename}`, requestId });
      return;
    }

    res.status(200).json(toTileView(metadata));
  };

  /**
   * @swagger
   * /tiles/coverage:
   *   get:
   *     tags: [Tiles]
   *     summary: Find tiles covering an area
   *     description: Returns the tiles intersecting the area. With fillGaps=true, grid cells not covered by any tile are returned as virtual tiles.
   *     parameters:
   *       - name: minLon
   *         in: query
   *         required: true
   *         schema:
   *           type: number
   *         example: 5
   *       - name: maxLon
   *         in: query
   *         required: true
   *         schema:
   *           type: number
   *         example: 7
   *       - name: minLat
   *         in: query
   *         required: true
   *         schema:
   *           type: number
   *         example: 45
   *       - name: maxLat
   *         in: query
   *         required: true
   *         schema:
   *           type: number
   *         example: 46
   *       - name: fillGaps
   *         in: query
   *         required: false
   *         schema:
   *           type: boolean
   *     responses:
   *       200:
   *         description: Covering tiles
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/CoverageResponse'
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   */
  public getCoverage = (req: Request, res: Response): void => {
    const requestId = req.requestId;
    const parsed = CoverageQuerySchema.safeParse(req.query);

    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid coverage query",
        details: parsed.error.issues.map((issue) => issue.message).join("; "),
        requestId,
      });
      return;
    }

    const { minLon, maxLon, minLat, maxLat, fillGaps } = parsed.data;
    const startTime = Date.now();

    try {
      const result = this.metadataIndex.findCovering(
        new BoundingBox(minLon, maxLon, minLat, maxLat),
        { fillGaps },
        requestId
      );

      logger.info(
        {
          requestId,
          tiles: result.tiles.length,
          virtualCount: result.virtualCount,
          fullyCovered: result.fullyCovered,
          duration: MetricsCalculator.formatDuration((Date.now() - startTime) / 1000),
          action: "coverage_success",
        },
        "Coverage query completed"
      );

      res.status(200).json({
        tiles: result.tiles.map(toTileView),
        virtualCount: result.virtualCount,
        fullyCovered: result.fullyCovered,
        requestId,
      });
    } catch (error) {
      if (error instanceof CoverageQueryTooLargeError) {
        res.status(400).json({ error: error.message, requestId });
        return;
      }

      logger.error(
        { requestId, error: errorMessage(error), action: "coverage_error" },
        "Coverage query failed"
      );
      res.status(500).json({ error: "Coverage query failed", requestId });
    }
  };

  /**
   * @swagger
   * /tiles/metadata:
   *   post:
   *     tags: [Tiles]
   *     summary: Register tile metadata
   *     description: Stores a tile metadata record in the metadata directory and indexes it
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/TileMetadataRecord'
   *     responses:
   *       201:
   *         description: Tile registered
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/RegisterResponse'
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   *       409:
   *         description: Record written by another schema version, metadata must be regenerated
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ErrorResponse'
   */
  public registerTile = async (req: Request, res: Response): Promise<void> => {
    const requestId = req.requestId;

    try {
      const metadata = decodeTileMetadata(req.body, "request body");
      const { replaced } = await this.metadataIndex.save(metadata, requestId);

      res.status(201).json({
        message: replaced ? "Tile metadata replaced" : "Tile metadata registered",
        replaced,
        metadata: toTileView(metadata),
        requestId,
      });
    } catch (error) {
      if (error instanceof TileMetadataRecordError) {
        res.status(400).json({
          error: "Invalid tile metadata record",
          details: error.issues.join("; "),
          requestId,
        });
        return;
      }
      if (error instanceof MetadataRegenerationRequiredError) {
        res.status(409).json({ error: error.message, requestId });
        return;
      }

      logger.error(
        { requestId, error: errorMessage(error), action: "register_tile_error" },
        "Failed to register tile metadata"
      );
      res.status(500).json({ error: "Failed to register tile metadata", requestId });
    }
  };

  /**
   * @swagger
   * /tiles/reload:
   *   post:
   *     tags: [Tiles]
   *     summary: Reload the index
   *     description: Rebuilds the index from the metadata directory
   *     responses:
   *       200:
   *         description: Load summary
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/LoadSummary'
   *       500:
   *         $ref: '#/components/responses/InternalServerError'
   */
  public reloadIndex = async (req: Request, res: Response): Promise<void> => {
    const requestId = req.requestId;

    try {
      const summary = await this.metadataIndex.load(requestId);
      res.status(200).json({ ...summary, requestId });
    } catch (error) {
      logger.error(
        { requestId, error: errorMessage(error), action: "reload_index_error" },
        "Failed to reload metadata index"
      );
      res.status(500).json({ error: "Failed to reload metadata index", requestId });
    }
  };
}
