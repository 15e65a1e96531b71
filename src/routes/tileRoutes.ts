import { Router } from "express";
import { TileController } from "../controllers/tileController";
import type { MetadataIndexService } from "../services/metadataIndexService";

export function createTileRouter(metadataIndex: MetadataIndexService): Router {
  const router = Router();
  const tileController = new TileController(metadataIndex);

  router.get("/tiles", tileController.listTiles);
  router.get("/tiles/coverage", tileController.getCoverage);
  router.get("/tiles/:filename/metadata", tileController.getTileMetadata);
  router.post("/tiles/metadata", tileController.registerTile);
  router.post("/tiles/reload", tileController.reloadIndex);

  return router;
}
