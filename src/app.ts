import express, { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { swaggerSpec, swaggerUi, swaggerUiOptions } from "./config/swagger";
import { createTileRouter } from "./routes/tileRoutes";
import type { MetadataIndexService } from "./services/metadataIndexService";
import { createLogger } from "./utils/logger";

const logger = createLogger("http");

export function createApp(metadataIndex: MetadataIndexService): express.Express {
  const app = express();

  // Middleware to add request ID and structured logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = uuidv4();
    req.requestId = requestId;
    res.setHeader("X-Request-ID", requestId);

    logger.info(
      {
        requestId,
        method: req.method,
        url: req.url,
        userAgent: req.get("User-Agent"),
      },
      "Incoming request"
    );

    next();
  });

  app.use(express.json());

  // Swagger documentation endpoint
  app.use(
    "/api-docs",
    swaggerUi.serve,
    swaggerUi.setup(swaggerSpec, swaggerUiOptions)
  );

  // API documentation JSON endpoint
  app.get("/swagger.json", (req: Request, res: Response) => {
    res.setHeader("Content-Type", "application/json");
    res.send(swaggerSpec);
  });

  app.get("/health", (req: Request, res: Response) => {
    res.status(200).json({
      status: "healthy",
      indexedTiles: metadataIndex.size,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Root endpoint with API information
  app.get("/", (req: Request, res: Response) => {
    res.status(200).json({
      service: "DEM Tile Index API",
      version: "1.0.0",
      description:
        "Spatial index over elevation raster tiles, built from per-tile metadata records",
      endpoints: {
        documentation: "/api-docs",
        swagger_json: "/swagger.json",
        health: "/health",
        tiles: "/tiles",
        coverage: "/tiles/coverage",
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.use(createTileRouter(metadataIndex));

  // Body parser errors (malformed JSON, oversized bodies) and other errors raised before a controller runs
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = httpStatusOf(err);
    logger.error(
      { requestId: req.requestId, error: err.message, action: "request_error" },
      "Request failed"
    );
    res.status(status).json({ error: err.message, requestId: req.requestId });
  });

  return app;
}

function httpStatusOf(err: Error): number {
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return err instanceof SyntaxError ? 400 : 500;
}
