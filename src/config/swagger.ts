import swaggerJsdoc from "swagger-jsdoc";
import swaggerUi from "swagger-ui-express";

const errorResponse = (description: string) => ({
  description,
  content: {
    "application/json": {
      schema: {
        $ref: "#/components/schemas/ErrorResponse",
      },
    },
  },
});

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: "3.0.0",
    info: {
      title: "DEM Tile Index API",
      version: "1.0.0",
      description:
        "Spatial index over elevation raster tiles, built from per-tile metadata records",
      license: {
        name: "ISC",
        url: "https://opensource.org/licenses/ISC",
      },
    },
    servers: [
      {
        url: "http://localhost:5045",
        description: "Development server",
      },
    ],
    components: {
      schemas: {
        FileFormat: {
          type: "object",
          required: ["name", "type", "extension", "registration"],
          properties: {
            name: { type: "string", example: "SRTM HGT" },
            type: {
              type: "string",
              enum: ["GeoTiff", "SRTM_HGT", "GTX", "ASCIIGrid", "netCDF"],
            },
            extension: { type: "string", example: ".hgt" },
            registration: { type: "string", enum: ["Cell", "Grid"] },
          },
        },
        BoundingBox: {
          type: "object",
          properties: {
            xMin: { type: "number", example: 5 },
            xMax: { type: "number", example: 6 },
            yMin: { type: "number", example: 45 },
            yMax: { type: "number", example: 46 },
          },
        },
        TileMetadataRecord: {
          type: "object",
          description:
            "Persisted form of a tile. Keys are written in stable tag order.",
          required: ["version", "filename", "fileFormat"],
          properties: {
            version: { type: "string", example: "2.2" },
            filename: { type: "string", example: "srtm/N45E005.hgt" },
            height: { type: "integer", example: 3601 },
            width: { type: "integer", example: 3601 },
            pixelScaleX: { type: "number" },
            pixelScaleY: { type: "number" },
            dataStartLat: { type: "number", example: 45 },
            dataStartLon: { type: "number", example: 5 },
            dataEndLat: { type: "number", example: 46 },
            dataEndLon: { type: "number", example: 6 },
            bitsPerSample: { type: "integer", example: 16 },
            worldUnits: { type: "string", example: "meter" },
            sampleFormat: { type: "string", example: "INTEGER" },
            noDataValue: { type: "string", example: "-32768" },
            scanlineSize: { type: "integer" },
            physicalStartLon: { type: "number" },
            physicalStartLat: { type: "number" },
            physicalEndLon: { type: "number" },
            physicalEndLat: { type: "number" },
            pixelSizeX: { type: "number" },
            pixelSizeY: { type: "number" },
            fileFormat: { $ref: "#/components/schemas/FileFormat" },
            minimumAltitude: { type: "number" },
            maximumAltitude: { type: "number" },
          },
        },
        Tile: {
          allOf: [
            { $ref: "#/components/schemas/TileMetadataRecord" },
            {
              type: "object",
              properties: {
                virtual: {
                  type: "boolean",
                  description: "Synthetic tile covering a gap, no backing file",
                },
                boundingBox: { $ref: "#/components/schemas/BoundingBox" },
              },
            },
          ],
        },
        TileListResponse: {
          type: "object",
          properties: {
            count: { type: "integer" },
            tiles: {
              type: "array",
              items: { $ref: "#/components/schemas/Tile" },
            },
            requestId: { type: "string" },
          },
        },
        CoverageResponse: {
          type: "object",
          properties: {
            tiles: {
              type: "array",
              items: { $ref: "#/components/schemas/Tile" },
            },
            virtualCount: { type: "integer" },
            fullyCovered: { type: "boolean" },
            requestId: { type: "string" },
          },
        },
        RegisterResponse: {
          type: "object",
          properties: {
            message: { type: "string", example: "Tile metadata registered" },
            replaced: { type: "boolean" },
            metadata: { $ref: "#/components/schemas/Tile" },
            requestId: { type: "string" },
          },
        },
        LoadSummary: {
          type: "object",
          properties: {
            loaded: { type: "integer" },
            skipped: { type: "integer" },
            regenerationRequired: { type: "integer" },
            collisions: { type: "integer" },
            durationMs: { type: "integer" },
            requestId: { type: "string" },
          },
        },
        ErrorResponse: {
          type: "object",
          properties: {
            error: {
              type: "string",
              description: "Error message",
              example: "Tile not found: N45E005.hgt",
            },
            details: {
              type: "string",
              description: "Additional error details",
            },
            requestId: {
              type: "string",
              description: "Unique request identifier",
            },
          },
          required: ["error"],
        },
      },
      parameters: {
        Filename: {
          name: "filename",
          in: "path",
          required: true,
          schema: {
            type: "string",
          },
          description: "Tile file name; only the base name is compared",
          example: "N45E005.hgt",
        },
      },
      responses: {
        BadRequest: errorResponse("Bad request - invalid input"),
        NotFound: errorResponse("Resource not found"),
        InternalServerError: errorResponse("Internal server error"),
      },
    },
    tags: [
      {
        name: "Tiles",
        description: "Tile metadata index and coverage queries",
      },
    ],
  },
  apis: ["./src/controllers/*.ts", "./src/routes/*.ts"],
};

export const swaggerSpec = swaggerJsdoc(options);
export const swaggerUiOptions = {
  explorer: true,
  swaggerOptions: {
    displayRequestDuration: true,
  },
};

export { swaggerUi };
