import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { MetadataIndexService } from "./services/metadataIndexService";
import { errorMessage } from "./utils/errors";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
  const config = loadConfig();

  const metadataIndex = new MetadataIndexService(config.metadataDir);
  await metadataIndex.load();

  const app = createApp(metadataIndex);
  app.listen(config.port, () => {
    logger.info(
      { port: config.port, metadataDir: config.metadataDir, logLevel: config.logLevel },
      "Server is running"
    );
  });
}

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, "Server failed to start");
  process.exit(1);
});
