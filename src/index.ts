import "reflect-metadata";
import { AppDataSource } from "./config/data-source";
import { settings } from "./config/settings";
import { logger } from "./config/logger";
import { createApp } from "./app";

const app = createApp();

// DB Connection
AppDataSource.initialize()
  .then(() => {
    logger.info("✅ Connected to DB");
    app.listen(settings.PORT, () => {
      logger.info(`🚀 Server running on http://localhost:${settings.PORT}`);
    });
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "❌ DB connection failed");
    process.exitCode = 1;
  });
