import "reflect-metadata";
import { AppDataSource } from "../config/data-source";
import { logger } from "../config/logger";
import { populateLanguages } from "../services/seed.service";

async function run(): Promise<void> {
  logger.info("🔁 Populating languages...");

  try {
    await AppDataSource.initialize();
    const report = await AppDataSource.transaction((manager) => populateLanguages(manager));
    logger.info(`✅ Languages ready (${report.created} created, ${report.existing} already present)`);
  } catch (err) {
    logger.error({ err }, "❌ Error populating languages");
    process.exitCode = 1;
  } finally {
    if (AppDataSource.isInitialized) await AppDataSource.destroy();
  }
}

void run();
