import "reflect-metadata";
import sampleData from "./data/sample-data.json";
import { AppDataSource } from "../config/data-source";
import { logger } from "../config/logger";
import { loadSampleData } from "../services/seed.service";

async function run(): Promise<void> {
  logger.info("🔁 Loading sample data...");

  try {
    await AppDataSource.initialize();
    const report = await AppDataSource.transaction((manager) => loadSampleData(manager, sampleData));
    logger.info(`✅ Sample data loaded (${report.created} created, ${report.existing} already present)`);
  } catch (err) {
    logger.error({ err }, "❌ Error loading sample data");
    process.exitCode = 1;
  } finally {
    if (AppDataSource.isInitialized) await AppDataSource.destroy();
  }
}

void run();
