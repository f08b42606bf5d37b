import { config } from "../config/config";
import { createLogger } from "../utils/logger";
import { loadSupplierIdsFromToml } from "../utils/supplierList";
import { createBrowserSession } from "../services/authService";
import { runCollectorBatch } from "../services/collectorService";
import { createPlaywrightScorecardBrowser } from "../services/scorecardService";

const logger = createLogger({ errorLogPath: config.errorLogPath });

async function main(): Promise<void> {
  logger.info("Starting VSIB supplier scorecard scraper...");

  const supplierIds = await loadSupplierIdsFromToml(config.suppliersTomlPath, logger);

  const session = await createBrowserSession(config, logger);

  try {
    const browser = createPlaywrightScorecardBrowser(session.page, config, logger);
    const metadata = await runCollectorBatch(browser, supplierIds, config, logger);

    logger.info(
      `Scraping finished. Success: ${metadata.successful}, Failed: ${metadata.failed}`
    );
    logger.info(`Error log: ${config.errorLogPath}`);
  } finally {
    logger.info("Closing browser...");
    await session.close();
  }
}

main().catch((err) => {
  logger.error(`Fatal error in scraper: ${String(err)}`);
  process.exit(1);
});
