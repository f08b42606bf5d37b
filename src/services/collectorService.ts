import type { ScraperConfig } from "../config/config";
import type { BatchMetadata, BatchResult } from "../types/Batch";
import { saveSupplierHtml, writeBatchMetadata } from "../utils/jsonStore";
import type { Logger } from "../utils/logger";
import { fetchScorecard, type ScorecardBrowser } from "./scorecardService";

export function successRate(successful: number, total: number): string {
  if (total === 0) return "0%";
  return `${((successful / total) * 100).toFixed(1)}%`;
}

/**
 * Fetches every supplier's scorecard one after another and saves the page
 * HTML into the data directory. A failed supplier is recorded and the batch
 * moves on; nothing is retried.
 */
export async function runCollectorBatch(
  browser: ScorecardBrowser,
  supplierIds: string[],
  cfg: ScraperConfig,
  logger: Logger
): Promise<BatchMetadata> {
  logger.info(
    `Processing ${supplierIds.length} supplier IDs, saving files to ${cfg.dataDir}/`
  );

  const results: BatchResult[] = [];
  let successful = 0;
  let failed = 0;

  for (const [i, supplierId] of supplierIds.entries()) {
    logger.info(`[${i + 1}/${supplierIds.length}] Processing Supplier ID: ${supplierId}`);

    const fetched = await fetchScorecard(browser, supplierId, cfg, logger);

    if (fetched.ok) {
      try {
        const filename = await saveSupplierHtml(supplierId, fetched.page.html, cfg.dataDir);
        successful += 1;
        results.push({
          supplierId,
          status: "success",
          outcome: fetched.outcome,
          filename,
          pageTitle: fetched.page.title,
          contentLength: fetched.page.html.length,
          keyElementsFound: fetched.keyElementsFound,
          timestamp: fetched.timestamp
        });
        logger.info(`Successfully processed supplier ${supplierId}, HTML saved to ${filename}`);
      } catch (err) {
        failed += 1;
        const error = `Failed to save file for supplier ${supplierId}: ${String(err)}`;
        logger.error(error);
        results.push({
          supplierId,
          status: "failed",
          outcome: fetched.outcome,
          error,
          timestamp: new Date().toISOString()
        });
      }
    } else {
      failed += 1;
      logger.error(fetched.error);
      results.push({
        supplierId,
        status: "failed",
        outcome: fetched.outcome,
        error: fetched.error,
        timestamp: fetched.timestamp
      });
    }

    if (i < supplierIds.length - 1 && cfg.requestDelayMs > 0) {
      await browser.wait(cfg.requestDelayMs);
    }
  }

  const finishedAt = new Date();
  const metadata: BatchMetadata = {
    totalSuppliers: supplierIds.length,
    successful,
    failed,
    successRate: successRate(successful, supplierIds.length),
    processingDate: finishedAt.toISOString(),
    results
  };

  try {
    await writeBatchMetadata(metadata, cfg.dataDir, finishedAt, logger);
  } catch (err) {
    logger.error(`Error saving batch metadata: ${String(err)}`);
  }

  logger.info(
    `Batch finished. Successful: ${successful}, Failed: ${failed}, Success Rate: ${metadata.successRate}`
  );
  return metadata;
}
