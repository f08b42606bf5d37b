import type { CheerioAPI } from "cheerio";
import type { MetricSeries } from "../types/Supplier";
import type { Logger } from "../utils/logger";
import { buildSyntheticSeries, emptySeries } from "../utils/syntheticSeries";
import { flattenText } from "./htmlText";

const MIN_CELLS = 15;
const PPM_ACTUAL_CELL = 3;
const QPM_ACTUAL_CELL = 7;

export interface PerformanceActuals {
  qpm: number;
  ppm: number;
}

/** `"12"` and `"3.5"` parse, anything else (`"-"`, `"1,2"`, empty) counts as 0 */
export function parseActual(value: string): number {
  if (!/^\d+(\.\d*)?$|^\.\d+$/.test(value)) return 0;
  const n = parseFloat(value);
  return Number.isNaN(n) ? 0 : n;
}

/**
 * Actual QPM/PPM of the supplier total row in `#tblSales2`. The table lists
 * one row per brand/consignee, the total is recognised by its label or by the
 * `ShowHeading` row id. When several rows qualify the last one wins.
 */
export function findPerformanceActuals(
  $: CheerioAPI,
  logger: Logger
): PerformanceActuals | null {
  let actuals: PerformanceActuals | null = null;

  for (const row of $("table#tblSales2 tr").toArray()) {
    try {
      const cells = $(row).find("td").toArray();
      if (cells.length < MIN_CELLS) continue;

      const brand = flattenText(cells[0]);
      if (!brand || brand.includes("Brand/Consignee")) continue;

      const rowId = $(row).attr("id") ?? "";
      if (!brand.includes("Supplier Total") && !rowId.includes("ShowHeading")) continue;

      actuals = {
        ppm: parseActual(flattenText(cells[PPM_ACTUAL_CELL])),
        qpm: parseActual(flattenText(cells[QPM_ACTUAL_CELL]))
      };
    } catch (err) {
      logger.warn(`Skipping performance row: ${String(err)}`);
    }
  }

  return actuals;
}

export function parsePerformanceSeries(
  $: CheerioAPI,
  logger: Logger
): { qpm: MetricSeries; ppm: MetricSeries } {
  const actuals = findPerformanceActuals($, logger);
  if (!actuals) {
    return { qpm: emptySeries(), ppm: emptySeries() };
  }
  logger.info(`QPM: ${actuals.qpm}, PPM: ${actuals.ppm}`);
  return buildSyntheticSeries(actuals.qpm, actuals.ppm);
}
