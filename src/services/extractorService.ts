import * as fs from "fs";
import * as path from "path";
import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import {
  PLACEHOLDER,
  type AuditEntry,
  type SupplierMetrics,
  type SupplierRecord
} from "../types/Supplier";
import type { Logger } from "../utils/logger";
import { exportSuppliersToExcel } from "../utils/excelExporter";
import {
  readHtmlBestEffort,
  writeSupplierJson,
  writeSuppliersIndex
} from "../utils/jsonStore";
import { parseCertificationAudits, parseSemAudit } from "./certificationRules";
import { flattenSelection } from "./htmlText";
import { parsePerformanceSeries } from "./performanceParser";
import { emptyQualityIndexMetrics, parseQualityAudits } from "./qualityAuditParser";

/** The dashboard renders audits in a fixed grid of six tiles */
export const AUDIT_SLOTS = 6;

const UNKNOWN_SUPPLIER = "Unknown Supplier";
const UNKNOWN_NAME = "Unknown";

export interface ParseOptions {
  now?: Date;
  logger: Logger;
}

export interface SupplierIdentity {
  id: string;
  name: string;
}

export function parseSupplierIdentity($: CheerioAPI): SupplierIdentity {
  const linkText =
    flattenSelection($('a[href*="SupplierInformation.aspx"]').first()) ??
    UNKNOWN_SUPPLIER;

  const comma = linkText.indexOf(",");
  if (comma === -1) {
    return { id: PLACEHOLDER, name: UNKNOWN_NAME };
  }
  return {
    id: linkText.slice(0, comma).trim(),
    name: linkText.slice(comma + 1).trim()
  };
}

export function logoFor(name: string): string {
  return name !== UNKNOWN_NAME ? name.slice(0, 2).toUpperCase() : "??";
}

export function padAudits(audits: AuditEntry[], slots: number = AUDIT_SLOTS): AuditEntry[] {
  const padded = [...audits];
  while (padded.length < slots) {
    padded.push({
      title: PLACEHOLDER,
      status: PLACEHOLDER,
      statusClass: "status-na",
      date: PLACEHOLDER
    });
  }
  return padded;
}

export function emptyMetrics(): SupplierMetrics {
  return {
    ...emptyQualityIndexMetrics(),
    csr: PLACEHOLDER,
    csrStatus: PLACEHOLDER,
    csrDate: PLACEHOLDER,
    saq: PLACEHOLDER,
    saqStatus: PLACEHOLDER,
    saqDate: PLACEHOLDER
  };
}

/**
 * Builds one supplier record from a saved scorecard page.
 *
 * Every section is looked up on its own; whatever is missing from the page
 * stays "N/A" and the rest of the record is still filled in.
 */
export function parseSupplierHtml(html: string, options: ParseOptions): SupplierRecord {
  const { logger } = options;
  const now = options.now ?? new Date();
  const $ = cheerio.load(html);

  const { id, name } = parseSupplierIdentity($);
  logger.info(`Supplier: ${name} (ID: ${id})`);

  const audits: AuditEntry[] = [];
  const sem = parseSemAudit($);
  if (sem) audits.push(sem);

  const certification = parseCertificationAudits($, now, logger);
  audits.push(...certification.audits);

  const metrics: SupplierMetrics = {
    ...emptyMetrics(),
    ...(certification.csr ?? {}),
    ...parseQualityAudits($)
  };

  const { qpm, ppm } = parsePerformanceSeries($, logger);

  return {
    id,
    parmaId: id,
    name,
    logo: logoFor(name),
    address: PLACEHOLDER,
    projectLink: "#",
    timeplanLink: "#",
    apqp: PLACEHOLDER,
    ppap: PLACEHOLDER,
    audits: padAudits(audits),
    metrics,
    qpm,
    ppm
  };
}

export interface ExtractionSummary {
  processed: number;
  failed: string[];
  records: SupplierRecord[];
}

export async function listHtmlFiles(inputDir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(inputDir);
  return entries.filter((name) => name.endsWith(".html")).sort();
}

export async function runExtraction(
  inputDir: string,
  outputDir: string,
  logger: Logger,
  now: Date = new Date()
): Promise<ExtractionSummary> {
  const htmlFiles = await listHtmlFiles(inputDir);
  if (htmlFiles.length === 0) {
    logger.warn(`No HTML files found in ${inputDir}`);
    return { processed: 0, failed: [], records: [] };
  }

  logger.info(`Found ${htmlFiles.length} HTML files in ${inputDir}`);
  await fs.promises.mkdir(outputDir, { recursive: true });

  const records: SupplierRecord[] = [];
  const failed: string[] = [];

  for (const fileName of htmlFiles) {
    const filePath = path.join(inputDir, fileName);
    logger.info(`Parsing: ${filePath}`);
    try {
      const html = await readHtmlBestEffort(filePath);
      const record = parseSupplierHtml(html, { now, logger });
      await writeSupplierJson(record, outputDir, logger);
      records.push(record);
    } catch (err) {
      failed.push(fileName);
      logger.error(`Error parsing ${fileName}: ${String(err)}`);
    }
  }

  if (records.length > 0) {
    await writeSuppliersIndex(records, outputDir, logger);
    await exportSuppliersToExcel(
      records,
      path.join(outputDir, "suppliers_scorecard.xlsx"),
      logger
    );
  }

  logger.info(
    `Extraction finished. Processed: ${records.length}, Failed: ${failed.length}, Output: ${outputDir}`
  );
  return { processed: records.length, failed, records };
}
