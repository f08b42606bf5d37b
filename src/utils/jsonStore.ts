import * as fs from "fs";
import * as path from "path";
import type { BatchMetadata } from "../types/Batch";
import { PLACEHOLDER, type SupplierIndexEntry, type SupplierRecord } from "../types/Supplier";
import type { Logger } from "./logger";

const ensureDir = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

async function writeJson(filePath: string, payload: unknown): Promise<void> {
  ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(
    filePath,
    JSON.stringify(payload, null, 2),
    "utf-8"
  );
}

/** An id read from page text must name a single file inside the output directory */
export function isUsableSupplierId(supplierId: string): boolean {
  return (
    supplierId !== "" &&
    supplierId !== PLACEHOLDER &&
    !/[\\/]/.test(supplierId) &&
    !supplierId.includes("..")
  );
}

export function supplierJsonPath(outputDir: string, supplierId: string): string {
  if (!isUsableSupplierId(supplierId)) {
    throw new Error(`Unusable supplier id "${supplierId}"`);
  }
  return path.join(outputDir, `supplier_${supplierId}.json`);
}

export async function writeSupplierJson(
  record: SupplierRecord,
  outputDir: string,
  logger: Logger
): Promise<string> {
  const filePath = supplierJsonPath(outputDir, record.id);
  await writeJson(filePath, record);
  logger.info(`Supplier JSON written to ${filePath}`);
  return filePath;
}

export async function writeSuppliersIndex(
  records: SupplierRecord[],
  outputDir: string,
  logger: Logger
): Promise<string> {
  const index: SupplierIndexEntry[] = records.map((r) => ({
    id: r.id,
    parmaId: r.parmaId,
    name: r.name
  }));
  const filePath = path.join(outputDir, "suppliers_index.json");
  await writeJson(filePath, index);
  logger.info(`Suppliers index written to ${filePath} (${index.length} entries)`);
  return filePath;
}

/** `20260131_142501` in local time, used to keep one metadata file per run */
export function batchStamp(at: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}_` +
    `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`
  );
}

export async function writeBatchMetadata(
  metadata: BatchMetadata,
  dataDir: string,
  at: Date,
  logger: Logger
): Promise<string> {
  const filePath = path.join(dataDir, `batch_metadata_${batchStamp(at)}.json`);
  await writeJson(filePath, metadata);
  logger.info(`Batch metadata saved to ${filePath}`);
  return filePath;
}

export async function saveSupplierHtml(
  supplierId: string,
  html: string,
  dataDir: string
): Promise<string> {
  ensureDir(dataDir);
  const filePath = path.join(dataDir, `${supplierId}.html`);
  await fs.promises.writeFile(filePath, html, "utf-8");
  return filePath;
}

/**
 * Reads a saved page, dropping bytes that are not valid UTF-8. Decoding turns
 * those bytes into U+FFFD, so a replacement character already present in the
 * page is dropped as well.
 */
export async function readHtmlBestEffort(filePath: string): Promise<string> {
  const raw = await fs.promises.readFile(filePath);
  return raw.toString("utf-8").replace(/\uFFFD/g, "");
}
