import * as fs from "fs";
import * as path from "path";
import ExcelJS from "exceljs";
import type { AuditEntry, MetricSeries, SupplierRecord } from "../types/Supplier";
import type { Logger } from "./logger";

const AUDIT_COLUMNS: { title: string; key: string; header: string }[] = [
  { title: "SEM", key: "sem", header: "SEM" },
  { title: "Quality Cert", key: "qualityCert", header: "Quality_Cert" },
  { title: "ISO 14001", key: "iso14001", header: "ISO_14001" },
  { title: "Logistic", key: "logistic", header: "Logistic_Audit" },
  { title: "REACH", key: "reach", header: "REACH" }
];

function auditCell(audits: AuditEntry[], title: string): string | undefined {
  const matching = audits.filter((a) => a.title === title);
  if (matching.length === 0) return undefined;
  return matching.map((a) => `${a.status} (${a.date})`).join(" | ");
}

function latest(series: MetricSeries): number | undefined {
  return series.actual ?? undefined;
}

export async function exportSuppliersToExcel(
  suppliers: SupplierRecord[],
  outputPath: string,
  logger: Logger
): Promise<void> {
  if (suppliers.length === 0) {
    logger.warn("No suppliers to export, skipping Excel generation.");
    return;
  }

  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet("Suppliers");

  worksheet.columns = [
    { header: "PARMA_ID", key: "parmaId", width: 12 },
    { header: "Name", key: "name", width: 36 },
    { header: "SMA_Index", key: "sma", width: 12 },
    { header: "SMA_Status", key: "smaStatus", width: 16 },
    { header: "SMA_Date", key: "smaDate", width: 12 },
    { header: "Software_Index", key: "swIndex", width: 14 },
    { header: "Software_Status", key: "swStatus", width: 16 },
    { header: "Software_Date", key: "swDate", width: 12 },
    { header: "EE_Index", key: "eeIndex", width: 12 },
    { header: "EE_Status", key: "eeStatus", width: 34 },
    { header: "EE_Date", key: "eeDate", width: 12 },
    { header: "CSR", key: "csr", width: 8 },
    { header: "CSR_Status", key: "csrStatus", width: 14 },
    { header: "CSR_Evaluated", key: "csrDate", width: 14 },
    ...AUDIT_COLUMNS.map((c) => ({ header: c.header, key: c.key, width: 30 })),
    { header: "QPM_Actual", key: "qpm", width: 12 },
    { header: "PPM_Actual", key: "ppm", width: 12 }
  ];

  for (const supplier of suppliers) {
    const { metrics } = supplier;
    const row: Record<string, string | number | undefined> = {
      parmaId: supplier.parmaId,
      name: supplier.name,
      sma: metrics.sma,
      smaStatus: metrics.smaStatus,
      smaDate: metrics.smaDate,
      swIndex: metrics.swIndex,
      swStatus: metrics.swStatus,
      swDate: metrics.swDate,
      eeIndex: metrics.eeIndex,
      eeStatus: metrics.eeStatus,
      eeDate: metrics.eeDate,
      csr: metrics.csr,
      csrStatus: metrics.csrStatus,
      csrDate: metrics.csrDate,
      qpm: latest(supplier.qpm),
      ppm: latest(supplier.ppm)
    };
    for (const column of AUDIT_COLUMNS) {
      row[column.key] = auditCell(supplier.audits, column.title);
    }
    worksheet.addRow(row);
  }

  const headerRow = worksheet.getRow(1);
  headerRow.font = { bold: true, color: { argb: "FFFFFFFF" } };
  headerRow.fill = {
    type: "pattern",
    pattern: "solid",
    fgColor: { argb: "FF1E3C72" }
  };
  headerRow.alignment = { vertical: "middle", horizontal: "center" };

  worksheet.views = [{ state: "frozen", ySplit: 1 }];
  worksheet.autoFilter = {
    from: { row: 1, column: 1 },
    to: { row: 1, column: worksheet.columnCount }
  };

  worksheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return;
    row.alignment = { wrapText: true, vertical: "top" };
  });

  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  await workbook.xlsx.writeFile(outputPath);
  logger.info(`Excel file written to ${outputPath}`);
}
