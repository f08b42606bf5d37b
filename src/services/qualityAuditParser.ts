import type { CheerioAPI } from "cheerio";
import { PLACEHOLDER, type SupplierMetrics } from "../types/Supplier";
import { firstMatch, flattenSelection } from "./htmlText";

export type QualityIndexMetrics = Pick<
  SupplierMetrics,
  | "swIndex" | "swStatus" | "swDate" | "sw Date"
  | "eeIndex" | "eeStatus" | "eeDate"
  | "sma" | "smaStatus" | "smaDate"
>;

interface QualityIndexRule {
  valueKey: "sma" | "swIndex" | "eeIndex";
  statusKey: "smaStatus" | "swStatus" | "eeStatus";
  dateKey: "smaDate" | "swDate" | "eeDate";
  /** Captures the segment that belongs to this index */
  segment: RegExp;
  status: (segment: string) => string | null;
}

const PERCENT = /(\d+)%/;
const ISO_DATE = /(\d{4}-\d{2}-\d{2})/;

// "Approved" is looked for first, so "Not Approved" reads as approved while
// "Not approved" (lower-case a) does not. Existing reports rely on this.
function approvalStatus(segment: string): string | null {
  if (segment.includes("Approved")) return "Approved";
  if (segment.includes("Not approved") || segment.includes("Not Approved")) {
    return "Not Approved";
  }
  return null;
}

function eeStatus(segment: string): string | null {
  const status = segment.includes("Approved with conditions")
    ? "Approved with conditions"
    : approvalStatus(segment);
  if (segment.includes("Restriction")) {
    return `${status ?? PLACEHOLDER} (Restriction)`;
  }
  return status;
}

// The three indices are printed one after another without any element
// between them, so each segment ends where the next label starts.
export const QUALITY_INDEX_RULES: QualityIndexRule[] = [
  {
    valueKey: "sma",
    statusKey: "smaStatus",
    dateKey: "smaDate",
    segment: /SMA\s*\/\s*Criticality\s+1\s+Index([\s\S]+?)(?:Software Index|EE Index|$)/i,
    status: approvalStatus
  },
  {
    valueKey: "swIndex",
    statusKey: "swStatus",
    dateKey: "swDate",
    segment: /Software\s+Index([\s\S]+?)(?:EE Index|$)/i,
    status: approvalStatus
  },
  {
    valueKey: "eeIndex",
    statusKey: "eeStatus",
    dateKey: "eeDate",
    segment: /EE\s+Index([\s\S]+?)$/i,
    status: eeStatus
  }
];

export function emptyQualityIndexMetrics(): QualityIndexMetrics {
  return {
    swIndex: PLACEHOLDER,
    swStatus: PLACEHOLDER,
    swDate: PLACEHOLDER,
    "sw Date": PLACEHOLDER,
    eeIndex: PLACEHOLDER,
    eeStatus: PLACEHOLDER,
    eeDate: PLACEHOLDER,
    sma: PLACEHOLDER,
    smaStatus: PLACEHOLDER,
    smaDate: PLACEHOLDER
  };
}

/** Reads the flattened `#IndexAuditPanel` text, one segment per rule */
export function parseQualityIndexText(text: string): QualityIndexMetrics {
  const metrics = emptyQualityIndexMetrics();

  for (const rule of QUALITY_INDEX_RULES) {
    const segment = firstMatch(text, rule.segment);
    if (segment === null) continue;

    const percent = firstMatch(segment, PERCENT);
    if (percent) metrics[rule.valueKey] = `${percent}%`;

    const status = rule.status(segment);
    if (status) metrics[rule.statusKey] = status;

    const date = firstMatch(segment, ISO_DATE);
    if (date) metrics[rule.dateKey] = date;
  }

  return metrics;
}

export function parseQualityAudits($: CheerioAPI): QualityIndexMetrics {
  const text = flattenSelection($("div#IndexAuditPanel"));
  if (text === null) return emptyQualityIndexMetrics();
  return parseQualityIndexText(text);
}
