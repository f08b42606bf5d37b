import type { CheerioAPI } from "cheerio";
import {
  PLACEHOLDER,
  type AuditEntry,
  type AuditStatusClass,
  type SupplierMetrics
} from "../types/Supplier";
import type { Logger } from "../utils/logger";
import { firstMatch, flattenSelection, ratingCellsForLabel } from "./htmlText";

export type CsrMetrics = Pick<SupplierMetrics, "csr" | "csrStatus" | "csrDate">;

export interface CellResult {
  entry: AuditEntry;
  csr?: CsrMetrics;
}

/**
 * One row of the scorecard's certification table: the `<strong>` label that
 * anchors it and how each rating cell in that row becomes an audit entry.
 * `classify` returns null for cells that do not belong to the rule.
 */
export interface CertificationRule {
  title: string;
  label: string;
  classify: (cellText: string, now: Date) => CellResult | null;
}

const PERCENT = /(\d+)%/;
const ISO_DATE = /(\d{4}-\d{2}-\d{2})/;
const EXPIRE_DATE = /Expire:\s*(\d{4}-\d{2}-\d{2})/;
const EVALUATED_DATE = /Evaluated:\s*(\d{4}-\d{2}-\d{2})/;
const LOGISTIC_GRADE = /([ABC])\s+(\d+)%/;
const BRACKETED_DATE = /\((\d{4}-\d{2}-\d{2})\)/;

function parseIsoDate(value: string): Date {
  const [year, month, day] = value.split("-").map((part) => parseInt(part, 10));
  return new Date(year, month - 1, day);
}

export function isExpired(expireDate: string, now: Date): boolean {
  return parseIsoDate(expireDate).getTime() < now.getTime();
}

/** Approval keyword of a certificate cell, overridden by a passed expiry date */
export function certificateStatus(
  cellText: string,
  now: Date
): { status: string; statusClass: AuditStatusClass; expires: string | null } {
  const expires = firstMatch(cellText, EXPIRE_DATE);
  if (expires && isExpired(expires, now)) {
    return { status: "Expired", statusClass: "status-expired", expires };
  }
  if (cellText.includes("Not approved") || cellText.includes("Not Approved")) {
    return { status: "Not Approved", statusClass: "status-not-approved", expires };
  }
  return { status: "Approved", statusClass: "status-approved", expires };
}

export function logisticStatusClass(grade: string): AuditStatusClass {
  if (grade === "A") return "status-excellent";
  if (grade === "B") return "status-approved";
  return "status-not-approved";
}

export function csrClassification(percentage: number): {
  status: string;
  statusClass: AuditStatusClass;
} {
  if (percentage >= 80) return { status: "Approved", statusClass: "status-approved" };
  if (percentage >= 60) return { status: "Pending", statusClass: "status-pending" };
  return { status: "Not Approved", statusClass: "status-not-approved" };
}

function certificateRule(
  title: string,
  label: string,
  accepts: (cellText: string) => boolean
): CertificationRule {
  return {
    title,
    label,
    classify: (cellText, now) => {
      if (!accepts(cellText)) return null;
      const { status, statusClass, expires } = certificateStatus(cellText, now);
      return {
        entry: { title, status, statusClass, date: `Exp: ${expires ?? PLACEHOLDER}` }
      };
    }
  };
}

export const CERTIFICATION_RULES: CertificationRule[] = [
  certificateRule(
    "Quality Cert",
    "Quality Certification:",
    (text) => text.includes("IATF") || text.includes("ISO")
  ),
  certificateRule(
    "ISO 14001",
    "Environmental Certification:",
    (text) => text.includes("ISO 14001")
  ),
  {
    title: "Logistic",
    label: "Logistic Audit:",
    classify: (cellText) => {
      const grade = cellText.match(LOGISTIC_GRADE);
      if (!grade) return null;
      return {
        entry: {
          title: "Logistic",
          status: `${grade[1]} ${grade[2]}%`,
          statusClass: logisticStatusClass(grade[1]),
          date: firstMatch(cellText, BRACKETED_DATE) ?? PLACEHOLDER
        }
      };
    }
  },
  {
    title: "REACH",
    label: "REACH EU Compliance:",
    classify: (cellText) => {
      if (!cellText.includes("Compliant")) return null;
      const evaluated = firstMatch(cellText, EVALUATED_DATE) ?? PLACEHOLDER;
      return {
        entry: {
          title: "REACH",
          status: "Compliant",
          statusClass: "status-approved",
          date: `Eval: ${evaluated}`
        }
      };
    }
  },
  {
    title: "CSR",
    label: "Sustainability Self-Assessment:",
    classify: (cellText) => {
      const percent = firstMatch(cellText, PERCENT);
      if (percent === null) return null;
      const percentage = parseInt(percent, 10);
      const { status, statusClass } = csrClassification(percentage);
      const evaluated = firstMatch(cellText, EVALUATED_DATE) ?? PLACEHOLDER;
      return {
        entry: {
          title: "CSR",
          status: `${percentage}%`,
          statusClass,
          date: `Eval: ${evaluated}`
        },
        csr: { csr: `${percentage}%`, csrStatus: status, csrDate: evaluated }
      };
    }
  }
];

/** SEM follow-up panel, the first audit shown on the scorecard */
export function parseSemAudit($: CheerioAPI): AuditEntry | null {
  const text = flattenSelection($("div#SEMPanelFollowup"));
  if (text === null) return null;

  let status: string;
  let statusClass: AuditStatusClass;
  if (text.includes("Not approved") || text.includes("Not Approved")) {
    status = "Not Approved";
    statusClass = "status-not-approved";
  } else if (text.includes("Approved")) {
    status = "Approved";
    statusClass = "status-approved";
  } else {
    status = "Unknown";
    statusClass = "status-na";
  }

  const percent = firstMatch(text, PERCENT);
  if (text.includes("StoppingParameter")) {
    status += " (Stopping)";
  }

  return {
    title: "SEM",
    status: `${status} ${percent ? `${percent}%` : PLACEHOLDER}`,
    statusClass,
    date: firstMatch(text, ISO_DATE) ?? PLACEHOLDER
  };
}

export function parseCertificationAudits(
  $: CheerioAPI,
  now: Date,
  logger: Logger,
  rules: CertificationRule[] = CERTIFICATION_RULES
): { audits: AuditEntry[]; csr: CsrMetrics | null } {
  const audits: AuditEntry[] = [];
  let csr: CsrMetrics | null = null;

  for (const rule of rules) {
    for (const cellText of ratingCellsForLabel($, rule.label)) {
      try {
        const result = rule.classify(cellText, now);
        if (!result) continue;
        audits.push(result.entry);
        if (result.csr) csr = result.csr;
      } catch (err) {
        logger.warn(`Skipping ${rule.title} cell "${cellText}": ${String(err)}`);
      }
    }
  }

  return { audits, csr };
}
