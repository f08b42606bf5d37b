export const PLACEHOLDER = "N/A";

export type AuditStatusClass =
  | "status-approved"
  | "status-not-approved"
  | "status-expired"
  | "status-excellent"
  | "status-pending"
  | "status-na";

export interface AuditEntry {
  title: string;
  status: string;
  statusClass: AuditStatusClass;
  /** Single date or a prefixed one such as `Exp: 2026-01-31` / `Eval: 2025-03-02`. */
  date: string;
}

export interface SupplierMetrics {
  swIndex: string;
  swStatus: string;
  swDate: string;
  /**
   * Legacy key kept for compatibility with existing dashboards, which receive it
   * alongside `swDate`. It is never populated.
   */
  "sw Date": string;
  eeIndex: string;
  eeStatus: string;
  eeDate: string;
  sma: string;
  smaStatus: string;
  smaDate: string;
  csr: string;
  csrStatus: string;
  csrDate: string;
  saq: string;
  saqStatus: string;
  saqDate: string;
}

/**
 * Monthly series shown on the dashboard charts.
 *
 * When `synthetic` is true the values are NOT measurements: they are jittered
 * around `actual` (the only number the scorecard page gives us) and only the
 * last month equals the real figure.
 */
export interface MetricSeries {
  months: string[];
  values: number[];
  actual: number | null;
  synthetic: boolean;
}

export interface SupplierRecord {
  id: string;
  parmaId: string;
  name: string;
  logo: string;
  address: string;
  projectLink: string;
  timeplanLink: string;
  apqp: string;
  ppap: string;
  audits: AuditEntry[];
  metrics: SupplierMetrics;
  qpm: MetricSeries;
  ppm: MetricSeries;
}

export interface SupplierIndexEntry {
  id: string;
  parmaId: string;
  name: string;
}
