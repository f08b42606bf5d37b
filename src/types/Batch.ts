export type ScorecardOutcome =
  | "success"
  | "incomplete"
  | "login-required"
  | "access-denied"
  | "not-found"
  | "error";

export interface BatchResult {
  supplierId: string;
  status: "success" | "failed";
  outcome: ScorecardOutcome;
  filename?: string;
  pageTitle?: string;
  contentLength?: number;
  keyElementsFound?: number;
  error?: string;
  timestamp: string;
}

export interface BatchMetadata {
  totalSuppliers: number;
  successful: number;
  failed: number;
  successRate: string;
  processingDate: string;
  results: BatchResult[];
}
