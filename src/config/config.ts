export interface ScraperConfig {
  baseUrl: string;
  /** Scorecard page, the supplier id is appended as the `SupplierId` query value */
  scorecardUrl: string;
  suppliersTomlPath: string;
  dataDir: string;
  extractorOutputDir: string;
  errorLogPath: string;
  headless: boolean;
  /** Opens a visible browser and waits for the operator to log in before the batch starts */
  useManualLogin: boolean;
  /** Chrome profile directory, keeps cookies between manual-login runs */
  userDataDir?: string;
  pageLoadTimeoutMs: number;
  elementWaitMs: number;
  settleDelayMs: number;
  requestDelayMs: number;
}

export const config: ScraperConfig = {
  baseUrl: "https://vsib.srv.volvo.com",
  scorecardUrl:
    "https://vsib.srv.volvo.com/vsib/Content/sus/SupplierScorecard.aspx?SupplierId=",
  suppliersTomlPath: "./conf/hr.toml",
  dataDir: "data",
  extractorOutputDir: "dashboard/suppliers",
  errorLogPath: "log.txt",
  headless: true,
  // switch on when the SSO session has expired
  useManualLogin: false,
  userDataDir: ".chrome-profile",
  pageLoadTimeoutMs: 60000,
  elementWaitMs: 10000,
  settleDelayMs: 5000,
  requestDelayMs: 2000
};
