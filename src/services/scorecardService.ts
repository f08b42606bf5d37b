import * as path from "path";
import type { Page } from "playwright";
import type { ScraperConfig } from "../config/config";
import type { ScorecardOutcome } from "../types/Batch";
import { batchStamp } from "../utils/jsonStore";
import type { Logger } from "../utils/logger";

export interface LoadedScorecard {
  html: string;
  title: string;
  currentUrl: string;
  /** false when the page never reached the `load` state in time */
  ready: boolean;
}

/** What the collector needs from a browser tab */
export interface ScorecardBrowser {
  load(url: string): Promise<LoadedScorecard>;
  screenshot(filePath: string): Promise<void>;
  wait(ms: number): Promise<void>;
}

export type ScorecardFetchResult =
  | {
      ok: true;
      supplierId: string;
      outcome: "success" | "incomplete";
      page: LoadedScorecard;
      keyElementsFound: number;
      timestamp: string;
    }
  | {
      ok: false;
      supplierId: string;
      outcome: Exclude<ScorecardOutcome, "success" | "incomplete">;
      error: string;
      timestamp: string;
    };

const LOGIN_MARKERS = ["login", "sign in", "authenticate", "logon"];
const ACCESS_DENIED_MARKERS = [
  "access denied",
  "permission denied",
  "not authorized",
  "forbidden"
];
const NOT_FOUND_MARKERS = ["supplier not found", "no supplier"];
export const KEY_SCORECARD_ELEMENTS = [
  "supplier spend",
  "dependency",
  "ppm",
  "qpm",
  "dispatch precision"
];

export function scorecardUrl(cfg: ScraperConfig, supplierId: string): string {
  return `${cfg.scorecardUrl}${encodeURIComponent(supplierId)}`;
}

export function countKeyElements(html: string): number {
  const lower = html.toLowerCase();
  return KEY_SCORECARD_ELEMENTS.filter((marker) => lower.includes(marker)).length;
}

/**
 * Decides what came back for a scorecard request from marker text alone.
 * Error pages share words with each other, so the checks run in a fixed
 * order: login, access denied, not found, then the scorecard itself.
 */
export function classifyScorecardPage(page: Pick<LoadedScorecard, "html" | "title">): ScorecardOutcome {
  const body = page.html.toLowerCase();
  const title = page.title.toLowerCase();

  if (LOGIN_MARKERS.some((m) => title.includes(m) || body.includes(m))) {
    return "login-required";
  }
  if (ACCESS_DENIED_MARKERS.some((m) => body.includes(m))) {
    return "access-denied";
  }
  if (NOT_FOUND_MARKERS.some((m) => body.includes(m))) {
    return "not-found";
  }
  if (body.includes("supplier scorecard") && body.includes("__viewstate")) {
    return "success";
  }
  return "incomplete";
}

function failureMessage(outcome: ScorecardOutcome, supplierId: string): string {
  switch (outcome) {
    case "login-required":
      return `Login page detected for supplier ${supplierId} - authentication required`;
    case "access-denied":
      return `Access denied for supplier ${supplierId}`;
    case "not-found":
      return `Supplier ${supplierId} not found`;
    default:
      return `Unexpected outcome ${outcome} for supplier ${supplierId}`;
  }
}

async function waitForPageReady(
  page: Page,
  cfg: ScraperConfig,
  logger: Logger
): Promise<boolean> {
  try {
    await page.waitForLoadState("load", { timeout: cfg.pageLoadTimeoutMs });
  } catch (err) {
    logger.warn(`Timeout waiting for page load: ${String(err)}`);
    return false;
  }

  try {
    await page.waitForSelector("#frmSearch", {
      state: "attached",
      timeout: cfg.elementWaitMs
    });
    logger.info("Form element detected");
  } catch {
    logger.warn("Form element not found - might be login page");
  }

  // the scorecard fills its panels through postbacks after load
  await page.waitForTimeout(cfg.settleDelayMs);

  if (await page.$("#__VIEWSTATE")) {
    logger.info("ViewState detected - page fully loaded");
  } else {
    logger.warn("ViewState not found");
  }
  return true;
}

export function createPlaywrightScorecardBrowser(
  page: Page,
  cfg: ScraperConfig,
  logger: Logger
): ScorecardBrowser {
  return {
    load: async (url) => {
      await page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: cfg.pageLoadTimeoutMs
      });
      const ready = await waitForPageReady(page, cfg, logger);
      return {
        html: await page.content(),
        title: await page.title(),
        currentUrl: page.url(),
        ready
      };
    },
    screenshot: async (filePath) => {
      await page.screenshot({ path: filePath, fullPage: true });
    },
    wait: (ms) => page.waitForTimeout(ms)
  };
}

export async function fetchScorecard(
  browser: ScorecardBrowser,
  supplierId: string,
  cfg: ScraperConfig,
  logger: Logger
): Promise<ScorecardFetchResult> {
  const url = scorecardUrl(cfg, supplierId);
  logger.info(`Navigating to: ${url}`);

  try {
    const loaded = await browser.load(url);
    if (!loaded.ready) {
      logger.warn("Page load timeout, continuing with what was rendered");
    }
    logger.info(
      `Page Title: ${loaded.title}, URL: ${loaded.currentUrl}, Content Length: ${loaded.html.length}`
    );

    const outcome = classifyScorecardPage(loaded);
    const timestamp = new Date().toISOString();

    if (outcome === "success" || outcome === "incomplete") {
      if (outcome === "incomplete") {
        logger.warn("Page content may be incomplete");
      }
      const keyElementsFound = countKeyElements(loaded.html);
      logger.info(
        `Found ${keyElementsFound}/${KEY_SCORECARD_ELEMENTS.length} key scorecard elements`
      );
      return { ok: true, supplierId, outcome, page: loaded, keyElementsFound, timestamp };
    }

    const error = failureMessage(outcome, supplierId);
    logger.warn(error);
    return { ok: false, supplierId, outcome, error, timestamp };
  } catch (err) {
    const error = `Error scraping supplier ${supplierId}: ${String(err)}`;
    logger.warn(error);

    const screenshotPath = path.join(
      cfg.dataDir,
      `error_screenshot_${supplierId}_${batchStamp(new Date())}.png`
    );
    try {
      await browser.screenshot(screenshotPath);
      logger.info(`Screenshot saved as ${screenshotPath}`);
    } catch (screenshotErr) {
      logger.warn(`Could not save screenshot: ${String(screenshotErr)}`);
    }

    return {
      ok: false,
      supplierId,
      outcome: "error",
      error,
      timestamp: new Date().toISOString()
    };
  }
}
