import * as readline from "readline";
import { chromium, type BrowserContext, type Page } from "playwright";
import type { ScraperConfig } from "../config/config";
import type { Logger } from "../utils/logger";

export interface BrowserSession {
  context: BrowserContext;
  page: Page;
  close(): Promise<void>;
}

const LAUNCH_ARGS = [
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--disable-blink-features=AutomationControlled"
];

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const VIEWPORT = { width: 1920, height: 1080 };

export async function waitForOperator(prompt: string): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });
  try {
    await new Promise<void>((resolve) => rl.question(prompt, () => resolve()));
  } finally {
    rl.close();
  }
}

/**
 * VSIB sits behind corporate SSO. In manual mode a visible browser with a
 * persistent profile is opened and the run waits until the operator has
 * logged in. Otherwise a fresh browser is launched, which only reaches
 * pages that need no interactive login.
 */
export async function createBrowserSession(
  cfg: ScraperConfig,
  logger: Logger
): Promise<BrowserSession> {
  if (cfg.useManualLogin) {
    logger.info("Launching visible browser for manual login...");
    const context = await chromium.launchPersistentContext(cfg.userDataDir ?? "", {
      headless: false,
      args: LAUNCH_ARGS,
      userAgent: USER_AGENT,
      viewport: VIEWPORT
    });
    const page = context.pages()[0] ?? (await context.newPage());

    logger.info(`Navigating to login page: ${cfg.baseUrl}`);
    await page.goto(cfg.baseUrl, { waitUntil: "domcontentloaded" });
    await waitForOperator("Press Enter after you have logged in successfully...");

    const cookies = await context.cookies();
    logger.info(`Session holds ${cookies.length} cookies`);

    return { context, page, close: () => context.close() };
  }

  logger.info("Launching browser...");
  const browser = await chromium.launch({
    headless: cfg.headless,
    args: LAUNCH_ARGS
  });
  const context = await browser.newContext({
    userAgent: USER_AGENT,
    viewport: VIEWPORT
  });
  const page = await context.newPage();

  return { context, page, close: () => browser.close() };
}
