/**
 * Headless browser access for session-login sources.
 *
 * Adapters talk to `PageDriver`; `launchPage` backs it with puppeteer-core and
 * an installed Chromium.
 */

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";

import puppeteer, { TimeoutError, type Browser, type Page } from "puppeteer-core";

import { errorMessage } from "../errors.js";
import { sourceLogger } from "../logger.js";

const VIEWPORT = { width: 1920, height: 1080 };
const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36";

// ============================================================================
// Types
// ============================================================================

/** Text of each requested field in one row; undefined where the selector matched nothing */
export type RowText<TField extends string> = Partial<Record<TField, string>>;

export interface PageDriver {
  goto(url: string): Promise<void>;
  currentUrl(): string;
  /** Locate, clear and type into a field; false when the field never appeared */
  fill(selector: string, value: string, timeoutMs: number): Promise<boolean>;
  /** Click an element; false when it is not on the page */
  click(selector: string): Promise<boolean>;
  exists(selector: string): Promise<boolean>;
  /** Wait for at least one element; false on timeout */
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;
  readRows<TField extends string>(
    rowSelector: string,
    fieldSelectors: Record<TField, string>
  ): Promise<RowText<TField>[]>;
  screenshot(path: `${string}.png`): Promise<void>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface LaunchOptions {
  executablePath: string;
  navigationTimeoutMs?: number;
}

// ============================================================================
// Puppeteer Implementation
// ============================================================================

async function waitOrNull(page: Page, selector: string, timeoutMs: number) {
  try {
    return await page.waitForSelector(selector, { timeout: timeoutMs });
  } catch (error) {
    if (error instanceof TimeoutError) {
      return null;
    }
    throw error;
  }
}

export class PuppeteerPage implements PageDriver {
  constructor(
    private browser: Browser,
    private page: Page,
    private navigationTimeoutMs: number
  ) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, {
      waitUntil: "domcontentloaded",
      timeout: this.navigationTimeoutMs,
    });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async fill(selector: string, value: string, timeoutMs: number): Promise<boolean> {
    const field = await waitOrNull(this.page, selector, timeoutMs);
    if (field === null) {
      return false;
    }
    await field.evaluate((element) => {
      if (element instanceof HTMLInputElement) {
        element.value = "";
      }
    });
    await field.type(value);
    return true;
  }

  async click(selector: string): Promise<boolean> {
    const element = await this.page.$(selector);
    if (element === null) {
      return false;
    }
    await element.click();
    return true;
  }

  async exists(selector: string): Promise<boolean> {
    return (await this.page.$(selector)) !== null;
  }

  async waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    return (await waitOrNull(this.page, selector, timeoutMs)) !== null;
  }

  async readRows<TField extends string>(
    rowSelector: string,
    fieldSelectors: Record<TField, string>
  ): Promise<RowText<TField>[]> {
    const rows = await this.page.$$(rowSelector);
    const fields = Object.keys(fieldSelectors).filter(
      (field): field is TField => field in fieldSelectors
    );
    const result: RowText<TField>[] = [];

    for (const row of rows) {
      const text: RowText<TField> = {};
      for (const field of fields) {
        const cell = await row.$(fieldSelectors[field]);
        if (cell !== null) {
          text[field] = await cell.evaluate((element) => element.textContent ?? "");
        }
      }
      result.push(text);
    }

    return result;
  }

  async screenshot(path: `${string}.png`): Promise<void> {
    await this.page.screenshot({ path, fullPage: true });
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/**
 * Launch headless Chromium and open a blank page
 */
export async function launchPage(options: LaunchOptions): Promise<PageDriver> {
  sourceLogger.info({ executablePath: options.executablePath }, "Launching headless browser");

  const browser = await puppeteer.launch({
    executablePath: options.executablePath,
    headless: true,
    args: [
      "--no-sandbox",
      "--disable-setuid-sandbox",
      "--disable-dev-shm-usage",
      "--disable-gpu",
      `--window-size=${String(VIEWPORT.width)},${String(VIEWPORT.height)}`,
    ],
  });

  try {
    const page = await browser.newPage();
    await page.setViewport(VIEWPORT);
    await page.setUserAgent(USER_AGENT);
    return new PuppeteerPage(browser, page, options.navigationTimeoutMs ?? 30_000);
  } catch (error) {
    await browser.close();
    throw error;
  }
}

// ============================================================================
// Diagnostics
// ============================================================================

export interface DiagnosticSnapshot {
  screenshotPath?: string;
  markupPath?: string;
}

/**
 * Save a screenshot and the page markup for a failed login or extraction.
 *
 * Capture problems are logged and never mask the original failure.
 */
export async function captureDiagnostics(
  page: PageDriver,
  directory: string,
  label: string
): Promise<DiagnosticSnapshot> {
  const snapshot: DiagnosticSnapshot = {};
  const screenshotPath: `${string}.png` = `${join(directory, label)}.png`;
  const markupPath = join(directory, `${label}.html`);

  try {
    await page.screenshot(screenshotPath);
    snapshot.screenshotPath = screenshotPath;
  } catch (error) {
    sourceLogger.warn({ error: errorMessage(error), label }, "Could not save screenshot");
  }

  try {
    await writeFile(markupPath, await page.content(), "utf8");
    snapshot.markupPath = markupPath;
  } catch (error) {
    sourceLogger.warn({ error: errorMessage(error), label }, "Could not save page markup");
  }

  sourceLogger.info({ ...snapshot, label }, "Saved diagnostic snapshot");
  return snapshot;
}

/**
 * Fixed wait for client-side rendering to settle
 */
export async function settle(ms: number): Promise<void> {
  if (ms > 0) {
    await sleep(ms);
  }
}
