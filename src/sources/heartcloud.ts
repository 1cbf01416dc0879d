/**
 * HeartCloud integration (browser-driven session-login adapter).
 *
 * The site has no API; the training history table is scraped after a form
 * login. Selector drift is the expected way this breaks, so neither a failed
 * login nor a missing table raises: both leave a diagnostic snapshot, record
 * a warning and yield no records. The table holds the whole history; only
 * sessions inside the run's range are returned.
 */

import { SelectorDrift } from "../errors.js";
import { sourceLogger } from "../logger.js";
import {
  parseDateText,
  parseDurationMinutes,
  parseFirstInteger,
  parseFirstNumber,
} from "../services/sync/canonical/parsers.js";
import { createRow } from "../services/sync/canonical/rows.js";
import { captureDiagnostics, settle, type PageDriver, type RowText } from "./browser.js";

import type {
  CanonicalRow,
  DateRange,
  Integration,
  RunContext,
  SheetLayout,
  SourceAdapter,
} from "../types/index.js";

const BASE_URL = "https://heartcloud.com";

export const HEARTCLOUD_LOOKBACK_DAYS = 0;

export const HEARTCLOUD_LAYOUT: SheetLayout = {
  worksheet: "daily_manual_entry",
  columns: ["date", "coherence", "session_minutes", "achievement"],
};

export type SessionField = "date" | "sessionLength" | "coherence" | "achievement";

export interface HeartCloudSelectors {
  emailField: string;
  passwordField: string;
  loginButton: string;
  sessionsContainer: string;
  sessionRow: string;
  fields: Record<SessionField, string>;
}

export const DEFAULT_SELECTORS: HeartCloudSelectors = {
  emailField: "#email",
  passwordField: "#password",
  loginButton: "button[type='submit']",
  // Training History is a plain table, one session per row
  sessionsContainer: "table",
  sessionRow: "tr",
  fields: {
    date: "td:nth-child(1)",
    sessionLength: "td:nth-child(2)",
    coherence: "td:nth-child(3)",
    achievement: "td:nth-child(4)",
  },
};

export const LANDING_URLS = [
  `${BASE_URL}/`,
  `${BASE_URL}/home`,
  `${BASE_URL}/dashboard`,
  `${BASE_URL}/sessions`,
  `${BASE_URL}/history`,
  `${BASE_URL}/review`,
];

const OPTIONAL_FIELDS: SessionField[] = ["coherence", "sessionLength", "achievement"];

// ============================================================================
// Types
// ============================================================================

export interface HeartCloudOptions {
  email: string;
  password: string;
  openPage: () => Promise<PageDriver>;
  diagnosticsDir: string;
  selectors?: HeartCloudSelectors;
  loginUrl?: string;
  landingUrls?: string[];
  /** Wait after opening the login page */
  formSettleMs?: number;
  /** Wait after submitting the form and after each landing navigation */
  pageSettleMs?: number;
  elementTimeoutMs?: number;
}

export interface HeartCloudSession {
  page: PageDriver;
  authenticated: boolean;
}

export type HeartCloudSessionRow = RowText<SessionField>;

// ============================================================================
// Adapter
// ============================================================================

export class HeartCloudAdapter implements SourceAdapter<HeartCloudSessionRow, HeartCloudSession> {
  readonly kind = "session-login" as const;

  private selectors: HeartCloudSelectors;

  constructor(private options: HeartCloudOptions) {
    this.selectors = options.selectors ?? DEFAULT_SELECTORS;
  }

  private async reportDrift(
    page: PageDriver,
    drift: SelectorDrift,
    label: string,
    ctx: RunContext
  ): Promise<void> {
    const snapshot = await captureDiagnostics(page, this.options.diagnosticsDir, label);
    ctx.warn(drift.message, { code: drift.code, selector: drift.selector, ...snapshot });
  }

  async authenticate(ctx: RunContext): Promise<HeartCloudSession> {
    const page = await this.options.openPage();
    try {
      return { page, authenticated: await this.login(page, ctx) };
    } catch (error) {
      if (error instanceof SelectorDrift) {
        await this.reportDrift(page, error, "heartcloud_login_form", ctx);
        return { page, authenticated: false };
      }
      await page.close();
      throw error;
    }
  }

  private async login(page: PageDriver, ctx: RunContext): Promise<boolean> {
    const loginUrl = this.options.loginUrl ?? `${BASE_URL}/login`;
    const timeout = this.options.elementTimeoutMs ?? 20_000;
    const { emailField, passwordField, loginButton } = this.selectors;

    sourceLogger.info({ url: loginUrl }, "Logging into HeartCloud");
    await page.goto(loginUrl);
    await settle(this.options.formSettleMs ?? 2000);

    if (!(await page.fill(emailField, this.options.email, timeout))) {
      throw new SelectorDrift(emailField, "Email field not found");
    }
    if (!(await page.fill(passwordField, this.options.password, timeout))) {
      throw new SelectorDrift(passwordField, "Password field not found");
    }
    if (!(await page.click(loginButton))) {
      throw new SelectorDrift(loginButton, "Login button not found");
    }

    await settle(this.options.pageSettleMs ?? 5000);

    const currentUrl = page.currentUrl();
    if (currentUrl.toLowerCase().includes("login")) {
      const snapshot = await captureDiagnostics(
        page,
        this.options.diagnosticsDir,
        "heartcloud_login_failed"
      );
      ctx.warn("Still on the login page after submitting; login probably failed", {
        url: currentUrl,
        ...snapshot,
      });
      return false;
    }

    sourceLogger.info({ url: currentUrl }, "Logged into HeartCloud");
    return true;
  }

  /**
   * Visit landing pages in order until one shows the sessions container
   */
  private async findSessionsPage(page: PageDriver): Promise<string | undefined> {
    for (const url of this.options.landingUrls ?? LANDING_URLS) {
      sourceLogger.debug({ url }, "Looking for sessions table");
      await page.goto(url);
      await settle(this.options.pageSettleMs ?? 3000);
      if (await page.exists(this.selectors.sessionsContainer)) {
        return url;
      }
    }
    return undefined;
  }

  async fetch(
    session: HeartCloudSession,
    range: DateRange,
    ctx: RunContext
  ): Promise<HeartCloudSessionRow[]> {
    if (!session.authenticated) {
      return [];
    }

    try {
      return await this.scrapeSessions(session.page, range, ctx);
    } catch (error) {
      if (!(error instanceof SelectorDrift)) {
        throw error;
      }
      await this.reportDrift(session.page, error, "heartcloud_sessions", ctx);
      return [];
    }
  }

  private async scrapeSessions(
    page: PageDriver,
    range: DateRange,
    ctx: RunContext
  ): Promise<HeartCloudSessionRow[]> {
    const { sessionsContainer, sessionRow, fields } = this.selectors;
    const landingUrl = await this.findSessionsPage(page);
    if (landingUrl === undefined) {
      throw new SelectorDrift(
        sessionsContainer,
        "Sessions container not found on any landing page"
      );
    }

    const rowSelector = `${sessionsContainer} ${sessionRow}`;
    if (!(await page.waitFor(rowSelector, this.options.elementTimeoutMs ?? 15_000))) {
      throw new SelectorDrift(rowSelector, "No session rows found");
    }

    const rows = await page.readRows(rowSelector, fields);
    const sessions: HeartCloudSessionRow[] = [];
    let outOfRange = 0;

    for (const [index, row] of rows.entries()) {
      const found = Object.values(row).filter((text) => text !== undefined);
      if (found.length === 0) {
        // Header rows carry <th> cells only
        continue;
      }
      const day = parseDateText(row.date, ctx.today);
      if (day < range.start || day > range.end) {
        outOfRange++;
        continue;
      }
      if (row.date === undefined) {
        ctx.warn("Session date not found; using today's date", {
          row: index,
          selector: fields.date,
        });
      }
      for (const field of OPTIONAL_FIELDS) {
        if (row[field] === undefined) {
          ctx.warn(`Session ${field} not found`, { row: index, selector: fields[field] });
        }
      }
      sessions.push(row);
    }

    sourceLogger.info(
      { url: landingUrl, sessions: sessions.length, outOfRange },
      "Scraped HeartCloud sessions"
    );

    // The table lists newest first; oldest first lets the newest session of a day win
    return sessions.reverse();
  }

  async release(session: HeartCloudSession): Promise<void> {
    await session.page.close();
    sourceLogger.info("Browser closed");
  }
}

// ============================================================================
// Normalizer
// ============================================================================

export function normalizeHeartCloudSession(
  row: HeartCloudSessionRow,
  ctx: RunContext
): CanonicalRow {
  const fields: CanonicalRow["fields"] = { date: parseDateText(row.date, ctx.today) };

  // A cell that was not found leaves its column as it is in the sheet
  if (row.coherence !== undefined) {
    fields.coherence = parseFirstNumber(row.coherence);
  }
  if (row.sessionLength !== undefined) {
    fields.session_minutes = parseDurationMinutes(row.sessionLength);
  }
  if (row.achievement !== undefined) {
    fields.achievement = parseFirstInteger(row.achievement);
  }

  return createRow(HEARTCLOUD_LAYOUT, fields);
}

export function createHeartCloudIntegration(
  options: HeartCloudOptions
): Integration<HeartCloudSessionRow, HeartCloudSession> {
  return {
    source: "heartcloud",
    layout: HEARTCLOUD_LAYOUT,
    adapter: new HeartCloudAdapter(options),
    normalize: normalizeHeartCloudSession,
    lookbackDays: HEARTCLOUD_LOOKBACK_DAYS,
  };
}
