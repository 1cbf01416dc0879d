/**
 * ResMed myAir integration (form-login session adapter over HTTP).
 *
 * Logs in with the account form and replays the session cookies on the
 * per-day sleep data calls. The sleep data endpoint is the only resource, so
 * a failed call fails the run.
 */

import { AuthFailure } from "../errors.js";
import { sourceLogger } from "../logger.js";
import { toFieldNumber } from "../services/sync/canonical/parsers.js";
import { createRow } from "../services/sync/canonical/rows.js";
import { eachDay } from "../services/sync/context.js";
import {
  MyAirSleepDataResponseSchema,
  MyAirSleepRecordSchema,
  type MyAirSleepRecord,
} from "../types/upstream.js";
import { keepValidRecords, readBodyPreview, readJson, sendRequest } from "./http.js";

import type {
  CanonicalRow,
  DateRange,
  Integration,
  RunContext,
  SheetLayout,
  SourceAdapter,
} from "../types/index.js";

const BASE_URL = "https://myair.resmed.com";
const LOGIN_URL = `${BASE_URL}/Default/Login`;
const SLEEP_DATA_URL = `${BASE_URL}/SleepData/GetSleepData`;
const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36";

export const MYAIR_LOOKBACK_DAYS = 2;

export const MYAIR_LAYOUT: SheetLayout = {
  worksheet: "resmed_cpap",
  columns: ["date", "ahi", "leak", "hours_used", "mask_seal", "events", "myair_score"],
};

// ============================================================================
// Types
// ============================================================================

export interface MyAirCredentials {
  email: string;
  password: string;
}

export interface MyAirSession {
  /** Cookie header value carrying the authenticated session */
  cookie: string;
}

export interface MyAirNight {
  date: string;
  record: MyAirSleepRecord;
}

// ============================================================================
// Cookies
// ============================================================================

/**
 * Merge Set-Cookie headers into a cookie jar keyed by cookie name
 */
export function collectCookies(jar: Map<string, string>, response: Response): void {
  for (const header of response.headers.getSetCookie()) {
    const pair = header.split(";", 1)[0] ?? "";
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      continue;
    }
    jar.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
  }
}

export function cookieHeader(jar: Map<string, string>): string {
  return [...jar].map(([name, value]) => `${name}=${value}`).join("; ");
}

// ============================================================================
// Adapter
// ============================================================================

export class MyAirAdapter implements SourceAdapter<MyAirNight, MyAirSession> {
  readonly kind = "session-login" as const;

  constructor(private credentials: MyAirCredentials) {}

  async authenticate(): Promise<MyAirSession> {
    const jar = new Map<string, string>();
    sourceLogger.info({ url: LOGIN_URL }, "Logging into myAir");

    const loginPage = await sendRequest(LOGIN_URL, {
      headers: { "User-Agent": USER_AGENT },
    });
    collectCookies(jar, loginPage);

    const response = await sendRequest(LOGIN_URL, {
      method: "POST",
      redirect: "manual",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        "User-Agent": USER_AGENT,
        Cookie: cookieHeader(jar),
      },
      body: new URLSearchParams({
        username: this.credentials.email,
        password: this.credentials.password,
        rememberMe: "false",
      }).toString(),
    });
    collectCookies(jar, response);

    const location = response.headers.get("location") ?? "";
    const redirectedToLogin = location.toLowerCase().includes("login");
    if (response.status >= 400 || redirectedToLogin) {
      const body = await readBodyPreview(response);
      sourceLogger.error({ status: response.status, location }, "myAir login rejected");
      throw new AuthFailure(
        `myAir login failed with status ${String(response.status)}`,
        response.status,
        body
      );
    }

    sourceLogger.info({ cookies: jar.size }, "myAir login succeeded");
    return { cookie: cookieHeader(jar) };
  }

  async fetch(session: MyAirSession, range: DateRange, ctx: RunContext): Promise<MyAirNight[]> {
    const nights: MyAirNight[] = [];

    for (const date of eachDay(range)) {
      const url = `${SLEEP_DATA_URL}?${new URLSearchParams({ date }).toString()}`;
      const response = await sendRequest(url, {
        headers: { Cookie: session.cookie, "User-Agent": USER_AGENT, Accept: "application/json" },
      });
      const items = await readJson(response, MyAirSleepDataResponseSchema, "myair sleep data");
      const [record] = keepValidRecords(items, MyAirSleepRecordSchema, "myair sleep record", ctx);

      if (record === undefined) {
        sourceLogger.info({ date }, "No myAir data for date");
        continue;
      }
      nights.push({ date, record });
    }

    sourceLogger.info({ nights: nights.length }, "Fetched myAir sleep data");
    return nights;
  }
}

// ============================================================================
// Normalizer
// ============================================================================

export function normalizeMyAirNight(night: MyAirNight, _ctx: RunContext): CanonicalRow {
  const { record } = night;
  return createRow(MYAIR_LAYOUT, {
    date: night.date,
    ahi: toFieldNumber(record.ahi),
    leak: toFieldNumber(record.maskPairCount),
    hours_used: toFieldNumber(record.usageHours),
    mask_seal: toFieldNumber(record.maskPairScore),
    events: toFieldNumber(record.totalEvents),
    myair_score: toFieldNumber(record.myAirScore),
  });
}

export function createMyAirIntegration(
  credentials: MyAirCredentials
): Integration<MyAirNight, MyAirSession> {
  return {
    source: "myair",
    layout: MYAIR_LAYOUT,
    adapter: new MyAirAdapter(credentials),
    normalize: normalizeMyAirNight,
    lookbackDays: MYAIR_LOOKBACK_DAYS,
  };
}
