/**
 * Strava integration (OAuth refresh-token adapter).
 *
 * A fresh access token is exchanged on every run. Activities come from one
 * page of the athlete activity list; heart-rate zones need one extra call
 * per activity.
 */

import { AuthFailure, FetchFailure, errorMessage } from "../errors.js";
import { sourceLogger } from "../logger.js";
import {
  addDays,
  parseDateText,
  roundTo,
  secondsToMinutes,
  toFieldNumber,
} from "../services/sync/canonical/parsers.js";
import { createRow } from "../services/sync/canonical/rows.js";
import {
  StravaActivityListSchema,
  StravaActivitySchema,
  StravaTokenResponseSchema,
  StravaZonesResponseSchema,
  type StravaActivity,
  type StravaActivityZone,
} from "../types/upstream.js";
import {
  bearerHeaders,
  keepValidRecords,
  readBodyPreview,
  readJson,
  sendRequest,
} from "./http.js";

import type {
  CanonicalRow,
  DateRange,
  DetailEnricher,
  Integration,
  RunContext,
  SheetLayout,
  SourceAdapter,
} from "../types/index.js";

const TOKEN_URL = "https://www.strava.com/oauth/token";
const API_URL = "https://www.strava.com/api/v3";
const PAGE_SIZE = 30;
const ZONE_COUNT = 5;
const START_PATTERN = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})/;

export const STRAVA_LOOKBACK_DAYS = 7;

export const STRAVA_LAYOUT: SheetLayout = {
  worksheet: "strava_workouts",
  columns: [
    "date",
    "time",
    "workout_type",
    "name",
    "duration_min",
    "distance_km",
    "avg_hr",
    "max_hr",
    "calories",
    "avg_power",
    "max_power",
    "zone_1_min",
    "zone_2_min",
    "zone_3_min",
    "zone_4_min",
    "zone_5_min",
  ],
  keyColumns: ["date", "time"],
};

// ============================================================================
// Types
// ============================================================================

export interface StravaCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface StravaSession {
  accessToken: string;
}

export interface StravaWorkout {
  activity: StravaActivity;
  /**
   * Minutes per heart-rate zone (1-5); `null` for a zone Strava did not report.
   * Undefined until the zones call succeeds.
   */
  zoneMinutes?: (number | null)[];
}

// ============================================================================
// Authentication
// ============================================================================

/**
 * Exchange the long-lived refresh token for a short-lived access token
 */
export async function exchangeRefreshToken(
  credentials: StravaCredentials
): Promise<StravaSession> {
  sourceLogger.info({ url: TOKEN_URL }, "Requesting new Strava access token");

  const response = await sendRequest(TOKEN_URL, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body: new URLSearchParams({
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      refresh_token: credentials.refreshToken,
      grant_type: "refresh_token",
    }).toString(),
  });

  if (!response.ok) {
    const body = await readBodyPreview(response);
    sourceLogger.error(
      { status: response.status, body },
      "Strava token exchange rejected"
    );
    throw new AuthFailure(
      `Strava token exchange failed with status ${String(response.status)}: ${body}`,
      response.status,
      body
    );
  }

  try {
    const token = await readJson(response, StravaTokenResponseSchema, "strava token");
    sourceLogger.info("Obtained Strava access token");
    return { accessToken: token.access_token };
  } catch (error) {
    throw new AuthFailure(
      `Strava token response unusable: ${errorMessage(error)}`,
      response.status
    );
  }
}

// ============================================================================
// Adapter
// ============================================================================

function toUnixSeconds(isoDate: string): number {
  // Local midnight, matching how the athlete sees their calendar
  return Math.floor(new Date(`${isoDate}T00:00:00`).getTime() / 1000);
}

export class StravaAdapter implements SourceAdapter<StravaWorkout, StravaSession> {
  readonly kind = "oauth-refresh" as const;

  constructor(private credentials: StravaCredentials) {}

  async authenticate(): Promise<StravaSession> {
    return exchangeRefreshToken(this.credentials);
  }

  async fetch(
    session: StravaSession,
    range: DateRange,
    ctx: RunContext
  ): Promise<StravaWorkout[]> {
    const params = new URLSearchParams({
      after: String(toUnixSeconds(range.start)),
      before: String(toUnixSeconds(addDays(range.end, 1))),
      per_page: String(PAGE_SIZE),
    });
    const url = `${API_URL}/athlete/activities?${params.toString()}`;
    sourceLogger.info({ url, range }, "Fetching Strava activities");

    const response = await sendRequest(url, {
      headers: bearerHeaders(session.accessToken),
    });
    const items = await readJson(response, StravaActivityListSchema, "strava activities");
    const activities = keepValidRecords(items, StravaActivitySchema, "strava activity", ctx);

    if (items.length >= PAGE_SIZE) {
      ctx.warn("Strava returned a full page; older activities in the range were not fetched", {
        pageSize: PAGE_SIZE,
      });
    }

    sourceLogger.info({ count: activities.length }, "Fetched Strava activities");
    return activities.map((activity) => ({ activity }));
  }
}

// ============================================================================
// Detail Enricher
// ============================================================================

/**
 * Minutes per heart-rate zone from a zones response; null where a zone is missing
 */
export function heartRateZoneMinutes(zones: StravaActivityZone[]): (number | null)[] {
  const heartRate = zones.find((zone) => zone.type === "heartrate");
  const buckets = heartRate?.distribution_buckets ?? [];

  return Array.from({ length: ZONE_COUNT }, (_, index) => {
    const bucket = buckets[index];
    return bucket !== undefined ? secondsToMinutes(bucket.time) : null;
  });
}

export class StravaZoneEnricher implements DetailEnricher<StravaWorkout, StravaSession> {
  async enrich(
    session: StravaSession,
    workout: StravaWorkout,
    ctx: RunContext
  ): Promise<StravaWorkout> {
    const resource = `strava activity ${String(workout.activity.id)} zones`;
    try {
      const response = await sendRequest(
        `${API_URL}/activities/${String(workout.activity.id)}/zones`,
        { headers: bearerHeaders(session.accessToken) }
      );
      const zones = await readJson(response, StravaZonesResponseSchema, resource);
      return { ...workout, zoneMinutes: heartRateZoneMinutes(zones) };
    } catch (error) {
      ctx.warn(`Zone details unavailable: ${errorMessage(error)}`, {
        activityId: workout.activity.id,
        status: error instanceof FetchFailure ? error.status : undefined,
      });
      return workout;
    }
  }
}

// ============================================================================
// Normalizer
// ============================================================================

export function normalizeStravaWorkout(
  workout: StravaWorkout,
  ctx: RunContext
): CanonicalRow {
  const { activity } = workout;
  const start = START_PATTERN.exec(activity.start_date_local);
  const date = parseDateText(start?.[1] ?? activity.start_date_local.slice(0, 10), ctx.today);
  const time = start?.[2] ?? "00:00:00";

  const movingTime = toFieldNumber(activity.moving_time);
  const distance = toFieldNumber(activity.distance);

  const fields: CanonicalRow["fields"] = {
    date,
    time,
    workout_type: activity.type ?? activity.sport_type ?? "Unknown",
    name: activity.name ?? "",
    duration_min: movingTime !== null ? secondsToMinutes(movingTime) : null,
    distance_km: distance !== null ? roundTo(distance / 1000, 2) : null,
    avg_hr: toFieldNumber(activity.average_heartrate),
    max_hr: toFieldNumber(activity.max_heartrate),
    calories: toFieldNumber(activity.calories),
    avg_power: toFieldNumber(activity.average_watts),
    max_power: toFieldNumber(activity.max_watts),
  };

  // Zone columns stay unsupplied when the zones call failed
  if (workout.zoneMinutes !== undefined) {
    for (let zone = 0; zone < ZONE_COUNT; zone++) {
      fields[`zone_${String(zone + 1)}_min`] = workout.zoneMinutes[zone] ?? null;
    }
  }

  return createRow(STRAVA_LAYOUT, fields);
}

export function createStravaIntegration(
  credentials: StravaCredentials
): Integration<StravaWorkout, StravaSession> {
  return {
    source: "strava",
    layout: STRAVA_LAYOUT,
    adapter: new StravaAdapter(credentials),
    enricher: new StravaZoneEnricher(),
    normalize: normalizeStravaWorkout,
    lookbackDays: STRAVA_LOOKBACK_DAYS,
  };
}
