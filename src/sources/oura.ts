/**
 * Oura integration (static bearer-token adapter).
 *
 * Each sub-resource is fetched once for the whole range and independently of
 * the others. A failed sub-resource is recorded as a warning and its columns
 * are left unsupplied, so cells written by an earlier run survive.
 */

import { errorMessage, FetchFailure } from "../errors.js";
import { sourceLogger } from "../logger.js";
import { addDays, roundTo, toFieldNumber } from "../services/sync/canonical/parsers.js";
import { createRow } from "../services/sync/canonical/rows.js";
import {
  OuraCollectionSchema,
  OuraDailyActivitySchema,
  OuraDailyReadinessSchema,
  OuraDailySleepSchema,
  OuraHeartRateSampleSchema,
  type OuraDailyActivity,
  type OuraDailyReadiness,
  type OuraDailySleep,
  type OuraHeartRateSample,
} from "../types/upstream.js";
import { bearerHeaders, keepValidRecords, readJson, sendRequest } from "./http.js";

import type {
  CanonicalRow,
  DateRange,
  Integration,
  RunContext,
  SheetLayout,
  SourceAdapter,
} from "../types/index.js";
import type { TSchema, Static } from "@sinclair/typebox";

const API_URL = "https://api.ouraring.com/v2/usercollection";

export const OURA_LOOKBACK_DAYS = 2;

export const OURA_LAYOUT: SheetLayout = {
  worksheet: "oura_data",
  columns: [
    "date",
    "sleep_score",
    "readiness_score",
    "activity_score",
    "total_sleep",
    "deep_sleep",
    "rem_sleep",
    "light_sleep",
    "sleep_efficiency",
    "hrv_avg",
    "resting_hr",
    "body_temp",
    "steps",
    "calories",
    "avg_hr",
    "min_hr",
  ],
};

// ============================================================================
// Types
// ============================================================================

export type OuraSubResource = "sleep" | "readiness" | "activity" | "heartrate";

export interface OuraHeartRateSummary {
  avgBpm: number;
  minBpm: number;
}

/**
 * One day of Oura data. Per sub-resource: `undefined` when the fetch failed,
 * `null` when it succeeded without an entry for this day.
 */
export interface OuraDay {
  day: string;
  sleep?: OuraDailySleep | null;
  readiness?: OuraDailyReadiness | null;
  activity?: OuraDailyActivity | null;
  heartRate?: OuraHeartRateSummary | null;
}

export interface OuraSession {
  token: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Reduce heart-rate samples to a per-day average and minimum
 */
export function summarizeHeartRate(
  samples: OuraHeartRateSample[]
): Map<string, OuraHeartRateSummary> {
  const byDay = new Map<string, number[]>();
  for (const sample of samples) {
    const day = sample.timestamp.slice(0, 10);
    const values = byDay.get(day) ?? [];
    values.push(sample.bpm);
    byDay.set(day, values);
  }

  const summaries = new Map<string, OuraHeartRateSummary>();
  for (const [day, values] of byDay) {
    const total = values.reduce((sum, bpm) => sum + bpm, 0);
    summaries.set(day, {
      avgBpm: roundTo(total / values.length, 1),
      minBpm: Math.min(...values),
    });
  }
  return summaries;
}

function indexByDay<T extends { day: string }>(records: T[]): Map<string, T> {
  return new Map(records.map((record) => [record.day, record]));
}

// ============================================================================
// Adapter
// ============================================================================

export class OuraAdapter implements SourceAdapter<OuraDay, OuraSession> {
  readonly kind = "static-token" as const;

  constructor(private token: string) {}

  async authenticate(): Promise<OuraSession> {
    return { token: this.token };
  }

  private async fetchCollection<T extends TSchema>(
    session: OuraSession,
    path: string,
    params: Record<string, string>,
    schema: T,
    ctx: RunContext
  ): Promise<Static<T>[]> {
    const url = `${API_URL}/${path}?${new URLSearchParams(params).toString()}`;
    sourceLogger.info({ url }, "Fetching Oura collection");

    const response = await sendRequest(url, { headers: bearerHeaders(session.token) });
    const body = await readJson(response, OuraCollectionSchema, `oura ${path}`);
    if (body.next_token !== undefined && body.next_token !== null) {
      ctx.warn(`Oura ${path} has more pages; only the first was read`);
    }
    return keepValidRecords(body.data, schema, `oura ${path}`, ctx);
  }

  /**
   * Run one sub-resource fetch; any failure is recorded and yields undefined
   */
  private async attempt<T>(
    resource: OuraSubResource,
    ctx: RunContext,
    load: () => Promise<T>
  ): Promise<T | undefined> {
    try {
      return await load();
    } catch (error) {
      ctx.warn(`Oura ${resource} data unavailable: ${errorMessage(error)}`, {
        resource,
        status: error instanceof FetchFailure ? error.status : undefined,
      });
      return undefined;
    }
  }

  async fetch(session: OuraSession, range: DateRange, ctx: RunContext): Promise<OuraDay[]> {
    const dailyParams = { start_date: range.start, end_date: range.end };

    const sleep = await this.attempt("sleep", ctx, async () =>
      indexByDay(
        await this.fetchCollection(session, "daily_sleep", dailyParams, OuraDailySleepSchema, ctx)
      )
    );
    const readiness = await this.attempt("readiness", ctx, async () =>
      indexByDay(
        await this.fetchCollection(
          session,
          "daily_readiness",
          dailyParams,
          OuraDailyReadinessSchema,
          ctx
        )
      )
    );
    const activity = await this.attempt("activity", ctx, async () =>
      indexByDay(
        await this.fetchCollection(
          session,
          "daily_activity",
          dailyParams,
          OuraDailyActivitySchema,
          ctx
        )
      )
    );
    const heartRate = await this.attempt("heartrate", ctx, async () =>
      summarizeHeartRate(
        await this.fetchCollection(
          session,
          "heartrate",
          {
            start_datetime: `${range.start}T00:00:00`,
            end_datetime: `${addDays(range.end, 1)}T00:00:00`,
          },
          OuraHeartRateSampleSchema,
          ctx
        )
      )
    );

    const days = new Set<string>([
      ...(sleep?.keys() ?? []),
      ...(readiness?.keys() ?? []),
      ...(activity?.keys() ?? []),
      ...(heartRate?.keys() ?? []),
    ]);

    const records = [...days]
      .filter((day) => day >= range.start && day <= range.end)
      .sort()
      .map(
        (day): OuraDay => ({
          day,
          sleep: sleep !== undefined ? (sleep.get(day) ?? null) : undefined,
          readiness: readiness !== undefined ? (readiness.get(day) ?? null) : undefined,
          activity: activity !== undefined ? (activity.get(day) ?? null) : undefined,
          heartRate: heartRate !== undefined ? (heartRate.get(day) ?? null) : undefined,
        })
      );

    sourceLogger.info({ days: records.length }, "Fetched Oura data");
    return records;
  }
}

// ============================================================================
// Normalizer
// ============================================================================

export function normalizeOuraDay(record: OuraDay, _ctx: RunContext): CanonicalRow {
  const fields: CanonicalRow["fields"] = { date: record.day };

  if (record.sleep !== undefined) {
    const contributors = record.sleep?.contributors;
    fields.sleep_score = toFieldNumber(record.sleep?.score);
    fields.total_sleep = toFieldNumber(contributors?.total_sleep);
    fields.deep_sleep = toFieldNumber(contributors?.deep_sleep);
    fields.rem_sleep = toFieldNumber(contributors?.rem_sleep);
    fields.light_sleep = toFieldNumber(contributors?.light_sleep);
    fields.sleep_efficiency = toFieldNumber(contributors?.efficiency);
  }

  if (record.readiness !== undefined) {
    const contributors = record.readiness?.contributors;
    fields.readiness_score = toFieldNumber(record.readiness?.score);
    fields.hrv_avg = toFieldNumber(contributors?.hrv_balance);
    fields.resting_hr = toFieldNumber(contributors?.resting_heart_rate);
    fields.body_temp = toFieldNumber(contributors?.body_temperature);
  }

  if (record.activity !== undefined) {
    fields.activity_score = toFieldNumber(record.activity?.score);
    fields.steps = toFieldNumber(record.activity?.steps);
    fields.calories = toFieldNumber(record.activity?.total_calories);
  }

  if (record.heartRate !== undefined) {
    fields.avg_hr = record.heartRate?.avgBpm ?? null;
    fields.min_hr = record.heartRate?.minBpm ?? null;
  }

  return createRow(OURA_LAYOUT, fields);
}

export function createOuraIntegration(token: string): Integration<OuraDay, OuraSession> {
  return {
    source: "oura",
    layout: OURA_LAYOUT,
    adapter: new OuraAdapter(token),
    normalize: normalizeOuraDay,
    lookbackDays: OURA_LOOKBACK_DAYS,
  };
}
