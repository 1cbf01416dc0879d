import { describe, it, expect, vi } from "vitest";

import { AuthFailure, FetchFailure } from "../../../src/errors.js";
import {
  exchangeRefreshToken,
  heartRateZoneMinutes,
  normalizeStravaWorkout,
  StravaAdapter,
  StravaZoneEnricher,
} from "../../../src/sources/strava.js";
import { eveningRide, heartRateZones, morningRun } from "../../fixtures/strava.js";
import { createTestContext } from "../../mocks/context.js";
import { calledUrls, jsonResponse, stubFetch, textResponse } from "../../mocks/http.js";

vi.mock("../../../src/logger.js", async () =>
  (await import("../../mocks/logger.js")).mockLoggerModule()
);

const CREDENTIALS = {
  clientId: "test-client",
  clientSecret: "test-secret",
  refreshToken: "test-refresh",
};
const SESSION = { accessToken: "test-access" };

function localMidnight(isoDate: string): number {
  return Math.floor(new Date(`${isoDate}T00:00:00`).getTime() / 1000);
}

describe("sources/strava", () => {
  // ============================================================================
  // Authentication
  // ============================================================================

  describe("exchangeRefreshToken", () => {
    it("should post the refresh grant and return the access token", async () => {
      const fetchMock = stubFetch(() => jsonResponse({ access_token: "test-access" }));

      const session = await exchangeRefreshToken(CREDENTIALS);

      expect(session).toEqual({ accessToken: "test-access" });
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("https://www.strava.com/oauth/token");
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe(
        "client_id=test-client&client_secret=test-secret&refresh_token=test-refresh&grant_type=refresh_token"
      );
    });

    it("should raise AuthFailure with the status and body on rejection", async () => {
      stubFetch(() => textResponse('{"message":"Bad Request"}', 400));

      const error = await exchangeRefreshToken(CREDENTIALS).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AuthFailure);
      expect(error).toMatchObject({
        status: 400,
        body: '{"message":"Bad Request"}',
        message: 'Strava token exchange failed with status 400: {"message":"Bad Request"}',
      });
    });

    it("should raise AuthFailure when the token response has no access token", async () => {
      stubFetch(() => jsonResponse({ token_type: "Bearer" }));

      await expect(exchangeRefreshToken(CREDENTIALS)).rejects.toBeInstanceOf(AuthFailure);
    });
  });

  // ============================================================================
  // Adapter
  // ============================================================================

  describe("StravaAdapter.fetch", () => {
    const range = { start: "2024-12-24", end: "2024-12-30" };

    it("should request one page between local midnights of the range", async () => {
      const fetchMock = stubFetch(() => jsonResponse([morningRun, eveningRide]));
      const ctx = createTestContext("strava", range);

      const workouts = await new StravaAdapter(CREDENTIALS).fetch(SESSION, range, ctx);

      expect(workouts.map((workout) => workout.activity.id)).toEqual([1001, 1002]);
      expect(calledUrls(fetchMock)).toEqual([
        `https://www.strava.com/api/v3/athlete/activities?after=${String(localMidnight("2024-12-24"))}&before=${String(localMidnight("2024-12-31"))}&per_page=30`,
      ]);
      expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
        Authorization: "Bearer test-access",
        Accept: "application/json",
      });
      expect(ctx.warnings).toEqual([]);
    });

    it("should skip malformed activities with a warning", async () => {
      stubFetch(() => jsonResponse([morningRun, { id: "not-a-number" }]));
      const ctx = createTestContext("strava", range);

      const workouts = await new StravaAdapter(CREDENTIALS).fetch(SESSION, range, ctx);

      expect(workouts).toHaveLength(1);
      expect(ctx.warnings).toHaveLength(1);
      expect(ctx.warnings[0]?.message).toMatch(/^Skipping malformed strava activity record #1:/);
      expect(ctx.warnings[0]?.details).toEqual({
        resource: "strava activity",
        code: "PARSE_FAILURE",
        input: '{"id":"not-a-number"}',
      });
    });

    it("should warn when the page is full", async () => {
      const page = Array.from({ length: 30 }, (_, index) => ({ ...morningRun, id: index }));
      stubFetch(() => jsonResponse(page));
      const ctx = createTestContext("strava", range);

      await new StravaAdapter(CREDENTIALS).fetch(SESSION, range, ctx);

      expect(ctx.warnings.map((warning) => warning.message)).toEqual([
        "Strava returned a full page; older activities in the range were not fetched",
      ]);
    });

    it("should raise FetchFailure when the list request fails", async () => {
      stubFetch(() => textResponse("rate limited", 429));
      const ctx = createTestContext("strava", range);

      await expect(
        new StravaAdapter(CREDENTIALS).fetch(SESSION, range, ctx)
      ).rejects.toBeInstanceOf(FetchFailure);
    });
  });

  // ============================================================================
  // Detail Enricher
  // ============================================================================

  describe("heartRateZoneMinutes", () => {
    it("should convert the heart-rate buckets to minutes", () => {
      expect(heartRateZoneMinutes(heartRateZones)).toEqual([10, 0, 20.5, 1.5, 0.5]);
    });

    it("should report missing zones as null", () => {
      expect(
        heartRateZoneMinutes([{ type: "heartrate", distribution_buckets: [{ time: 120 }] }])
      ).toEqual([2, null, null, null, null]);
      expect(heartRateZoneMinutes([])).toEqual([null, null, null, null, null]);
    });
  });

  describe("StravaZoneEnricher", () => {
    it("should attach zone minutes from the zones endpoint", async () => {
      const fetchMock = stubFetch(() => jsonResponse(heartRateZones));
      const ctx = createTestContext("strava");

      const workout = await new StravaZoneEnricher().enrich(
        SESSION,
        { activity: morningRun },
        ctx
      );

      expect(workout.zoneMinutes).toEqual([10, 0, 20.5, 1.5, 0.5]);
      expect(calledUrls(fetchMock)).toEqual([
        "https://www.strava.com/api/v3/activities/1001/zones",
      ]);
    });

    it("should leave zones unsupplied with a warning when the call fails", async () => {
      stubFetch(() => textResponse("not found", 404));
      const ctx = createTestContext("strava");

      const workout = await new StravaZoneEnricher().enrich(
        SESSION,
        { activity: morningRun },
        ctx
      );

      expect(workout).toEqual({ activity: morningRun });
      expect(ctx.warnings).toHaveLength(1);
      expect(ctx.warnings[0]?.details).toEqual({ activityId: 1001, status: 404 });
    });

    it("should leave zones unsupplied when the request never completes", async () => {
      stubFetch(() => {
        throw new TypeError("fetch failed");
      });
      const ctx = createTestContext("strava");

      const workout = await new StravaZoneEnricher().enrich(
        SESSION,
        { activity: morningRun },
        ctx
      );

      expect(workout).toEqual({ activity: morningRun });
      expect(ctx.warnings).toEqual([
        {
          source: "strava",
          message: "Zone details unavailable: fetch failed",
          details: { activityId: 1001, status: undefined },
        },
      ]);
    });
  });

  // ============================================================================
  // Normalizer
  // ============================================================================

  describe("normalizeStravaWorkout", () => {
    const ctx = createTestContext("strava");

    it("should key workouts by local start date and time", () => {
      const row = normalizeStravaWorkout(
        { activity: morningRun, zoneMinutes: [10, 0, 20.5, 1.5, null] },
        ctx
      );

      expect(row).toEqual({
        key: "2024-12-29_07:15:00",
        fields: {
          date: "2024-12-29",
          time: "07:15:00",
          workout_type: "Run",
          name: "Morning Run",
          duration_min: 30,
          distance_km: 5.01,
          avg_hr: 142.5,
          max_hr: 171,
          calories: 410,
          avg_power: null,
          max_power: null,
          zone_1_min: 10,
          zone_2_min: 0,
          zone_3_min: 20.5,
          zone_4_min: 1.5,
          zone_5_min: null,
        },
      });
    });

    it("should not supply zone columns without zone data", () => {
      const row = normalizeStravaWorkout({ activity: eveningRide }, ctx);

      expect(row.key).toBe("2024-12-30_18:05:30");
      expect(row.fields).toMatchObject({
        workout_type: "Ride",
        duration_min: 60,
        distance_km: 20.25,
        calories: null,
        avg_power: 180,
      });
      expect(Object.keys(row.fields)).not.toContain("zone_1_min");
    });

    it("should fall back to today for an unreadable start", () => {
      const row = normalizeStravaWorkout(
        { activity: { ...morningRun, start_date_local: "unknown" } },
        ctx
      );

      expect(row.key).toBe("2024-12-30_00:00:00");
    });
  });
});
