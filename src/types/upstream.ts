/**
 * TypeBox schemas for upstream API responses.
 *
 * Only the fields the normalizers read are declared; everything else passes
 * through unchecked.
 */

import { Type, type Static } from "@sinclair/typebox";

const NullableNumber = Type.Optional(Type.Union([Type.Number(), Type.Null()]));
const NullableString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

// ============================================================================
// Strava
// ============================================================================

export const StravaTokenResponseSchema = Type.Object({
  access_token: Type.String({ minLength: 1 }),
  expires_at: Type.Optional(Type.Number()),
});

export const StravaActivitySchema = Type.Object({
  id: Type.Number(),
  name: NullableString,
  type: NullableString,
  sport_type: NullableString,
  start_date_local: Type.String(),
  moving_time: NullableNumber,
  distance: NullableNumber,
  average_heartrate: NullableNumber,
  max_heartrate: NullableNumber,
  calories: NullableNumber,
  average_watts: NullableNumber,
  max_watts: NullableNumber,
});

export type StravaActivity = Static<typeof StravaActivitySchema>;

export const StravaActivityListSchema = Type.Array(Type.Unknown());

export const StravaZoneBucketSchema = Type.Object({
  min: Type.Optional(Type.Number()),
  max: Type.Optional(Type.Number()),
  time: Type.Number(),
});

export const StravaActivityZoneSchema = Type.Object({
  type: Type.String(),
  distribution_buckets: Type.Optional(Type.Array(StravaZoneBucketSchema)),
});

export const StravaZonesResponseSchema = Type.Array(StravaActivityZoneSchema);

export type StravaActivityZone = Static<typeof StravaActivityZoneSchema>;

// ============================================================================
// Oura
// ============================================================================

export const OuraCollectionSchema = Type.Object({
  data: Type.Array(Type.Unknown()),
  next_token: NullableString,
});

const OuraSleepContributorsSchema = Type.Object({
  total_sleep: NullableNumber,
  deep_sleep: NullableNumber,
  rem_sleep: NullableNumber,
  light_sleep: NullableNumber,
  efficiency: NullableNumber,
});

export const OuraDailySleepSchema = Type.Object({
  day: Type.String(),
  score: NullableNumber,
  contributors: Type.Optional(OuraSleepContributorsSchema),
});

export type OuraDailySleep = Static<typeof OuraDailySleepSchema>;

const OuraReadinessContributorsSchema = Type.Object({
  hrv_balance: NullableNumber,
  resting_heart_rate: NullableNumber,
  body_temperature: NullableNumber,
});

export const OuraDailyReadinessSchema = Type.Object({
  day: Type.String(),
  score: NullableNumber,
  contributors: Type.Optional(OuraReadinessContributorsSchema),
});

export type OuraDailyReadiness = Static<typeof OuraDailyReadinessSchema>;

export const OuraDailyActivitySchema = Type.Object({
  day: Type.String(),
  score: NullableNumber,
  steps: NullableNumber,
  total_calories: NullableNumber,
});

export type OuraDailyActivity = Static<typeof OuraDailyActivitySchema>;

export const OuraHeartRateSampleSchema = Type.Object({
  bpm: Type.Number(),
  source: Type.Optional(Type.String()),
  timestamp: Type.String(),
});

export type OuraHeartRateSample = Static<typeof OuraHeartRateSampleSchema>;

// ============================================================================
// myAir
// ============================================================================

export const MyAirSleepRecordSchema = Type.Object({
  ahi: NullableNumber,
  maskPairCount: NullableNumber,
  usageHours: NullableNumber,
  maskPairScore: NullableNumber,
  totalEvents: NullableNumber,
  myAirScore: NullableNumber,
});

export type MyAirSleepRecord = Static<typeof MyAirSleepRecordSchema>;

export const MyAirSleepDataResponseSchema = Type.Array(Type.Unknown());
