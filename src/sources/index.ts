/**
 * Source registry: the only place that maps a source name to its integration.
 */

import { requireSetting, type AppConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { createSyncJob, type SyncJob } from "../services/sync/orchestrator.js";
import { launchPage } from "./browser.js";
import {
  createHeartCloudIntegration,
  HEARTCLOUD_LAYOUT,
  HEARTCLOUD_LOOKBACK_DAYS,
} from "./heartcloud.js";
import { createMyAirIntegration, MYAIR_LAYOUT, MYAIR_LOOKBACK_DAYS } from "./myair.js";
import { createOuraIntegration, OURA_LAYOUT, OURA_LOOKBACK_DAYS } from "./oura.js";
import { createStravaIntegration, STRAVA_LAYOUT, STRAVA_LOOKBACK_DAYS } from "./strava.js";

import type { AdapterKind, SheetLayout } from "../types/index.js";

export const SOURCE_NAMES = ["strava", "oura", "myair", "heartcloud"] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export interface SourceInfo {
  name: SourceName;
  description: string;
  kind: AdapterKind;
  layout: SheetLayout;
  lookbackDays: number;
  /** Environment variables the source needs */
  settings: string[];
}

export const SOURCES: Record<SourceName, SourceInfo> = {
  strava: {
    name: "strava",
    description: "Strava workouts with heart-rate zones",
    kind: "oauth-refresh",
    layout: STRAVA_LAYOUT,
    lookbackDays: STRAVA_LOOKBACK_DAYS,
    settings: ["STRAVA_CLIENT_ID", "STRAVA_CLIENT_SECRET", "STRAVA_REFRESH_TOKEN"],
  },
  oura: {
    name: "oura",
    description: "Oura ring sleep, readiness, activity and heart rate",
    kind: "static-token",
    layout: OURA_LAYOUT,
    lookbackDays: OURA_LOOKBACK_DAYS,
    settings: ["OURA_TOKEN"],
  },
  myair: {
    name: "myair",
    description: "ResMed myAir CPAP nightly summary",
    kind: "session-login",
    layout: MYAIR_LAYOUT,
    lookbackDays: MYAIR_LOOKBACK_DAYS,
    settings: ["MYAIR_EMAIL", "MYAIR_PASSWORD"],
  },
  heartcloud: {
    name: "heartcloud",
    description: "HeartCloud coherence sessions (headless browser)",
    kind: "session-login",
    layout: HEARTCLOUD_LAYOUT,
    lookbackDays: HEARTCLOUD_LOOKBACK_DAYS,
    settings: ["HEARTCLOUD_EMAIL", "HEARTCLOUD_PASSWORD", "CHROME_PATH"],
  },
};

export function isSourceName(name: string): name is SourceName {
  return SOURCE_NAMES.some((source) => source === name);
}

export function parseSourceName(name: string): SourceName {
  const normalized = name.trim().toLowerCase();
  if (!isSourceName(normalized)) {
    throw new ConfigError(`Unknown source "${name}"`, { known: [...SOURCE_NAMES] });
  }
  return normalized;
}

/**
 * Build the sync job for a source from configuration
 */
export function buildSyncJob(name: SourceName, config: AppConfig): SyncJob {
  switch (name) {
    case "strava":
      return createSyncJob(
        createStravaIntegration({
          clientId: requireSetting(config.strava.clientId, "STRAVA_CLIENT_ID"),
          clientSecret: requireSetting(config.strava.clientSecret, "STRAVA_CLIENT_SECRET"),
          refreshToken: requireSetting(config.strava.refreshToken, "STRAVA_REFRESH_TOKEN"),
        })
      );
    case "oura":
      return createSyncJob(createOuraIntegration(requireSetting(config.oura.token, "OURA_TOKEN")));
    case "myair":
      return createSyncJob(
        createMyAirIntegration({
          email: requireSetting(config.myair.email, "MYAIR_EMAIL"),
          password: requireSetting(config.myair.password, "MYAIR_PASSWORD"),
        })
      );
    case "heartcloud": {
      const executablePath = requireSetting(config.heartcloud.chromePath, "CHROME_PATH");
      return createSyncJob(
        createHeartCloudIntegration({
          email: requireSetting(config.heartcloud.email, "HEARTCLOUD_EMAIL"),
          password: requireSetting(config.heartcloud.password, "HEARTCLOUD_PASSWORD"),
          diagnosticsDir: config.heartcloud.diagnosticsDir,
          openPage: () => launchPage({ executablePath }),
        })
      );
    }
  }
}
