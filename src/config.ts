/**
 * Environment configuration.
 *
 * Everything the sync needs from the process environment is read here once
 * and passed down explicitly. Source credentials are optional at load time;
 * `requireSetting` enforces them when a source is actually built.
 */

import { tmpdir } from "node:os";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError, errorMessage } from "./errors.js";

// ============================================================================
// Schemas
// ============================================================================

const OptionalString = Type.Optional(Type.String());

export const EnvSchema = Type.Object({
  SHEET_ID: OptionalString,
  GOOGLE_CREDENTIALS_JSON: OptionalString,
  SYNC_LOOKBACK_DAYS: Type.Optional(Type.String({ pattern: "^[0-9]+$" })),
  STRAVA_CLIENT_ID: OptionalString,
  STRAVA_CLIENT_SECRET: OptionalString,
  STRAVA_REFRESH_TOKEN: OptionalString,
  OURA_TOKEN: OptionalString,
  MYAIR_EMAIL: OptionalString,
  MYAIR_PASSWORD: OptionalString,
  HEARTCLOUD_EMAIL: OptionalString,
  HEARTCLOUD_PASSWORD: OptionalString,
  CHROME_PATH: OptionalString,
  DIAGNOSTICS_DIR: OptionalString,
});

export type Env = Static<typeof EnvSchema>;

export const ServiceAccountSchema = Type.Object({
  client_email: Type.String({ minLength: 1 }),
  private_key: Type.String({ minLength: 1 }),
  project_id: Type.Optional(Type.String()),
});

export type ServiceAccount = Static<typeof ServiceAccountSchema>;

// ============================================================================
// Types
// ============================================================================

export interface AppConfig {
  sheetId?: string;
  googleCredentialsJson?: string;
  lookbackDays?: number;
  strava: {
    clientId?: string;
    clientSecret?: string;
    refreshToken?: string;
  };
  oura: {
    token?: string;
  };
  myair: {
    email?: string;
    password?: string;
  };
  heartcloud: {
    email?: string;
    password?: string;
    chromePath?: string;
    diagnosticsDir: string;
  };
}

// ============================================================================
// Loading
// ============================================================================

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  // Only keep the keys the schema knows about, so unrelated variables never fail validation
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = blankToUndefined(env[key]);
    if (value !== undefined) {
      picked[key] = value;
    }
  }

  if (!Value.Check(EnvSchema, picked)) {
    const problems = [...Value.Errors(EnvSchema, picked)].map(
      (error) => `${error.path}: ${error.message}`
    );
    throw new ConfigError("Invalid environment configuration", { problems });
  }

  return {
    sheetId: picked.SHEET_ID,
    googleCredentialsJson: picked.GOOGLE_CREDENTIALS_JSON,
    lookbackDays:
      picked.SYNC_LOOKBACK_DAYS !== undefined
        ? Number.parseInt(picked.SYNC_LOOKBACK_DAYS, 10)
        : undefined,
    strava: {
      clientId: picked.STRAVA_CLIENT_ID,
      clientSecret: picked.STRAVA_CLIENT_SECRET,
      refreshToken: picked.STRAVA_REFRESH_TOKEN,
    },
    oura: {
      token: picked.OURA_TOKEN,
    },
    myair: {
      email: picked.MYAIR_EMAIL,
      password: picked.MYAIR_PASSWORD,
    },
    heartcloud: {
      email: picked.HEARTCLOUD_EMAIL,
      password: picked.HEARTCLOUD_PASSWORD,
      chromePath: picked.CHROME_PATH,
      diagnosticsDir: picked.DIAGNOSTICS_DIR ?? tmpdir(),
    },
  };
}

/**
 * Return a setting or throw a ConfigError naming the variable to set
 */
export function requireSetting(value: string | undefined, envName: string): string {
  if (value === undefined) {
    throw new ConfigError(`${envName} must be set`, { variable: envName });
  }
  return value;
}

/**
 * Parse the service-account JSON, restoring escaped newlines in the key
 */
export function parseServiceAccount(json: string): ServiceAccount {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ConfigError("GOOGLE_CREDENTIALS_JSON is not valid JSON", {
      reason: errorMessage(error),
    });
  }

  if (!Value.Check(ServiceAccountSchema, parsed)) {
    throw new ConfigError(
      "GOOGLE_CREDENTIALS_JSON must contain client_email and private_key"
    );
  }

  return {
    ...parsed,
    private_key: parsed.private_key.replaceAll("\\n", "\n"),
  };
}
