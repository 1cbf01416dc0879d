import { Value } from "@sinclair/typebox/value";

import { FetchFailure, ParseFailure } from "../errors.js";
import { sourceLogger } from "../logger.js";

import type { RunContext } from "../types/index.js";
import type { Static, TSchema } from "@sinclair/typebox";

const BODY_PREVIEW_LENGTH = 500;

/**
 * fetch() with request/response logging
 */
export async function sendRequest(
  url: string,
  options?: RequestInit
): Promise<Response> {
  const method = options?.method ?? "GET";
  sourceLogger.debug({ method, url }, "Sending upstream request");

  const startTime = performance.now();
  const response = await fetch(url, options);
  const duration = Math.round(performance.now() - startTime);

  sourceLogger.debug(
    {
      method,
      url,
      status: response.status,
      statusText: response.statusText,
      duration: `${String(duration)}ms`,
    },
    "Received upstream response"
  );

  return response;
}

/**
 * Response body for error reports, truncated
 */
export async function readBodyPreview(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.slice(0, BODY_PREVIEW_LENGTH);
  } catch (error) {
    sourceLogger.debug({ error }, "Could not read response body");
    return "";
  }
}

/**
 * Throw a FetchFailure for a non-success response
 */
export async function expectOk(response: Response, resource: string): Promise<void> {
  if (response.ok) {
    return;
  }

  const body = await readBodyPreview(response);
  sourceLogger.error(
    { resource, status: response.status, statusText: response.statusText, body },
    "Upstream request failed"
  );
  throw new FetchFailure(
    resource,
    `Failed to fetch ${resource}: ${String(response.status)} ${response.statusText}`,
    response.status
  );
}

/**
 * Parse a JSON response and check its overall shape
 */
export async function readJson<T extends TSchema>(
  response: Response,
  schema: T,
  resource: string
): Promise<Static<T>> {
  await expectOk(response, resource);

  let data: unknown;
  try {
    data = await response.json();
  } catch {
    throw new FetchFailure(resource, `Response from ${resource} is not JSON`, response.status);
  }

  if (!Value.Check(schema, data)) {
    const first = Value.Errors(schema, data).First();
    throw new FetchFailure(
      resource,
      `Unexpected response shape from ${resource}: ${first !== undefined ? `${first.path} ${first.message}` : "invalid"}`,
      response.status
    );
  }

  return data;
}

/**
 * One list item checked against `schema`
 */
function parseRecord<T extends TSchema>(item: unknown, schema: T, label: string): Static<T> {
  if (Value.Check(schema, item)) {
    return item;
  }
  const first = Value.Errors(schema, item).First();
  throw new ParseFailure(
    JSON.stringify(item).slice(0, BODY_PREVIEW_LENGTH),
    `malformed ${label}: ${first !== undefined ? `${first.path} ${first.message}` : "invalid"}`
  );
}

/**
 * Keep the items matching `schema`; each malformed item becomes a warning.
 */
export function keepValidRecords<T extends TSchema>(
  items: unknown[],
  schema: T,
  resource: string,
  ctx: RunContext
): Static<T>[] {
  const valid: Static<T>[] = [];

  for (const [index, item] of items.entries()) {
    try {
      valid.push(parseRecord(item, schema, `${resource} record #${String(index)}`));
    } catch (error) {
      if (!(error instanceof ParseFailure)) {
        throw error;
      }
      ctx.warn(`Skipping ${error.message}`, { resource, code: error.code, input: error.input });
    }
  }

  return valid;
}

export function bearerHeaders(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}`, Accept: "application/json" };
}
