/**
 * Error taxonomy for sync runs.
 *
 * AuthFailure and SchemaError abort a run. FetchFailure aborts only sources
 * with a single upstream resource; multi-resource adapters catch any failure
 * of one sub-resource and leave its fields unsupplied. SelectorDrift and
 * ParseFailure are caught inside the adapter that throws them.
 */

// ============================================================================
// Custom Error Classes
// ============================================================================

export class AuthFailure extends Error {
  code = "AUTH_FAILURE" as const;
  status?: number;
  body?: string;

  constructor(message: string, status?: number, body?: string) {
    super(message);
    this.name = "AuthFailure";
    this.status = status;
    this.body = body;
  }
}

export class FetchFailure extends Error {
  code = "FETCH_FAILURE" as const;
  resource: string;
  status?: number;

  constructor(resource: string, message: string, status?: number) {
    super(message);
    this.name = "FetchFailure";
    this.resource = resource;
    this.status = status;
  }
}

export class SelectorDrift extends Error {
  code = "SELECTOR_DRIFT" as const;
  selector: string;

  constructor(selector: string, message: string) {
    super(message);
    this.name = "SelectorDrift";
    this.selector = selector;
  }
}

export class ParseFailure extends Error {
  code = "PARSE_FAILURE" as const;
  input: string;

  constructor(input: string, message: string) {
    super(message);
    this.name = "ParseFailure";
    this.input = input;
  }
}

export class SchemaError extends Error {
  code = "SCHEMA_ERROR" as const;
  worksheet: string;
  missingColumns: string[];

  constructor(worksheet: string, missingColumns: string[]) {
    super(
      `Worksheet "${worksheet}" is missing required column(s): ${missingColumns.join(", ")}`
    );
    this.name = "SchemaError";
    this.worksheet = worksheet;
    this.missingColumns = missingColumns;
  }
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ConfigError";
    this.details = details;
  }
}

/**
 * Error message for logs and run results, whatever was thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
