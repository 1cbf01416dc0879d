// ============================================================================
// Canonical Rows
// ============================================================================

/**
 * A single cell value. `null` marks an absent value, written as an empty cell.
 */
export type FieldValue = number | string | null;

/**
 * Normalized, source-independent record.
 *
 * Columns missing from `fields` are not supplied by the source: an update
 * leaves them untouched and an append leaves them empty.
 */
export interface CanonicalRow {
  /** Key-column values joined with "_", e.g. "2024-12-29" or "2024-12-29_07:15:00" */
  key: string;
  fields: Record<string, FieldValue>;
}

/**
 * Worksheet shape for one source
 */
export interface SheetLayout {
  worksheet: string;
  /** Full header for a new worksheet; every column must exist in an old one */
  columns: readonly string[];
  /** Columns forming the natural key, defaults to the first column */
  keyColumns?: readonly string[];
}

// ============================================================================
// Run Context
// ============================================================================

/**
 * Inclusive calendar date range, both ends as YYYY-MM-DD
 */
export interface DateRange {
  start: string;
  end: string;
}

export interface RunWarning {
  source: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Explicit run-time state handed to adapters and normalizers.
 */
export interface RunContext {
  source: string;
  /** Local calendar date of the run, used when a record carries no date */
  today: string;
  range: DateRange;
  warn: (message: string, details?: Record<string, unknown>) => void;
  warnings: RunWarning[];
}

// ============================================================================
// Integration Contracts
// ============================================================================

export type AdapterKind = "oauth-refresh" | "static-token" | "session-login";

/**
 * Authenticates against one upstream system and retrieves raw records.
 */
export interface SourceAdapter<TRecord, TSession> {
  readonly kind: AdapterKind;
  authenticate(ctx: RunContext): Promise<TSession>;
  fetch(session: TSession, range: DateRange, ctx: RunContext): Promise<TRecord[]>;
  release?(session: TSession): Promise<void>;
}

/**
 * Second-pass fetch that fills in fields the summary endpoint omits.
 */
export interface DetailEnricher<TRecord, TSession> {
  enrich(session: TSession, record: TRecord, ctx: RunContext): Promise<TRecord>;
}

export type Normalizer<TRecord> = (record: TRecord, ctx: RunContext) => CanonicalRow;

export interface Integration<TRecord, TSession> {
  source: string;
  layout: SheetLayout;
  adapter: SourceAdapter<TRecord, TSession>;
  enricher?: DetailEnricher<TRecord, TSession>;
  normalize: Normalizer<TRecord>;
  /** Days rescanned on every run when no override is configured */
  lookbackDays: number;
}

// ============================================================================
// Run Results
// ============================================================================

export type SyncPhase =
  | "init"
  | "authenticate"
  | "fetch"
  | "enrich"
  | "normalize"
  | "upsert"
  | "done"
  | "failed";

export type UpsertOutcome = "inserted" | "updated" | "unchanged";

export interface SyncRunResult {
  source: string;
  worksheet: string;
  status: "succeeded" | "failed";
  /** Phase the run failed in */
  failedPhase?: SyncPhase;
  error?: string;
  range: DateRange;
  fetched: number;
  inserted: number;
  updated: number;
  unchanged: number;
  warnings: RunWarning[];
  durationMs: number;
  /** Normalized rows, only for dry runs */
  rows?: CanonicalRow[];
}

export interface SyncProgress {
  phase: SyncPhase;
  current: number;
  total: number;
  currentItem?: string;
}

export type ProgressCallback = (progress: SyncProgress) => void;

// ============================================================================
// Sink Storage
// ============================================================================

/** Value written to a cell; "" clears it */
export type CellValue = string | number;

export interface CellWrite {
  /** 0-based column index */
  column: number;
  value: CellValue;
}

/**
 * One worksheet of the tabular store. Row numbers are 1-based, row 1 is the header.
 */
export interface SheetTable {
  readonly name: string;
  /** Create the worksheet with `header` as row 1 if it does not exist; true when created */
  ensure(header: readonly string[]): Promise<boolean>;
  /** Every row as displayed text, header first */
  readAll(): Promise<string[][]>;
  updateCells(rowNumber: number, cells: CellWrite[]): Promise<void>;
  /** Append after the last row; resolves to the row number written */
  appendRow(values: CellValue[]): Promise<number>;
}
