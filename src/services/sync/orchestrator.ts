/**
 * Sync Driver - runs one integration end to end
 *
 * Init -> Authenticate -> Fetch -> Enrich -> Normalize -> Upsert -> Done.
 * Any phase may end the run in Failed; nothing is retried. The source
 * session is released however the run ends.
 */

import { ConfigError, errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { createRunContext } from "./context.js";
import { UpsertSink } from "./upsert.js";

import type {
  CanonicalRow,
  Integration,
  ProgressCallback,
  SheetLayout,
  SheetTable,
  SyncPhase,
  SyncRunResult,
  UpsertOutcome,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface SyncRunOptions {
  /** Destination worksheet; not needed for a dry run */
  table?: SheetTable;
  /** Normalize only, never touching the sink */
  dryRun?: boolean;
  /** Overrides the integration's default lookback */
  lookbackDays?: number;
  now?: Date;
}

/**
 * A runnable sync for one source, independent of its record and session types
 */
export interface SyncJob {
  readonly source: string;
  readonly layout: SheetLayout;
  setProgressCallback(callback: ProgressCallback): void;
  run(options?: SyncRunOptions): Promise<SyncRunResult>;
}

/**
 * Fold rows sharing a key into one; later rows win for the fields they supply
 */
export function mergeRowsByKey(rows: readonly CanonicalRow[]): CanonicalRow[] {
  const merged = new Map<string, CanonicalRow>();
  for (const row of rows) {
    const existing = merged.get(row.key);
    merged.set(
      row.key,
      existing ? { key: row.key, fields: { ...existing.fields, ...row.fields } } : row
    );
  }
  return [...merged.values()];
}

// ============================================================================
// Sync Driver
// ============================================================================

export class SyncDriver<TRecord, TSession> implements SyncJob {
  private phase: SyncPhase = "init";
  private onProgress?: ProgressCallback;

  constructor(private integration: Integration<TRecord, TSession>) {}

  get source(): string {
    return this.integration.source;
  }

  get layout(): SheetLayout {
    return this.integration.layout;
  }

  get currentPhase(): SyncPhase {
    return this.phase;
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  private enter(phase: SyncPhase, total = 0): void {
    this.phase = phase;
    this.onProgress?.({ phase, current: 0, total });
  }

  async run(options: SyncRunOptions = {}): Promise<SyncRunResult> {
    const { source, layout, adapter, enricher, normalize } = this.integration;
    const startedAt = Date.now();
    const ctx = createRunContext({
      source,
      now: options.now,
      lookbackDays: options.lookbackDays ?? this.integration.lookbackDays,
    });
    const log = syncLogger.child({ source });

    const result: SyncRunResult = {
      source,
      worksheet: options.table?.name ?? layout.worksheet,
      status: "succeeded",
      range: ctx.range,
      fetched: 0,
      inserted: 0,
      updated: 0,
      unchanged: 0,
      warnings: ctx.warnings,
      durationMs: 0,
    };

    this.phase = "init";
    log.info({ range: ctx.range, dryRun: options.dryRun === true }, "Sync started");

    let session: { value: TSession } | undefined;

    try {
      this.enter("authenticate");
      session = { value: await adapter.authenticate(ctx) };

      this.enter("fetch");
      const records = await adapter.fetch(session.value, ctx.range, ctx);
      result.fetched = records.length;
      log.info({ records: records.length }, "Fetched records");

      let enriched = records;
      if (enricher) {
        this.enter("enrich", records.length);
        enriched = [];
        for (const [i, record] of records.entries()) {
          enriched.push(await enricher.enrich(session.value, record, ctx));
          this.onProgress?.({ phase: "enrich", current: i + 1, total: records.length });
        }
      }

      this.enter("normalize", enriched.length);
      const rows = enriched.map((record) => normalize(record, ctx));

      if (options.dryRun) {
        result.rows = mergeRowsByKey(rows);
        log.info({ rows: result.rows.length }, "Dry run; sink not touched");
      } else {
        this.enter("upsert", rows.length);
        if (!options.table) {
          throw new ConfigError("No worksheet to write to", { source });
        }

        const sink = new UpsertSink(options.table, layout);
        await sink.open();
        const outcomes = await sink.upsertAll(rows, (row, outcome, position) => {
          this.onProgress?.({
            phase: "upsert",
            current: position + 1,
            total: rows.length,
            currentItem: `${row.key} (${outcome})`,
          });
        });
        countOutcomes(result, outcomes);
      }

      this.enter("done");
    } catch (error) {
      result.status = "failed";
      result.failedPhase = this.phase;
      result.error = errorMessage(error);
      log.error({ phase: this.phase, error: result.error }, "Sync failed");
      this.enter("failed");
    } finally {
      if (session && adapter.release) {
        try {
          await adapter.release(session.value);
        } catch (error) {
          log.warn({ error: errorMessage(error) }, "Could not release source session");
        }
      }
    }

    result.durationMs = Date.now() - startedAt;
    log.info(
      {
        status: result.status,
        fetched: result.fetched,
        inserted: result.inserted,
        updated: result.updated,
        unchanged: result.unchanged,
        warnings: result.warnings.length,
        durationMs: result.durationMs,
      },
      "Sync finished"
    );
    return result;
  }
}

function countOutcomes(result: SyncRunResult, outcomes: UpsertOutcome[]): void {
  for (const outcome of outcomes) {
    result[outcome] += 1;
  }
}

/**
 * Build a driver for an integration
 */
export function createSyncJob<TRecord, TSession>(
  integration: Integration<TRecord, TSession>
): SyncJob {
  return new SyncDriver(integration);
}
