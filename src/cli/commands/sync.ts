import { InvalidArgumentError } from "commander";
import ora from "ora";

import { loadConfig, requireSetting, type AppConfig } from "../../config.js";
import { ConfigError, errorMessage } from "../../errors.js";
import { logger } from "../../logger.js";
import { createSheetsApi, GoogleSheetTable } from "../../sheets/client.js";
import {
  buildSyncJob,
  parseSourceName,
  SOURCE_NAMES,
  type SourceName,
} from "../../sources/index.js";
import { displayRows, displayRunSummary, printError, printWarning } from "../utils/display.js";

import type { SyncJob } from "../../services/sync/index.js";
import type { SheetTable, SyncRunResult } from "../../types/index.js";
import type { sheets_v4 } from "googleapis";
import type { Command } from "commander";

// ============================================================================
// Options
// ============================================================================

export interface SyncCommandOptions {
  sheet?: string;
  worksheet?: string;
  days?: number;
  dryRun?: boolean;
}

export function parseDays(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a whole number of days.");
  }
  return Number.parseInt(value, 10);
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Resolves the worksheet a job writes to, creating the Sheets client once
 */
function createTableFactory(
  config: AppConfig,
  options: SyncCommandOptions
): (job: SyncJob) => SheetTable {
  let api: sheets_v4.Sheets | undefined;

  return (job) => {
    const sheetId = requireSetting(options.sheet ?? config.sheetId, "SHEET_ID");
    api ??= createSheetsApi(
      requireSetting(config.googleCredentialsJson, "GOOGLE_CREDENTIALS_JSON")
    );
    return new GoogleSheetTable(api, sheetId, options.worksheet ?? job.layout.worksheet);
  };
}

async function runJob(
  job: SyncJob,
  options: SyncCommandOptions,
  lookbackDays: number | undefined,
  tableFor: (job: SyncJob) => SheetTable
): Promise<SyncRunResult> {
  const spinner = ora(`Syncing ${job.source}...`).start();

  job.setProgressCallback((progress) => {
    spinner.text =
      progress.total > 0
        ? `${job.source} ${progress.phase}: ${String(progress.current)}/${String(progress.total)} ${progress.currentItem ?? ""}`
        : `${job.source} ${progress.phase}...`;
  });

  const result = await job.run({
    table: options.dryRun === true ? undefined : tableFor(job),
    dryRun: options.dryRun,
    lookbackDays,
  });

  if (result.status === "succeeded") {
    spinner.succeed(
      `${job.source}: ${String(result.fetched)} fetched, ${String(result.inserted)} inserted, ${String(result.updated)} updated, ${String(result.unchanged)} unchanged`
    );
  } else {
    spinner.fail(
      `${job.source}: failed during ${result.failedPhase ?? "sync"}: ${result.error ?? ""}`
    );
  }

  if (result.rows) {
    displayRows(job.layout, result.rows);
  }
  return result;
}

/**
 * Run one source, or every configured source in turn for "all"
 */
export async function runSyncCommand(
  sourceArg: string,
  options: SyncCommandOptions,
  config: AppConfig = loadConfig()
): Promise<SyncRunResult[]> {
  const all = sourceArg.trim().toLowerCase() === "all";
  if (all && options.worksheet !== undefined) {
    throw new ConfigError("--worksheet cannot be combined with 'sync all'");
  }

  const names: SourceName[] = all ? [...SOURCE_NAMES] : [parseSourceName(sourceArg)];
  const tableFor = createTableFactory(config, options);
  const results: SyncRunResult[] = [];

  for (const name of names) {
    let job: SyncJob;
    try {
      job = buildSyncJob(name, config);
    } catch (error) {
      if (all && error instanceof ConfigError) {
        printWarning(`Skipping ${name}: ${error.message}`);
        continue;
      }
      throw error;
    }
    results.push(await runJob(job, options, options.days ?? config.lookbackDays, tableFor));
  }

  if (all && results.length === 0) {
    throw new ConfigError("No source is configured");
  }
  return results;
}

// ============================================================================
// Sync Command
// ============================================================================

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Sync recent records from a source into its worksheet")
    .argument("<source>", `source to sync (${SOURCE_NAMES.join(", ")}, or all)`)
    .option("--sheet <id>", "spreadsheet id (defaults to SHEET_ID)")
    .option("--worksheet <name>", "worksheet name (defaults to the source's worksheet)")
    .option("--days <n>", "days before today to rescan", parseDays)
    .option("--dry-run", "fetch and normalize without writing")
    .action(async (source: string, options: SyncCommandOptions) => {
      try {
        const results = await runSyncCommand(source, options);
        displayRunSummary(results);
        if (results.some((result) => result.status === "failed")) {
          process.exitCode = 1;
        }
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Sync command failed");
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });
}
