/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { SourceInfo } from "../../sources/index.js";
import type { CanonicalRow, SheetLayout, SyncRunResult } from "../../types/index.js";

/**
 * Text shown for a canonical field; absent and unsupplied values are blank
 */
export function formatField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  return String(value);
}

/**
 * Display the outcome of one or more sync runs
 */
export function displayRunSummary(results: SyncRunResult[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Source"),
      chalk.cyan("Worksheet"),
      chalk.cyan("Status"),
      chalk.cyan("Range"),
      chalk.cyan("Fetched"),
      chalk.cyan("Inserted"),
      chalk.cyan("Updated"),
      chalk.cyan("Unchanged"),
      chalk.cyan("Warnings"),
    ],
  });

  for (const result of results) {
    const status =
      result.status === "succeeded"
        ? chalk.green("ok")
        : chalk.red(`failed (${result.failedPhase ?? "unknown"})`);
    table.push([
      result.source,
      result.worksheet,
      status,
      `${result.range.start} .. ${result.range.end}`,
      String(result.fetched),
      String(result.inserted),
      String(result.updated),
      String(result.unchanged),
      result.warnings.length > 0 ? chalk.yellow(String(result.warnings.length)) : "0",
    ]);
  }

  console.log(table.toString());

  for (const result of results) {
    if (result.error !== undefined) {
      printError(`${result.source}: ${result.error}`);
    }
    for (const warning of result.warnings) {
      printWarning(`${warning.source}: ${warning.message}`);
    }
  }
}

/**
 * Display the rows a dry run would write
 */
export function displayRows(layout: SheetLayout, rows: CanonicalRow[]): void {
  if (rows.length === 0) {
    console.log(chalk.yellow("No rows to write"));
    return;
  }

  const table = new CliTable3({
    head: layout.columns.map((column) => chalk.cyan(column)),
  });

  for (const row of rows) {
    table.push(layout.columns.map((column) => formatField(row.fields[column])));
  }

  console.log(table.toString());
  console.log(chalk.gray(`\n${String(rows.length)} row(s) would be written\n`));
}

/**
 * Display the available sources
 */
export function displaySourcesTable(sources: SourceInfo[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Source"),
      chalk.cyan("Kind"),
      chalk.cyan("Worksheet"),
      chalk.cyan("Key"),
      chalk.cyan("Lookback"),
      chalk.cyan("Settings"),
    ],
    wordWrap: true,
  });

  for (const source of sources) {
    table.push([
      chalk.green(source.name),
      source.kind,
      source.layout.worksheet,
      (source.layout.keyColumns ?? source.layout.columns.slice(0, 1)).join(" + "),
      `${String(source.lookbackDays)}d`,
      source.settings.join("\n"),
    ]);
  }

  console.log(table.toString());
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
