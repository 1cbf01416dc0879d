/**
 * Upsert Sink - Idempotent insert/update of canonical rows into one worksheet
 *
 * The worksheet is read once per run into a natural key index. Rows whose key
 * is already present are updated in place, cell by cell; new keys are
 * appended and indexed so later rows of the same run see them.
 */

import { SchemaError } from "../../errors.js";
import { sheetsLogger } from "../../logger.js";
import { KEY_SEPARATOR, keyColumnsOf } from "./canonical/rows.js";

import type {
  CanonicalRow,
  CellValue,
  CellWrite,
  FieldValue,
  SheetLayout,
  SheetTable,
  UpsertOutcome,
} from "../../types/index.js";

// ============================================================================
// Helpers
// ============================================================================

/**
 * Header lookup name: trimmed and case-insensitive
 */
export function headerName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Cell value for a field; absent values clear the cell
 */
export function toCellValue(value: FieldValue): CellValue {
  return value ?? "";
}

// ============================================================================
// Sink
// ============================================================================

export class UpsertSink {
  private header = new Map<string, number>();
  private width = 0;
  /** Natural key -> 1-based row number */
  private index = new Map<string, number>();
  /** Row number -> cell text as last read or written */
  private cache = new Map<number, string[]>();
  private opened = false;

  constructor(
    private table: SheetTable,
    private layout: SheetLayout
  ) {}

  get worksheet(): string {
    return this.table.name;
  }

  /** Number of keyed data rows currently in the worksheet */
  get size(): number {
    return this.index.size;
  }

  /**
   * Ensure the worksheet exists, read it and index it by natural key.
   */
  async open(): Promise<void> {
    const created = await this.table.ensure(this.layout.columns);
    if (created) {
      sheetsLogger.info({ worksheet: this.table.name }, "Created worksheet with header");
    }

    const rows = await this.table.readAll();
    const headerRow = rows[0] ?? [];

    this.header.clear();
    headerRow.forEach((cell, column) => {
      const name = headerName(cell);
      if (name !== "" && !this.header.has(name)) {
        this.header.set(name, column);
      }
    });
    this.width = headerRow.length;

    const missing = this.layout.columns.filter((column) => !this.header.has(headerName(column)));
    if (missing.length > 0) {
      throw new SchemaError(this.table.name, missing);
    }

    this.index.clear();
    this.cache.clear();
    const keyIndexes = keyColumnsOf(this.layout).map((column) => this.columnIndex(column));

    for (let i = 1; i < rows.length; i++) {
      const row = rows[i];
      if (!row) continue;

      const parts = keyIndexes.map((column) => (row[column] ?? "").trim());
      if (parts.some((part) => part === "")) continue;

      const rowNumber = i + 1;
      const key = parts.join(KEY_SEPARATOR);
      const first = this.index.get(key);
      if (first !== undefined) {
        sheetsLogger.warn(
          { worksheet: this.table.name, key, firstRow: first, duplicateRow: rowNumber },
          "Duplicate key in worksheet; updating the first occurrence"
        );
        continue;
      }

      this.index.set(key, rowNumber);
      this.cache.set(rowNumber, [...row]);
    }

    this.opened = true;
    sheetsLogger.info(
      { worksheet: this.table.name, rows: rows.length - 1, keys: this.index.size },
      "Indexed worksheet"
    );
  }

  private columnIndex(column: string): number {
    const index = this.header.get(headerName(column));
    if (index === undefined) {
      throw new SchemaError(this.table.name, [column]);
    }
    return index;
  }

  /**
   * Check every supplied column against the header before anything is written
   */
  validate(rows: readonly CanonicalRow[]): void {
    const missing = new Set<string>();
    for (const row of rows) {
      for (const column of Object.keys(row.fields)) {
        if (!this.header.has(headerName(column))) {
          missing.add(column);
        }
      }
    }
    if (missing.size > 0) {
      throw new SchemaError(this.table.name, [...missing]);
    }
  }

  /**
   * Upsert rows in order, after validating all of them
   */
  async upsertAll(
    rows: readonly CanonicalRow[],
    onRow?: (row: CanonicalRow, outcome: UpsertOutcome, position: number) => void
  ): Promise<UpsertOutcome[]> {
    this.validate(rows);

    const outcomes: UpsertOutcome[] = [];
    for (const [position, row] of rows.entries()) {
      const outcome = await this.upsert(row);
      outcomes.push(outcome);
      onRow?.(row, outcome, position);
    }
    return outcomes;
  }

  /**
   * Update the row holding `row.key`, or append a new one.
   */
  async upsert(row: CanonicalRow): Promise<UpsertOutcome> {
    if (!this.opened) {
      throw new Error(`Upsert into ${this.table.name} before open()`);
    }

    const rowNumber = this.index.get(row.key);
    return rowNumber === undefined ? this.append(row) : this.update(rowNumber, row);
  }

  private async update(rowNumber: number, row: CanonicalRow): Promise<UpsertOutcome> {
    const keyColumns = new Set(keyColumnsOf(this.layout).map(headerName));
    const cached = this.cache.get(rowNumber) ?? [];
    const writes: CellWrite[] = [];

    for (const [column, value] of Object.entries(row.fields)) {
      if (keyColumns.has(headerName(column))) continue;

      const index = this.columnIndex(column);
      const next = toCellValue(value);
      if ((cached[index] ?? "") === String(next)) continue;

      writes.push({ column: index, value: next });
    }

    if (writes.length === 0) {
      sheetsLogger.debug({ worksheet: this.table.name, key: row.key, rowNumber }, "Row unchanged");
      return "unchanged";
    }

    await this.table.updateCells(rowNumber, writes);

    for (const write of writes) {
      while (cached.length <= write.column) {
        cached.push("");
      }
      cached[write.column] = String(write.value);
    }
    this.cache.set(rowNumber, cached);

    sheetsLogger.debug(
      { worksheet: this.table.name, key: row.key, rowNumber, cells: writes.length },
      "Updated row"
    );
    return "updated";
  }

  private async append(row: CanonicalRow): Promise<UpsertOutcome> {
    const values: CellValue[] = Array.from({ length: this.width }, () => "");
    for (const [column, value] of Object.entries(row.fields)) {
      values[this.columnIndex(column)] = toCellValue(value);
    }

    const rowNumber = await this.table.appendRow(values);
    this.index.set(row.key, rowNumber);
    this.cache.set(rowNumber, values.map(String));

    sheetsLogger.debug({ worksheet: this.table.name, key: row.key, rowNumber }, "Appended row");
    return "inserted";
  }
}
