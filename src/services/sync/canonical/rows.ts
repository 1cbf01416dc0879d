import type { CanonicalRow, FieldValue, SheetLayout } from "../../../types/index.js";

export const KEY_SEPARATOR = "_";

export function keyColumnsOf(layout: SheetLayout): readonly string[] {
  if (layout.keyColumns !== undefined && layout.keyColumns.length > 0) {
    return layout.keyColumns;
  }
  return layout.columns.slice(0, 1);
}

/**
 * Build a canonical row, deriving the natural key from the layout's key columns.
 *
 * Key columns must be present as non-empty values in `fields`.
 */
export function createRow(
  layout: SheetLayout,
  fields: Record<string, FieldValue>
): CanonicalRow {
  const parts = keyColumnsOf(layout).map((column) => {
    const value = fields[column];
    if (value === undefined || value === null || value === "") {
      throw new Error(`Key column "${column}" has no value`);
    }
    return String(value);
  });

  return { key: parts.join(KEY_SEPARATOR), fields };
}
