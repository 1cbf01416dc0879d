import { describe, it, expect } from "vitest";

import { createRow, keyColumnsOf } from "../../../../../src/services/sync/canonical/rows.js";

import type { SheetLayout } from "../../../../../src/types/index.js";

const DAILY: SheetLayout = { worksheet: "daily", columns: ["date", "score"] };
const EVENTS: SheetLayout = {
  worksheet: "events",
  columns: ["date", "time", "name"],
  keyColumns: ["date", "time"],
};

describe("canonical/rows", () => {
  it("should default the key to the first column", () => {
    expect(keyColumnsOf(DAILY)).toEqual(["date"]);
    expect(keyColumnsOf(EVENTS)).toEqual(["date", "time"]);
  });

  it("should build single and composite keys", () => {
    expect(createRow(DAILY, { date: "2024-12-29", score: 81 }).key).toBe("2024-12-29");
    expect(
      createRow(EVENTS, { date: "2024-12-29", time: "07:15:00", name: "Morning Run" }).key
    ).toBe("2024-12-29_07:15:00");
  });

  it("should keep fields as given", () => {
    const row = createRow(DAILY, { date: "2024-12-29", score: null });
    expect(row.fields).toEqual({ date: "2024-12-29", score: null });
  });

  it("should throw when a key column has no value", () => {
    expect(() => createRow(EVENTS, { date: "2024-12-29", time: null })).toThrow(
      'Key column "time" has no value'
    );
  });
});
