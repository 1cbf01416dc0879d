import { describe, it, expect, vi } from "vitest";

import {
  buildDateRange,
  createRunContext,
  eachDay,
} from "../../../../src/services/sync/context.js";

vi.mock("../../../../src/logger.js", async () =>
  (await import("../../../mocks/logger.js")).mockLoggerModule()
);

describe("sync/context", () => {
  it("should build an inclusive range ending today", () => {
    expect(buildDateRange("2024-12-30", 2)).toEqual({ start: "2024-12-28", end: "2024-12-30" });
    expect(buildDateRange("2024-12-30", 0)).toEqual({ start: "2024-12-30", end: "2024-12-30" });
  });

  it("should treat a negative lookback as today only", () => {
    expect(buildDateRange("2024-12-30", -3)).toEqual({ start: "2024-12-30", end: "2024-12-30" });
  });

  it("should list every day of a range oldest first", () => {
    expect(eachDay({ start: "2024-12-30", end: "2025-01-01" })).toEqual([
      "2024-12-30",
      "2024-12-31",
      "2025-01-01",
    ]);
  });

  it("should derive today and the range from the given clock", () => {
    const ctx = createRunContext({
      source: "oura",
      now: new Date(2024, 11, 30, 8, 0),
      lookbackDays: 1,
    });

    expect(ctx.today).toBe("2024-12-30");
    expect(ctx.range).toEqual({ start: "2024-12-29", end: "2024-12-30" });
  });

  it("should collect warnings with the source name", () => {
    const ctx = createRunContext({ source: "oura", lookbackDays: 0 });
    ctx.warn("heartrate unavailable", { status: 500 });

    expect(ctx.warnings).toEqual([
      { source: "oura", message: "heartrate unavailable", details: { status: 500 } },
    ]);
  });
});
