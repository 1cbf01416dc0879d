import { describe, it, expect, vi } from "vitest";

import { AuthFailure, FetchFailure } from "../../../../src/errors.js";
import { createRow } from "../../../../src/services/sync/canonical/rows.js";
import { mergeRowsByKey, SyncDriver } from "../../../../src/services/sync/orchestrator.js";
import { MemorySheetTable } from "../../../mocks/sheets.js";

import type {
  DetailEnricher,
  Integration,
  SheetLayout,
  SyncPhase,
} from "../../../../src/types/index.js";

vi.mock("../../../../src/logger.js", async () =>
  (await import("../../../mocks/logger.js")).mockLoggerModule()
);

interface DailyScore {
  date: string;
  score?: number;
}

const LAYOUT: SheetLayout = { worksheet: "daily", columns: ["date", "score", "notes"] };
const NOW = new Date(2024, 11, 30, 9, 0);
const SESSION = "session-token";

function createIntegration(records: DailyScore[]) {
  const adapter = {
    kind: "static-token" as const,
    authenticate: vi.fn(async () => SESSION),
    fetch: vi.fn(async () => records),
    release: vi.fn(async () => undefined),
  };
  const integration: Integration<DailyScore, string> = {
    source: "fake",
    layout: LAYOUT,
    adapter,
    normalize: (record) =>
      createRow(LAYOUT, { date: record.date, score: record.score ?? null }),
    lookbackDays: 1,
  };
  return { integration, adapter };
}

function existingTable() {
  return new MemorySheetTable("daily", [
    ["date", "score", "notes"],
    ["2024-12-29", "", "felt good"],
  ]);
}

describe("sync/orchestrator", () => {
  describe("run", () => {
    it("should update the existing row and append the new one", async () => {
      const { integration, adapter } = createIntegration([
        { date: "2024-12-29", score: 80 },
        { date: "2024-12-30", score: 82 },
      ]);
      const table = existingTable();

      const result = await new SyncDriver(integration).run({ table, now: NOW });

      expect(table.rows).toEqual([
        ["date", "score", "notes"],
        ["2024-12-29", "80", "felt good"],
        ["2024-12-30", "82", ""],
      ]);
      expect(result).toMatchObject({
        source: "fake",
        worksheet: "daily",
        status: "succeeded",
        range: { start: "2024-12-29", end: "2024-12-30" },
        fetched: 2,
        inserted: 1,
        updated: 1,
        unchanged: 0,
      });
      expect(adapter.fetch).toHaveBeenCalledWith(
        SESSION,
        { start: "2024-12-29", end: "2024-12-30" },
        expect.objectContaining({ source: "fake", today: "2024-12-30" })
      );
      expect(adapter.release).toHaveBeenCalledWith(SESSION);
    });

    it("should report unchanged rows on a repeated run", async () => {
      const { integration } = createIntegration([{ date: "2024-12-29", score: 80 }]);
      const table = existingTable();
      const driver = new SyncDriver(integration);

      await driver.run({ table, now: NOW });
      const second = await driver.run({ table, now: NOW });

      expect(second).toMatchObject({ inserted: 0, updated: 0, unchanged: 1 });
      expect(table.rows).toHaveLength(2);
    });

    it("should use the lookback override", async () => {
      const { integration } = createIntegration([]);

      const result = await new SyncDriver(integration).run({
        table: existingTable(),
        now: NOW,
        lookbackDays: 6,
      });

      expect(result.range).toEqual({ start: "2024-12-24", end: "2024-12-30" });
    });

    it("should fail in authenticate without touching the sink", async () => {
      const { integration, adapter } = createIntegration([]);
      adapter.authenticate.mockRejectedValueOnce(
        new AuthFailure("Token refresh failed with status 401", 401, "invalid_grant")
      );
      const table = existingTable();

      const result = await new SyncDriver(integration).run({ table, now: NOW });

      expect(result.status).toBe("failed");
      expect(result.failedPhase).toBe("authenticate");
      expect(result.error).toBe("Token refresh failed with status 401");
      expect(adapter.fetch).not.toHaveBeenCalled();
      expect(adapter.release).not.toHaveBeenCalled();
      expect(table.reads).toBe(0);
    });

    it("should release the session when fetch fails", async () => {
      const { integration, adapter } = createIntegration([]);
      adapter.fetch.mockRejectedValueOnce(
        new FetchFailure("activities", "activities request failed with status 500", 500)
      );

      const result = await new SyncDriver(integration).run({ table: existingTable(), now: NOW });

      expect(result.failedPhase).toBe("fetch");
      expect(adapter.release).toHaveBeenCalledTimes(1);
    });

    it("should fail in upsert on a schema mismatch before writing", async () => {
      const { integration, adapter } = createIntegration([{ date: "2024-12-30", score: 1 }]);
      const table = new MemorySheetTable("daily", [["date", "score"]]);

      const result = await new SyncDriver(integration).run({ table, now: NOW });

      expect(result.failedPhase).toBe("upsert");
      expect(result.error).toBe('Worksheet "daily" is missing required column(s): notes');
      expect(table.writes).toBe(0);
      expect(adapter.release).toHaveBeenCalledTimes(1);
    });

    it("should fail in upsert when no worksheet is given", async () => {
      const { integration } = createIntegration([{ date: "2024-12-30" }]);

      const result = await new SyncDriver(integration).run({ now: NOW });

      expect(result.failedPhase).toBe("upsert");
      expect(result.error).toBe("No worksheet to write to");
    });

    it("should succeed when releasing the session fails", async () => {
      const { integration, adapter } = createIntegration([]);
      adapter.release.mockRejectedValueOnce(new Error("browser already closed"));

      const result = await new SyncDriver(integration).run({ table: existingTable(), now: NOW });

      expect(result.status).toBe("succeeded");
    });

    it("should return merged rows on a dry run", async () => {
      const { integration } = createIntegration([
        { date: "2024-12-29", score: 80 },
        { date: "2024-12-29", score: 81 },
      ]);
      const table = existingTable();

      const result = await new SyncDriver(integration).run({ table, now: NOW, dryRun: true });

      expect(result.rows).toEqual([
        { key: "2024-12-29", fields: { date: "2024-12-29", score: 81 } },
      ]);
      expect(result.inserted).toBe(0);
      expect(table.reads).toBe(0);
    });

    it("should enrich every record and report each phase", async () => {
      const { integration } = createIntegration([
        { date: "2024-12-29", score: 1 },
        { date: "2024-12-30", score: 2 },
      ]);
      const enricher: DetailEnricher<DailyScore, string> = {
        enrich: vi.fn(async (_session: string, record: DailyScore) => ({
          ...record,
          score: (record.score ?? 0) * 10,
        })),
      };
      const driver = new SyncDriver({ ...integration, enricher });
      const phases: SyncPhase[] = [];
      driver.setProgressCallback((progress) => {
        if (phases.at(-1) !== progress.phase) {
          phases.push(progress.phase);
        }
      });
      const table = existingTable();

      const result = await driver.run({ table, now: NOW });

      expect(phases).toEqual(["authenticate", "fetch", "enrich", "normalize", "upsert", "done"]);
      expect(enricher.enrich).toHaveBeenCalledTimes(2);
      expect(result.status).toBe("succeeded");
      expect(table.rows[1]).toEqual(["2024-12-29", "10", "felt good"]);
      expect(table.rows[2]).toEqual(["2024-12-30", "20", ""]);
      expect(driver.currentPhase).toBe("done");
    });
  });

  describe("mergeRowsByKey", () => {
    it("should let later rows win for the fields they supply", () => {
      expect(
        mergeRowsByKey([
          { key: "a", fields: { date: "a", score: 1, notes: "x" } },
          { key: "b", fields: { date: "b" } },
          { key: "a", fields: { date: "a", score: 2 } },
        ])
      ).toEqual([
        { key: "a", fields: { date: "a", score: 2, notes: "x" } },
        { key: "b", fields: { date: "b" } },
      ]);
    });
  });
});
