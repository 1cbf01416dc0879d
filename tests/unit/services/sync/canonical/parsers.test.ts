import { describe, it, expect } from "vitest";

import {
  addDays,
  formatLocalDate,
  parseDateText,
  parseDurationMinutes,
  parseFirstInteger,
  parseFirstNumber,
  roundTo,
  secondsToMinutes,
  toFieldNumber,
  toIsoDate,
} from "../../../../../src/services/sync/canonical/parsers.js";

const TODAY = "2024-12-30";

describe("canonical/parsers", () => {
  // ============================================================================
  // Numbers
  // ============================================================================

  describe("roundTo / secondsToMinutes", () => {
    it("should round to the requested digits", () => {
      expect(roundTo(12.346, 2)).toBe(12.35);
      expect(roundTo(7.04, 1)).toBe(7);
    });

    it("should convert seconds to minutes with one decimal", () => {
      expect(secondsToMinutes(1800)).toBe(30);
      expect(secondsToMinutes(95)).toBe(1.6);
      expect(secondsToMinutes(0)).toBe(0);
    });
  });

  describe("toFieldNumber", () => {
    it("should keep finite numbers including zero", () => {
      expect(toFieldNumber(0)).toBe(0);
      expect(toFieldNumber(142.5)).toBe(142.5);
    });

    it("should map missing or non-numeric values to null", () => {
      expect(toFieldNumber(undefined)).toBeNull();
      expect(toFieldNumber(null)).toBeNull();
      expect(toFieldNumber("12")).toBeNull();
      expect(toFieldNumber(Number.NaN)).toBeNull();
      expect(toFieldNumber(Number.POSITIVE_INFINITY)).toBeNull();
    });
  });

  describe("parseFirstNumber", () => {
    it("should take the first decimal number in free text", () => {
      expect(parseFirstNumber("Coherence: 5.8 (High)")).toBe(5.8);
      expect(parseFirstNumber("3 of 4")).toBe(3);
    });

    it("should return null without a number", () => {
      expect(parseFirstNumber("n/a")).toBeNull();
      expect(parseFirstNumber(undefined)).toBeNull();
    });
  });

  describe("parseFirstInteger", () => {
    it("should take the first integer token", () => {
      expect(parseFirstInteger("Achievement 240 pts")).toBe(240);
      expect(parseFirstInteger("12.9")).toBe(12);
    });

    it("should return null without digits", () => {
      expect(parseFirstInteger("none")).toBeNull();
      expect(parseFirstInteger(undefined)).toBeNull();
    });
  });

  describe("parseDurationMinutes", () => {
    it("should read MM:SS as fractional minutes", () => {
      expect(parseDurationMinutes("15:30")).toBe(15.5);
      expect(parseDurationMinutes("05:20")).toBe(5.3);
    });

    it("should read a bare number as whole minutes", () => {
      expect(parseDurationMinutes("22")).toBe(22);
      expect(parseDurationMinutes("22 min")).toBe(22);
    });

    it("should return null for text without a duration", () => {
      expect(parseDurationMinutes("n/a")).toBeNull();
      expect(parseDurationMinutes(undefined)).toBeNull();
    });
  });

  // ============================================================================
  // Dates
  // ============================================================================

  describe("toIsoDate", () => {
    it("should format valid calendar dates", () => {
      expect(toIsoDate(2024, 2, 29)).toBe("2024-02-29");
    });

    it("should reject impossible dates", () => {
      expect(toIsoDate(2023, 2, 29)).toBeNull();
      expect(toIsoDate(2024, 13, 1)).toBeNull();
      expect(toIsoDate(2024, 4, 31)).toBeNull();
      expect(toIsoDate(2024, 4, 0)).toBeNull();
    });
  });

  describe("addDays", () => {
    it("should shift across month and year boundaries", () => {
      expect(addDays("2024-12-30", 2)).toBe("2025-01-01");
      expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
      expect(addDays("2024-12-30", 0)).toBe("2024-12-30");
    });
  });

  describe("formatLocalDate", () => {
    it("should use the local calendar date", () => {
      expect(formatLocalDate(new Date(2024, 11, 30, 23, 59))).toBe("2024-12-30");
      expect(formatLocalDate(new Date(2025, 0, 5, 0, 1))).toBe("2025-01-05");
    });
  });

  describe("parseDateText", () => {
    it("should accept ISO dates", () => {
      expect(parseDateText("2024-12-29", TODAY)).toBe("2024-12-29");
      expect(parseDateText("  2024-1-5 ", TODAY)).toBe("2024-01-05");
    });

    it("should read slash dates month first", () => {
      expect(parseDateText("12/29/2024", TODAY)).toBe("2024-12-29");
      expect(parseDateText("03/04/2024", TODAY)).toBe("2024-03-04");
    });

    it("should fall back to day first when month first is impossible", () => {
      expect(parseDateText("29/12/2024", TODAY)).toBe("2024-12-29");
    });

    it("should accept English month names in any case", () => {
      expect(parseDateText("December 29, 2024", TODAY)).toBe("2024-12-29");
      expect(parseDateText("march 3, 2024", TODAY)).toBe("2024-03-03");
    });

    it("should return today for missing or unparseable text", () => {
      expect(parseDateText(undefined, TODAY)).toBe(TODAY);
      expect(parseDateText("yesterday", TODAY)).toBe(TODAY);
      expect(parseDateText("Smarch 3, 2024", TODAY)).toBe(TODAY);
    });

    it("should reject impossible calendar dates", () => {
      expect(parseDateText("2023-02-29", TODAY)).toBe(TODAY);
      expect(parseDateText("31/31/2024", TODAY)).toBe(TODAY);
    });
  });
});
