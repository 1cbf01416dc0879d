import { syncLogger } from "../../logger.js";
import { addDays, formatLocalDate } from "./canonical/parsers.js";

import type { DateRange, RunContext, RunWarning } from "../../types/index.js";

export interface RunContextOptions {
  source: string;
  now?: Date;
  /** Days before today included in the range; 0 syncs today only */
  lookbackDays: number;
}

/**
 * The rescanned window: `lookbackDays` before today through today, inclusive
 */
export function buildDateRange(today: string, lookbackDays: number): DateRange {
  return { start: addDays(today, -Math.max(0, lookbackDays)), end: today };
}

/**
 * Every date in an inclusive range, oldest first
 */
export function eachDay(range: DateRange): string[] {
  const days: string[] = [];
  for (let day = range.start; day <= range.end; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}

export function createRunContext(options: RunContextOptions): RunContext {
  const today = formatLocalDate(options.now ?? new Date());
  const warnings: RunWarning[] = [];

  return {
    source: options.source,
    today,
    range: buildDateRange(today, options.lookbackDays),
    warnings,
    warn(message, details) {
      warnings.push({ source: options.source, message, details });
      syncLogger.warn({ source: options.source, ...details }, message);
    },
  };
}
