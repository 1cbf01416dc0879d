/**
 * Text and unit parsers shared by the record normalizers.
 *
 * Every parser is total: malformed input yields `null` (or the fallback date),
 * never an exception.
 */

// ============================================================================
// Parsing Patterns
// ============================================================================

const ISO_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const SLASH_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const MONTH_NAME_DATE_PATTERN = /^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/;
const FIRST_NUMBER_PATTERN = /\d+\.?\d*/;
const FIRST_INTEGER_PATTERN = /\d+/;
const MINUTES_SECONDS_PATTERN = /(\d+):(\d+)/;

const MONTHS_EN = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

// ============================================================================
// Numbers
// ============================================================================

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function secondsToMinutes(seconds: number): number {
  return roundTo(seconds / 60, 1);
}

/**
 * Keep finite numbers, map everything else to an absent value
 */
export function toFieldNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

/**
 * First decimal number in free text, e.g. "Score: 5.8 (High)" -> 5.8
 */
export function parseFirstNumber(text: string | undefined): number | null {
  if (text === undefined) {
    return null;
  }
  const match = FIRST_NUMBER_PATTERN.exec(text);
  return match !== null ? Number.parseFloat(match[0]) : null;
}

export function parseFirstInteger(text: string | undefined): number | null {
  if (text === undefined) {
    return null;
  }
  const match = FIRST_INTEGER_PATTERN.exec(text);
  return match !== null ? Number.parseInt(match[0], 10) : null;
}

/**
 * Duration in minutes: "15:30" -> 15.5, "22" -> 22, "n/a" -> null
 */
export function parseDurationMinutes(text: string | undefined): number | null {
  if (text === undefined) {
    return null;
  }

  const clock = MINUTES_SECONDS_PATTERN.exec(text);
  if (clock?.[1] !== undefined && clock[2] !== undefined) {
    const minutes = Number.parseInt(clock[1], 10);
    const seconds = Number.parseInt(clock[2], 10);
    return roundTo(minutes + seconds / 60, 1);
  }

  return parseFirstInteger(text);
}

// ============================================================================
// Dates
// ============================================================================

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Format year/month/day as YYYY-MM-DD, or null if the day does not exist
 */
export function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) {
    return null;
  }
  return `${String(year).padStart(4, "0")}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Local calendar date of a timestamp as YYYY-MM-DD
 */
export function formatLocalDate(date: Date): string {
  return `${String(date.getFullYear())}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/**
 * Shift a YYYY-MM-DD date by whole days
 */
export function addDays(isoDate: string, days: number): string {
  const [year = 1970, month = 1, day = 1] = isoDate.split("-").map(Number);
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return `${String(shifted.getUTCFullYear())}-${pad2(shifted.getUTCMonth() + 1)}-${pad2(shifted.getUTCDate())}`;
}

function parseIsoDate(text: string): string | null {
  const match = ISO_DATE_PATTERN.exec(text);
  if (match === null) {
    return null;
  }
  return toIsoDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

function parseMonthFirst(text: string): string | null {
  const match = SLASH_DATE_PATTERN.exec(text);
  if (match === null) {
    return null;
  }
  return toIsoDate(Number(match[3]), Number(match[1]), Number(match[2]));
}

function parseDayFirst(text: string): string | null {
  const match = SLASH_DATE_PATTERN.exec(text);
  if (match === null) {
    return null;
  }
  return toIsoDate(Number(match[3]), Number(match[2]), Number(match[1]));
}

function parseMonthName(text: string): string | null {
  const match = MONTH_NAME_DATE_PATTERN.exec(text);
  if (match?.[1] === undefined) {
    return null;
  }
  const monthIndex = MONTHS_EN.indexOf(match[1].toLowerCase());
  if (monthIndex === -1) {
    return null;
  }
  return toIsoDate(Number(match[3]), monthIndex + 1, Number(match[2]));
}

// Tried in order; "03/04/2024" is read month-first
const DATE_PARSERS = [parseIsoDate, parseMonthFirst, parseDayFirst, parseMonthName];

/**
 * Canonicalize a displayed date to YYYY-MM-DD.
 *
 * Accepts YYYY-MM-DD, MM/DD/YYYY, DD/MM/YYYY and "Month DD, YYYY". Text that
 * matches none of them (or no text at all) yields `fallback`.
 */
export function parseDateText(text: string | undefined, fallback: string): string {
  if (text === undefined) {
    return fallback;
  }
  const trimmed = text.trim();
  for (const parse of DATE_PARSERS) {
    const parsed = parse(trimmed);
    if (parsed !== null) {
      return parsed;
    }
  }
  return fallback;
}
