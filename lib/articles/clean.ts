/**
 * Cell-level coercions applied while loading the articles CSV. Every helper
 * returns null for values it cannot interpret instead of throwing.
 */

const NA_MARKERS = new Set([
  "",
  "#N/A",
  "#N/A N/A",
  "#NA",
  "-1.#IND",
  "-1.#QNAN",
  "-NaN",
  "-nan",
  "1.#IND",
  "1.#QNAN",
  "<NA>",
  "N/A",
  "NA",
  "NULL",
  "NaN",
  "None",
  "n/a",
  "nan",
  "null",
]);

/** Returns the cell verbatim, or null when it is absent or an NA marker. */
export function cleanText(raw: string | undefined): string | null {
  if (raw === undefined || NA_MARKERS.has(raw)) return null;
  return raw;
}

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/;
const DAY_FIRST_DATE = /^(\d{1,2})([/.-])(\d{1,2})\2(\d{4})(?:\s.*)?$/;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parses a publication date, reading ambiguous numeric dates day first
 * (03/04/2024 is 3 April). Returns YYYY-MM-DD.
 */
export function parseDayFirstDate(raw: string | undefined): string | null {
  const text = cleanText(raw);
  if (text === null) return null;
  const value = text.trim();

  let year: number;
  let month: number;
  let day: number;

  const iso = ISO_DATE.exec(value);
  const dayFirst = iso ? null : DAY_FIRST_DATE.exec(value);
  if (iso) {
    year = Number(iso[1]);
    month = Number(iso[2]);
    day = Number(iso[3]);
  } else if (dayFirst) {
    day = Number(dayFirst[1]);
    month = Number(dayFirst[3]);
    year = Number(dayFirst[4]);
  } else {
    return null;
  }

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

const CLOCK_TIME = /^(\d{1,2}):(\d{2}):(\d{2})$/;

/** Parses an HH:MM:SS wall-clock time. */
export function parseClockTime(raw: string | undefined): string | null {
  const text = cleanText(raw);
  if (text === null) return null;
  const match = CLOCK_TIME.exec(text.trim());
  if (!match) return null;
  const [hours, minutes, seconds] = [match[1], match[2], match[3]].map(Number);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
}

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseNumeric(raw: string | undefined): number | null {
  const text = cleanText(raw);
  if (text === null) return null;
  const value = text.trim();
  if (!DECIMAL.test(value)) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}
