/**
 * Timestamp model.
 *
 * A Timestamp is a non-negative integer tick. Every artifact version, run and
 * input binding is positioned on this single, totally ordered axis, so offsets
 * are plain integer arithmetic (`t - 1` is "one tick earlier").
 *
 * Two canonical string forms are supported, selected per deployment:
 *
 *   "tick"    the decimal integer itself ("42")
 *   "yymmdd"  the tick is a day number since 1970-01-01 (UTC) and renders as
 *             a six digit date, e.g. 19508 <-> "230531"
 *
 * The day-based helpers below also cover the spreadsheet-facing date shapes
 * that show up in column headers and cells:
 *
 *   snapshot     "MAY31"     month + day, year taken from a reference
 *   excel date   "23-05-31"  YY-MM-DD
 *   excel int    45077       days counted from 1899-12-30
 */

import { EngineError } from "../errors.js";

export type Timestamp = number;

export type TimestampFormat = "tick" | "yymmdd";

export class InvalidTimestampError extends EngineError {
  constructor(message: string) {
    super("INVALID_TIMESTAMP", message);
  }
}

const MS_PER_DAY = 86_400_000;

/** Day number of 1899-12-30, the zero of spreadsheet serial dates. */
const EXCEL_EPOCH_DAY = -25_569;

/** 2000-01-01 and 2099-12-31 as spreadsheet serial dates. */
const EXCEL_MIN_SERIAL = 36_526;
const EXCEL_MAX_SERIAL = 73_050;

const MONTHS = [
  "JAN", "FEB", "MAR", "APR", "MAY", "JUN",
  "JUL", "AUG", "SEP", "OCT", "NOV", "DEC",
] as const;

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export function isTimestamp(value: unknown): value is Timestamp {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Negative if a < b, zero if equal, positive if a > b.
 */
export function compareTimestamps(a: Timestamp, b: Timestamp): number {
  return a - b;
}

// ============================================================
// Calendar conversions
// ============================================================

function dayFromCalendar({ year, month, day }: CalendarDate): Timestamp {
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    throw new InvalidTimestampError(
      `Not a calendar date: ${year}-${month}-${day}`
    );
  }
  return Math.round(ms / MS_PER_DAY);
}

function calendarFromDay(day: Timestamp): CalendarDate {
  const date = new Date(day * MS_PER_DAY);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  };
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function twoDigitYear(year: number): string {
  if (year < 2000 || year > 2099) {
    throw new InvalidTimestampError(
      `Year ${year} cannot be written with two digits (supported: 2000-2099)`
    );
  }
  return pad2(year - 2000);
}

/**
 * Day number of a JavaScript Date (UTC calendar day).
 */
export function fromDate(date: Date): Timestamp {
  return dayFromCalendar({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  });
}

export function toDate(day: Timestamp): Date {
  return new Date(day * MS_PER_DAY);
}

/**
 * Parse "YYMMDD" (e.g. "230421" for 21 April 2023) into a day number.
 */
export function fromYymmdd(text: string): Timestamp {
  const match = /^(\d{2})(\d{2})(\d{2})$/.exec(text);
  if (!match) {
    throw new InvalidTimestampError(`Expected YYMMDD, got "${text}"`);
  }
  const [, yy, mm, dd] = match;
  return dayFromCalendar({
    year: 2000 + Number(yy),
    month: Number(mm),
    day: Number(dd),
  });
}

export function toYymmdd(day: Timestamp): string {
  const { year, month, day: dayOfMonth } = calendarFromDay(day);
  return `${twoDigitYear(year)}${pad2(month)}${pad2(dayOfMonth)}`;
}

/**
 * Render a day as a snapshot label such as "APR14" (no year).
 */
export function toSnapshot(day: Timestamp): string {
  const { month, day: dayOfMonth } = calendarFromDay(day);
  return `${MONTHS[month - 1]}${pad2(dayOfMonth)}`;
}

/**
 * Parse a snapshot label. Snapshots carry no year, so the year of
 * `reference` is used.
 */
export function fromSnapshot(snapshot: string, reference: Timestamp): Timestamp {
  const match = /^([A-Za-z]{3})(\d{2})$/.exec(snapshot);
  const monthIndex = match
    ? MONTHS.findIndex((name) => name === match[1]?.toUpperCase())
    : -1;
  if (!match || monthIndex < 0) {
    throw new InvalidTimestampError(`Expected a snapshot like "APR14", got "${snapshot}"`);
  }
  return dayFromCalendar({
    year: calendarFromDay(reference).year,
    month: monthIndex + 1,
    day: Number(match[2]),
  });
}

/**
 * Parse a spreadsheet date cell in "YY-MM-DD" form.
 */
export function fromExcelDate(text: string): Timestamp {
  const match = /^(\d{2})-(\d{2})-(\d{2})$/.exec(text);
  if (!match) {
    throw new InvalidTimestampError(`Expected YY-MM-DD, got "${text}"`);
  }
  return fromYymmdd(`${match[1]}${match[2]}${match[3]}`);
}

export function toExcelDate(day: Timestamp): string {
  const { year, month, day: dayOfMonth } = calendarFromDay(day);
  return `${twoDigitYear(year)}-${pad2(month)}-${pad2(dayOfMonth)}`;
}

/**
 * Convert a spreadsheet serial date (45077 is 31 May 2023). Only serials for
 * 2000-01-01 through 2099-12-31 are accepted; anything else is most likely a
 * time of day or an unrelated number.
 */
export function fromExcelInt(serial: number): Timestamp {
  if (
    !Number.isInteger(serial) ||
    serial < EXCEL_MIN_SERIAL ||
    serial > EXCEL_MAX_SERIAL
  ) {
    throw new InvalidTimestampError(
      `Bad spreadsheet date ${serial}: expected an integer between ${EXCEL_MIN_SERIAL} and ${EXCEL_MAX_SERIAL}`
    );
  }
  return serial + EXCEL_EPOCH_DAY;
}

export function toExcelInt(day: Timestamp): number {
  return day - EXCEL_EPOCH_DAY;
}

/**
 * Today's day number, unless a `forcedToday` ("YYMMDD") pins it. Tests and
 * replays pin it to get deterministic runs.
 */
export function today(forcedToday?: string | null): Timestamp {
  if (forcedToday) {
    return fromYymmdd(forcedToday);
  }
  return fromDate(new Date());
}

// ============================================================
// Canonical forms
// ============================================================

export function formatTimestamp(t: Timestamp, format: TimestampFormat): string {
  if (!isTimestamp(t)) {
    throw new InvalidTimestampError(`Timestamp must be a non-negative integer, got ${t}`);
  }
  return format === "yymmdd" ? toYymmdd(t) : String(t);
}

export function parseTimestamp(text: string, format: TimestampFormat): Timestamp {
  if (format === "yymmdd") {
    return fromYymmdd(text);
  }
  if (!/^(0|[1-9]\d*)$/.test(text)) {
    throw new InvalidTimestampError(`Expected a decimal tick, got "${text}"`);
  }
  return Number(text);
}

/**
 * Regex source matching exactly the canonical strings of `format`.
 */
export function timestampPattern(format: TimestampFormat): string {
  return format === "yymmdd" ? "\\d{6}" : "0|[1-9]\\d*";
}
