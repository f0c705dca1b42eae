// engine/normalizeFields.ts
// Field normalization helpers shared by the row validator and the record assembler.
// Every helper is total: it returns null (or isAllowed: false) instead of throwing.

import type { CalendarDate, FuelType, RawCellValue, VehicleType } from './types';
import { FUEL_TYPES, VEHICLE_TYPES } from './constants';
import {
  ADDRESS_DIGIT,
  ADDRESS_LETTER,
  DECIMAL_TEXT,
  INTEGER_TEXT,
  INTEGER_ZERO_FRACTION_TEXT,
  ISO_DATE
} from './regex';

// ------------------------------------------------------------
// Core string helpers
// ------------------------------------------------------------

/**
 * Convert a raw cell to a trimmed string.
 * Never returns null/undefined; always returns a string (possibly empty).
 */
export function toSafeTrimmedString(value: RawCellValue | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

export function isBlank(value: RawCellValue | undefined): boolean {
  return toSafeTrimmedString(value) === '';
}

// ------------------------------------------------------------
// Numbers
// ------------------------------------------------------------

/**
 * Parse an integer from a number cell or integer-looking text.
 * "1000", "1000.0" and 1000 all give 1000; "1000.5", 1000.5 and "abc" give null.
 */
export function parseInteger(value: RawCellValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }

  const s = toSafeTrimmedString(value);
  if (!s) return null;

  let digits: string | null = null;
  if (INTEGER_TEXT.test(s)) {
    digits = s;
  } else {
    const m = INTEGER_ZERO_FRACTION_TEXT.exec(s);
    if (m) digits = m[1] ?? null;
  }
  if (digits === null) return null;

  const n = Number(digits);
  return Number.isSafeInteger(n) ? n : null;
}

/** Parse a finite decimal; text may use either '.' or ',' as separator. */
export function parseDecimal(value: RawCellValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  const s = toSafeTrimmedString(value);
  if (!s || !DECIMAL_TEXT.test(s)) return null;

  const n = Number(s.replace(',', '.'));
  return Number.isFinite(n) ? n : null;
}

export function parsePositiveNumber(value: RawCellValue | undefined): number | null {
  const n = parseDecimal(value);
  return n !== null && n > 0 ? n : null;
}

// ------------------------------------------------------------
// Enumerations
// ------------------------------------------------------------

export interface NormalizedEnumResult<T extends string> {
  normalized: T | null;  // canonical value if allowed
  isAllowed: boolean;
}

function matchEnum<T extends string>(
  raw: RawCellValue | undefined,
  allowed: readonly T[]
): NormalizedEnumResult<T> {
  const safe = toSafeTrimmedString(raw).toLowerCase();
  if (!safe) return { normalized: null, isAllowed: false };

  const hit = allowed.find((candidate) => candidate.toLowerCase() === safe);
  return hit ? { normalized: hit, isAllowed: true } : { normalized: null, isAllowed: false };
}

/** Case-insensitive match against VEHICLE_TYPES; canonical casing is "Lastbil". */
export function normalizeVehicleType(raw: RawCellValue | undefined): NormalizedEnumResult<VehicleType> {
  return matchEnum(raw, VEHICLE_TYPES);
}

/** Case-insensitive match against FUEL_TYPES; canonical casing is lower case. */
export function normalizeFuelType(raw: RawCellValue | undefined): NormalizedEnumResult<FuelType> {
  return matchEnum(raw, FUEL_TYPES);
}

// ------------------------------------------------------------
// Dates
// ------------------------------------------------------------

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

/**
 * Parse a strict YYYY-MM-DD calendar date (proleptic Gregorian, years 0001-9999).
 * Rejects rollover dates such as 2024-02-30 and anything that is not text.
 */
export function parseIsoDate(value: RawCellValue | undefined): CalendarDate | null {
  if (typeof value !== 'string') return null;

  const m = ISO_DATE.exec(value.trim());
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);

  if (year < 1 || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return { year, month, day };
}

export function formatCalendarDate(date: CalendarDate): string {
  const y = String(date.year).padStart(4, '0');
  const m = String(date.month).padStart(2, '0');
  const d = String(date.day).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/** Format a JS Date (spreadsheet date cell) by its UTC calendar components. */
export function dateToIsoString(value: Date): string {
  return formatCalendarDate({
    year: value.getUTCFullYear(),
    month: value.getUTCMonth() + 1,
    day: value.getUTCDate()
  });
}

// ------------------------------------------------------------
// Address heuristics
// ------------------------------------------------------------

/** Street name + house number: 5–200 characters with at least one letter and one digit. */
export function looksLikeStreetAddress(address: string): boolean {
  const s = address.trim();
  if (s.length < 5 || s.length > 200) return false;
  return ADDRESS_LETTER.test(s) && ADDRESS_DIGIT.test(s);
}
