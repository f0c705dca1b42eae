import { describe, expect, it } from 'vitest';

import {
  dateToIsoString,
  formatCalendarDate,
  looksLikeStreetAddress,
  normalizeFuelType,
  normalizeVehicleType,
  parseDecimal,
  parseInteger,
  parseIsoDate,
  parsePositiveNumber,
  toSafeTrimmedString
} from './normalizeFields';

describe('toSafeTrimmedString', () => {
  it('returns an empty string for null and undefined', () => {
    expect(toSafeTrimmedString(null)).toBe('');
    expect(toSafeTrimmedString(undefined)).toBe('');
  });

  it('stringifies numbers and trims text', () => {
    expect(toSafeTrimmedString(8444)).toBe('8444');
    expect(toSafeTrimmedString('  Grenå ')).toBe('Grenå');
  });
});

describe('parseInteger', () => {
  it('accepts integer numbers and integer text', () => {
    expect(parseInteger(1061)).toBe(1061);
    expect(parseInteger(' 8444 ')).toBe(8444);
    expect(parseInteger('-5')).toBe(-5);
  });

  it('accepts text with an all-zero fraction', () => {
    expect(parseInteger('1000.0')).toBe(1000);
    expect(parseInteger('1000,00')).toBe(1000);
  });

  it('rejects fractions and non-numeric text', () => {
    expect(parseInteger(1000.5)).toBeNull();
    expect(parseInteger('1000.5')).toBeNull();
    expect(parseInteger('abc')).toBeNull();
    expect(parseInteger('12a')).toBeNull();
    expect(parseInteger('')).toBeNull();
    expect(parseInteger(null)).toBeNull();
  });
});

describe('parseDecimal / parsePositiveNumber', () => {
  it('reads dot and comma separators', () => {
    expect(parseDecimal('2500.5')).toBe(2500.5);
    expect(parseDecimal('2500,5')).toBe(2500.5);
    expect(parseDecimal(',5')).toBe(0.5);
  });

  it('rejects thousands separators and words', () => {
    expect(parseDecimal('2.500,5')).toBeNull();
    expect(parseDecimal('ton')).toBeNull();
  });

  it('only returns strictly positive values', () => {
    expect(parsePositiveNumber(2500)).toBe(2500);
    expect(parsePositiveNumber('0')).toBeNull();
    expect(parsePositiveNumber(-1)).toBeNull();
    expect(parsePositiveNumber('-0,5')).toBeNull();
  });
});

describe('enum normalization', () => {
  it('matches vehicle types case-insensitively and returns canonical casing', () => {
    expect(normalizeVehicleType('LASTBIL')).toEqual({ normalized: 'Lastbil', isAllowed: true });
    expect(normalizeVehicleType(' varebil ')).toEqual({ normalized: 'Varebil', isAllowed: true });
  });

  it('returns lower-case fuel types', () => {
    expect(normalizeFuelType('Diesel')).toEqual({ normalized: 'diesel', isAllowed: true });
    expect(normalizeFuelType('EL')).toEqual({ normalized: 'el', isAllowed: true });
  });

  it('flags unknown and empty values', () => {
    expect(normalizeVehicleType('Traktor')).toEqual({ normalized: null, isAllowed: false });
    expect(normalizeFuelType('')).toEqual({ normalized: null, isAllowed: false });
  });
});

describe('parseIsoDate', () => {
  it('parses a strict calendar date', () => {
    expect(parseIsoDate('2024-08-26')).toEqual({ year: 2024, month: 8, day: 26 });
    expect(parseIsoDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
  });

  it('keeps years below 100 as written', () => {
    expect(parseIsoDate('0024-08-26')).toEqual({ year: 24, month: 8, day: 26 });
    expect(parseIsoDate('0024-02-29')).toEqual({ year: 24, month: 2, day: 29 });
  });

  it('rejects year zero and non-leap century days', () => {
    expect(parseIsoDate('0000-01-01')).toBeNull();
    expect(parseIsoDate('1900-02-29')).toBeNull();
    expect(parseIsoDate('2000-02-29')).toEqual({ year: 2000, month: 2, day: 29 });
    expect(parseIsoDate('2024-04-31')).toBeNull();
  });

  it('rejects rollover dates and other layouts', () => {
    expect(parseIsoDate('2023-02-29')).toBeNull();
    expect(parseIsoDate('2024-13-01')).toBeNull();
    expect(parseIsoDate('26-08-2024')).toBeNull();
    expect(parseIsoDate('2024-8-26')).toBeNull();
  });

  it('rejects numeric cells', () => {
    expect(parseIsoDate(45530)).toBeNull();
  });
});

describe('date formatting', () => {
  it('pads calendar dates', () => {
    expect(formatCalendarDate({ year: 2024, month: 3, day: 7 })).toBe('2024-03-07');
  });

  it('formats JS dates by UTC components', () => {
    expect(dateToIsoString(new Date(Date.UTC(2024, 7, 26)))).toBe('2024-08-26');
  });
});

describe('looksLikeStreetAddress', () => {
  it('accepts street + number', () => {
    expect(looksLikeStreetAddress('Rugvænget 18')).toBe(true);
  });

  it('rejects text without a house number or too short', () => {
    expect(looksLikeStreetAddress('Rugvænget')).toBe(false);
    expect(looksLikeStreetAddress('A 1')).toBe(false);
    expect(looksLikeStreetAddress('12345')).toBe(false);
  });
});
