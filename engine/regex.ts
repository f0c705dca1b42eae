// engine/regex.ts
// Centralized regular expressions for the manifest import core.

// ------------------------------------------------------------
// Dates
// ------------------------------------------------------------

// ISO calendar date: 2024-08-26
export const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// ------------------------------------------------------------
// Numbers (text cells)
// ------------------------------------------------------------

// Plain integer: 1000, +1000, -5
export const INTEGER_TEXT = /^[+-]?\d+$/;

// Integer with an all-zero fraction, as spreadsheet exports write it: 1000.0, 1000,00
export const INTEGER_ZERO_FRACTION_TEXT = /^([+-]?\d+)[.,]0+$/;

// Decimal with dot or Danish comma separator: 2500, 2500.5, 2500,5, .5
export const DECIMAL_TEXT = /^[+-]?(\d+([.,]\d+)?|[.,]\d+)$/;

// ------------------------------------------------------------
// Address heuristics
// ------------------------------------------------------------

export const ADDRESS_LETTER = /[A-Za-zÆØÅæøåÄÖÜäöüé]/;
export const ADDRESS_DIGIT = /\d/;

// ------------------------------------------------------------
// CSV delimiter candidates (header-line detection)
// ------------------------------------------------------------

export const CSV_DELIMITERS = [',', ';', '\t'] as const;
export type CsvDelimiter = (typeof CSV_DELIMITERS)[number];

// ------------------------------------------------------------
// Unicode clean helper
// ------------------------------------------------------------

// Strip Unicode zero-width + most control characters (except \n, \r, \t)
export function stripZeroWidthAndControl(input: string): string {
  if (!input) return '';

  // Zero-width, BOM and bidi controls
  const zeroWidthAndBidi = /[\u200B-\u200F\u202A-\u202E\u2060-\u206F\uFEFF]/g;

  // Control chars: 0x00–0x08, 0x0B, 0x0C, 0x0E–0x1F, 0x7F
  const controlChars = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

  return input.replace(zeroWidthAndBidi, '').replace(controlChars, '');
}
