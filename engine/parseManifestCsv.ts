// engine/parseManifestCsv.ts
//
// Parse UTF-8 delimited text into header + RawRow[], the same shape the
// spreadsheet reader produces.

import { parse } from 'csv-parse/sync';
import { FormatError } from './importErrors';
import { isBlank } from './normalizeFields';
import { CSV_DELIMITERS, stripZeroWidthAndControl, type CsvDelimiter } from './regex';
import type { ParsedManifest, RawCellValue, RawRow } from './types';

function decodeUtf8(bytes: Uint8Array): string {
  try {
    // fatal: invalid sequences throw instead of becoming U+FFFD; a leading BOM is dropped
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    throw new FormatError('File is not valid UTF-8 text.', { cause: err });
  }
}

/**
 * Pick the delimiter from the header line (the first non-blank line): the
 * candidate occurring most often outside quotes. Ties and no hits fall back to ','.
 */
export function detectCsvDelimiter(text: string): CsvDelimiter {
  const firstLine = text.split(/\r?\n/).find((line) => line.trim() !== '') ?? '';

  const counts = new Map<CsvDelimiter, number>(CSV_DELIMITERS.map((d): [CsvDelimiter, number] => [d, 0]));
  let inQuotes = false;
  for (const ch of firstLine) {
    if (ch === '"') {
      inQuotes = !inQuotes;
      continue;
    }
    if (inQuotes) continue;
    const delimiter = CSV_DELIMITERS.find((d) => d === ch);
    if (delimiter) counts.set(delimiter, (counts.get(delimiter) ?? 0) + 1);
  }

  let best: CsvDelimiter = ',';
  let bestCount = counts.get(',') ?? 0;
  for (const d of CSV_DELIMITERS) {
    const c = counts.get(d) ?? 0;
    if (c > bestCount) {
      best = d;
      bestCount = c;
    }
  }
  return best;
}

function toRawCell(cell: unknown): RawCellValue {
  if (cell === null || cell === undefined) return null;
  const s = stripZeroWidthAndControl(String(cell));
  return s.trim() === '' ? null : s;
}

function readTable(text: string, delimiter: CsvDelimiter): RawCellValue[][] {
  let records: unknown;
  try {
    records = parse(text, {
      delimiter,
      relax_column_count: true,
      // a stray quote inside an unquoted field stays literal text
      relax_quotes: true,
      skip_empty_lines: false
    });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new FormatError(`CSV could not be parsed: ${msg}`, { cause: err });
  }

  if (!Array.isArray(records)) {
    throw new FormatError('CSV could not be parsed: unexpected parser output.');
  }

  return records.map((record: unknown) =>
    Array.isArray(record) ? record.map((cell: unknown) => toRawCell(cell)) : []
  );
}

/**
 * Parse a CSV manifest.
 * - Leading blank records are skipped; the first non-blank record is the header.
 * - Data records whose cells are all empty are skipped; the indices of later
 *   records are kept (the record after the header is data row 1).
 */
export function parseManifestCsv(bytes: Uint8Array): ParsedManifest {
  const text = decodeUtf8(bytes);
  if (text.trim() === '') {
    throw new FormatError('File contains no data rows.');
  }

  const delimiter = detectCsvDelimiter(text);
  const records = readTable(text, delimiter);
  const headerAt = records.findIndex((record) => record.some((cell) => !isBlank(cell)));
  if (headerAt === -1) {
    throw new FormatError('Header row is empty or missing.');
  }
  const headerRecord = records[headerAt] ?? [];
  const dataRecords = records.slice(headerAt + 1);

  const header = headerRecord.map((cell) => (cell === null ? '' : String(cell).trim()));

  const rows: RawRow[] = [];

  dataRecords.forEach((record, i) => {
    const values: Record<string, RawCellValue> = {};
    header.forEach((name, col) => {
      if (!name) return;
      values[name] = record[col] ?? null;
    });

    if (Object.values(values).every((v) => isBlank(v))) return;

    rows.push({ index: i + 1, values });
  });

  if (rows.length === 0) {
    throw new FormatError('File contains no data rows.');
  }

  return {
    format: 'csv',
    sheetName: null,
    header,
    rows,
    delimiter
  };
}
