// engine/parseManifestExcel.ts
//
// Parse a manifest workbook (.xlsx) into header + RawRow[].

import ExcelJS from 'exceljs';
import { FormatError } from './importErrors';
import { dateToIsoString, isBlank, toSafeTrimmedString } from './normalizeFields';
import { stripZeroWidthAndControl } from './regex';
import type { ParsedManifest, RawCellValue, RawRow } from './types';

// Sheet written by the manifest template; other sheets (instructions,
// facility list) are ignored.
export const DATA_SHEET_NAME = 'Data';

function cleanText(value: string): RawCellValue {
  const s = stripZeroWidthAndControl(value);
  return s.trim() === '' ? null : s;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function richTextPart(part: unknown): string {
  return isObject(part) && typeof part['text'] === 'string' ? part['text'] : '';
}

/**
 * Reduce an exceljs cell value to a raw scalar.
 * Dates become YYYY-MM-DD (UTC components), formulas yield their cached
 * result, rich text and hyperlinks their text (a link label may itself be
 * rich text), error cells null.
 */
export function readCellValue(value: unknown): RawCellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') return cleanText(value);
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : dateToIsoString(value);
  }
  if (!isObject(value)) return null;

  const richText = value['richText'];
  if (Array.isArray(richText)) {
    return cleanText(richText.map((part: unknown) => richTextPart(part)).join(''));
  }
  if ('hyperlink' in value) {
    return readCellValue(value['text']);
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return readCellValue(value['result'] ?? null);
  }
  return null;
}

function readHeader(row: ExcelJS.Row): string[] {
  const header: string[] = [];
  for (let col = 1; col <= row.cellCount; col++) {
    header.push(toSafeTrimmedString(readCellValue(row.getCell(col).value)));
  }
  return header;
}

/**
 * Parse the manifest workbook buffer.
 * - Uses sheet "Data" if present; otherwise the first worksheet.
 * - Expects the header row at row 1.
 * - Skips completely empty data rows; indices of later rows are kept
 *   (sheet row 2 is data row 1).
 */
export async function parseManifestExcel(bytes: Uint8Array): Promise<ParsedManifest> {
  const workbook = new ExcelJS.Workbook();

  // exceljs loads from an ArrayBuffer holding exactly the file
  const data = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(data).set(bytes);

  try {
    await workbook.xlsx.load(data);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new FormatError(`Spreadsheet could not be read: ${msg}`, { cause: err });
  }

  const worksheet = workbook.getWorksheet(DATA_SHEET_NAME) ?? workbook.worksheets[0];
  if (!worksheet) {
    throw new FormatError('No worksheet found in spreadsheet.');
  }

  const header = readHeader(worksheet.getRow(1));
  if (header.every((name) => name === '')) {
    throw new FormatError('Header row (row 1) is empty or missing.');
  }

  const rows: RawRow[] = [];

  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    const values: Record<string, RawCellValue> = {};

    header.forEach((name, i) => {
      if (!name) return;
      values[name] = readCellValue(row.getCell(i + 1).value);
    });

    if (Object.values(values).every((v) => isBlank(v))) continue;

    rows.push({ index: rowNumber - 1, values });
  }

  if (rows.length === 0) {
    throw new FormatError('File contains no data rows.');
  }

  return {
    format: 'xlsx',
    sheetName: worksheet.name,
    header,
    rows,
    delimiter: null
  };
}
