// engine/__fixtures__/manifests.ts
// Builders for manifest test inputs. Workbooks are written with exceljs so
// the reader is exercised against real .xlsx bytes.

import ExcelJS from 'exceljs';
import { vi } from 'vitest';

import type { ImportLogger } from '../logger';

export type FixtureCell = string | number | Date | null;

export const TEMPLATE_HEADER = [
  'Adresse',
  'Postnummer',
  'PostDistrikt',
  'ModtageranlægID',
  'Navn',
  'Dato',
  'KøretøjsType',
  'LastVægt',
  'Brændstoftype'
];

// The example row the manifest template ships with
export const TEMPLATE_ROW: FixtureCell[] = [
  'Nørregade 10',
  1000,
  'København',
  1061,
  'ABC Transport',
  '2024-08-26',
  'Lastbil',
  2500,
  'diesel'
];

export function csvBytes(lines: string[], eol = '\n'): Uint8Array {
  return new TextEncoder().encode(lines.join(eol));
}

export interface FixtureSheet {
  name: string;
  rows: FixtureCell[][];
}

/** Writes each row at its position (rows[0] → sheet row 1); null cells stay empty. */
export async function workbookBytes(sheets: FixtureSheet[]): Promise<Uint8Array> {
  const workbook = new ExcelJS.Workbook();

  for (const sheet of sheets) {
    const worksheet = workbook.addWorksheet(sheet.name);
    sheet.rows.forEach((cells, r) => {
      const row = worksheet.getRow(r + 1);
      cells.forEach((value, c) => {
        if (value !== null) row.getCell(c + 1).value = value;
      });
    });
  }

  const buffer = await workbook.xlsx.writeBuffer();
  return new Uint8Array(buffer);
}

export function dataSheet(rows: FixtureCell[][]): Promise<Uint8Array> {
  return workbookBytes([{ name: 'Data', rows }]);
}

export function silentLogger(): ImportLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}
