// engine/validateHeader.ts
// Schema-level validation, run once per file before any row is looked at.
//
// Responsibilities:
//  - Fold header cells onto canonical column names (aliases, casing, æ/ø/å)
//  - Abort the import when a mandatory column is missing or a column repeats
//  - Report renamed, unknown and absent-but-useful columns as warnings
//  - Re-key raw rows by canonical column name

import {
  COLUMN_LOOKUP,
  MANIFEST_SCHEMA,
  USEFUL_OPTIONAL_FIELDS,
  foldColumnName,
  type SchemaDefinition
} from './constants';
import { WarningCodes } from './errorCodes';
import { DuplicateColumnsError, MissingColumnsError } from './importErrors';
import type { FieldWarning, HeaderResolution, RawCellValue, RawRow } from './types';

export function resolveHeader(header: readonly string[]): HeaderResolution {
  const columns: string[] = [];
  const renamed: HeaderResolution['renamed'] = [];
  const unknown: string[] = [];

  for (const cell of header) {
    const original = cell.trim();
    if (!original) {
      columns.push('');
      continue;
    }

    const canonical = COLUMN_LOOKUP.get(foldColumnName(original));
    if (canonical) {
      columns.push(canonical);
      if (canonical !== original) renamed.push({ from: original, to: canonical });
    } else {
      columns.push(original);
      unknown.push(original);
    }
  }

  return { columns, renamed, unknown };
}

export interface HeaderCheckResult {
  resolution: HeaderResolution;
  warnings: FieldWarning[];
}

/**
 * Check the header against the schema.
 * Throws MissingColumnsError (all missing columns at once) or
 * DuplicateColumnsError; otherwise returns the resolution + header warnings.
 */
export function validateHeader(
  header: readonly string[],
  schema: SchemaDefinition = MANIFEST_SCHEMA
): HeaderCheckResult {
  const resolution = resolveHeader(header);
  const present = resolution.columns.filter((c) => c !== '');

  const missing = schema.mandatoryFields.filter((field) => !present.includes(field));
  if (missing.length > 0) {
    throw new MissingColumnsError([...missing]);
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const column of present) {
    if (seen.has(column)) duplicates.add(column);
    seen.add(column);
  }
  if (duplicates.size > 0) {
    throw new DuplicateColumnsError(Array.from(duplicates));
  }

  const warnings: FieldWarning[] = [];

  for (const { from, to } of resolution.renamed) {
    warnings.push({
      field: to,
      rowIndex: null,
      code: WarningCodes.COLUMN_RENAMED,
      message: `Kolonnenavn '${from}' tolket som '${to}'`
    });
  }

  for (const name of resolution.unknown) {
    warnings.push({
      field: name,
      rowIndex: null,
      code: WarningCodes.UNKNOWN_COLUMN,
      message: `Ukendt kolonne '${name}' fundet`,
      suggestion: 'Fjern eller omdøb kolonnen for bedre kompatibilitet'
    });
  }

  const missingUseful = USEFUL_OPTIONAL_FIELDS.filter((field) => !present.includes(field));
  if (missingUseful.length > 0) {
    warnings.push({
      field: 'header',
      rowIndex: null,
      code: WarningCodes.MISSING_OPTIONAL_COLUMNS,
      message: `Manglende nyttige kolonner: ${missingUseful.join(', ')}`,
      suggestion: 'Tilføj disse kolonner for bedre rapportering'
    });
  }

  return { resolution, warnings };
}

/** Re-key a raw row from header-cell names to canonical column names. */
export function remapRow(
  row: RawRow,
  header: readonly string[],
  resolution: HeaderResolution
): RawRow {
  const values: Record<string, RawCellValue> = {};

  header.forEach((cell, i) => {
    const column = resolution.columns[i];
    const source = cell.trim();
    if (!column || !source) return;
    values[column] = row.values[source] ?? null;
  });

  return { index: row.index, values };
}
