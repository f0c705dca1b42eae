// engine/importManifest.ts
//
// One file in, one report out:
//   bytes → parseManifestFile → validateHeader → validateRow (chunked) → ValidationReport
//
// File-level defects never throw from here; they come back as the report's
// fatalError with zero rows processed. Unexpected exceptions propagate.

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import { assembleRecord } from './assembleRecord';
import { DEFAULT_IMPORT_CONFIG, type ImportConfig } from './config';
import { MANIFEST_SCHEMA, type SchemaDefinition } from './constants';
import { ErrorCodeDescriptions, WarningCodes } from './errorCodes';
import { DEFAULT_FACILITY_DIRECTORY, type FacilityDirectory } from './facilityDirectory';
import { isManifestImportError } from './importErrors';
import { createImportLogger, type ImportLogger } from './logger';
import { parseManifestFile } from './parseManifestFile';
import type {
  FieldError,
  FieldWarning,
  ManifestFormat,
  ParsedManifest,
  RawRow,
  ValidationReport
} from './types';
import { ValidationReportBuilder, fatalReport } from './validationReport';
import { remapRow, validateHeader } from './validateHeader';
import {
  createRowValidationContext,
  inspectRowWarnings,
  validateRow,
  type RowValidationContext
} from './validateRow';

export interface ImportManifestOptions {
  format: ManifestFormat;
  config?: ImportConfig;
  directory?: FacilityDirectory;
  schema?: SchemaDefinition;
  logger?: ImportLogger;
}

interface RowResult {
  row: RawRow;
  errors: FieldError[];
  warnings: FieldWarning[];
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * Validate rows in independent chunks, each scheduled as its own task.
 * Results are returned in input order whatever order the chunks finish in.
 */
export async function validateRowsInOrder(
  rows: readonly RawRow[],
  ctx: RowValidationContext,
  chunkSize: number
): Promise<RowResult[]> {
  const size = Math.max(1, Math.floor(chunkSize));

  const chunkResults = await Promise.all(
    chunk(rows, size).map(async (part) => {
      await yieldToEventLoop();
      return part.map((row) => ({
        row,
        errors: validateRow(row, ctx),
        warnings: inspectRowWarnings(row, ctx)
      }));
    })
  );

  return chunkResults.flat();
}

function delimiterWarning(parsed: ParsedManifest): FieldWarning[] {
  if (parsed.delimiter === null || parsed.delimiter === ',') return [];
  const shown = parsed.delimiter === '\t' ? 'tab' : parsed.delimiter;
  return [
    {
      field: 'header',
      rowIndex: null,
      code: WarningCodes.NON_STANDARD_DELIMITER,
      message: `CSV parset med skilletegn '${shown}'`
    }
  ];
}

export async function importManifest(
  bytes: Uint8Array,
  options: ImportManifestOptions
): Promise<ValidationReport> {
  const config = options.config ?? DEFAULT_IMPORT_CONFIG;
  const directory = options.directory ?? DEFAULT_FACILITY_DIRECTORY;
  const schema = options.schema ?? MANIFEST_SCHEMA;
  const logger = options.logger ?? createImportLogger({ level: config.logging.level });
  const { format } = options;

  logger.info('manifest_import_started', { format, size_bytes: bytes.byteLength });

  let parsed: ParsedManifest;
  let headerWarnings: FieldWarning[];
  let rows: RawRow[];

  try {
    parsed = await parseManifestFile(bytes, format, config.limits);
    const { resolution, warnings } = validateHeader(parsed.header, schema);
    headerWarnings = warnings;
    rows = parsed.rows.map((row) => remapRow(row, parsed.header, resolution));
  } catch (err) {
    if (!isManifestImportError(err)) throw err;

    logger.warn('manifest_import_rejected_fatal', {
      format,
      error_code: err.code,
      description: ErrorCodeDescriptions[err.code],
      message: err.message
    });
    return fatalReport(err.toDetail(), format);
  }

  const ctx = createRowValidationContext(directory, config.validation.heavyLoadWarningKg, schema);
  const results = await validateRowsInOrder(rows, ctx, config.validation.chunkSize);

  const builder = new ValidationReportBuilder({
    format: parsed.format,
    sheetName: parsed.sheetName,
    header: parsed.header,
    schemaVersion: schema.version
  });
  builder.warn(...headerWarnings, ...delimiterWarning(parsed));

  for (const { row, errors, warnings } of results) {
    if (errors.length === 0) {
      builder.accept(assembleRecord(row, errors, directory));
    } else {
      builder.reject(row.index, errors);
    }
    builder.warn(...warnings);
  }

  const report = builder.build();

  logger.info('manifest_import_completed', {
    format,
    total_rows: report.totalRows,
    accepted_count: report.acceptedCount,
    rejected_count: report.rejectedCount,
    warning_count: report.warnings.length
  });

  return report;
}
