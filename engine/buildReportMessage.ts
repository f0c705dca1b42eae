// engine/buildReportMessage.ts
// Final message builder for a ValidationReport.
//
// Responsibilities:
//  - Summarise counts per field and per error code
//  - Render the Danish plain-text report shown next to an upload
//
// IMPORTANT:
//  - This layer performs ZERO validation.
//  - Output is deterministic for a given report (no clock, no locale lookups).

import {
  FIELD_ERROR_ORDER,
  FatalErrorCodes,
  type FatalErrorCode,
  type FieldErrorCode
} from './errorCodes';
import type { FieldError, FieldWarning, ValidationReport } from './types';

export interface ReportSummary {
  isValid: boolean;
  fatalCode: FatalErrorCode | null;
  totalRows: number;
  acceptedCount: number;
  rejectedCount: number;
  totalErrors: number;
  totalWarnings: number;
  errorsByField: Record<string, number>;
  errorsByCode: Partial<Record<FieldErrorCode, number>>;
}

const FATAL_LABELS: Record<FatalErrorCode, string> = {
  [FatalErrorCodes.FORMAT_ERROR]: 'Filen kunne ikke læses',
  [FatalErrorCodes.SIZE_LIMIT_EXCEEDED]: 'Filen er for stor',
  [FatalErrorCodes.ROW_LIMIT_EXCEEDED]: 'Filen indeholder for mange rækker',
  [FatalErrorCodes.MISSING_COLUMNS]: 'Manglende obligatoriske kolonner',
  [FatalErrorCodes.DUPLICATE_COLUMNS]: 'Duplikerede kolonner fundet'
};

export function summarizeReport(report: ValidationReport): ReportSummary {
  const allErrors = report.rejections.flatMap((r) => r.errors);

  const errorsByField: Record<string, number> = {};
  for (const e of allErrors) {
    errorsByField[e.field] = (errorsByField[e.field] ?? 0) + 1;
  }

  const errorsByCode: Partial<Record<FieldErrorCode, number>> = {};
  for (const code of FIELD_ERROR_ORDER) {
    const count = allErrors.filter((e) => e.code === code).length;
    if (count > 0) errorsByCode[code] = count;
  }

  return {
    isValid: report.fatalError === null && report.rejectedCount === 0,
    fatalCode: report.fatalError?.code ?? null,
    totalRows: report.totalRows,
    acceptedCount: report.acceptedCount,
    rejectedCount: report.rejectedCount,
    totalErrors: report.fatalError ? 1 : allErrors.length,
    totalWarnings: report.warnings.length,
    errorsByField,
    errorsByCode
  };
}

function formatFieldError(e: FieldError): string {
  return `Række ${e.rowIndex}, felt '${e.field}': ${e.message}`;
}

function formatWarning(w: FieldWarning): string {
  const base =
    w.rowIndex === null
      ? `Felt '${w.field}': ${w.message}`
      : `Række ${w.rowIndex}, felt '${w.field}': ${w.message}`;
  return w.suggestion ? `${base} (Forslag: ${w.suggestion})` : base;
}

export function formatValidationReport(report: ValidationReport): string {
  const lines: string[] = [];

  if (report.fatalError) {
    const { code, columns } = report.fatalError;
    lines.push('✗ IMPORT AFBRUDT');
    lines.push(
      columns && columns.length > 0
        ? `  • ${FATAL_LABELS[code]}: ${columns.join(', ')}`
        : `  • ${FATAL_LABELS[code]}`
    );
    return lines.join('\n');
  }

  if (report.rejectedCount === 0) {
    lines.push('✓ VALIDERING GENNEMFØRT SUCCESFULDT');
  } else {
    lines.push('✗ VALIDERING FEJLEDE');
  }
  lines.push(`  Antal rækker: ${report.totalRows}`);
  lines.push(`  Godkendte rækker: ${report.acceptedCount}`);
  lines.push(`  Afviste rækker: ${report.rejectedCount}`);

  const errors = report.rejections.flatMap((r) => r.errors);
  if (errors.length > 0) {
    lines.push('', 'FEJL:');
    for (const e of errors) lines.push(`  • ${formatFieldError(e)}`);
  }

  if (report.warnings.length > 0) {
    lines.push('', 'ADVARSLER:');
    for (const w of report.warnings) lines.push(`  • ${formatWarning(w)}`);
  }

  return lines.join('\n');
}
