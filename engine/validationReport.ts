// engine/validationReport.ts
// Accumulates per-row outcomes of one import into a ValidationReport.
//
// Outcomes may be added in any order; build() always emits them in
// original row order. A fatal error supersedes every row outcome.

import { SCHEMA_VERSION } from './constants';
import type { FatalErrorDetail } from './importErrors';
import type {
  FieldError,
  FieldWarning,
  ManifestFormat,
  RowRejection,
  ValidatedRecord,
  ValidationReport
} from './types';

export interface ReportSource {
  format?: ManifestFormat | null;
  sheetName?: string | null;
  header?: readonly string[];
  schemaVersion?: string;
}

type RowOutcome =
  | { kind: 'accepted'; record: ValidatedRecord }
  | { kind: 'rejected'; rejection: RowRejection };

export class ValidationReportBuilder {
  private readonly outcomes = new Map<number, RowOutcome>();
  private readonly headerWarnings: FieldWarning[] = [];
  private readonly rowWarnings = new Map<number, FieldWarning[]>();
  private fatal: FatalErrorDetail | null = null;

  private readonly format: ManifestFormat | null;
  private readonly sheetName: string | null;
  private readonly header: string[];
  private readonly schemaVersion: string;

  constructor(source: ReportSource = {}) {
    this.format = source.format ?? null;
    this.sheetName = source.sheetName ?? null;
    this.header = [...(source.header ?? [])];
    this.schemaVersion = source.schemaVersion ?? SCHEMA_VERSION;
  }

  accept(record: ValidatedRecord): this {
    this.claim(record.rowIndex);
    this.outcomes.set(record.rowIndex, { kind: 'accepted', record });
    return this;
  }

  reject(rowIndex: number, errors: readonly FieldError[]): this {
    if (errors.length === 0) {
      throw new Error(`Row ${rowIndex} cannot be rejected without errors.`);
    }
    this.claim(rowIndex);
    this.outcomes.set(rowIndex, {
      kind: 'rejected',
      rejection: { rowIndex, errors: [...errors] }
    });
    return this;
  }

  warn(...warnings: FieldWarning[]): this {
    for (const w of warnings) {
      if (w.rowIndex === null) {
        this.headerWarnings.push(w);
      } else {
        const list = this.rowWarnings.get(w.rowIndex) ?? [];
        list.push(w);
        this.rowWarnings.set(w.rowIndex, list);
      }
    }
    return this;
  }

  setFatal(detail: FatalErrorDetail): this {
    if (this.fatal) {
      throw new Error('A fatal error has already been recorded for this import.');
    }
    this.fatal = detail;
    return this;
  }

  build(): ValidationReport {
    if (this.fatal) {
      return {
        schemaVersion: this.schemaVersion,
        format: this.format,
        sheetName: this.sheetName,
        header: [],
        totalRows: 0,
        acceptedCount: 0,
        rejectedCount: 0,
        records: [],
        rejections: [],
        warnings: [],
        fatalError: { ...this.fatal }
      };
    }

    const indices = Array.from(this.outcomes.keys()).sort((a, b) => a - b);
    const records: ValidatedRecord[] = [];
    const rejections: RowRejection[] = [];

    for (const index of indices) {
      const outcome = this.outcomes.get(index);
      if (outcome?.kind === 'accepted') records.push(outcome.record);
      else if (outcome?.kind === 'rejected') rejections.push(outcome.rejection);
    }

    const warningIndices = Array.from(this.rowWarnings.keys()).sort((a, b) => a - b);
    const warnings = [
      ...this.headerWarnings,
      ...warningIndices.flatMap((i) => this.rowWarnings.get(i) ?? [])
    ];

    return {
      schemaVersion: this.schemaVersion,
      format: this.format,
      sheetName: this.sheetName,
      header: [...this.header],
      totalRows: indices.length,
      acceptedCount: records.length,
      rejectedCount: rejections.length,
      records,
      rejections,
      warnings,
      fatalError: null
    };
  }

  private claim(rowIndex: number): void {
    if (this.outcomes.has(rowIndex)) {
      throw new Error(`Row ${rowIndex} already has an outcome.`);
    }
  }
}

/** Report for an import that was aborted before any row was processed. */
export function fatalReport(
  detail: FatalErrorDetail,
  format: ManifestFormat | null = null
): ValidationReport {
  return new ValidationReportBuilder({ format }).setFatal(detail).build();
}
