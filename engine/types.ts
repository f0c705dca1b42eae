// engine/types.ts
// Shared TypeScript interfaces for the manifest import core.
import type { FieldErrorCode, WarningCode } from './errorCodes';
import type { FatalErrorDetail } from './importErrors';

export type ManifestFormat = 'xlsx' | 'csv';

/** Raw scalar as read from a cell; empty cells are null. */
export type RawCellValue = string | number | null;

/**
 * RawRow – one data row exactly as read from the file.
 * `index` is the 1-based position among data rows (header excluded),
 * counted before blank rows are skipped.
 */
export interface RawRow {
  index: number;
  values: Record<string, RawCellValue>;
}

export interface ParsedManifest {
  format: ManifestFormat;
  /** Worksheet the rows came from (xlsx only). */
  sheetName: string | null;
  /** Header cells in file order, trimmed, before alias resolution. */
  header: string[];
  rows: RawRow[];
  /** Delimiter actually used (csv only). */
  delimiter: string | null;
}

export interface FieldError {
  field: string;
  rowIndex: number;
  code: FieldErrorCode;
  message: string;
  /** Offending raw value, echoed for rendering. */
  value: RawCellValue;
}

export interface FieldWarning {
  field: string;
  /** null for header-level warnings. */
  rowIndex: number | null;
  code: WarningCode;
  message: string;
  suggestion?: string;
}

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export type VehicleType = 'Personbil' | 'Lastbil' | 'Varebil' | 'Trailer';
export type FuelType = 'diesel' | 'benzin' | 'el' | 'hybrid';

export interface FacilityEntry {
  id: number;
  name: string;
  address: string;
}

/**
 * ValidatedRecord – a row that passed every check.
 * Optional fields are null when the cell was empty or the column absent.
 */
export interface ValidatedRecord {
  rowIndex: number;
  address: string;
  postalCode: number;
  district: string;
  facility: FacilityEntry;

  name: string | null;
  date: CalendarDate | null;
  vehicleType: VehicleType | null;
  loadWeightKg: number | null;
  fuelType: FuelType | null;
}

export interface RowRejection {
  rowIndex: number;
  errors: FieldError[];
}

/**
 * HeaderResolution – header after alias folding.
 * `columns[i]` is the canonical name for header cell i, or the trimmed
 * original when the cell matched no known column.
 */
export interface HeaderResolution {
  columns: string[];
  renamed: Array<{ from: string; to: string }>;
  unknown: string[];
}

export interface ValidationReport {
  schemaVersion: string;
  format: ManifestFormat | null;
  sheetName: string | null;
  /** Header cells as read (empty when the import was aborted). */
  header: string[];

  totalRows: number;
  acceptedCount: number;
  rejectedCount: number;

  records: ValidatedRecord[];
  rejections: RowRejection[];
  warnings: FieldWarning[];

  /** Set when the import was aborted; rows are then empty. */
  fatalError: FatalErrorDetail | null;
}
