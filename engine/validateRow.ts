// engine/validateRow.ts
// Row-level validation for manifest rows.
//
// Responsibilities (per row):
//  - Identify empty mandatory fields
//  - Check types and ranges (postal code, facility ID, load weight, date)
//  - Check enumerations (vehicle type, fuel type), case-insensitive
//  - Collect non-blocking warnings (heavy load, address shape)
//
// Every applicable check runs; a row can carry several errors at once.
// Rows are independent: nothing here reads or writes state shared across rows.
//
// This module DOES NOT:
//  - Check the header (validateHeader.ts)
//  - Build typed records (assembleRecord.ts)

import type { FacilityDirectory } from './facilityDirectory';
import {
  MANIFEST_SCHEMA,
  type FieldSpec,
  type ManifestColumn,
  type SchemaDefinition
} from './constants';
import { FieldErrorCodes, WarningCodes, type FieldErrorCode } from './errorCodes';
import {
  isBlank,
  looksLikeStreetAddress,
  parseInteger,
  parseIsoDate,
  parsePositiveNumber,
  toSafeTrimmedString
} from './normalizeFields';
import type { FieldError, FieldWarning, RawCellValue, RawRow } from './types';

export interface RowValidationContext {
  schema: SchemaDefinition;
  directory: FacilityDirectory;
  heavyLoadWarningKg: number;
}

export function createRowValidationContext(
  directory: FacilityDirectory,
  heavyLoadWarningKg: number,
  schema: SchemaDefinition = MANIFEST_SCHEMA
): RowValidationContext {
  return Object.freeze({ schema, directory, heavyLoadWarningKg });
}

function schemaFieldOrder(schema: SchemaDefinition): ManifestColumn[] {
  return [...schema.mandatoryFields, ...schema.optionalFields];
}

function cellOf(row: RawRow, field: string): RawCellValue {
  return row.values[field] ?? null;
}

type CheckOutcome = { code: FieldErrorCode; message: string } | null;

function checkPostalCode(value: RawCellValue, spec: FieldSpec): CheckOutcome {
  const n = parseInteger(value);
  if (n === null) {
    return {
      code: FieldErrorCodes.INVALID_TYPE,
      message: `Ugyldigt postnummer format: '${toSafeTrimmedString(value)}'`
    };
  }

  const min = spec.min ?? Number.MIN_SAFE_INTEGER;
  const max = spec.max ?? Number.MAX_SAFE_INTEGER;
  if (n < min || n > max) {
    return {
      code: FieldErrorCodes.POSTAL_CODE_OUT_OF_RANGE,
      message: `Postnummer ${n} er ikke i det gyldige område (${min}-${max})`
    };
  }
  return null;
}

function checkFacility(value: RawCellValue, directory: FacilityDirectory): CheckOutcome {
  const id = parseInteger(value);
  if (id === null) {
    return {
      code: FieldErrorCodes.INVALID_TYPE,
      message: `Ugyldigt anlæg ID format: '${toSafeTrimmedString(value)}'`
    };
  }

  if (!directory.has(id)) {
    return {
      code: FieldErrorCodes.UNKNOWN_FACILITY_ID,
      message: `Ukendt anlæg ID: ${id}. Gyldige værdier: ${directory.ids().join(', ')}`
    };
  }
  return null;
}

function checkEnum(value: RawCellValue, spec: FieldSpec): CheckOutcome {
  const allowed = spec.allowedValues ?? [];
  const safe = toSafeTrimmedString(value);
  const lower = safe.toLowerCase();

  if (allowed.some((candidate) => candidate.toLowerCase() === lower)) return null;

  return {
    code: FieldErrorCodes.INVALID_ENUM_VALUE,
    message: `Ugyldig værdi for ${spec.name}: '${safe}'. Gyldige værdier: ${allowed.join(', ')}`
  };
}

function checkPositiveNumber(value: RawCellValue, spec: FieldSpec): CheckOutcome {
  if (parsePositiveNumber(value) !== null) return null;
  return {
    code: FieldErrorCodes.INVALID_TYPE,
    message: `Ugyldig værdi for ${spec.name}: '${toSafeTrimmedString(value)}'. Skal være et positivt tal`
  };
}

function checkDate(value: RawCellValue, spec: FieldSpec): CheckOutcome {
  if (parseIsoDate(value) !== null) return null;
  return {
    code: FieldErrorCodes.INVALID_DATE_FORMAT,
    message: `Ugyldigt datoformat for ${spec.name}: '${toSafeTrimmedString(value)}'. Brug formatet ÅÅÅÅ-MM-DD`
  };
}

function checkField(
  value: RawCellValue,
  spec: FieldSpec,
  ctx: RowValidationContext
): CheckOutcome {
  switch (spec.kind) {
    case 'text':
      return null;
    case 'postalCode':
      return checkPostalCode(value, spec);
    case 'facility':
      return checkFacility(value, ctx.directory);
    case 'enum':
      return checkEnum(value, spec);
    case 'positiveNumber':
      return checkPositiveNumber(value, spec);
    case 'date':
      return checkDate(value, spec);
  }
}

/**
 * Validate one row (already re-keyed by canonical column names).
 * Returns every FieldError found, in schema column order; [] when valid.
 */
export function validateRow(row: RawRow, ctx: RowValidationContext): FieldError[] {
  const errors: FieldError[] = [];

  for (const field of schemaFieldOrder(ctx.schema)) {
    const spec = ctx.schema.fields[field];
    const value = cellOf(row, field);

    if (isBlank(value)) {
      if (spec.mandatory) {
        errors.push({
          field,
          rowIndex: row.index,
          code: FieldErrorCodes.REQUIRED_FIELD_MISSING,
          message: 'Obligatorisk felt er tomt',
          value
        });
      }
      continue;
    }

    const outcome = checkField(value, spec, ctx);
    if (outcome) {
      errors.push({ field, rowIndex: row.index, ...outcome, value });
    }
  }

  return errors;
}

/** Non-blocking observations for one row; never affects acceptance. */
export function inspectRowWarnings(row: RawRow, ctx: RowValidationContext): FieldWarning[] {
  const warnings: FieldWarning[] = [];

  const address = toSafeTrimmedString(cellOf(row, 'Adresse'));
  if (address && !looksLikeStreetAddress(address)) {
    warnings.push({
      field: 'Adresse',
      rowIndex: row.index,
      code: WarningCodes.SUSPICIOUS_ADDRESS,
      message: `Adresse format ser ikke korrekt ud: '${address}'`,
      suggestion: 'Angiv vejnavn og husnummer'
    });
  }

  const weight = parsePositiveNumber(cellOf(row, 'LastVægt'));
  if (weight !== null && weight > ctx.heavyLoadWarningKg) {
    warnings.push({
      field: 'LastVægt',
      rowIndex: row.index,
      code: WarningCodes.HEAVY_LOAD,
      message: `Meget høj vægt: ${weight} kg`,
      suggestion: 'Kontroller at vægten er korrekt'
    });
  }

  return warnings;
}
