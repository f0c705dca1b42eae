// engine/errorCodes.ts
// Canonical error and warning codes for the manifest import core.
//
// Three families:
//
//  Fatal codes   → file-level defects; the import is aborted and no row is validated.
//  Field codes   → per-row constraint violations; the row is rejected, processing continues.
//  Warning codes → informational only; never reject a row or abort an import.

// NOTE:
// - A row is rejected when it carries at least one field code.
// - Warnings are reported alongside accepted and rejected rows alike.

export const FatalErrorCodes = {
  FORMAT_ERROR: 'FormatError',
  SIZE_LIMIT_EXCEEDED: 'SizeLimitExceeded',
  ROW_LIMIT_EXCEEDED: 'RowLimitExceeded',
  MISSING_COLUMNS: 'MissingColumnsError',
  DUPLICATE_COLUMNS: 'DuplicateColumnsError'
} as const;

export type FatalErrorCode = (typeof FatalErrorCodes)[keyof typeof FatalErrorCodes];

export const FieldErrorCodes = {
  REQUIRED_FIELD_MISSING: 'RequiredFieldMissing',
  INVALID_TYPE: 'InvalidType',
  POSTAL_CODE_OUT_OF_RANGE: 'PostalCodeOutOfRange',
  UNKNOWN_FACILITY_ID: 'UnknownFacilityId',
  INVALID_ENUM_VALUE: 'InvalidEnumValue',
  INVALID_DATE_FORMAT: 'InvalidDateFormat'
} as const;

export type FieldErrorCode = (typeof FieldErrorCodes)[keyof typeof FieldErrorCodes];

export const WarningCodes = {
  HEAVY_LOAD: 'HeavyLoad',
  SUSPICIOUS_ADDRESS: 'SuspiciousAddress',
  UNKNOWN_COLUMN: 'UnknownColumn',
  MISSING_OPTIONAL_COLUMNS: 'MissingOptionalColumns',
  COLUMN_RENAMED: 'ColumnRenamed',
  NON_STANDARD_DELIMITER: 'NonStandardDelimiter'
} as const;

export type WarningCode = (typeof WarningCodes)[keyof typeof WarningCodes];

// Human-readable descriptions (logs / API consumers)
export const ErrorCodeDescriptions: Record<FatalErrorCode | FieldErrorCode, string> = {
  [FatalErrorCodes.FORMAT_ERROR]: 'File could not be decoded as the declared format or contains no data rows.',
  [FatalErrorCodes.SIZE_LIMIT_EXCEEDED]: 'File exceeds the configured size ceiling.',
  [FatalErrorCodes.ROW_LIMIT_EXCEEDED]: 'File exceeds the configured row ceiling.',
  [FatalErrorCodes.MISSING_COLUMNS]: 'One or more mandatory columns are missing from the header.',
  [FatalErrorCodes.DUPLICATE_COLUMNS]: 'The header names the same column more than once.',

  [FieldErrorCodes.REQUIRED_FIELD_MISSING]: 'Mandatory field is empty.',
  [FieldErrorCodes.INVALID_TYPE]: 'Field value does not have the expected type.',
  [FieldErrorCodes.POSTAL_CODE_OUT_OF_RANGE]: 'Postal code is outside 1000–9999.',
  [FieldErrorCodes.UNKNOWN_FACILITY_ID]: 'Facility ID is not in the reference directory.',
  [FieldErrorCodes.INVALID_ENUM_VALUE]: 'Field value is not one of the allowed values.',
  [FieldErrorCodes.INVALID_DATE_FORMAT]: 'Date is not a valid YYYY-MM-DD calendar date.'
};

// Canonical ordering used when a report lists codes per field
export const FIELD_ERROR_ORDER: readonly FieldErrorCode[] = [
  FieldErrorCodes.REQUIRED_FIELD_MISSING,
  FieldErrorCodes.INVALID_TYPE,
  FieldErrorCodes.POSTAL_CODE_OUT_OF_RANGE,
  FieldErrorCodes.UNKNOWN_FACILITY_ID,
  FieldErrorCodes.INVALID_ENUM_VALUE,
  FieldErrorCodes.INVALID_DATE_FORMAT
];

// HTTP-layer codes (api/importManifest); never appear inside a ValidationReport
export const RequestErrorCodes = {
  METHOD_NOT_ALLOWED: 'METHOD_NOT_ALLOWED',
  INVALID_JSON_BODY: 'INVALID_JSON_BODY',
  INVALID_REQUEST_STRUCTURE: 'INVALID_REQUEST_STRUCTURE',
  INVALID_BASE64: 'INVALID_BASE64',
  UNSUPPORTED_FILE_TYPE: 'UNSUPPORTED_FILE_TYPE',
  INTERNAL_IMPORT_ERROR: 'INTERNAL_IMPORT_ERROR'
} as const;

export type RequestErrorCode = (typeof RequestErrorCodes)[keyof typeof RequestErrorCodes];
