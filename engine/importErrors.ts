// engine/importErrors.ts
// File-level (fatal) errors for the manifest import core.
//
// Any of these aborts the whole import: no row is validated and the caller
// receives the error instead of row outcomes.

import { FatalErrorCodes, type FatalErrorCode } from './errorCodes';

export interface FatalErrorDetail {
  code: FatalErrorCode;
  message: string;
  /** Columns involved, for header-level failures. */
  columns?: string[];
  limit?: number;
  actual?: number;
}

export abstract class ManifestImportError extends Error {
  abstract readonly code: FatalErrorCode;
  /** HTTP status the api layer maps this error to. */
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toDetail(): FatalErrorDetail {
    return { code: this.code, message: this.message };
  }
}

export class FormatError extends ManifestImportError {
  readonly code = FatalErrorCodes.FORMAT_ERROR;
  readonly statusCode = 422;
}

export class SizeLimitExceededError extends ManifestImportError {
  readonly code = FatalErrorCodes.SIZE_LIMIT_EXCEEDED;
  readonly statusCode = 413;

  constructor(
    public readonly limitBytes: number,
    public readonly actualBytes: number
  ) {
    super(
      `File size ${actualBytes} bytes exceeds the limit of ${limitBytes} bytes.`
    );
  }

  override toDetail(): FatalErrorDetail {
    return { ...super.toDetail(), limit: this.limitBytes, actual: this.actualBytes };
  }
}

export class RowLimitExceededError extends ManifestImportError {
  readonly code = FatalErrorCodes.ROW_LIMIT_EXCEEDED;
  readonly statusCode = 413;

  constructor(
    public readonly limitRows: number,
    public readonly actualRows: number
  ) {
    super(`Row limit exceeded. Max ${limitRows} rows allowed, found ${actualRows}.`);
  }

  override toDetail(): FatalErrorDetail {
    return { ...super.toDetail(), limit: this.limitRows, actual: this.actualRows };
  }
}

export class MissingColumnsError extends ManifestImportError {
  readonly code = FatalErrorCodes.MISSING_COLUMNS;
  readonly statusCode = 422;

  constructor(public readonly missingColumns: string[]) {
    super(`Missing mandatory columns: ${missingColumns.join(', ')}.`);
  }

  override toDetail(): FatalErrorDetail {
    return { ...super.toDetail(), columns: [...this.missingColumns] };
  }
}

export class DuplicateColumnsError extends ManifestImportError {
  readonly code = FatalErrorCodes.DUPLICATE_COLUMNS;
  readonly statusCode = 422;

  constructor(public readonly duplicateColumns: string[]) {
    super(`Duplicate columns found: ${duplicateColumns.join(', ')}.`);
  }

  override toDetail(): FatalErrorDetail {
    return { ...super.toDetail(), columns: [...this.duplicateColumns] };
  }
}

export function isManifestImportError(err: unknown): err is ManifestImportError {
  return err instanceof ManifestImportError;
}
