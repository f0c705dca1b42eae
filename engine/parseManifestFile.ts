// engine/parseManifestFile.ts
//
// Entry point for reading manifest bytes. Enforces the size and row ceilings
// and dispatches to the format-specific reader; callers never branch on format.

import type { LimitsConfig } from './config';
import { RowLimitExceededError, SizeLimitExceededError } from './importErrors';
import { parseManifestCsv } from './parseManifestCsv';
import { parseManifestExcel } from './parseManifestExcel';
import type { ManifestFormat, ParsedManifest } from './types';

// Local file header of a zip archive ("PK\x03\x04"); every .xlsx starts with it
const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04] as const;

function hasZipMagic(bytes: Uint8Array): boolean {
  return ZIP_MAGIC.every((b, i) => bytes[i] === b);
}

/**
 * Guess the declared format from a file name, falling back to magic bytes.
 * Returns null when neither identifies a supported format.
 */
export function detectManifestFormat(
  fileName: string | null | undefined,
  bytes: Uint8Array
): ManifestFormat | null {
  const lower = (fileName ?? '').trim().toLowerCase();

  if (lower.endsWith('.xlsx') || lower.endsWith('.xlsm')) return 'xlsx';
  if (lower.endsWith('.csv') || lower.endsWith('.txt')) return 'csv';

  return hasZipMagic(bytes) ? 'xlsx' : null;
}

export async function parseManifestFile(
  bytes: Uint8Array,
  format: ManifestFormat,
  limits: LimitsConfig
): Promise<ParsedManifest> {
  if (bytes.byteLength > limits.maxFileBytes) {
    throw new SizeLimitExceededError(limits.maxFileBytes, bytes.byteLength);
  }

  const parsed =
    format === 'xlsx' ? await parseManifestExcel(bytes) : parseManifestCsv(bytes);

  if (parsed.rows.length > limits.maxRows) {
    throw new RowLimitExceededError(limits.maxRows, parsed.rows.length);
  }

  return parsed;
}
