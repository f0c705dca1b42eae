// engine/assembleRecord.ts
// Build the typed record for a row that passed validation.
//
// IMPORTANT:
//  - This layer performs ZERO validation; it trusts validateRow().
//  - It must only be called with an empty error list. Anything else is a
//    caller bug and throws.

import type { FacilityDirectory } from './facilityDirectory';
import {
  normalizeFuelType,
  normalizeVehicleType,
  parseInteger,
  parseIsoDate,
  parsePositiveNumber,
  toSafeTrimmedString
} from './normalizeFields';
import type { FieldError, RawRow, ValidatedRecord } from './types';

function textOrNull(value: string): string | null {
  return value === '' ? null : value;
}

export function assembleRecord(
  row: RawRow,
  errors: readonly FieldError[],
  directory: FacilityDirectory
): ValidatedRecord {
  if (errors.length > 0) {
    throw new Error(
      `assembleRecord called for row ${row.index} with ${errors.length} pending error(s).`
    );
  }

  const v = row.values;

  const postalCode = parseInteger(v['Postnummer']);
  const facilityId = parseInteger(v['ModtageranlægID']);
  const facility = facilityId === null ? undefined : directory.get(facilityId);

  if (postalCode === null || facility === undefined) {
    throw new Error(`assembleRecord called for row ${row.index} that was not validated.`);
  }

  return {
    rowIndex: row.index,
    address: toSafeTrimmedString(v['Adresse']),
    postalCode,
    district: toSafeTrimmedString(v['PostDistrikt']),
    facility: { ...facility },

    name: textOrNull(toSafeTrimmedString(v['Navn'])),
    date: parseIsoDate(v['Dato']),
    vehicleType: normalizeVehicleType(v['KøretøjsType']).normalized,
    loadWeightKg: parsePositiveNumber(v['LastVægt']),
    fuelType: normalizeFuelType(v['Brændstoftype']).normalized
  };
}
