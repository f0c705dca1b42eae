import { describe, expect, it } from 'vitest';

import { createFacilityDirectory, DEFAULT_FACILITY_DIRECTORY } from './facilityDirectory';
import type { RawCellValue, RawRow } from './types';
import { createRowValidationContext, inspectRowWarnings, validateRow } from './validateRow';

const ctx = createRowValidationContext(DEFAULT_FACILITY_DIRECTORY, 50_000);

const TEMPLATE_VALUES: Record<string, RawCellValue> = {
  Adresse: 'Nørregade 10',
  Postnummer: 1000,
  PostDistrikt: 'København',
  ModtageranlægID: 1061,
  Navn: 'ABC Transport',
  Dato: '2024-08-26',
  KøretøjsType: 'Lastbil',
  LastVægt: 2500,
  Brændstoftype: 'diesel'
};

function row(overrides: Record<string, RawCellValue> = {}, index = 1): RawRow {
  return { index, values: { ...TEMPLATE_VALUES, ...overrides } };
}

describe('validateRow', () => {
  it('accepts the template example row', () => {
    expect(validateRow(row(), ctx)).toEqual([]);
  });

  it('accepts a row with only mandatory fields', () => {
    const minimal: RawRow = {
      index: 3,
      values: { Adresse: 'Hovedvejen 24A', Postnummer: '8670', PostDistrikt: 'Låsby', ModtageranlægID: '1013' }
    };
    expect(validateRow(minimal, ctx)).toEqual([]);
  });

  it.each([999, 10000, 0, -1000])('rejects postal code %s as out of range', (code) => {
    expect(validateRow(row({ Postnummer: code }, 4), ctx)).toEqual([
      {
        field: 'Postnummer',
        rowIndex: 4,
        code: 'PostalCodeOutOfRange',
        message: `Postnummer ${code} er ikke i det gyldige område (1000-9999)`,
        value: code
      }
    ]);
  });

  it('accepts the range boundaries', () => {
    expect(validateRow(row({ Postnummer: 1000 }), ctx)).toEqual([]);
    expect(validateRow(row({ Postnummer: 9999 }), ctx)).toEqual([]);
  });

  it('reports a non-numeric postal code as InvalidType', () => {
    expect(validateRow(row({ Postnummer: 'DK-8444' }), ctx)).toEqual([
      {
        field: 'Postnummer',
        rowIndex: 1,
        code: 'InvalidType',
        message: "Ugyldigt postnummer format: 'DK-8444'",
        value: 'DK-8444'
      }
    ]);
  });

  it.each([9999, 1000, 1062])('rejects facility %s that is not in the directory', (id) => {
    const errors = validateRow(row({ ModtageranlægID: id }), ctx);
    expect(errors).toEqual([
      {
        field: 'ModtageranlægID',
        rowIndex: 1,
        code: 'UnknownFacilityId',
        message: `Ukendt anlæg ID: ${id}. Gyldige værdier: 1061, 1013, 1327, 2191, 1901`,
        value: id
      }
    ]);
  });

  it('separates empty, non-numeric and unknown facility IDs', () => {
    expect(validateRow(row({ ModtageranlægID: '  ' }), ctx).map((e) => e.code)).toEqual([
      'RequiredFieldMissing'
    ]);
    expect(validateRow(row({ ModtageranlægID: 'x1' }), ctx)).toEqual([
      {
        field: 'ModtageranlægID',
        rowIndex: 1,
        code: 'InvalidType',
        message: "Ugyldigt anlæg ID format: 'x1'",
        value: 'x1'
      }
    ]);
    expect(validateRow(row({ ModtageranlægID: '2191' }), ctx)).toEqual([]);
  });

  it('reports every missing mandatory field in one pass', () => {
    const errors = validateRow(
      row({ Adresse: null, Postnummer: '', PostDistrikt: '   ', ModtageranlægID: null }),
      ctx
    );
    expect(errors.map((e) => [e.field, e.code])).toEqual([
      ['Adresse', 'RequiredFieldMissing'],
      ['Postnummer', 'RequiredFieldMissing'],
      ['PostDistrikt', 'RequiredFieldMissing'],
      ['ModtageranlægID', 'RequiredFieldMissing']
    ]);
    expect(errors.every((e) => e.message === 'Obligatorisk felt er tomt')).toBe(true);
  });

  it('keeps checking after the first failure', () => {
    const errors = validateRow(
      row({ Adresse: '', Postnummer: 123, KøretøjsType: 'Traktor', Dato: '26/08/2024' }),
      ctx
    );
    expect(errors.map((e) => e.code)).toEqual([
      'RequiredFieldMissing',
      'PostalCodeOutOfRange',
      'InvalidDateFormat',
      'InvalidEnumValue'
    ]);
  });

  it('checks enumerations case-insensitively', () => {
    expect(validateRow(row({ KøretøjsType: 'TRAILER', Brændstoftype: 'Hybrid' }), ctx)).toEqual([]);
    expect(validateRow(row({ KøretøjsType: 'Traktor' }), ctx)).toEqual([
      {
        field: 'KøretøjsType',
        rowIndex: 1,
        code: 'InvalidEnumValue',
        message: "Ugyldig værdi for KøretøjsType: 'Traktor'. Gyldige værdier: Personbil, Lastbil, Varebil, Trailer",
        value: 'Traktor'
      }
    ]);
    expect(validateRow(row({ Brændstoftype: 'brint' }), ctx)[0]?.message).toBe(
      "Ugyldig værdi for Brændstoftype: 'brint'. Gyldige værdier: diesel, benzin, el, hybrid"
    );
  });

  it('requires a strictly positive load weight', () => {
    expect(validateRow(row({ LastVægt: 0 }), ctx)).toEqual([
      {
        field: 'LastVægt',
        rowIndex: 1,
        code: 'InvalidType',
        message: "Ugyldig værdi for LastVægt: '0'. Skal være et positivt tal",
        value: 0
      }
    ]);
    expect(validateRow(row({ LastVægt: 'tung' }), ctx).map((e) => e.code)).toEqual(['InvalidType']);
    expect(validateRow(row({ LastVægt: '2500,5' }), ctx)).toEqual([]);
  });

  it('requires YYYY-MM-DD dates', () => {
    expect(validateRow(row({ Dato: '2024-02-30' }), ctx)).toEqual([
      {
        field: 'Dato',
        rowIndex: 1,
        code: 'InvalidDateFormat',
        message: "Ugyldigt datoformat for Dato: '2024-02-30'. Brug formatet ÅÅÅÅ-MM-DD",
        value: '2024-02-30'
      }
    ]);
  });

  it('ignores empty or absent optional fields', () => {
    const values = { ...TEMPLATE_VALUES };
    delete values['LastVægt'];
    expect(validateRow({ index: 1, values: { ...values, Dato: null, KøretøjsType: '' } }, ctx)).toEqual([]);
  });

  it('uses the injected directory', () => {
    const directory = createFacilityDirectory([{ id: 42, name: 'Testanlæg', address: 'Testvej 1, 1000 København' }]);
    const custom = createRowValidationContext(directory, 50_000);

    expect(validateRow(row({ ModtageranlægID: 42 }), custom)).toEqual([]);
    expect(validateRow(row({ ModtageranlægID: 1061 }), custom)[0]?.message).toBe(
      'Ukendt anlæg ID: 1061. Gyldige værdier: 42'
    );
  });
});

describe('inspectRowWarnings', () => {
  it('has nothing to say about the template row', () => {
    expect(inspectRowWarnings(row(), ctx)).toEqual([]);
  });

  it('flags an address without a house number', () => {
    expect(inspectRowWarnings(row({ Adresse: 'Lagerpladsen' }, 2), ctx)).toEqual([
      {
        field: 'Adresse',
        rowIndex: 2,
        code: 'SuspiciousAddress',
        message: "Adresse format ser ikke korrekt ud: 'Lagerpladsen'",
        suggestion: 'Angiv vejnavn og husnummer'
      }
    ]);
  });

  it('flags loads above the configured threshold only', () => {
    expect(inspectRowWarnings(row({ LastVægt: 50_000 }), ctx)).toEqual([]);
    expect(inspectRowWarnings(row({ LastVægt: 60_000 }), ctx)).toEqual([
      {
        field: 'LastVægt',
        rowIndex: 1,
        code: 'HeavyLoad',
        message: 'Meget høj vægt: 60000 kg',
        suggestion: 'Kontroller at vægten er korrekt'
      }
    ]);
  });
});
