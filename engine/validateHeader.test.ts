import { describe, expect, it } from 'vitest';

import { TEMPLATE_HEADER } from './__fixtures__/manifests';
import { DuplicateColumnsError, MissingColumnsError } from './importErrors';
import { remapRow, resolveHeader, validateHeader } from './validateHeader';

const MANDATORY = ['Adresse', 'Postnummer', 'PostDistrikt', 'ModtageranlægID'];

describe('resolveHeader', () => {
  it('keeps canonical names as they are', () => {
    expect(resolveHeader(TEMPLATE_HEADER)).toEqual({
      columns: TEMPLATE_HEADER,
      renamed: [],
      unknown: []
    });
  });

  it('folds case, whitespace and Danish letters', () => {
    const { columns, renamed } = resolveHeader([' adresse ', 'MODTAGERANLÆG ID', 'Koeretoejstype']);
    expect(columns).toEqual(['Adresse', 'ModtageranlægID', 'KøretøjsType']);
    expect(renamed).toEqual([
      { from: 'adresse', to: 'Adresse' },
      { from: 'MODTAGERANLÆG ID', to: 'ModtageranlægID' },
      { from: 'Koeretoejstype', to: 'KøretøjsType' }
    ]);
  });

  it('maps known aliases and keeps unknown columns by name', () => {
    expect(resolveHeader(['postnr', 'receiver_id', 'Kommentar', ''])).toEqual({
      columns: ['Postnummer', 'ModtageranlægID', 'Kommentar', ''],
      renamed: [
        { from: 'postnr', to: 'Postnummer' },
        { from: 'receiver_id', to: 'ModtageranlægID' }
      ],
      unknown: ['Kommentar']
    });
  });
});

describe('validateHeader', () => {
  it('returns no warnings for the full template header', () => {
    const { resolution, warnings } = validateHeader(TEMPLATE_HEADER);
    expect(resolution.columns).toEqual(TEMPLATE_HEADER);
    expect(warnings).toEqual([]);
  });

  it('lists every missing mandatory column in schema order', () => {
    let caught: unknown;
    try {
      validateHeader(['Adresse', 'Postnummer', 'Navn']);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MissingColumnsError);
    if (caught instanceof MissingColumnsError) {
      expect(caught.missingColumns).toEqual(['PostDistrikt', 'ModtageranlægID']);
      expect(caught.message).toBe('Missing mandatory columns: PostDistrikt, ModtageranlægID.');
      expect(caught.toDetail()).toEqual({
        code: 'MissingColumnsError',
        message: 'Missing mandatory columns: PostDistrikt, ModtageranlægID.',
        columns: ['PostDistrikt', 'ModtageranlægID']
      });
    }
  });

  it('rejects a column that appears twice after alias resolution', () => {
    expect(() => validateHeader([...MANDATORY, 'zip'])).toThrow(DuplicateColumnsError);
    expect(() => validateHeader([...MANDATORY, 'zip'])).toThrow(
      'Duplicate columns found: Postnummer.'
    );
  });

  it('reports renamed, unknown and missing useful columns as warnings', () => {
    const { warnings } = validateHeader(['Adresse', 'postnr', 'By', 'ModtageranlægID', 'Kommentar']);
    expect(warnings).toEqual([
      {
        field: 'Postnummer',
        rowIndex: null,
        code: 'ColumnRenamed',
        message: "Kolonnenavn 'postnr' tolket som 'Postnummer'"
      },
      {
        field: 'PostDistrikt',
        rowIndex: null,
        code: 'ColumnRenamed',
        message: "Kolonnenavn 'By' tolket som 'PostDistrikt'"
      },
      {
        field: 'Kommentar',
        rowIndex: null,
        code: 'UnknownColumn',
        message: "Ukendt kolonne 'Kommentar' fundet",
        suggestion: 'Fjern eller omdøb kolonnen for bedre kompatibilitet'
      },
      {
        field: 'header',
        rowIndex: null,
        code: 'MissingOptionalColumns',
        message: 'Manglende nyttige kolonner: Navn, Brændstoftype, LastVægt, KøretøjsType',
        suggestion: 'Tilføj disse kolonner for bedre rapportering'
      }
    ]);
  });

  it('does not ask for Dato, which is optional but not flagged as useful', () => {
    const header = TEMPLATE_HEADER.filter((c) => c !== 'Dato');
    expect(validateHeader(header).warnings).toEqual([]);
  });
});

describe('remapRow', () => {
  it('re-keys values by canonical column and drops unnamed cells', () => {
    const header = ['postnr', 'Adresse', '', 'Kommentar'];
    const resolution = resolveHeader(header);
    const remapped = remapRow(
      { index: 7, values: { postnr: 8444, Adresse: 'Rugvænget 18', Kommentar: 'ok' } },
      header,
      resolution
    );
    expect(remapped).toEqual({
      index: 7,
      values: { Postnummer: 8444, Adresse: 'Rugvænget 18', Kommentar: 'ok' }
    });
  });
});
