// engine/constants.ts
// Schema definition for manifest files (column contract v2024.1).
// Single source of truth for column names, types and allowed values.

import columnAliases from '../data/column_aliases.json';
import type { FuelType, VehicleType } from './types';

export const SCHEMA_VERSION = '2024.1';

// ------------------------------------------------------------
// Columns
// ------------------------------------------------------------

export const MANDATORY_FIELDS = [
  'Adresse',
  'Postnummer',
  'PostDistrikt',
  'ModtageranlægID'
] as const;

export const OPTIONAL_FIELDS = [
  'Navn',
  'Dato',
  'KøretøjsType',
  'LastVægt',
  'Brændstoftype'
] as const;

export type MandatoryField = (typeof MANDATORY_FIELDS)[number];
export type OptionalField = (typeof OPTIONAL_FIELDS)[number];
export type ManifestColumn = MandatoryField | OptionalField;

export const ALL_FIELDS: readonly ManifestColumn[] = [...MANDATORY_FIELDS, ...OPTIONAL_FIELDS];

// Optional columns whose absence is worth a header warning
export const USEFUL_OPTIONAL_FIELDS: readonly OptionalField[] = [
  'Navn',
  'Brændstoftype',
  'LastVægt',
  'KøretøjsType'
];

// ------------------------------------------------------------
// Allowed enumerations (canonical casing)
// ------------------------------------------------------------

export const VEHICLE_TYPES: readonly VehicleType[] = ['Personbil', 'Lastbil', 'Varebil', 'Trailer'];
export const FUEL_TYPES: readonly FuelType[] = ['diesel', 'benzin', 'el', 'hybrid'];

export const POSTAL_CODE_MIN = 1000;
export const POSTAL_CODE_MAX = 9999;

// ------------------------------------------------------------
// Per-field contract
// ------------------------------------------------------------

// postalCode: integer within [min, max]; facility: integer key of the facility directory;
// positiveNumber: decimal > 0; enum: case-insensitive member of allowedValues
export type FieldKind = 'text' | 'postalCode' | 'facility' | 'positiveNumber' | 'date' | 'enum';

export interface FieldSpec {
  name: ManifestColumn;
  mandatory: boolean;
  kind: FieldKind;
  allowedValues?: readonly string[];
  min?: number;
  max?: number;
}

export interface SchemaDefinition {
  version: string;
  mandatoryFields: readonly MandatoryField[];
  optionalFields: readonly OptionalField[];
  fields: Readonly<Record<ManifestColumn, Readonly<FieldSpec>>>;
}

export const MANIFEST_SCHEMA: SchemaDefinition = Object.freeze({
  version: SCHEMA_VERSION,
  mandatoryFields: MANDATORY_FIELDS,
  optionalFields: OPTIONAL_FIELDS,
  fields: Object.freeze({
    Adresse: { name: 'Adresse', mandatory: true, kind: 'text' },
    Postnummer: {
      name: 'Postnummer',
      mandatory: true,
      kind: 'postalCode',
      min: POSTAL_CODE_MIN,
      max: POSTAL_CODE_MAX
    },
    PostDistrikt: { name: 'PostDistrikt', mandatory: true, kind: 'text' },
    ModtageranlægID: { name: 'ModtageranlægID', mandatory: true, kind: 'facility' },
    Navn: { name: 'Navn', mandatory: false, kind: 'text' },
    Dato: { name: 'Dato', mandatory: false, kind: 'date' },
    KøretøjsType: {
      name: 'KøretøjsType',
      mandatory: false,
      kind: 'enum',
      allowedValues: VEHICLE_TYPES
    },
    LastVægt: { name: 'LastVægt', mandatory: false, kind: 'positiveNumber' },
    Brændstoftype: {
      name: 'Brændstoftype',
      mandatory: false,
      kind: 'enum',
      allowedValues: FUEL_TYPES
    }
  } satisfies Record<ManifestColumn, FieldSpec>)
});

export function isManifestColumn(name: string): name is ManifestColumn {
  return ALL_FIELDS.some((field) => field === name);
}

// ------------------------------------------------------------
// Header folding + aliases
// ------------------------------------------------------------

/**
 * Fold a header cell for lookup: lower case, no whitespace,
 * Danish letters transliterated (æ→ae, ø→oe, å→aa).
 */
export function foldColumnName(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '')
    .replace(/æ/g, 'ae')
    .replace(/ø/g, 'oe')
    .replace(/å/g, 'aa');
}

function buildAliasLookup(): ReadonlyMap<string, ManifestColumn> {
  const lookup = new Map<string, ManifestColumn>();

  for (const column of ALL_FIELDS) {
    lookup.set(foldColumnName(column), column);
  }

  for (const [alias, target] of Object.entries(columnAliases)) {
    if (!isManifestColumn(target)) {
      throw new Error(`Column alias "${alias}" points at unknown column "${target}".`);
    }
    lookup.set(foldColumnName(alias), target);
  }

  return lookup;
}

export const COLUMN_LOOKUP = buildAliasLookup();
