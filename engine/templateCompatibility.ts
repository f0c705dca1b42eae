// engine/templateCompatibility.ts
// Scores how closely a header matches the manifest template.
// Advisory only: the authoritative check is validateHeader().

import { MANIFEST_SCHEMA, type SchemaDefinition } from './constants';
import { resolveHeader } from './validateHeader';

export interface TemplateCompatibility {
  compatible: boolean;
  score: number;              // 0.8 * mandatory coverage + 0.2 * optional coverage
  mandatoryCoverage: number;
  optionalCoverage: number;
  missingMandatory: string[];
  missingOptional: string[];
  unexpectedColumns: string[];
}

const MANDATORY_WEIGHT = 0.8;
const OPTIONAL_WEIGHT = 0.2;

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function assessTemplateCompatibility(
  header: readonly string[],
  schema: SchemaDefinition = MANIFEST_SCHEMA
): TemplateCompatibility {
  const { columns, unknown } = resolveHeader(header);
  const present = new Set(columns.filter((c) => c !== ''));

  const missingMandatory = schema.mandatoryFields.filter((f) => !present.has(f));
  const missingOptional = schema.optionalFields.filter((f) => !present.has(f));

  const mandatoryCoverage =
    (schema.mandatoryFields.length - missingMandatory.length) / schema.mandatoryFields.length;
  const optionalCoverage =
    schema.optionalFields.length === 0
      ? 1
      : (schema.optionalFields.length - missingOptional.length) / schema.optionalFields.length;

  return {
    compatible: missingMandatory.length === 0,
    score: round(mandatoryCoverage * MANDATORY_WEIGHT + optionalCoverage * OPTIONAL_WEIGHT),
    mandatoryCoverage: round(mandatoryCoverage),
    optionalCoverage: round(optionalCoverage),
    missingMandatory: [...missingMandatory],
    missingOptional: [...missingOptional],
    unexpectedColumns: [...unknown]
  };
}
