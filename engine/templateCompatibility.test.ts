import { describe, expect, it } from 'vitest';

import { TEMPLATE_HEADER } from './__fixtures__/manifests';
import { assessTemplateCompatibility } from './templateCompatibility';

describe('assessTemplateCompatibility', () => {
  it('scores the full template header as 1', () => {
    expect(assessTemplateCompatibility(TEMPLATE_HEADER)).toEqual({
      compatible: true,
      score: 1,
      mandatoryCoverage: 1,
      optionalCoverage: 1,
      missingMandatory: [],
      missingOptional: [],
      unexpectedColumns: []
    });
  });

  it('weights mandatory coverage over optional coverage', () => {
    const result = assessTemplateCompatibility(['Adresse', 'postnr', 'PostDistrikt', 'Navn', 'Kommentar']);

    // 0.8 * 3/4 + 0.2 * 1/5
    expect(result).toEqual({
      compatible: false,
      score: 0.64,
      mandatoryCoverage: 0.75,
      optionalCoverage: 0.2,
      missingMandatory: ['ModtageranlægID'],
      missingOptional: ['Dato', 'KøretøjsType', 'LastVægt', 'Brændstoftype'],
      unexpectedColumns: ['Kommentar']
    });
  });

  it('handles an empty header', () => {
    const result = assessTemplateCompatibility([]);
    expect(result.score).toBe(0);
    expect(result.compatible).toBe(false);
  });
});
