/**
 * Confidence and Quality Scoring Tests
 */

import {
  analyzeTextQuality,
  confidenceBand,
  createScoringContext,
  fieldConfidence,
  overallQualityScore,
  qualityBand,
  type CanonicalField,
} from '@facturalens/extraction';

describe('fieldConfidence', () => {
  it('should give a must-have field with context in its expected position full marks', () => {
    const text = `${' '.repeat(80)}Total: 500.00`;
    const context = createScoringContext(text);

    expect(fieldConfidence('total', text.indexOf('500.00'), context)).toBe(100);
  });

  it('should add only the position bonus when nothing else applies', () => {
    const text = 'Ferreteria Ochoa\nGracias por su compra';

    expect(fieldConfidence('razon_social', 0, createScoringContext(text))).toBe(40);
  });

  it('should use the full document as the default position window', () => {
    const text = 'Vehiculo: LIVIANO';

    expect(fieldConfidence('vehiculo', 10, createScoringContext(text))).toBe(70);
  });

  it('should withhold the position bonus outside the expected window', () => {
    const text = `${'x'.repeat(90)}\nRNC 101234567`;
    const offset = text.indexOf('101234567');

    // base 20 + must-have 30 + context 30
    expect(fieldConfidence('rnc', offset, createScoringContext(text))).toBe(80);
  });
});

describe('confidenceBand', () => {
  it.each<[number, string]>([
    [100, 'high'],
    [80, 'high'],
    [79, 'medium'],
    [60, 'medium'],
    [59, 'low'],
    [40, 'low'],
    [39, 'very_low'],
    [0, 'very_low'],
  ])('should map %d to %s', (score, band) => {
    expect(confidenceBand(score)).toBe(band);
  });
});

describe('overallQualityScore', () => {
  it('should weight must-haves, validation and text quality', () => {
    const presentFields = new Set<CanonicalField>(['rnc', 'fecha', 'total']);

    expect(overallQualityScore({ presentFields, validatedCount: 4, validCount: 3, textQuality: 5 })).toBe(7.75);
  });

  it('should count any date field as the date must-have', () => {
    const presentFields = new Set<CanonicalField>(['fecha_vencimiento']);

    // 4 * 1/3 + 3 * 1 + 3 * 2.5 / 10
    expect(overallQualityScore({ presentFields, validatedCount: 2, validCount: 2, textQuality: 2.5 })).toBe(5.08);
  });

  it('should score nothing as zero', () => {
    expect(overallQualityScore({ presentFields: new Set(), validatedCount: 0, validCount: 0, textQuality: 0 })).toBe(0);
  });
});

describe('qualityBand', () => {
  it('should band the overall score', () => {
    expect(qualityBand(7)).toBe('high');
    expect(qualityBand(6.99)).toBe('medium');
    expect(qualityBand(4)).toBe('medium');
    expect(qualityBand(3.99)).toBe('low');
  });
});

describe('analyzeTextQuality', () => {
  it('should score empty text as zero', () => {
    const quality = analyzeTextQuality('');

    expect(quality.score).toBe(0);
    expect(quality.hasDates).toBe(false);
    expect(quality.wordCount).toBe(0);
  });

  it('should combine presence flags with capped densities', () => {
    const quality = analyzeTextQuality('RNC 123\nTotal 10.00');

    expect(quality.hasDates).toBe(false);
    expect(quality.hasAmounts).toBe(true);
    expect(quality.hasIdentifierKeywords).toBe(true);
    expect(quality.lineCount).toBe(2);
    // (0 + 1 + 1 + 2 + 2) / 7 * 10
    expect(quality.score).toBe(8.57);
  });
});
