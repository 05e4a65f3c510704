/**
 * Classification Features
 *
 * Fixed-order feature vector shared by the statistical model and the
 * rule-based fallback. The order is part of the model file contract.
 */

import { CATEGORY_PROFILES } from '../categories';
import { foldText, hasAnyKeyword, matchedKeywords } from '../text';

export const FEATURE_NAMES = [
  'pattern_toll',
  'pattern_domestic_fiscal',
  'pattern_international',
  'pattern_detailed',
  'pattern_simple',
  'line_count',
  'word_count',
  'has_dates',
  'has_amounts',
  'has_numbers',
  'has_currency_rd',
  'has_currency_usd',
  'has_tax_terms',
  'has_invoice_terms',
  'has_toll_terms',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type FeatureVector = Record<FeatureName, number>;

export const DATE_SHAPE = /\d{1,2}[-/]\d{1,2}[-/]\d{2,4}/g;
export const AMOUNT_SHAPE = /\$?\d+[.,]\d{2}/g;

const TAX_TERMS = ['itbis', 'iva', 'impuesto', 'tax'];
const INVOICE_TERMS = ['factura', 'invoice', 'comprobante'];
const TOLL_TERMS = ['ticket', 'peaje', 'vehiculo', 'estacion', 'vial'];

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function flag(value: boolean): number {
  return value ? 1 : 0;
}

export function extractFeatures(text: string): FeatureVector {
  const folded = foldText(text);
  const words = text.split(/\s+/).filter(Boolean);

  return {
    pattern_toll: matchedKeywords(folded, CATEGORY_PROFILES.toll.keywords).length,
    pattern_domestic_fiscal: matchedKeywords(folded, CATEGORY_PROFILES.domestic_fiscal.keywords).length,
    pattern_international: matchedKeywords(folded, CATEGORY_PROFILES.international.keywords).length,
    pattern_detailed: matchedKeywords(folded, CATEGORY_PROFILES.detailed.keywords).length,
    pattern_simple: matchedKeywords(folded, CATEGORY_PROFILES.simple.keywords).length,
    line_count: text.length === 0 ? 0 : text.split('\n').length,
    word_count: words.length,
    has_dates: countMatches(text, DATE_SHAPE),
    has_amounts: countMatches(text, AMOUNT_SHAPE),
    has_numbers: countMatches(text, /\d+/g),
    has_currency_rd: flag(folded.includes('rd$')),
    has_currency_usd: flag(hasAnyKeyword(folded, ['usd']) || text.includes('$')),
    has_tax_terms: flag(hasAnyKeyword(folded, TAX_TERMS)),
    has_invoice_terms: flag(hasAnyKeyword(folded, INVOICE_TERMS)),
    has_toll_terms: flag(hasAnyKeyword(folded, TOLL_TERMS)),
  };
}

export function toVector(features: FeatureVector): number[] {
  return FEATURE_NAMES.map((name) => features[name]);
}
