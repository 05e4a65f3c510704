/**
 * Confidence Scoring
 *
 * Per-field confidence (0-100) from four additive signals, and the overall
 * document quality score (0-10).
 */

import { foldText, hasKeywordNear } from '../text';
import type { CanonicalField, FieldConfidenceBand, QualityBand } from '../types';
import { round2 } from './text-quality';

const BASE_SCORE = 20;
const MUST_HAVE_BONUS = 30;
const CONTEXT_BONUS = 30;
const POSITION_BONUS = 20;
const CONTEXT_RADIUS = 100;

export const MUST_HAVE_FIELDS: ReadonlySet<CanonicalField> = new Set<CanonicalField>([
  'rnc',
  'fecha',
  'fecha_emision',
  'total',
]);

export const FIELD_CONTEXT_KEYWORDS: Readonly<Record<CanonicalField, readonly string[]>> = {
  rnc: ['rnc', 'nit', 'identif*'],
  ncf: ['ncf', 'comprobante'],
  numero_factura: ['factura', 'no', 'numero', 'invoice'],
  numero_ticket: ['ticket', 'no', 'numero'],
  razon_social: ['razon social', 'emisor', 'proveedor', 'empresa'],
  vehiculo: ['vehiculo', 'categoria'],
  estacion: ['estacion', 'peaje'],
  fecha: ['fecha', 'emision', 'factura', 'date'],
  fecha_emision: ['fecha', 'emision'],
  fecha_vencimiento: ['vencim*', 'due'],
  subtotal: ['subtotal', 'gravado'],
  itbis: ['itbis', 'impuesto*', 'iva', 'tax'],
  descuento: ['descuento*', 'rebaja', 'discount'],
  total: ['total', 'pagar', 'importe'],
};

/** Expected position of a field as a percentage of the text length */
const EXPECTED_POSITION: Partial<Record<CanonicalField, readonly [number, number]>> = {
  rnc: [0, 40],
  fecha: [0, 50],
  fecha_emision: [0, 50],
  numero_factura: [0, 40],
  ncf: [0, 40],
  razon_social: [0, 30],
  total: [60, 100],
  subtotal: [50, 100],
  itbis: [50, 100],
};

export interface ScoringContext {
  text: string;
  /** foldText(text), computed once per document */
  folded: string;
}

export function createScoringContext(text: string): ScoringContext {
  return { text, folded: foldText(text) };
}

export function fieldConfidence(field: CanonicalField, offset: number, context: ScoringContext): number {
  let score = BASE_SCORE;

  if (MUST_HAVE_FIELDS.has(field)) score += MUST_HAVE_BONUS;

  if (hasKeywordNear(context.folded, FIELD_CONTEXT_KEYWORDS[field], offset, CONTEXT_RADIUS)) {
    score += CONTEXT_BONUS;
  }

  const [min, max] = EXPECTED_POSITION[field] ?? [0, 100];
  const position = context.text.length > 0 ? (offset / context.text.length) * 100 : 0;
  if (position >= min && position <= max) score += POSITION_BONUS;

  return Math.min(score, 100);
}

export function confidenceBand(score: number): FieldConfidenceBand {
  if (score >= 80) return 'high';
  if (score >= 60) return 'medium';
  if (score >= 40) return 'low';
  return 'very_low';
}

export interface QualityInputs {
  presentFields: ReadonlySet<CanonicalField>;
  /** Fields that went through validation */
  validatedCount: number;
  /** Of those, how many produced a valid value */
  validCount: number;
  /** OCR text quality, 0-10 */
  textQuality: number;
}

/**
 * 4 x must-have fraction + 3 x validation pass fraction + 3 x text quality / 10
 */
export function overallQualityScore(inputs: QualityInputs): number {
  const { presentFields } = inputs;
  const hasDate =
    presentFields.has('fecha') || presentFields.has('fecha_emision') || presentFields.has('fecha_vencimiento');
  const mustHave = [presentFields.has('rnc'), hasDate, presentFields.has('total')];
  const mustHaveFraction = mustHave.filter(Boolean).length / mustHave.length;

  const passFraction = inputs.validatedCount > 0 ? inputs.validCount / inputs.validatedCount : 0;

  return round2(4 * mustHaveFraction + 3 * passFraction + (3 * inputs.textQuality) / 10);
}

export function qualityBand(score: number): QualityBand {
  if (score >= 7) return 'high';
  if (score >= 4) return 'medium';
  return 'low';
}
