/**
 * Result Merger
 *
 * Combines regex and heuristic candidates into one field map. The regex map is
 * the base. Heuristic candidates fill gaps, and for a fixed set of fields
 * replace the regex value when theirs is better formatted. Identity fields
 * stay with the regex source.
 */

import type { CanonicalField, FieldCandidate, MergedFieldMap, ResolvedCandidate } from '../types';
import { kindOf, resolveFieldName } from '../validation/field-kinds';

/** Fields the heuristic source never overrides once regex has them */
export const REGEX_LOCKED_FIELDS: ReadonlySet<CanonicalField> = new Set<CanonicalField>([
  'rnc',
  'ncf',
  'numero_factura',
  'numero_ticket',
  'razon_social',
]);

/** Fields where a better-formatted heuristic value replaces the regex value */
export const HEURISTIC_ELIGIBLE_FIELDS: ReadonlySet<CanonicalField> = new Set<CanonicalField>([
  'total',
  'subtotal',
  'itbis',
  'fecha',
  'fecha_emision',
  'fecha_vencimiento',
]);

const TWO_DECIMALS = /^\d+[.,]\d{2}$/;

function resolve(candidate: FieldCandidate): ResolvedCandidate {
  return { ...candidate, field: resolveFieldName(candidate.field) };
}

/**
 * Later candidates overwrite earlier ones for the same canonical field.
 */
function toMap(candidates: readonly FieldCandidate[]): MergedFieldMap {
  const map: MergedFieldMap = {};
  for (const candidate of candidates) {
    const resolved = resolve(candidate);
    map[resolved.field] = resolved;
  }
  return map;
}

export function isBetterFormatted(field: CanonicalField, heuristic: string, regex: string): boolean {
  if (kindOf(field) === 'money') {
    return TWO_DECIMALS.test(heuristic) && !TWO_DECIMALS.test(regex);
  }
  return heuristic.length > regex.length;
}

export function mergeCandidates(
  regexCandidates: readonly FieldCandidate[],
  heuristicCandidates: readonly FieldCandidate[]
): MergedFieldMap {
  const merged = toMap(regexCandidates);
  const heuristic = toMap(heuristicCandidates);

  for (const candidate of Object.values(heuristic)) {
    if (!candidate) continue;
    const field = candidate.field;
    const existing = merged[field];

    if (!existing) {
      merged[field] = candidate;
      continue;
    }
    if (REGEX_LOCKED_FIELDS.has(field)) continue;

    if (HEURISTIC_ELIGIBLE_FIELDS.has(field) && isBetterFormatted(field, candidate.rawValue, existing.rawValue)) {
      merged[field] = candidate;
    }
  }

  return merged;
}
