/**
 * Failsafe Extraction
 *
 * Last-resort patterns for total, date and RNC, used when the full pipeline
 * fails on a document.
 */

import type { FieldCandidate } from '../types';
import { cleanCapturedValue } from './regex-extractor';
import { FAILSAFE_PATTERNS } from './patterns';

export function extractFailsafeCandidates(text: string): FieldCandidate[] {
  const candidates: FieldCandidate[] = [];

  for (const { field, pattern } of FAILSAFE_PATTERNS) {
    const match = pattern.exec(text);
    const value = match?.[1];
    if (!match || value === undefined) continue;

    const rawValue = cleanCapturedValue(field, value);
    if (rawValue) {
      candidates.push({
        field,
        rawValue,
        provenance: 'pattern',
        offset: match.index + match[0].lastIndexOf(value),
      });
    }
  }

  return candidates;
}
