/**
 * Rule-Based Category Scoring
 *
 * Used whenever no model is loaded or the model is not confident enough.
 */

import { CATEGORY_PROFILES } from '../categories';
import { foldText, hasAnyKeyword, matchedKeywords } from '../text';
import { CATEGORY_PRIORITY, type DocumentCategory } from '../types';

/** Confidence reported for a rule-based decision. */
export const RULES_CONFIDENCE = 0.8;
/** Confidence reported when the model raised and rules took over. */
export const RULES_AFTER_MODEL_ERROR_CONFIDENCE = 0.7;

interface CategoryBonus {
  category: DocumentCategory;
  /** Every keyword must be present */
  requires: readonly string[];
  points: number;
}

const CATEGORY_BONUSES: readonly CategoryBonus[] = [
  { category: 'domestic_fiscal', requires: ['rnc'], points: 2 },
  { category: 'toll', requires: ['ticket', 'peaje'], points: 3 },
  { category: 'toll', requires: ['vehiculo', 'importe'], points: 2 },
  { category: 'toll', requires: ['estacion'], points: 1 },
  { category: 'toll', requires: ['fideicomiso', 'vial'], points: 2 },
  { category: 'toll', requires: ['operador', 'peaje'], points: 1 },
];

export type CategoryScores = Record<DocumentCategory, number>;

export function scoreCategories(text: string): CategoryScores {
  const folded = foldText(text);
  const scores: CategoryScores = {
    toll: 0,
    domestic_fiscal: 0,
    international: 0,
    detailed: 0,
    simple: 0,
    generic: 0,
  };

  for (const category of CATEGORY_PRIORITY) {
    scores[category] += matchedKeywords(folded, CATEGORY_PROFILES[category].keywords).length;
  }

  for (const bonus of CATEGORY_BONUSES) {
    if (bonus.requires.every((keyword) => hasAnyKeyword(folded, [keyword]))) {
      scores[bonus.category] += bonus.points;
    }
  }

  return scores;
}

/**
 * Highest-scoring category; ties go to the earlier entry in CATEGORY_PRIORITY.
 * A document with no keyword hits at all is generic.
 */
export function pickCategory(scores: CategoryScores): DocumentCategory {
  let best: DocumentCategory = 'generic';
  let bestScore = 0;

  for (const category of CATEGORY_PRIORITY) {
    if (scores[category] > bestScore) {
      best = category;
      bestScore = scores[category];
    }
  }

  return best;
}

export function classifyByRules(text: string): DocumentCategory {
  return pickCategory(scoreCategories(text));
}
