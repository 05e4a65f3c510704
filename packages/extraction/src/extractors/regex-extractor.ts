/**
 * Regex Extractor
 *
 * Applies the pattern catalog field by field. For each field the first rule
 * whose match has a context keyword nearby wins.
 */

import { foldText, hasKeywordNear } from '../text';
import type { CanonicalField, FieldCandidate } from '../types';
import { kindOf } from '../validation/field-kinds';
import { cleanIdentifier, cleanMoney, cleanText } from './cleaning';
import { CONTEXT_RADIUS, PATTERN_CATALOG, type PatternRule } from './patterns';

export interface RuleMatch {
  rule: PatternRule;
  value: string;
  offset: number;
}

export function cleanCapturedValue(field: CanonicalField, raw: string): string {
  switch (kindOf(field)) {
    case 'money':
      return cleanMoney(raw);
    case 'identifier':
    case 'fiscal_document_number':
      return cleanIdentifier(raw);
    case 'date':
    case 'free_text':
      return cleanText(raw);
  }
}

/**
 * First match of a rule that satisfies its context requirement.
 * `folded` must be foldText(text).
 */
export function matchRule(rule: PatternRule, text: string, folded: string): RuleMatch | null {
  for (const match of folded.matchAll(rule.pattern)) {
    const span = match.indices?.[rule.group];
    if (!span || match.index === undefined) continue;

    if (!hasKeywordNear(folded, rule.context, match.index, CONTEXT_RADIUS)) continue;

    const [start, end] = span;
    return { rule, value: text.slice(start, end), offset: start };
  }
  return null;
}

export class RegexExtractor {
  constructor(
    private readonly catalog: Readonly<Record<CanonicalField, readonly PatternRule[]>> = PATTERN_CATALOG
  ) {}

  extract(text: string): FieldCandidate[] {
    const folded = foldText(text);
    const candidates: FieldCandidate[] = [];

    for (const rules of Object.values(this.catalog)) {
      for (const rule of rules) {
        const match = matchRule(rule, text, folded);
        if (!match) continue;

        const rawValue = cleanCapturedValue(rule.field, match.value);
        if (rawValue) {
          candidates.push({ field: rule.field, rawValue, provenance: 'pattern', offset: match.offset });
        }
        break;
      }
    }

    return candidates;
  }
}
