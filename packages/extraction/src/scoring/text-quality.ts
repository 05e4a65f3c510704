/**
 * OCR Text Quality
 *
 * Cheap signals for how usable the OCR output is, on a 0-10 scale.
 */

import { foldText, hasAnyKeyword } from '../text';

export interface TextQuality {
  characterCount: number;
  lineCount: number;
  wordCount: number;
  digitDensity: number;
  amountsPerLine: number;
  hasDates: boolean;
  hasAmounts: boolean;
  hasIdentifierKeywords: boolean;
  /** 0-10, two decimals */
  score: number;
}

const DATE_SHAPE = /\d{1,2}[-/]\d{1,2}[-/]\d{2,4}/;
const AMOUNT_SHAPE = /\d+[.,]\d{2}/g;
const IDENTIFIER_KEYWORDS = ['rnc', 'ncf', 'nit', 'id'];

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function analyzeTextQuality(text: string): TextQuality {
  const lineCount = text.split('\n').length;
  const amountCount = text.match(AMOUNT_SHAPE)?.length ?? 0;
  const digitCount = text.match(/\d/g)?.length ?? 0;

  const digitDensity = digitCount / Math.max(1, text.length);
  const amountsPerLine = amountCount / Math.max(1, lineCount);
  const hasDates = DATE_SHAPE.test(text);
  const hasAmounts = amountCount > 0;
  const hasIdentifierKeywords = hasAnyKeyword(foldText(text), IDENTIFIER_KEYWORDS);

  const raw =
    (Number(hasDates) +
      Number(hasAmounts) +
      Number(hasIdentifierKeywords) +
      Math.min(digitDensity * 10, 2) +
      Math.min(amountsPerLine * 20, 2)) /
    7;

  return {
    characterCount: text.length,
    lineCount,
    wordCount: text.split(/\s+/).filter(Boolean).length,
    digitDensity,
    amountsPerLine,
    hasDates,
    hasAmounts,
    hasIdentifierKeywords,
    score: round2(raw * 10),
  };
}
