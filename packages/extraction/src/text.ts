/**
 * Text Helpers
 *
 * OCR text arrives with mixed case, accents that may or may not survive, and
 * arbitrary whitespace. Keyword lookups go through foldText() so "Vehículo",
 * "VEHICULO" and "vehiculo" all match the same keyword.
 */

/**
 * Lowercase and strip diacritics while keeping every character at its
 * original index, so offsets found in folded text are valid in the original.
 */
export function foldText(text: string): string {
  let folded = '';
  for (const char of text) {
    const lower = char.toLowerCase();
    const stripped = lower.normalize('NFD').replace(/\p{M}/gu, '');
    folded += stripped.length === char.length ? stripped : lower.length === char.length ? lower : char;
  }
  return folded;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const WORD_CHAR = /[\p{L}\p{N}]/u;
const keywordCache = new Map<string, RegExp>();

/**
 * Compile a keyword into a whole-word matcher for folded text.
 * A trailing "*" makes it a prefix ("vencim*" matches "vencimiento").
 */
export function keywordPattern(keyword: string): RegExp {
  const cached = keywordCache.get(keyword);
  if (cached) return cached;

  const prefix = keyword.endsWith('*');
  const body = foldText(prefix ? keyword.slice(0, -1) : keyword);
  const lead = WORD_CHAR.test(body.charAt(0)) ? '(?<![\\p{L}\\p{N}])' : '';
  const trail = !prefix && WORD_CHAR.test(body.charAt(body.length - 1)) ? '(?![\\p{L}\\p{N}])' : '';
  const pattern = new RegExp(`${lead}${escapeRegExp(body)}${trail}`, 'u');

  keywordCache.set(keyword, pattern);
  return pattern;
}

/**
 * True if any keyword occurs in the (already folded) text.
 */
export function hasAnyKeyword(foldedText: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => keywordPattern(keyword).test(foldedText));
}

/**
 * Keywords from the list that occur in the (already folded) text.
 */
export function matchedKeywords(foldedText: string, keywords: readonly string[]): string[] {
  return keywords.filter((keyword) => keywordPattern(keyword).test(foldedText));
}

/**
 * True if any keyword occurs within `radius` characters of `center`.
 * Word boundaries are checked against the full text, so a word cut by the
 * window edge does not count.
 */
export function hasKeywordNear(
  foldedText: string,
  keywords: readonly string[],
  center: number,
  radius: number
): boolean {
  const start = Math.max(0, center - radius);
  const end = Math.min(foldedText.length, center + radius);
  return keywords.some((keyword) => {
    const pattern = new RegExp(keywordPattern(keyword).source, 'gu');
    pattern.lastIndex = start;
    const match = pattern.exec(foldedText);
    return match !== null && match.index + match[0].length <= end;
  });
}

/**
 * Character offset at which each line starts.
 */
export function lineOffsets(lines: readonly string[]): number[] {
  const offsets: number[] = [];
  let cursor = 0;
  for (const line of lines) {
    offsets.push(cursor);
    cursor += line.length + 1;
  }
  return offsets;
}
