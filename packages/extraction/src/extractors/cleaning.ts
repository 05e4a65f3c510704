/**
 * Candidate Cleaning
 *
 * Light, field-specific cleanup applied to captured text before it becomes a
 * candidate. Full normalization happens later in the validator.
 */

/**
 * Strip currency symbols and thousands separators, leaving digits and at most
 * one "." as decimal point. The number of decimals is left untouched
 * ("150.0" stays "150.0").
 */
export function cleanMoney(raw: string): string {
  const stripped = raw.replace(/[^\d.,-]/g, '').replace(/(?!^)-/g, '');
  const lastDot = stripped.lastIndexOf('.');
  const lastComma = stripped.lastIndexOf(',');

  let decimalIndex = -1;
  if (lastDot >= 0 && lastComma >= 0) {
    decimalIndex = Math.max(lastDot, lastComma);
  } else if (lastDot >= 0 || lastComma >= 0) {
    const sep = lastDot >= 0 ? '.' : ',';
    const index = Math.max(lastDot, lastComma);
    const occurrences = stripped.split(sep).length - 1;
    const digitsAfter = stripped.length - index - 1;
    if (occurrences === 1 && (sep === '.' || digitsAfter <= 2)) {
      decimalIndex = index;
    } else if (occurrences > 1 && digitsAfter <= 2) {
      decimalIndex = index;
    }
  }

  if (decimalIndex === -1) {
    return stripped.replace(/[.,]/g, '');
  }

  const integerPart = stripped.slice(0, decimalIndex).replace(/[.,]/g, '');
  const fractionPart = stripped.slice(decimalIndex + 1);
  return `${integerPart}.${fractionPart}`;
}

/**
 * Uppercase and drop whitespace ("b01 0000 0001" -> "B0100000001").
 */
export function cleanIdentifier(raw: string): string {
  return raw.replace(/\s+/g, '').toUpperCase();
}

/**
 * Trim and collapse internal whitespace.
 */
export function cleanText(raw: string): string {
  return raw.replace(/\s+/g, ' ').trim();
}
