/**
 * Field Validator
 *
 * Normalizes a candidate's raw text into a typed FieldValue. Dispatch is an
 * exhaustive switch over the field's kind (see field-kinds.ts).
 *
 * Outcomes:
 * - valid: normalized value
 * - rejected: the value is not acceptable for its kind; the field is dropped
 * - raw: the kind validator threw; the field is kept with its raw text
 *
 * Subclasses may override a kind method to change normalization for every
 * field of that kind.
 */

import { format, isValid, parse } from 'date-fns';
import { serializeError } from '../logger';
import { fieldValidationCounter } from '../metrics';
import type { CanonicalField, FieldValue } from '../types';
import { cleanMoney, cleanText } from '../extractors/cleaning';
import { FIELD_KINDS } from './field-kinds';

export interface Rejection {
  kind: 'rejected';
  reason: string;
}

export type Normalized = FieldValue | Rejection;

export type ValidationOutcome =
  | { status: 'valid'; value: FieldValue }
  | { status: 'raw'; value: FieldValue; diagnostic: string }
  | { status: 'rejected'; diagnostic: string };

export const MAX_AMOUNT = 10_000_000;

/** Two-digit years resolve to 20YY unless that lands past this year */
export const TWO_DIGIT_YEAR_PIVOT = 2030;

const OUTPUT_DATE_FORMAT = 'dd/MM/yyyy';
const ISO_DATE_FORMAT = 'yyyy-MM-dd';
const REFERENCE_DATE = new Date(2000, 0, 1);

interface DateLayout {
  shape: RegExp;
  format: string;
  twoDigitYear: boolean;
}

/** Tried in order; the shape check keeps date-fns from reading "24" as year 24 */
const DATE_LAYOUTS: readonly DateLayout[] = [
  { shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, format: 'dd/MM/yyyy', twoDigitYear: false },
  { shape: /^\d{1,2}-\d{1,2}-\d{4}$/, format: 'dd-MM-yyyy', twoDigitYear: false },
  { shape: /^\d{4}-\d{1,2}-\d{1,2}$/, format: 'yyyy-MM-dd', twoDigitYear: false },
  { shape: /^\d{1,2}\/\d{1,2}\/\d{2}$/, format: 'dd/MM/yyyy', twoDigitYear: true },
  { shape: /^\d{1,2}-\d{1,2}-\d{2}$/, format: 'dd-MM-yyyy', twoDigitYear: true },
];

const FISCAL_NUMBER_FORMATS: readonly RegExp[] = [/^B\d{10}$/, /^E\d{12}$/, /^[A-K]\d{13}$/, /^[A-K]\d{18}$/];

export function reject(reason: string): Rejection {
  return { kind: 'rejected', reason };
}

function isRejection(value: Normalized): value is Rejection {
  return value.kind === 'rejected';
}

function assertNever(value: never): never {
  throw new Error(`Unhandled field kind: ${JSON.stringify(value)}`);
}

/**
 * "15/01/24" -> "15/01/2024", "15/01/45" -> "15/01/1945"
 */
export function expandTwoDigitYear(value: string): string {
  const separator = value.includes('/') ? '/' : '-';
  const parts = value.split(separator);
  const yy = parseInt(parts[parts.length - 1] ?? '', 10);
  let year = 2000 + yy;
  if (year > TWO_DIGIT_YEAR_PIVOT) year -= 100;
  return [...parts.slice(0, -1), String(year)].join(separator);
}

export class FieldValidator {
  validate(field: CanonicalField, rawValue: string): ValidationOutcome {
    let normalized: Normalized;
    try {
      normalized = this.normalize(field, rawValue);
    } catch (error) {
      fieldValidationCounter.inc({ field, outcome: 'raw' });
      const detail = serializeError(error);
      const message = typeof detail === 'string' ? detail : detail.message;
      return {
        status: 'raw',
        value: { kind: 'raw', value: rawValue },
        diagnostic: `${field}: validator error, kept raw value (${message})`,
      };
    }

    if (isRejection(normalized)) {
      fieldValidationCounter.inc({ field, outcome: 'rejected' });
      return { status: 'rejected', diagnostic: `${field}: rejected, ${normalized.reason}` };
    }

    fieldValidationCounter.inc({ field, outcome: 'valid' });
    return { status: 'valid', value: normalized };
  }

  protected normalize(field: CanonicalField, rawValue: string): Normalized {
    const fieldKind = FIELD_KINDS[field];
    switch (fieldKind.kind) {
      case 'identifier':
        return this.identifier(rawValue, fieldKind.expectedDigits);
      case 'fiscal_document_number':
        return this.fiscalDocumentNumber(rawValue);
      case 'date':
        return this.calendarDate(rawValue);
      case 'money':
        return this.money(rawValue);
      case 'free_text':
        return this.freeText(rawValue);
      default:
        return assertNever(fieldKind);
    }
  }

  /**
   * Digits only when their count is expected, otherwise the trimmed input.
   */
  identifier(rawValue: string, expectedDigits: readonly number[]): Normalized {
    const trimmed = rawValue.trim();
    if (!trimmed) return reject('empty identifier');

    const digits = trimmed.replace(/\D/g, '');
    if (expectedDigits.includes(digits.length)) {
      return { kind: 'identifier', value: digits };
    }
    return { kind: 'identifier', value: trimmed };
  }

  calendarDate(rawValue: string): Normalized {
    const value = rawValue.trim();
    if (!value) return reject('empty date');

    for (const layout of DATE_LAYOUTS) {
      if (!layout.shape.test(value)) continue;

      const input = layout.twoDigitYear ? expandTwoDigitYear(value) : value;
      const date = parse(input, layout.format, REFERENCE_DATE);
      if (isValid(date)) {
        return { kind: 'date', value: format(date, OUTPUT_DATE_FORMAT), iso: format(date, ISO_DATE_FORMAT) };
      }
    }

    // Unparseable dates pass through unchanged
    return { kind: 'date', value, iso: null };
  }

  money(rawValue: string): Normalized {
    const cleaned = cleanMoney(rawValue);
    const amount = cleaned ? Number(cleaned) : NaN;

    if (!Number.isFinite(amount)) return reject(`not a number: "${rawValue}"`);
    if (amount < 0) return reject(`negative amount: ${amount}`);
    if (amount > MAX_AMOUNT) return reject(`amount above ${MAX_AMOUNT}: ${amount}`);

    const fixed = amount.toFixed(2);
    return { kind: 'money', amount: fixed, cents: Math.round(Number(fixed) * 100) };
  }

  freeText(rawValue: string): Normalized {
    const value = cleanText(rawValue);
    if (value.length < 2) return reject('text too short');
    return { kind: 'text', value };
  }

  fiscalDocumentNumber(rawValue: string): Normalized {
    const value = rawValue.toUpperCase().replace(/[\s.\-_/]/g, '');
    if (!FISCAL_NUMBER_FORMATS.some((pattern) => pattern.test(value))) {
      return reject(`unknown fiscal document number format: "${value}"`);
    }
    return { kind: 'fiscal_document_number', value, series: value.slice(0, 3) };
  }
}
