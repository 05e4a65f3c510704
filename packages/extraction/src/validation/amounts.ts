/**
 * Amount Coherence
 *
 * subtotal - descuento + itbis should equal total within one cent.
 */

import type { CanonicalField, FieldValue } from '../types';

export const AMOUNT_TOLERANCE_CENTS = 1;

type ValueMap = Partial<Record<CanonicalField, FieldValue>>;

function cents(values: ValueMap, field: CanonicalField): number | null {
  const value = values[field];
  return value?.kind === 'money' ? value.cents : null;
}

function formatCents(value: number): string {
  return (value / 100).toFixed(2);
}

/**
 * Returns a warning when subtotal, itbis and total are all present and valid
 * but do not add up.
 */
export function checkAmountCoherence(values: ValueMap): string[] {
  const subtotal = cents(values, 'subtotal');
  const itbis = cents(values, 'itbis');
  const total = cents(values, 'total');
  if (subtotal === null || itbis === null || total === null) return [];

  const discount = cents(values, 'descuento') ?? 0;
  const expected = subtotal - discount + itbis;
  const difference = Math.abs(expected - total);

  if (difference > AMOUNT_TOLERANCE_CENTS) {
    return [
      `Amounts do not add up: subtotal ${formatCents(subtotal)} - descuento ${formatCents(discount)} + itbis ${formatCents(itbis)} = ${formatCents(expected)}, total is ${formatCents(total)} (difference ${formatCents(difference)})`,
    ];
  }
  return [];
}
