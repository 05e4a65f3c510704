/**
 * Field Kinds
 *
 * Every canonical field has exactly one semantic kind. The record is typed
 * over CanonicalField, so adding a field without a kind fails to compile.
 */

import type { CanonicalField, FieldAlias } from '../types';

export type FieldKind =
  | { kind: 'identifier'; expectedDigits: readonly number[] }
  | { kind: 'fiscal_document_number' }
  | { kind: 'date' }
  | { kind: 'money' }
  | { kind: 'free_text' };

export const FIELD_KINDS: Record<CanonicalField, FieldKind> = {
  rnc: { kind: 'identifier', expectedDigits: [9, 11] },
  // Document numbers carry letters and dashes; no digit count to enforce
  numero_factura: { kind: 'identifier', expectedDigits: [] },
  numero_ticket: { kind: 'identifier', expectedDigits: [] },
  ncf: { kind: 'fiscal_document_number' },
  razon_social: { kind: 'free_text' },
  vehiculo: { kind: 'free_text' },
  estacion: { kind: 'free_text' },
  fecha: { kind: 'date' },
  fecha_emision: { kind: 'date' },
  fecha_vencimiento: { kind: 'date' },
  subtotal: { kind: 'money' },
  itbis: { kind: 'money' },
  descuento: { kind: 'money' },
  total: { kind: 'money' },
};

export const FIELD_ALIASES: Record<FieldAlias, CanonicalField> = {
  monto_detectado: 'total',
  fecha_detectada: 'fecha',
  empresa_detectada: 'razon_social',
  numero_documento: 'rnc',
  impuestos: 'itbis',
  iva: 'itbis',
  rnc_emisor: 'rnc',
  comprobante: 'ncf',
  nombre_emisor: 'razon_social',
};

function isAlias(field: CanonicalField | FieldAlias): field is FieldAlias {
  return Object.prototype.hasOwnProperty.call(FIELD_ALIASES, field);
}

export function resolveFieldName(field: CanonicalField | FieldAlias): CanonicalField {
  return isAlias(field) ? FIELD_ALIASES[field] : field;
}

export const CANONICAL_FIELDS = Object.keys(FIELD_KINDS).filter(
  (name): name is CanonicalField => Object.prototype.hasOwnProperty.call(FIELD_KINDS, name)
);

export function kindOf(field: CanonicalField): FieldKind['kind'] {
  return FIELD_KINDS[field].kind;
}
