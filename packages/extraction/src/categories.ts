/**
 * Category Profiles
 *
 * Per-category keyword sets and field policy. Keywords drive both the
 * classifier features and the rule-based fallback scores.
 */

import type { CanonicalField, DocumentCategory } from './types';

export interface CategoryProfile {
  category: DocumentCategory;
  description: string;
  /** Whole-word keywords (see keywordPattern) */
  keywords: readonly string[];
  requiresFiscalDocumentNumber: boolean;
  /** Fields kept on top of CORE_FIELDS */
  optionalFields: readonly CanonicalField[];
}

/** Fields every category may carry. */
export const CORE_FIELDS: readonly CanonicalField[] = [
  'rnc',
  'razon_social',
  'fecha',
  'fecha_emision',
  'total',
];

export const CATEGORY_PROFILES: Record<DocumentCategory, CategoryProfile> = {
  toll: {
    category: 'toll',
    description: 'Road toll (peaje) ticket: vehicle, station and ticket number, no NCF',
    keywords: ['ticket', 'peaje', 'vehiculo', 'importe', 'estacion', 'vial'],
    requiresFiscalDocumentNumber: false,
    optionalFields: ['numero_ticket', 'vehiculo', 'estacion'],
  },
  domestic_fiscal: {
    category: 'domestic_fiscal',
    description: 'Domestic tax invoice with RNC, NCF and ITBIS',
    keywords: ['rnc', 'ncf', 'itbis', 'rd$', 'comprobante fiscal', 'dgii'],
    requiresFiscalDocumentNumber: true,
    optionalFields: ['ncf', 'numero_factura', 'fecha_vencimiento', 'subtotal', 'itbis', 'descuento'],
  },
  international: {
    category: 'international',
    description: 'Foreign invoice identified by NIT and IVA/VAT',
    keywords: ['nit', 'iva', 'usd', 'tax', 'invoice', 'vat'],
    requiresFiscalDocumentNumber: true,
    optionalFields: ['ncf', 'numero_factura', 'fecha_vencimiento', 'subtotal', 'itbis', 'descuento'],
  },
  detailed: {
    category: 'detailed',
    description: 'Itemized invoice with subtotal, discounts and tax lines',
    keywords: ['subtotal', 'descuento', 'impuesto', 'items', 'cantidad', 'precio'],
    requiresFiscalDocumentNumber: true,
    optionalFields: ['ncf', 'numero_factura', 'fecha_vencimiento', 'subtotal', 'itbis', 'descuento'],
  },
  simple: {
    category: 'simple',
    description: 'Short invoice with a total and a date',
    keywords: ['factura', 'total', 'fecha', 'cliente', 'producto'],
    requiresFiscalDocumentNumber: true,
    optionalFields: ['ncf', 'numero_factura', 'subtotal', 'itbis'],
  },
  generic: {
    category: 'generic',
    description: 'Unrecognized document',
    keywords: [],
    requiresFiscalDocumentNumber: true,
    optionalFields: ['ncf', 'numero_factura', 'fecha_vencimiento', 'subtotal', 'itbis', 'descuento'],
  },
};

/**
 * Fields a category is allowed to carry. NCF is excluded whenever the
 * category does not require a fiscal document number.
 */
export function allowedFields(category: DocumentCategory): ReadonlySet<CanonicalField> {
  const profile = CATEGORY_PROFILES[category];
  const fields = new Set<CanonicalField>([...CORE_FIELDS, ...profile.optionalFields]);
  if (!profile.requiresFiscalDocumentNumber) {
    fields.delete('ncf');
  }
  return fields;
}
