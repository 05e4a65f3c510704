/**
 * Invoice Extraction Patterns
 *
 * Ordered regex rules per canonical field. Patterns run against folded text
 * (lowercase, accents stripped, same offsets as the original), so they are
 * written in lowercase ASCII. A rule only counts when one of its context
 * keywords appears within CONTEXT_RADIUS characters of the match start.
 *
 * Rules for a field are tried in order and the first hit wins.
 */

import type { CanonicalField } from '../types';

export interface PatternRule {
  field: CanonicalField;
  /** Short label for diagnostics */
  name: string;
  pattern: RegExp;
  /** Capture group holding the value */
  group: number;
  /** Whole-word keywords, see keywordPattern() */
  context: readonly string[];
}

export const CONTEXT_RADIUS = 100;

/** Inline separator between a label and its value ("RNC: ", "Total  RD$ : ") */
const SEP = '[ \\t]*[:.#]?[ \\t]*';
const CURRENCY = '(?:rd\\$|us\\$|usd|dop|\\$|€)';
const AMOUNT = '(\\d{1,3}(?:[.,]\\d{3})+(?:[.,]\\d{1,2})?|\\d+(?:[.,]\\d{1,2})?)(?!\\d)';
const MONEY_VALUE = `${SEP}(?:${CURRENCY}${SEP})?${AMOUNT}`;
const DATE = '(\\d{4}-\\d{1,2}-\\d{1,2}|\\d{1,2}[/-]\\d{1,2}[/-]\\d{2,4})(?!\\d)';
const TAXPAYER_ID = '(\\d{3}-\\d{7}-\\d|\\d-\\d{2}-\\d{5}-\\d|\\d{11}(?!\\d)|\\d{9}(?!\\d))';
const NCF_VALUE = '([a-z][ \\t]?\\d{10,18})(?!\\d)';
const DOC_NUMBER = '((?=[a-z-]*\\d)[a-z0-9][a-z0-9-]{0,19})';

function rule(
  field: CanonicalField,
  name: string,
  source: string,
  context: readonly string[],
  options: { group?: number; multiline?: boolean } = {}
): PatternRule {
  const flags = options.multiline ? 'gdm' : 'gd';
  return { field, name, pattern: new RegExp(source, flags), group: options.group ?? 1, context };
}

const RNC_CONTEXT = ['rnc', 'r.n.c', 'nit', 'identificacion', 'registro', 'cedula'];
const TOTAL_CONTEXT = ['total', 'pagar', 'importe', 'amount'];
const TAX_CONTEXT = ['itbis', 'iva', 'impuesto*', 'tax', 'vat'];

export const PATTERN_CATALOG: Readonly<Record<CanonicalField, readonly PatternRule[]>> = {
  rnc: [
    rule('rnc', 'rnc_label', `\\b(?:rnc|r\\.n\\.c\\.?)(?:[ \\t]+(?:del[ \\t]+)?emisor)?${SEP}${TAXPAYER_ID}`, RNC_CONTEXT),
    rule(
      'rnc',
      'registry_label',
      `\\b(?:registro[ \\t]+nacional(?:[ \\t]+de[ \\t]+contribuyentes)?|identificacion(?:[ \\t]+fiscal)?|nit|cedula)${SEP}${TAXPAYER_ID}`,
      RNC_CONTEXT
    ),
    rule('rnc', 'dashed_id', '(?<![\\d-])(\\d{3}-\\d{7}-\\d)(?![\\d-])', RNC_CONTEXT),
    rule('rnc', 'bare_nine_digits', '(?<![\\d-])(\\d{9})(?![\\d-])', ['rnc', 'r.n.c', 'nit']),
  ],

  ncf: [
    rule('ncf', 'ncf_label', `\\b(?:ncf|n\\.c\\.f\\.?)(?:[ \\t]*(?:no\\.?|nro\\.?))?${SEP}${NCF_VALUE}`, ['ncf', 'n.c.f']),
    rule(
      'ncf',
      'comprobante_label',
      `\\b(?:no\\.?[ \\t]*)?comprobante(?:[ \\t]+fiscal)?(?:[ \\t]*(?:no\\.?|nro\\.?))?${SEP}${NCF_VALUE}`,
      ['comprobante', 'ncf']
    ),
    rule('ncf', 'bare_series', '\\b([be]\\d{10,12})(?!\\d)', ['ncf', 'comprobante', 'fiscal']),
  ],

  numero_factura: [
    rule(
      'numero_factura',
      'invoice_number_label',
      `\\b(?:factura|invoice)[ \\t]*(?:no\\.?|nro\\.?|num\\.?|numero|number|#)${SEP}${DOC_NUMBER}`,
      ['factura', 'invoice']
    ),
    rule('numero_factura', 'number_of_invoice', `\\b(?:no\\.?|numero)[ \\t]+(?:de[ \\t]+)?factura${SEP}${DOC_NUMBER}`, [
      'factura',
    ]),
  ],

  numero_ticket: [
    rule('numero_ticket', 'ticket_label', `\\bticket(?:[ \\t]*(?:nro\\.?|no\\.?|num\\.?|numero|#))?${SEP}(\\d[\\d-]{3,19})`, [
      'ticket',
    ]),
  ],

  razon_social: [
    rule(
      'razon_social',
      'name_label',
      `\\b(?:razon[ \\t]+social|nombre(?:[ \\t]+del)?[ \\t]+emisor|emisor|proveedor|empresa)[ \\t]*[:.][ \\t]*([^\\n]{2,80}?)[ \\t]*$`,
      ['razon social', 'emisor', 'proveedor', 'empresa'],
      { multiline: true }
    ),
    rule(
      'razon_social',
      'company_suffix_line',
      "^[ \\t]*([a-z0-9&.,' -]{2,60}?[ \\t,]+(?:srl|s\\.r\\.l\\.?|s\\.a\\.s?\\.?|sas|eirl|c\\.?[ \\t]?por[ \\t]?a\\.?|inc\\.?|ltd\\.?|llc))[ \\t]*$",
      ['rnc', 'nit', 'factura', 'comprobante', 'invoice'],
      { multiline: true }
    ),
  ],

  vehiculo: [
    rule('vehiculo', 'vehicle_label', '\\bvehiculo[ \\t]*[:.]?[ \\t]*([a-z][a-z0-9 ]{1,30}?)[ \\t]*$', ['vehiculo'], {
      multiline: true,
    }),
  ],

  estacion: [
    rule(
      'estacion',
      'station_label',
      '\\bestacion(?:[ \\t]+de[ \\t]+peaje)?[ \\t]*[:.]?[ \\t]*([^\\n]{2,60}?)[ \\t]*$',
      ['estacion', 'peaje'],
      { multiline: true }
    ),
  ],

  fecha_emision: [
    rule('fecha_emision', 'issue_date_label', `\\bfecha[ \\t]+(?:de[ \\t]+)?emision${SEP}${DATE}`, ['emision']),
    rule('fecha_emision', 'issued_label', `\\bemision${SEP}${DATE}`, ['emision']),
  ],

  fecha_vencimiento: [
    rule(
      'fecha_vencimiento',
      'due_date_label',
      `\\b(?:fecha[ \\t]+(?:de[ \\t]+)?)?vencimiento${SEP}${DATE}`,
      ['vencim*']
    ),
    rule('fecha_vencimiento', 'due_date_en', `\\bdue[ \\t]+date${SEP}${DATE}`, ['due']),
  ],

  fecha: [
    rule('fecha', 'date_label', `\\bfecha(?:[ \\t]*\\/[ \\t]*hora)?${SEP}${DATE}`, ['fecha']),
    rule('fecha', 'date_label_en', `\\bdate${SEP}${DATE}`, ['date']),
    rule('fecha', 'bare_date', DATE, ['fecha', 'date', 'hora', 'emision']),
  ],

  subtotal: [
    rule('subtotal', 'subtotal_label', `\\bsub[ \\t-]?total${MONEY_VALUE}`, ['subtotal', 'sub-total', 'sub total']),
    rule('subtotal', 'taxable_base', `\\b(?:monto[ \\t]+)?gravado${MONEY_VALUE}`, ['gravado']),
  ],

  itbis: [
    rule(
      'itbis',
      'itbis_label',
      `\\b(?:total[ \\t]+)?itbis(?:[ \\t]+facturado)?(?:[ \\t]*\\(?[ \\t]*\\d{1,2}[ \\t]*%[ \\t]*\\)?)?${MONEY_VALUE}`,
      TAX_CONTEXT
    ),
    rule('itbis', 'iva_label', `\\biva(?:[ \\t]*\\(?[ \\t]*\\d{1,2}[ \\t]*%[ \\t]*\\)?)?${MONEY_VALUE}`, TAX_CONTEXT),
    rule('itbis', 'tax_label', `\\b(?:impuestos?|vat|tax)${MONEY_VALUE}`, TAX_CONTEXT),
  ],

  descuento: [
    rule('descuento', 'discount_label', `\\b(?:descuentos?|desc\\.|rebaja|discount)${MONEY_VALUE}`, [
      'descuento*',
      'desc',
      'rebaja',
      'discount',
    ]),
  ],

  total: [
    rule('total', 'total_to_pay', `(?<![a-z-])(?<!sub[ \\t-]?)total[ \\t]+a[ \\t]+pagar${MONEY_VALUE}`, TOTAL_CONTEXT),
    rule('total', 'amount_total', `\\bmonto[ \\t]+total${MONEY_VALUE}`, TOTAL_CONTEXT),
    rule(
      'total',
      'total_label',
      `(?<![a-z-])(?<!sub[ \\t-]?)total(?:[ \\t]+(?:general|factura))?${MONEY_VALUE}`,
      TOTAL_CONTEXT
    ),
    rule('total', 'amount_label', `\\bimporte(?:[ \\t]+total)?${MONEY_VALUE}`, TOTAL_CONTEXT),
    rule('total', 'amount_due', `\\b(?:amount[ \\t]+due|grand[ \\t]+total)${MONEY_VALUE}`, TOTAL_CONTEXT),
  ],
};

// ============================================================================
// Failsafe Patterns
// ============================================================================

/**
 * Minimal patterns used when the full pipeline fails. Case-insensitive,
 * applied to the raw text with no context checks.
 */
export const FAILSAFE_PATTERNS: ReadonlyArray<{ field: CanonicalField; pattern: RegExp }> = [
  { field: 'total', pattern: /(?:total|importe)[^\d\n]{0,20}(\d{1,3}(?:,\d{3})*\.\d{2}|\d+\.\d{2})/i },
  { field: 'fecha', pattern: /(\d{1,2}[/-]\d{1,2}[/-]\d{4})/ },
  { field: 'rnc', pattern: /(?<![\d-])(\d{11}|\d{9})(?![\d-])/ },
];
