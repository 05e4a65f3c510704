/**
 * Heuristic Extractor
 *
 * Second opinion on the regex extractor. Two passes:
 * - entity pass: maps recognized entities (MONEY, DATE, ORG, CARDINAL) to
 *   provisional field names, resolved to canonical names by the merger
 * - window pass: line-oriented keyword windows around money tokens and dates
 *
 * The entity pass is optional and runs first; if it throws, the ladder falls
 * back to the window pass alone.
 */

import { runFallbackLadder } from '../fallback-ladder';
import { logger } from '../logger';
import { foldText, hasAnyKeyword, lineOffsets } from '../text';
import type { CanonicalField, FieldAlias, FieldCandidate } from '../types';
import { cleanIdentifier, cleanMoney, cleanText } from './cleaning';
import type { EntityRecognizer, RecognizedEntity } from './entity-recognizer';

type CandidateName = CanonicalField | FieldAlias;

const LINE_WINDOW = 3;
const DATE_CONTEXT_BEFORE = 50;
const DATE_CONTEXT_AFTER = 30;

const MONEY_TOKEN = /(?<![\d.,])(\d{1,3}(?:,\d{3})+|\d+)\.\d{2}(?!\d)/g;
const DATE_TOKEN = /(?<!\d)\d{1,2}[-/]\d{1,2}[-/]\d{2,4}(?!\d)/g;
const RNC_TOKEN = /(?<!\d)\d{9,11}(?!\d)/;
const NCF_TOKENS = [/\b[a-e]\d{10,11}(?!\d)/, /\b[a-z]\d{2}-\d{2}-\d{4}-\d{2}(?!\d)/];

const TOTAL_KEYWORDS = ['total', 'pagar', 'importe', 'final'];
const SUBTOTAL_KEYWORDS = ['subtotal', 'gravado', 'base'];
const ITBIS_KEYWORDS = ['itbis', 'impuesto*', 'iva', 'tax'];

/** Head words that pin a numeric entity to a field; subtotal checked before total */
const HEAD_FIELDS: ReadonlyArray<[string, CanonicalField]> = [
  ['subtotal', 'subtotal'],
  ['total', 'total'],
  ['itbis', 'itbis'],
];

/**
 * Per-pass accumulator. Insertion order of the map is the emission order.
 */
class CandidateSet {
  private readonly byField = new Map<CandidateName, FieldCandidate>();

  has(field: CandidateName): boolean {
    return this.byField.has(field);
  }

  get(field: CandidateName): FieldCandidate | undefined {
    return this.byField.get(field);
  }

  set(field: CandidateName, rawValue: string, offset: number): void {
    if (!rawValue) return;
    this.byField.set(field, { field, rawValue, provenance: 'heuristic', offset });
  }

  setIfAbsent(field: CandidateName, rawValue: string, offset: number): void {
    if (!this.has(field)) this.set(field, rawValue, offset);
  }

  values(): FieldCandidate[] {
    return Array.from(this.byField.values());
  }
}

function isNumericEntity(entity: RecognizedEntity): boolean {
  return entity.label === 'MONEY' || entity.label === 'CARDINAL';
}

function headField(entity: RecognizedEntity): CanonicalField | null {
  if (!entity.head || !isNumericEntity(entity)) return null;
  const head = foldText(entity.head);
  for (const [word, field] of HEAD_FIELDS) {
    if (head.includes(word)) return field;
  }
  return null;
}

export class HeuristicExtractor {
  constructor(private readonly recognizer?: EntityRecognizer) {}

  extract(text: string): FieldCandidate[] {
    const outcome = runFallbackLadder<FieldCandidate[]>(
      'heuristic_extraction',
      [
        {
          name: 'entities_and_windows',
          run: () => (this.recognizer ? [...this.entityPass(text, this.recognizer), ...this.windowPass(text)] : null),
        },
        { name: 'windows', run: () => this.windowPass(text) },
      ],
      () => []
    );

    logger.debug('Heuristic extraction complete', {
      resolved_by: outcome.resolvedBy,
      candidate_count: outcome.value.length,
    });

    return outcome.value;
  }

  entityPass(text: string, recognizer: EntityRecognizer): FieldCandidate[] {
    const found = new CandidateSet();

    for (const entity of recognizer.recognize(text)) {
      const pinned = headField(entity);
      if (pinned) {
        found.set(pinned, cleanMoney(entity.text), entity.start);
        continue;
      }

      switch (entity.label) {
        case 'MONEY':
          if (entity.text.length > 3) found.set('monto_detectado', cleanMoney(entity.text), entity.start);
          break;
        case 'DATE':
          found.setIfAbsent('fecha_detectada', cleanText(entity.text), entity.start);
          break;
        case 'ORG':
          if (entity.text.length > 3) found.set('empresa_detectada', cleanText(entity.text), entity.start);
          break;
        case 'CARDINAL':
          if (entity.text.length > 5 && /^\d+$/.test(entity.text.replace(/[-.]/g, ''))) {
            found.set('numero_documento', entity.text.trim(), entity.start);
          }
          break;
        default:
          break;
      }
    }

    return found.values();
  }

  windowPass(text: string): FieldCandidate[] {
    const found = new CandidateSet();
    const lines = text.split('\n');
    const foldedLines = lines.map(foldText);
    const offsets = lineOffsets(lines);

    foldedLines.forEach((folded, index) => {
      const lineStart = offsets[index] ?? 0;
      const line = lines[index] ?? '';

      if (hasAnyKeyword(folded, ['rnc'])) {
        const rnc = RNC_TOKEN.exec(folded);
        if (rnc) found.setIfAbsent('rnc', rnc[0], lineStart + rnc.index);
      }

      if (hasAnyKeyword(folded, ['ncf'])) {
        for (const pattern of NCF_TOKENS) {
          const ncf = pattern.exec(folded);
          if (ncf) {
            const value = line.slice(ncf.index, ncf.index + ncf[0].length);
            found.setIfAbsent('ncf', cleanIdentifier(value), lineStart + ncf.index);
            break;
          }
        }
      }

      const from = Math.max(0, index - LINE_WINDOW);
      const context = foldedLines.slice(from, index + LINE_WINDOW + 1).join(' ');

      for (const match of folded.matchAll(MONEY_TOKEN)) {
        const amount = cleanMoney(match[0]);
        const offset = lineStart + (match.index ?? 0);

        if (hasAnyKeyword(context, TOTAL_KEYWORDS)) {
          const current = found.get('total');
          if (!current || Number(amount) > Number(current.rawValue)) found.set('total', amount, offset);
        } else if (hasAnyKeyword(context, SUBTOTAL_KEYWORDS)) {
          found.setIfAbsent('subtotal', amount, offset);
        } else if (hasAnyKeyword(context, ITBIS_KEYWORDS)) {
          found.setIfAbsent('itbis', amount, offset);
        }
      }
    });

    const foldedText = foldText(text);
    for (const match of foldedText.matchAll(DATE_TOKEN)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      const context = foldedText.slice(Math.max(0, start - DATE_CONTEXT_BEFORE), end + DATE_CONTEXT_AFTER);

      if (hasAnyKeyword(context, ['vencim*']) && !found.has('fecha_vencimiento')) {
        found.set('fecha_vencimiento', match[0], start);
      } else if (hasAnyKeyword(context, ['emis*']) && !found.has('fecha_emision')) {
        found.set('fecha_emision', match[0], start);
      } else if (hasAnyKeyword(context, ['fecha']) && !found.has('fecha')) {
        found.set('fecha', match[0], start);
      }
    }

    return found.values();
  }
}
