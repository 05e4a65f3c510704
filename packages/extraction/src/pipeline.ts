/**
 * Invoice Extraction Pipeline
 *
 * classify -> regex + heuristic extraction -> merge -> category allowlist ->
 * validate -> score. Runs synchronously per document and never throws; when
 * the full chain fails the failsafe patterns run instead, and when those fail
 * too an empty result is returned.
 */

import { allowedFields } from './categories';
import { DocumentClassifier } from './classification/classifier';
import { createDocumentContext, runWithContext } from './context';
import type { EntityRecognizer } from './extractors/entity-recognizer';
import { extractFailsafeCandidates } from './extractors/failsafe';
import { HeuristicExtractor } from './extractors/heuristic-extractor';
import { mergeCandidates } from './extractors/merger';
import { RegexExtractor } from './extractors/regex-extractor';
import { runFallbackLadder } from './fallback-ladder';
import { logger, serializeError } from './logger';
import { documentsProcessedCounter, extractionDurationHistogram, trainingRecorderFailuresCounter } from './metrics';
import {
  confidenceBand,
  createScoringContext,
  fieldConfidence,
  overallQualityScore,
  qualityBand,
} from './scoring/confidence';
import { analyzeTextQuality } from './scoring/text-quality';
import { buildTrainingExample, type TrainingRecorder } from './training/recorder';
import type {
  CanonicalField,
  ClassificationResult,
  ExtractedField,
  ExtractionResult,
  FieldCandidate,
  FieldValue,
  RawDocument,
  ResolvedCandidate,
} from './types';
import { checkAmountCoherence } from './validation/amounts';
import { resolveFieldName } from './validation/field-kinds';
import { FieldValidator } from './validation/validator';

export const FAILSAFE_CLASSIFICATION_CONFIDENCE = 0.3;
export const FAILSAFE_FIELD_CONFIDENCE = 30;
export const FAILSAFE_QUALITY_SCORE = 1.0;

export type Classifier = Pick<DocumentClassifier, 'classify'>;

export interface PipelineOptions {
  classifier?: Classifier;
  /** Enables the heuristic entity pass */
  entityRecognizer?: EntityRecognizer;
  validator?: FieldValidator;
  /** Receives every successful extraction that found at least one field */
  trainingRecorder?: TrainingRecorder;
}

interface ValidatedFields {
  fields: Partial<Record<CanonicalField, ExtractedField>>;
  values: Partial<Record<CanonicalField, FieldValue>>;
  validatedCount: number;
  validCount: number;
  diagnostics: string[];
}

type ConfidenceFn = (field: CanonicalField, offset: number) => number;

/**
 * Flatten a result to plain strings: money as "200.00", everything else as
 * its normalized text.
 */
export function toFieldMap(result: ExtractionResult): Record<string, string> {
  const map: Record<string, string> = {};
  for (const field of Object.values(result.fields)) {
    if (!field) continue;
    map[field.name] = field.value.kind === 'money' ? field.value.amount : field.value.value;
  }
  return map;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function presentFields(fields: Partial<Record<CanonicalField, ExtractedField>>): Set<CanonicalField> {
  const present = new Set<CanonicalField>();
  for (const field of Object.values(fields)) {
    if (field) present.add(field.name);
  }
  return present;
}

function missingFieldWarnings(fields: Partial<Record<CanonicalField, ExtractedField>>): string[] {
  const warnings: string[] = [];
  if (!fields.rnc) warnings.push('No RNC found');
  if (!fields.fecha && !fields.fecha_emision && !fields.fecha_vencimiento) warnings.push('No date found');
  if (!fields.total) warnings.push('No total amount found');
  return warnings;
}

export class InvoiceExtractionPipeline {
  private readonly classifier: Classifier;
  private readonly regexExtractor = new RegexExtractor();
  private readonly heuristicExtractor: HeuristicExtractor;
  private readonly validator: FieldValidator;
  private readonly trainingRecorder?: TrainingRecorder;

  constructor(options: PipelineOptions = {}) {
    this.classifier = options.classifier ?? new DocumentClassifier();
    this.heuristicExtractor = new HeuristicExtractor(options.entityRecognizer);
    this.validator = options.validator ?? new FieldValidator();
    this.trainingRecorder = options.trainingRecorder;
  }

  /**
   * Extract invoice fields from one OCR'd document. Never throws.
   */
  extract(document: RawDocument): ExtractionResult {
    return runWithContext(createDocumentContext(document.sourceRef), () => this.extractInContext(document));
  }

  private extractInContext(document: RawDocument): ExtractionResult {
    const endTimer = extractionDurationHistogram.startTimer();
    const text = document.text;
    const sourceRef = document.sourceRef;

    logger.debug('Starting extraction', { text_length: text.length });

    const outcome = runFallbackLadder<ExtractionResult>(
      'pipeline',
      [
        { name: 'hybrid', run: () => this.extractHybrid(text, sourceRef) },
        { name: 'failsafe', run: () => this.extractFailsafe(text, sourceRef) },
      ],
      () => this.emptyResult(sourceRef)
    );

    const failureNotes = outcome.failures.map(({ attempt, error }) => {
      const detail = serializeError(error);
      return `${attempt} failed: ${typeof detail === 'string' ? detail : detail.message}`;
    });
    const result = deepFreeze<ExtractionResult>({
      ...outcome.value,
      diagnostics: [...failureNotes, ...outcome.value.diagnostics],
    });

    endTimer({ method: result.method });
    documentsProcessedCounter.inc({ category: result.category, method: result.method });

    logger.info('Extraction complete', {
      category: result.category,
      method: result.method,
      field_count: Object.keys(result.fields).length,
      quality_score: result.overallQualityScore,
      quality_band: result.qualityBand,
    });

    this.recordTrainingExample(text, result);
    return result;
  }

  private extractHybrid(text: string, sourceRef: string | undefined): ExtractionResult {
    const classification = this.classifier.classify(text);

    const merged = mergeCandidates(this.regexExtractor.extract(text), this.heuristicExtractor.extract(text));

    const allowed = allowedFields(classification.category);
    const diagnostics: string[] = [];
    const kept: ResolvedCandidate[] = [];
    for (const candidate of Object.values(merged)) {
      if (!candidate) continue;
      if (allowed.has(candidate.field)) {
        kept.push(candidate);
      } else {
        diagnostics.push(`${candidate.field}: not used for category ${classification.category}`);
      }
    }

    const scoring = createScoringContext(text);
    const validated = this.validateFields(kept, (field, offset) => fieldConfidence(field, offset, scoring));

    const textQuality = analyzeTextQuality(text);
    const score = overallQualityScore({
      presentFields: presentFields(validated.fields),
      validatedCount: validated.validatedCount,
      validCount: validated.validCount,
      textQuality: textQuality.score,
    });

    return {
      category: classification.category,
      classificationConfidence: classification.confidence,
      classificationSource: classification.source,
      fields: validated.fields,
      overallQualityScore: score,
      qualityBand: qualityBand(score),
      method: 'hybrid',
      warnings: [...missingFieldWarnings(validated.fields), ...checkAmountCoherence(validated.values)],
      diagnostics: [...diagnostics, ...validated.diagnostics],
      ...(sourceRef !== undefined ? { sourceRef } : {}),
    };
  }

  private extractFailsafe(text: string, sourceRef: string | undefined): ExtractionResult {
    const candidates = extractFailsafeCandidates(text).map(
      (candidate: FieldCandidate): ResolvedCandidate => ({ ...candidate, field: resolveFieldName(candidate.field) })
    );
    const validated = this.validateFields(candidates, () => FAILSAFE_FIELD_CONFIDENCE);

    const classification: ClassificationResult = {
      category: 'generic',
      confidence: FAILSAFE_CLASSIFICATION_CONFIDENCE,
      source: 'default',
    };

    return {
      category: classification.category,
      classificationConfidence: classification.confidence,
      classificationSource: classification.source,
      fields: validated.fields,
      overallQualityScore: FAILSAFE_QUALITY_SCORE,
      qualityBand: 'low',
      method: 'failsafe',
      warnings: ['Full extraction failed; only failsafe patterns were applied'],
      diagnostics: validated.diagnostics,
      ...(sourceRef !== undefined ? { sourceRef } : {}),
    };
  }

  private emptyResult(sourceRef: string | undefined): ExtractionResult {
    return {
      category: 'generic',
      classificationConfidence: 0,
      classificationSource: 'default',
      fields: {},
      overallQualityScore: 0,
      qualityBand: 'low',
      method: 'empty',
      warnings: ['Extraction failed; no fields could be extracted'],
      diagnostics: [],
      ...(sourceRef !== undefined ? { sourceRef } : {}),
    };
  }

  private validateFields(candidates: readonly ResolvedCandidate[], confidence: ConfidenceFn): ValidatedFields {
    const validated: ValidatedFields = {
      fields: {},
      values: {},
      validatedCount: 0,
      validCount: 0,
      diagnostics: [],
    };

    for (const candidate of candidates) {
      const outcome = this.validator.validate(candidate.field, candidate.rawValue);
      validated.validatedCount += 1;

      if (outcome.status === 'rejected') {
        validated.diagnostics.push(outcome.diagnostic);
        continue;
      }
      if (outcome.status === 'raw') {
        validated.diagnostics.push(outcome.diagnostic);
      } else {
        validated.validCount += 1;
      }

      const score = confidence(candidate.field, candidate.offset);
      validated.values[candidate.field] = outcome.value;
      validated.fields[candidate.field] = {
        name: candidate.field,
        value: outcome.value,
        confidence: score,
        confidenceBand: confidenceBand(score),
        provenance: candidate.provenance,
        offset: candidate.offset,
      };
    }

    return validated;
  }

  private recordTrainingExample(text: string, result: ExtractionResult): void {
    const recorder = this.trainingRecorder;
    if (!recorder || result.method !== 'hybrid') return;

    const data = toFieldMap(result);
    if (Object.keys(data).length === 0) return;

    const onFailure = (error: unknown): void => {
      trainingRecorderFailuresCounter.inc({ recorder: recorder.name });
      logger.error('Failed to record training example', error, { recorder: recorder.name });
    };

    try {
      recorder.record(buildTrainingExample(text, result.category, data)).catch(onFailure);
    } catch (error) {
      onFailure(error);
    }
  }
}
