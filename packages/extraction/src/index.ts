/**
 * Extraction Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  createDocumentContext,
  type RequestContext,
} from './context';

// Logger
export { logger, serializeError, type LogContext } from './logger';

// Config
export { config, type Config, type LogLevel } from './config';

// Types
export * from './types';

// Fallback ladder
export { runFallbackLadder, type LadderAttempt, type LadderOutcome } from './fallback-ladder';

// Text helpers
export { foldText, keywordPattern, hasAnyKeyword, hasKeywordNear } from './text';

// Categories
export { CATEGORY_PROFILES, CORE_FIELDS, allowedFields, type CategoryProfile } from './categories';

// Classification
export { FEATURE_NAMES, extractFeatures, toVector, type FeatureVector } from './classification/features';
export {
  classifyByRules,
  scoreCategories,
  pickCategory,
  RULES_CONFIDENCE,
  RULES_AFTER_MODEL_ERROR_CONFIDENCE,
} from './classification/rules';
export {
  ModelStore,
  SoftmaxCategoryModel,
  loadCategoryModel,
  createStaticModelStore,
  type CategoryModel,
  type CategoryPrediction,
} from './classification/model-store';
export { DocumentClassifier, type ClassifierOptions } from './classification/classifier';

// Extractors
export { cleanMoney, cleanIdentifier, cleanText } from './extractors/cleaning';
export { PATTERN_CATALOG, FAILSAFE_PATTERNS, CONTEXT_RADIUS, type PatternRule } from './extractors/patterns';
export { RegexExtractor, matchRule, cleanCapturedValue, type RuleMatch } from './extractors/regex-extractor';
export type { EntityRecognizer, RecognizedEntity, EntityLabel } from './extractors/entity-recognizer';
export { HeuristicExtractor } from './extractors/heuristic-extractor';
export {
  mergeCandidates,
  isBetterFormatted,
  REGEX_LOCKED_FIELDS,
  HEURISTIC_ELIGIBLE_FIELDS,
} from './extractors/merger';
export { extractFailsafeCandidates } from './extractors/failsafe';

// Validation
export {
  FIELD_KINDS,
  FIELD_ALIASES,
  CANONICAL_FIELDS,
  resolveFieldName,
  kindOf,
  type FieldKind,
} from './validation/field-kinds';
export {
  FieldValidator,
  expandTwoDigitYear,
  reject,
  MAX_AMOUNT,
  TWO_DIGIT_YEAR_PIVOT,
  type Normalized,
  type Rejection,
  type ValidationOutcome,
} from './validation/validator';
export { checkAmountCoherence, AMOUNT_TOLERANCE_CENTS } from './validation/amounts';

// Scoring
export {
  fieldConfidence,
  confidenceBand,
  overallQualityScore,
  qualityBand,
  createScoringContext,
  MUST_HAVE_FIELDS,
  FIELD_CONTEXT_KEYWORDS,
  type ScoringContext,
  type QualityInputs,
} from './scoring/confidence';
export { analyzeTextQuality, round2, type TextQuality } from './scoring/text-quality';

// Training sink
export {
  buildTrainingExample,
  sampleText,
  type TrainingExample,
  type TrainingRecorder,
} from './training/recorder';
export { FileTrainingRecorder } from './training/file-recorder';
export { QueueTrainingRecorder, type TrainingQueue } from './training/queue-recorder';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type RecordTrainingExampleJob,
  getRedisConnection,
  createQueue,
  defaultJobOptions,
} from './queues';

// Metrics
export {
  register,
  documentsProcessedCounter,
  extractionDurationHistogram,
  fallbackStepsCounter,
  classificationsCounter,
  fieldValidationCounter,
  trainingRecorderFailuresCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateExtractionResult,
  parseCategoryModelFile,
  type CategoryModelFile,
  type ValidationResult,
} from './schemas';

// Pipeline
export {
  InvoiceExtractionPipeline,
  toFieldMap,
  FAILSAFE_CLASSIFICATION_CONFIDENCE,
  FAILSAFE_FIELD_CONFIDENCE,
  FAILSAFE_QUALITY_SCORE,
  type Classifier,
  type PipelineOptions,
} from './pipeline';
