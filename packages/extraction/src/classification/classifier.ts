/**
 * Document Classifier
 *
 * model -> rules ladder. The model answer is used only above the configured
 * probability threshold; rules always produce an answer.
 */

import { config } from '../config';
import { runFallbackLadder } from '../fallback-ladder';
import { logger } from '../logger';
import { classificationsCounter } from '../metrics';
import type { ClassificationResult } from '../types';
import { extractFeatures } from './features';
import { ModelStore } from './model-store';
import { classifyByRules, RULES_AFTER_MODEL_ERROR_CONFIDENCE, RULES_CONFIDENCE } from './rules';

export interface ClassifierOptions {
  modelStore?: ModelStore;
  /** Model answers at or below this probability are ignored */
  minProbability?: number;
}

export class DocumentClassifier {
  private readonly modelStore: ModelStore;
  private readonly minProbability: number;

  constructor(options: ClassifierOptions = {}) {
    this.modelStore = options.modelStore ?? new ModelStore();
    this.minProbability = options.minProbability ?? config.classifierMinProbability;
  }

  /**
   * Classify OCR text. Never throws.
   */
  classify(text: string): ClassificationResult {
    const outcome = runFallbackLadder<ClassificationResult>(
      'classification',
      [
        { name: 'model', run: () => this.classifyWithModel(text) },
        {
          name: 'rules',
          run: () => ({ category: classifyByRules(text), confidence: RULES_CONFIDENCE, source: 'rules' }),
        },
      ],
      () => ({ category: 'generic', confidence: 0, source: 'default' })
    );

    const modelFailed = outcome.failures.some((failure) => failure.attempt === 'model');
    const result: ClassificationResult =
      outcome.resolvedBy === 'rules' && modelFailed
        ? { ...outcome.value, confidence: RULES_AFTER_MODEL_ERROR_CONFIDENCE }
        : outcome.value;

    classificationsCounter.inc({ category: result.category, source: result.source });
    logger.debug('Document classified', {
      category: result.category,
      confidence: result.confidence,
      source: result.source,
    });

    return result;
  }

  /**
   * Reload the model from disk.
   */
  reloadModel(): void {
    this.modelStore.reload();
  }

  private classifyWithModel(text: string): ClassificationResult | null {
    const model = this.modelStore.get();
    if (!model) return null;

    const prediction = model.predict(extractFeatures(text));
    if (prediction.probability <= this.minProbability) {
      logger.debug('Model prediction below threshold, deferring to rules', {
        category: prediction.category,
        probability: prediction.probability,
        threshold: this.minProbability,
      });
      return null;
    }

    return { category: prediction.category, confidence: prediction.probability, source: 'model' };
  }
}
