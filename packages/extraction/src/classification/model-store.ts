/**
 * Category Model Store
 *
 * Holds the pretrained category model. The model is read from disk lazily on
 * first use and is read-only afterwards; reload() swaps it out wholesale.
 * A missing file simply means "no model" and classification uses rules.
 */

import fs from 'fs';
import { config } from '../config';
import { logger } from '../logger';
import { parseCategoryModelFile, type CategoryModelFile } from '../schemas';
import { CATEGORY_PRIORITY, type DocumentCategory } from '../types';
import { FEATURE_NAMES, toVector, type FeatureVector } from './features';

export interface CategoryPrediction {
  category: DocumentCategory;
  /** Probability of the predicted class, 0-1 */
  probability: number;
}

export interface CategoryModel {
  readonly version: string;
  predict(features: FeatureVector): CategoryPrediction;
}

function isCategory(value: string): value is DocumentCategory {
  return CATEGORY_PRIORITY.some((category) => category === value);
}

/**
 * Multinomial logistic regression over the classification feature vector.
 */
export class SoftmaxCategoryModel implements CategoryModel {
  readonly version: string;

  private constructor(
    version: string,
    private readonly classes: readonly DocumentCategory[],
    private readonly weights: readonly (readonly number[])[],
    private readonly bias: readonly number[],
    private readonly scale: readonly number[]
  ) {
    this.version = version;
  }

  /**
   * Build a model from a schema-valid file, checking that it was trained on
   * the same feature layout this build produces.
   */
  static fromFile(file: CategoryModelFile): SoftmaxCategoryModel {
    const expected = FEATURE_NAMES.join(',');
    if (file.features.join(',') !== expected) {
      throw new Error(`Model feature layout mismatch: expected [${expected}]`);
    }

    const classes: DocumentCategory[] = [];
    for (const name of file.classes) {
      if (!isCategory(name)) {
        throw new Error(`Model references unknown category: ${name}`);
      }
      classes.push(name);
    }

    if (file.weights.length !== classes.length || file.bias.length !== classes.length) {
      throw new Error('Model weights/bias do not match class count');
    }
    if (file.weights.some((row) => row.length !== FEATURE_NAMES.length)) {
      throw new Error('Model weight rows do not match feature count');
    }

    const scale = file.scale ?? FEATURE_NAMES.map(() => 1);
    if (scale.length !== FEATURE_NAMES.length) {
      throw new Error('Model scale does not match feature count');
    }

    return new SoftmaxCategoryModel(file.version, classes, file.weights, file.bias, scale);
  }

  predict(features: FeatureVector): CategoryPrediction {
    const vector = toVector(features).map((value, i) => value * this.scale[i]);
    const logits = this.weights.map(
      (row, c) => row.reduce((sum, weight, i) => sum + weight * vector[i], this.bias[c])
    );

    const max = Math.max(...logits);
    const exps = logits.map((logit) => Math.exp(logit - max));
    const total = exps.reduce((sum, value) => sum + value, 0);

    let bestIndex = 0;
    for (let c = 1; c < exps.length; c++) {
      if (exps[c] > exps[bestIndex]) bestIndex = c;
    }

    const probability = exps[bestIndex] / total;
    if (!Number.isFinite(probability)) {
      throw new Error('Model produced a non-finite probability');
    }

    return { category: this.classes[bestIndex], probability };
  }
}

/**
 * Read and validate a model file. Returns null when the file does not exist;
 * throws when it exists but cannot be used.
 */
export function loadCategoryModel(modelPath: string): CategoryModel | null {
  if (!fs.existsSync(modelPath)) {
    return null;
  }

  const raw: unknown = JSON.parse(fs.readFileSync(modelPath, 'utf-8'));
  const parsed = parseCategoryModelFile(raw);
  if (parsed.model === null) {
    throw new Error(`Invalid model file ${modelPath}: ${parsed.errors.join('; ')}`);
  }

  return SoftmaxCategoryModel.fromFile(parsed.model);
}

type ModelState = { status: 'unloaded' } | { status: 'loaded'; model: CategoryModel | null };

export class ModelStore {
  private state: ModelState = { status: 'unloaded' };

  constructor(
    private readonly modelPath: string = config.classifierModelPath,
    private readonly loader: (modelPath: string) => CategoryModel | null = loadCategoryModel
  ) {}

  /**
   * The loaded model, or null when none is available. Load errors are
   * logged once and treated as "no model" until the next reload().
   */
  get(): CategoryModel | null {
    if (this.state.status === 'unloaded') {
      this.state = { status: 'loaded', model: this.load() };
    }
    return this.state.model;
  }

  /**
   * Replace the current model with a fresh read from disk.
   */
  reload(): CategoryModel | null {
    this.state = { status: 'loaded', model: this.load() };
    return this.state.model;
  }

  private load(): CategoryModel | null {
    try {
      const model = this.loader(this.modelPath);
      if (model) {
        logger.info('Category model loaded', { model_path: this.modelPath, version: model.version });
      } else {
        logger.info('No category model found, using rule-based classification', {
          model_path: this.modelPath,
        });
      }
      return model;
    } catch (error) {
      logger.error('Category model could not be loaded, using rule-based classification', error, {
        model_path: this.modelPath,
      });
      return null;
    }
  }
}

/**
 * Store wrapping an already-built model (or none), for hosts that manage
 * model files themselves.
 */
export function createStaticModelStore(model: CategoryModel | null): ModelStore {
  return new ModelStore('<in-memory>', () => model);
}
