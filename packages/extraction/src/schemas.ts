/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for extraction results and classifier model files.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

export interface CategoryModelFile {
  version: string;
  features: string[];
  classes: string[];
  /** One row per class, one column per feature */
  weights: number[][];
  bias: number[];
  /** Per-feature scaling applied before the dot product */
  scale?: number[];
}

function loadSchema(schemaName: string): object {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to the package sources in development and tests
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output under dist/
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

// Schema compilation - lazy on first use
let extractionResultValidator: ValidateFunction | null = null;
let categoryModelValidator: ValidateFunction<CategoryModelFile> | null = null;

function getExtractionResultValidator(): ValidateFunction {
  if (!extractionResultValidator) {
    extractionResultValidator = ajv.compile(loadSchema('extraction_result.schema.json'));
  }
  return extractionResultValidator;
}

function getCategoryModelValidator(): ValidateFunction<CategoryModelFile> {
  if (!categoryModelValidator) {
    categoryModelValidator = ajv.compile<CategoryModelFile>(loadSchema('category_model.schema.json'));
  }
  return categoryModelValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function describeErrors(validate: ValidateFunction): string[] | undefined {
  return validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate a serialized ExtractionResult against extraction_result.schema.json
 */
export function validateExtractionResult(data: unknown): ValidationResult {
  const validate = getExtractionResultValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = describeErrors(validate);
    logger.warn('ExtractionResult validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Parse a classifier model file, returning null with errors when it does
 * not match category_model.schema.json
 */
export function parseCategoryModelFile(
  data: unknown
): { model: CategoryModelFile; errors?: undefined } | { model: null; errors: string[] } {
  const validate = getCategoryModelValidator();

  if (validate(data)) {
    return { model: data };
  }

  return { model: null, errors: describeErrors(validate) ?? ['invalid model file'] };
}
