/**
 * Prometheus Metrics
 *
 * Metrics for classification, extraction outcomes and the training sink.
 * Hosts expose them by serving getMetrics() from their own HTTP endpoint.
 */

import * as promClient from 'prom-client';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'facturalens_documents_processed_total',
  help: 'Total number of documents processed through the pipeline',
  labelNames: ['category', 'method'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'facturalens_extraction_duration_seconds',
  help: 'Duration of a single document extraction',
  labelNames: ['method'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

export const fallbackStepsCounter = new promClient.Counter({
  name: 'facturalens_fallback_steps_total',
  help: 'Fallback ladder attempts by stage, attempt and outcome',
  labelNames: ['stage', 'attempt', 'outcome'],
  registers: [register],
});

// ============================================================================
// Classification Metrics
// ============================================================================

export const classificationsCounter = new promClient.Counter({
  name: 'facturalens_classifications_total',
  help: 'Classifications by resulting category and decision source',
  labelNames: ['category', 'source'],
  registers: [register],
});

// ============================================================================
// Validation Metrics
// ============================================================================

export const fieldValidationCounter = new promClient.Counter({
  name: 'facturalens_field_validations_total',
  help: 'Field validation outcomes',
  labelNames: ['field', 'outcome'],
  registers: [register],
});

// ============================================================================
// Training Sink Metrics
// ============================================================================

export const trainingRecorderFailuresCounter = new promClient.Counter({
  name: 'facturalens_training_recorder_failures_total',
  help: 'Training examples that could not be recorded',
  labelNames: ['recorder'],
  registers: [register],
});

/**
 * Get Prometheus metrics in exposition format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
