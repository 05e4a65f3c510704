/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Config {
  // Logging
  logLevel: LogLevel;

  // Classifier
  classifierModelPath: string;
  classifierMinProbability: number;

  // Training sink
  trainingDataPath: string;
  trainingSampleChars: number;

  // Redis (queue-backed training sink)
  redisHost: string;
  redisPort: number;
  redisUrl: string;
  maxJobAttempts: number;
  backoffBaseMs: number;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  if (match) return match;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function parseNumber(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value || '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config: Config = {
  // Logging
  logLevel: parseLogLevel(process.env.LOG_LEVEL),

  // Classifier
  classifierModelPath: process.env.CLASSIFIER_MODEL_PATH || 'models/category_model.json',
  classifierMinProbability: parseNumber(process.env.CLASSIFIER_MIN_PROBABILITY, 0.6),

  // Training sink
  trainingDataPath: process.env.TRAINING_DATA_PATH || 'training_data',
  trainingSampleChars: parseInt(process.env.TRAINING_SAMPLE_CHARS || '1000', 10),

  // Redis (queue-backed training sink)
  redisHost: process.env.REDIS_HOST || 'localhost',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || '',
  maxJobAttempts: parseInt(process.env.MAX_JOB_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),
};
