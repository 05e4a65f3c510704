/**
 * BullMQ Queue Definitions
 *
 * Queue names, job payloads and the queue factory for the queue-backed
 * training sink.
 */

import { Queue, type ConnectionOptions } from 'bullmq';
import { config } from './config';
import { logger } from './logger';
import type { TrainingExample } from './training/recorder';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  RECORD_TRAINING_EXAMPLE: 'record_training_example',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * record_training_example - Enqueued by the pipeline after each extraction
 */
export interface RecordTrainingExampleJob {
  event_type: 'training.example';
  correlation_id: string;
  example: TrainingExample;
}

// ============================================================================
// Redis Connection
// ============================================================================

export function getRedisConnection(): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (redisUrl && redisUrl.startsWith('redis://')) {
    try {
      const url = new URL(redisUrl);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password || undefined,
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch (error) {
      logger.warn('Invalid REDIS_URL, using REDIS_HOST/REDIS_PORT', { redisUrl, error: String(error) });
    }
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Queue Factory
// ============================================================================

export const defaultJobOptions = {
  attempts: config.maxJobAttempts,
  backoff: {
    type: 'exponential' as const,
    delay: config.backoffBaseMs,
  },
  removeOnComplete: 100, // Keep last 100 completed jobs
  removeOnFail: 1000, // Keep last 1000 failed jobs
};

export function createQueue<TData, TResult>(queueName: QueueName): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions,
  });
}
