/**
 * Queue Training Recorder
 *
 * Publishes each example as a BullMQ job for an out-of-process consumer.
 */

import type { Queue } from 'bullmq';
import { getCorrelationId } from '../context';
import { logger } from '../logger';
import { createQueue, QUEUE_NAMES, type RecordTrainingExampleJob } from '../queues';
import type { TrainingExample, TrainingRecorder } from './recorder';

export type TrainingQueue = Pick<Queue<RecordTrainingExampleJob>, 'add'>;

export class QueueTrainingRecorder implements TrainingRecorder {
  readonly name = 'queue';
  private queue: TrainingQueue | null;

  /**
   * @param queue - injected queue; a Redis-backed queue is created on first use when omitted
   */
  constructor(queue?: TrainingQueue) {
    this.queue = queue ?? null;
  }

  async record(example: TrainingExample): Promise<void> {
    const job: RecordTrainingExampleJob = {
      event_type: 'training.example',
      correlation_id: getCorrelationId(),
      example,
    };

    await this.getQueue().add(QUEUE_NAMES.RECORD_TRAINING_EXAMPLE, job);

    logger.debug('Training example enqueued', {
      queue: QUEUE_NAMES.RECORD_TRAINING_EXAMPLE,
      invoice_type: example.invoice_type,
    });
  }

  private getQueue(): TrainingQueue {
    if (!this.queue) {
      this.queue = createQueue<RecordTrainingExampleJob, void>(QUEUE_NAMES.RECORD_TRAINING_EXAMPLE);
    }
    return this.queue;
  }
}
