/**
 * File Training Recorder
 *
 * Writes one pretty-printed JSON file per example into a directory.
 * File names are ULIDs, so a directory listing is in recording order.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { ulid } from 'ulid';
import { config } from '../config';
import { logger } from '../logger';
import type { TrainingExample, TrainingRecorder } from './recorder';

export class FileTrainingRecorder implements TrainingRecorder {
  readonly name = 'file';

  constructor(private readonly directory: string = config.trainingDataPath) {}

  async record(example: TrainingExample): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const filename = `training_${ulid()}.json`;
    await writeFile(path.join(this.directory, filename), JSON.stringify(example, null, 2), 'utf-8');

    logger.debug('Training example recorded', {
      recorder: this.name,
      filename,
      invoice_type: example.invoice_type,
    });
  }
}
