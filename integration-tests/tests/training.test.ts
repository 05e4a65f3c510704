/**
 * Training Recorder Tests
 */

import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  FileTrainingRecorder,
  QueueTrainingRecorder,
  QUEUE_NAMES,
  buildTrainingExample,
  runWithContext,
  sampleText,
  type TrainingExample,
  type TrainingQueue,
} from '@facturalens/extraction';

const example: TrainingExample = buildTrainingExample(
  'RNC: 131092659\nImporte: 200.00',
  'toll',
  { rnc: '131092659', total: '200.00' },
  new Date('2025-10-08T14:13:59.000Z')
);

describe('buildTrainingExample', () => {
  it('should describe the extraction', () => {
    expect(example).toEqual({
      timestamp: '2025-10-08T14:13:59.000Z',
      invoice_type: 'toll',
      text_sample: 'RNC: 131092659\nImporte: 200.00',
      extracted_data: { rnc: '131092659', total: '200.00' },
      text_length: 30,
      fields_found: ['rnc', 'total'],
    });
  });
});

describe('sampleText', () => {
  it('should cut long text and mark the cut', () => {
    expect(sampleText('abcdefgh', 5)).toBe('abcde...');
  });

  it('should leave short text alone', () => {
    expect(sampleText('abcde', 5)).toBe('abcde');
  });
});

describe('FileTrainingRecorder', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'training-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should write one JSON file per example', async () => {
    const target = path.join(directory, 'nested');
    const recorder = new FileTrainingRecorder(target);

    await recorder.record(example);

    const files = await readdir(target);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^training_[0-9A-Z]{26}\.json$/);
    expect(JSON.parse(await readFile(path.join(target, files[0]), 'utf-8'))).toEqual(example);
  });
});

describe('QueueTrainingRecorder', () => {
  it('should enqueue the example with the current correlation ID', async () => {
    const add = jest.fn().mockResolvedValue(undefined);
    const queue: TrainingQueue = { add };
    const recorder = new QueueTrainingRecorder(queue);

    await runWithContext({ correlationId: 'corr-1' }, () => recorder.record(example));

    expect(add).toHaveBeenCalledWith(QUEUE_NAMES.RECORD_TRAINING_EXAMPLE, {
      event_type: 'training.example',
      correlation_id: 'corr-1',
      example,
    });
  });

  it('should propagate queue errors', async () => {
    const queue: TrainingQueue = { add: jest.fn().mockRejectedValue(new Error('redis unavailable')) };

    await expect(new QueueTrainingRecorder(queue).record(example)).rejects.toThrow('redis unavailable');
  });
});
