/**
 * Training Recorder
 *
 * Sink for extraction results that can later be labeled and fed back into
 * the category model. The pipeline calls record() without awaiting it.
 */

import { config } from '../config';
import type { DocumentCategory } from '../types';

export interface TrainingExample {
  /** ISO-8601 */
  timestamp: string;
  invoice_type: DocumentCategory;
  /** Leading slice of the OCR text, "..." appended when cut */
  text_sample: string;
  extracted_data: Record<string, string>;
  text_length: number;
  fields_found: string[];
}

export interface TrainingRecorder {
  readonly name: string;
  record(example: TrainingExample): Promise<void>;
}

export function sampleText(text: string, maxChars: number = config.trainingSampleChars): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

export function buildTrainingExample(
  text: string,
  category: DocumentCategory,
  extractedData: Record<string, string>,
  now: Date = new Date()
): TrainingExample {
  return {
    timestamp: now.toISOString(),
    invoice_type: category,
    text_sample: sampleText(text),
    extracted_data: extractedData,
    text_length: text.length,
    fields_found: Object.keys(extractedData),
  };
}
