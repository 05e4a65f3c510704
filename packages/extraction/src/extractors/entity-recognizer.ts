/**
 * Entity Recognizer
 *
 * Optional named-entity recognition used by the heuristic extractor's entity
 * pass. Implementations wrap whatever NLP backend the host provides; the
 * pipeline works without one.
 */

export type EntityLabel = 'MONEY' | 'DATE' | 'ORG' | 'CARDINAL' | 'PERSON' | 'GPE' | 'OTHER';

export interface RecognizedEntity {
  text: string;
  label: EntityLabel;
  /** Character offset in the recognized text */
  start: number;
  /** Text of the syntactic head token, when the backend parses dependencies */
  head?: string;
}

export interface EntityRecognizer {
  readonly name: string;
  recognize(text: string): RecognizedEntity[];
}
