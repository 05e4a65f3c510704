/**
 * Shared TypeScript Types
 *
 * Types for the invoice field extraction pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Document Classification
// ============================================================================

export type DocumentCategory =
  | 'toll'
  | 'domestic_fiscal'
  | 'international'
  | 'detailed'
  | 'simple'
  | 'generic';

/** Tie-break order for classification; earlier wins. */
export const CATEGORY_PRIORITY: readonly DocumentCategory[] = [
  'toll',
  'domestic_fiscal',
  'international',
  'detailed',
  'simple',
  'generic',
];

export type ClassificationSource = 'model' | 'rules' | 'default';

export interface ClassificationResult {
  category: DocumentCategory;
  /** 0-1 */
  confidence: number;
  source: ClassificationSource;
}

// ============================================================================
// Input
// ============================================================================

export interface RawDocument {
  /** OCR text, no quality guarantees */
  readonly text: string;
  /** Opaque file path or id supplied by the caller */
  readonly sourceRef?: string;
}

// ============================================================================
// Fields
// ============================================================================

export type CanonicalField =
  | 'rnc'
  | 'ncf'
  | 'numero_factura'
  | 'numero_ticket'
  | 'razon_social'
  | 'vehiculo'
  | 'estacion'
  | 'fecha'
  | 'fecha_emision'
  | 'fecha_vencimiento'
  | 'subtotal'
  | 'itbis'
  | 'descuento'
  | 'total';

/**
 * Names produced by the entity pass and by older field naming.
 * Resolved to canonical names by the merger.
 */
export type FieldAlias =
  | 'monto_detectado'
  | 'fecha_detectada'
  | 'empresa_detectada'
  | 'numero_documento'
  | 'impuestos'
  | 'iva'
  | 'rnc_emisor'
  | 'comprobante'
  | 'nombre_emisor';

export type Provenance = 'pattern' | 'heuristic';

export interface FieldCandidate {
  field: CanonicalField | FieldAlias;
  rawValue: string;
  provenance: Provenance;
  /** Character offset of the value in the source text */
  offset: number;
}

/** Candidate after alias resolution. */
export interface ResolvedCandidate extends FieldCandidate {
  field: CanonicalField;
}

export type MergedFieldMap = Partial<Record<CanonicalField, ResolvedCandidate>>;

/** Discriminated union of normalized field values. */
export type FieldValue =
  | { kind: 'money'; amount: string; cents: number }
  | { kind: 'date'; value: string; iso: string | null }
  | { kind: 'identifier'; value: string }
  | { kind: 'fiscal_document_number'; value: string; series: string }
  | { kind: 'text'; value: string }
  | { kind: 'raw'; value: string };

export type FieldConfidenceBand = 'high' | 'medium' | 'low' | 'very_low';

export interface ExtractedField {
  readonly name: CanonicalField;
  readonly value: FieldValue;
  /** 0-100 */
  readonly confidence: number;
  readonly confidenceBand: FieldConfidenceBand;
  readonly provenance: Provenance;
  readonly offset: number;
}

// ============================================================================
// Extraction Result (per document)
// ============================================================================

export type QualityBand = 'high' | 'medium' | 'low';

/**
 * hybrid: full classifier + extractor chain
 * failsafe: catastrophic failure, minimal patterns only
 * empty: terminal default when even the failsafe path failed
 */
export type ExtractionMethod = 'hybrid' | 'failsafe' | 'empty';

export interface ExtractionResult {
  readonly category: DocumentCategory;
  readonly classificationConfidence: number;
  readonly classificationSource: ClassificationSource;
  readonly fields: Readonly<Partial<Record<CanonicalField, ExtractedField>>>;
  /** 0-10 */
  readonly overallQualityScore: number;
  readonly qualityBand: QualityBand;
  readonly method: ExtractionMethod;
  readonly warnings: readonly string[];
  readonly diagnostics: readonly string[];
  readonly sourceRef?: string;
}
