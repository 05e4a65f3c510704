/**
 * Invoice Extraction Pipeline Tests
 *
 * End-to-end behavior of extract(): classification, field selection,
 * validation outcomes, the failsafe path and result invariants.
 */

import {
  InvoiceExtractionPipeline,
  DocumentClassifier,
  FieldValidator,
  createStaticModelStore,
  toFieldMap,
  trainingRecorderFailuresCounter,
  type Classifier,
  type Normalized,
  type TrainingRecorder,
  type ValidationOutcome,
  type CanonicalField,
} from '@facturalens/extraction';

const TOLL_TICKET = `Fideicomiso Vial del Este
RNC: 131092659
Estacion de Peaje Las Americas
Ticket Nro: 0412-000187
Vehiculo: LIVIANO
Fecha/Hora: 08/10/2025 10:13:59
Importe: RD$ : 200.00`;

const FISCAL_INVOICE = `COMPROBANTE FISCAL
Distribuidora Caribe SRL
RNC: 101234567
NCF: B0100000123
Fecha Emision: 15/01/2024
Subtotal: 1,000.00
ITBIS: 180.00
Total: 1,180.00`;

function rulesOnlyPipeline(options: ConstructorParameters<typeof InvoiceExtractionPipeline>[0] = {}) {
  return new InvoiceExtractionPipeline({
    classifier: new DocumentClassifier({ modelStore: createStaticModelStore(null) }),
    ...options,
  });
}

const offlineClassifier: Classifier = {
  classify: () => {
    throw new Error('classifier offline');
  },
};

function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('InvoiceExtractionPipeline', () => {
  describe('toll tickets', () => {
    it('should classify and extract a toll ticket', () => {
      const result = rulesOnlyPipeline().extract({ text: TOLL_TICKET });

      expect(result.category).toBe('toll');
      expect(result.classificationSource).toBe('rules');
      expect(result.classificationConfidence).toBe(0.8);
      expect(result.method).toBe('hybrid');
      expect(toFieldMap(result)).toEqual({
        rnc: '131092659',
        numero_ticket: '0412-000187',
        vehiculo: 'LIVIANO',
        estacion: 'Las Americas',
        fecha: '08/10/2025',
        total: '200.00',
      });
      expect(result.warnings).toEqual([]);
      expect(result.diagnostics).toEqual([]);
      expect(result.qualityBand).toBe('high');
    });

    it('should score must-have fields found in context', () => {
      const result = rulesOnlyPipeline().extract({ text: TOLL_TICKET });

      expect(result.fields.total).toEqual({
        name: 'total',
        value: { kind: 'money', amount: '200.00', cents: 20000 },
        confidence: 100,
        confidenceBand: 'high',
        provenance: 'pattern',
        offset: TOLL_TICKET.indexOf('200.00'),
      });
      expect(result.fields.fecha?.value).toEqual({ kind: 'date', value: '08/10/2025', iso: '2025-10-08' });
    });

    it('should drop NCF from toll tickets', () => {
      const text = TOLL_TICKET.replace('Vehiculo: LIVIANO', 'Vehiculo: LIVIANO\nNCF: B0200000045');

      const result = rulesOnlyPipeline().extract({ text });

      expect(result.category).toBe('toll');
      expect(result.fields.ncf).toBeUndefined();
      expect(result.diagnostics).toEqual(['ncf: not used for category toll']);
    });
  });

  describe('domestic fiscal invoices', () => {
    it('should extract and validate RNC and NCF', () => {
      const result = rulesOnlyPipeline().extract({ text: FISCAL_INVOICE });

      expect(result.category).toBe('domestic_fiscal');
      expect(result.fields.rnc?.value).toEqual({ kind: 'identifier', value: '101234567' });
      expect(result.fields.ncf?.value).toEqual({
        kind: 'fiscal_document_number',
        value: 'B0100000123',
        series: 'B01',
      });
      expect(toFieldMap(result)).toEqual({
        rnc: '101234567',
        ncf: 'B0100000123',
        razon_social: 'Distribuidora Caribe SRL',
        fecha_emision: '15/01/2024',
        fecha: '15/01/2024',
        subtotal: '1000.00',
        itbis: '180.00',
        total: '1180.00',
      });
      expect(result.warnings).toEqual([]);
    });

    it('should warn when the amounts do not add up', () => {
      const text = FISCAL_INVOICE.replace('Total: 1,180.00', 'Total: 1,200.00');

      const result = rulesOnlyPipeline().extract({ text });

      expect(result.warnings).toEqual([
        'Amounts do not add up: subtotal 1000.00 - descuento 0.00 + itbis 180.00 = 1180.00, total is 1200.00 (difference 20.00)',
      ]);
    });

    it('should format every money field with two decimals', () => {
      const result = rulesOnlyPipeline().extract({ text: FISCAL_INVOICE });
      const moneyFields: CanonicalField[] = ['subtotal', 'itbis', 'total'];

      for (const name of moneyFields) {
        const value = result.fields[name]?.value;
        expect(value?.kind).toBe('money');
        if (value?.kind === 'money') {
          expect(value.amount).toMatch(/^\d+\.\d{2}$/);
          expect(value.cents).toBeGreaterThanOrEqual(0);
        }
      }
    });

    it('should keep raw values when a validator throws', () => {
      class BrokenMoneyValidator extends FieldValidator {
        money(): Normalized {
          throw new Error('money parser broken');
        }
      }

      const result = rulesOnlyPipeline({ validator: new BrokenMoneyValidator() }).extract({ text: FISCAL_INVOICE });

      expect(result.fields.total?.value).toEqual({ kind: 'raw', value: '1180.00' });
      expect(result.diagnostics).toEqual([
        'subtotal: validator error, kept raw value (money parser broken)',
        'itbis: validator error, kept raw value (money parser broken)',
        'total: validator error, kept raw value (money parser broken)',
      ]);
      expect(result.warnings).toEqual([]);
    });
  });

  describe('degenerate input', () => {
    it('should return an empty generic result for empty text', () => {
      const result = rulesOnlyPipeline().extract({ text: '' });

      expect(result.category).toBe('generic');
      expect(result.fields).toEqual({});
      expect(result.overallQualityScore).toBe(0);
      expect(result.qualityBand).toBe('low');
      expect(result.warnings).toEqual(['No RNC found', 'No date found', 'No total amount found']);
    });

    it('should carry the source reference through', () => {
      const result = rulesOnlyPipeline().extract({ text: TOLL_TICKET, sourceRef: 'scans/ticket-0412.png' });

      expect(result.sourceRef).toBe('scans/ticket-0412.png');
    });
  });

  describe('failure handling', () => {
    const text = 'Total: 1,180.00\nFecha: 15/01/2024\nRNC 101234567';

    it('should fall back to failsafe patterns when the full chain fails', () => {
      const result = new InvoiceExtractionPipeline({ classifier: offlineClassifier }).extract({ text });

      expect(result.method).toBe('failsafe');
      expect(result.category).toBe('generic');
      expect(result.classificationConfidence).toBe(0.3);
      expect(result.overallQualityScore).toBe(1);
      expect(result.qualityBand).toBe('low');
      expect(toFieldMap(result)).toEqual({ total: '1180.00', fecha: '15/01/2024', rnc: '101234567' });
      expect(result.fields.rnc).toEqual({
        name: 'rnc',
        value: { kind: 'identifier', value: '101234567' },
        confidence: 30,
        confidenceBand: 'very_low',
        provenance: 'pattern',
        offset: 38,
      });
      expect(result.diagnostics).toEqual(['hybrid failed: classifier offline']);
    });

    it('should return an empty result when the failsafe path fails too', () => {
      class OfflineValidator extends FieldValidator {
        validate(): ValidationOutcome {
          throw new Error('validator offline');
        }
      }

      const result = new InvoiceExtractionPipeline({
        classifier: offlineClassifier,
        validator: new OfflineValidator(),
      }).extract({ text });

      expect(result.method).toBe('empty');
      expect(result.category).toBe('generic');
      expect(result.fields).toEqual({});
      expect(result.diagnostics).toEqual(['hybrid failed: classifier offline', 'failsafe failed: validator offline']);
    });
  });

  describe('result invariants', () => {
    it('should be idempotent', () => {
      const pipeline = rulesOnlyPipeline();

      const first = pipeline.extract({ text: FISCAL_INVOICE });
      const second = pipeline.extract({ text: FISCAL_INVOICE });

      expect(second).toEqual(first);
      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });

    it('should return a frozen result', () => {
      const result = rulesOnlyPipeline().extract({ text: TOLL_TICKET });

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.fields)).toBe(true);
      expect(Object.isFrozen(result.fields.total)).toBe(true);
      expect(Object.isFrozen(result.warnings)).toBe(true);
    });
  });

  describe('training examples', () => {
    it('should hand successful extractions to the recorder', () => {
      const record = jest.fn<Promise<void>, Parameters<TrainingRecorder['record']>>().mockResolvedValue(undefined);
      const pipeline = rulesOnlyPipeline({ trainingRecorder: { name: 'spy', record } });

      const result = pipeline.extract({ text: TOLL_TICKET });

      expect(record).toHaveBeenCalledTimes(1);
      const [example] = record.mock.calls[0];
      expect(example.invoice_type).toBe('toll');
      expect(example.extracted_data).toEqual(toFieldMap(result));
      expect(example.text_length).toBe(TOLL_TICKET.length);
    });

    it('should not record results without fields', () => {
      const record = jest.fn<Promise<void>, Parameters<TrainingRecorder['record']>>().mockResolvedValue(undefined);

      rulesOnlyPipeline({ trainingRecorder: { name: 'spy', record } }).extract({ text: '' });

      expect(record).not.toHaveBeenCalled();
    });

    it('should count a rejected recording without failing the extraction', async () => {
      const recorder: TrainingRecorder = {
        name: 'rejecting',
        record: () => Promise.reject(new Error('disk full')),
      };

      const result = rulesOnlyPipeline({ trainingRecorder: recorder }).extract({ text: TOLL_TICKET });
      await flushPromises();

      expect(result.method).toBe('hybrid');
      const metric = await trainingRecorderFailuresCounter.get();
      expect(metric.values.find((entry) => entry.labels.recorder === 'rejecting')?.value).toBe(1);
    });

    it('should count a recorder that throws synchronously', async () => {
      const recorder: TrainingRecorder = {
        name: 'throwing',
        record: () => {
          throw new Error('recorder misconfigured');
        },
      };

      const result = rulesOnlyPipeline({ trainingRecorder: recorder }).extract({ text: TOLL_TICKET });

      expect(result.category).toBe('toll');
      const metric = await trainingRecorderFailuresCounter.get();
      expect(metric.values.find((entry) => entry.labels.recorder === 'throwing')?.value).toBe(1);
    });
  });
});
