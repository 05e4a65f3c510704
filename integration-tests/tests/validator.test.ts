/**
 * Field Validator and Amount Coherence Tests
 */

import {
  FieldValidator,
  checkAmountCoherence,
  expandTwoDigitYear,
  reject,
  FIELD_KINDS,
  CANONICAL_FIELDS,
  type Normalized,
} from '@facturalens/extraction';

describe('FieldValidator', () => {
  const validator = new FieldValidator();

  describe('identifiers', () => {
    it('should keep only digits when the count is expected', () => {
      expect(validator.validate('rnc', '101-2345678-9')).toEqual({
        status: 'valid',
        value: { kind: 'identifier', value: '10123456789' },
      });
    });

    it('should keep the trimmed original for an unexpected digit count', () => {
      expect(validator.validate('rnc', ' 12345 ')).toEqual({
        status: 'valid',
        value: { kind: 'identifier', value: '12345' },
      });
      expect(validator.validate('numero_ticket', '0412-000187')).toEqual({
        status: 'valid',
        value: { kind: 'identifier', value: '0412-000187' },
      });
    });

    it('should reject an empty identifier', () => {
      expect(validator.validate('rnc', '   ')).toEqual({
        status: 'rejected',
        diagnostic: 'rnc: rejected, empty identifier',
      });
    });
  });

  describe('dates', () => {
    it.each([
      ['15/01/2024', '15/01/2024', '2024-01-15'],
      ['5-3-2024', '05/03/2024', '2024-03-05'],
      ['2024-03-10', '10/03/2024', '2024-03-10'],
      ['15/01/24', '15/01/2024', '2024-01-15'],
      ['15-01-45', '15/01/1945', '1945-01-15'],
    ])('should normalize %s to %s', (input, value, iso) => {
      expect(validator.validate('fecha', input)).toEqual({
        status: 'valid',
        value: { kind: 'date', value, iso },
      });
    });

    it('should return impossible or unparseable dates unchanged', () => {
      expect(validator.validate('fecha', '31/02/2024')).toEqual({
        status: 'valid',
        value: { kind: 'date', value: '31/02/2024', iso: null },
      });
      expect(validator.validate('fecha', '15 de enero')).toEqual({
        status: 'valid',
        value: { kind: 'date', value: '15 de enero', iso: null },
      });
    });

    it('should reject an empty date', () => {
      expect(validator.validate('fecha_emision', '')).toEqual({
        status: 'rejected',
        diagnostic: 'fecha_emision: rejected, empty date',
      });
    });
  });

  describe('money', () => {
    it('should format to two decimals', () => {
      expect(validator.validate('total', '150.0')).toEqual({
        status: 'valid',
        value: { kind: 'money', amount: '150.00', cents: 15000 },
      });
      expect(validator.validate('total', 'RD$ 1.250,50')).toEqual({
        status: 'valid',
        value: { kind: 'money', amount: '1250.50', cents: 125050 },
      });
    });

    it('should reject negative, oversized and non-numeric amounts', () => {
      expect(validator.validate('total', '-50.00')).toEqual({
        status: 'rejected',
        diagnostic: 'total: rejected, negative amount: -50',
      });
      expect(validator.validate('subtotal', '12,000,000.00')).toEqual({
        status: 'rejected',
        diagnostic: 'subtotal: rejected, amount above 10000000: 12000000',
      });
      expect(validator.validate('itbis', 'abc')).toEqual({
        status: 'rejected',
        diagnostic: 'itbis: rejected, not a number: "abc"',
      });
    });
  });

  describe('free text', () => {
    it('should collapse whitespace', () => {
      expect(validator.validate('razon_social', '  Ferreteria   Central ')).toEqual({
        status: 'valid',
        value: { kind: 'text', value: 'Ferreteria Central' },
      });
    });

    it('should reject text shorter than two characters', () => {
      expect(validator.validate('vehiculo', 'A')).toEqual({
        status: 'rejected',
        diagnostic: 'vehiculo: rejected, text too short',
      });
    });
  });

  describe('fiscal document numbers', () => {
    it.each([
      ['b01 0000 0123', 'B0100000123', 'B01'],
      ['E310000000045', 'E310000000045', 'E31'],
      ['A010010010100000001', 'A010010010100000001', 'A01'],
      ['A0100100100001', 'A0100100100001', 'A01'],
    ])('should accept %s', (input, value, series) => {
      expect(validator.validate('ncf', input)).toEqual({
        status: 'valid',
        value: { kind: 'fiscal_document_number', value, series },
      });
    });

    it('should reject unknown formats', () => {
      expect(validator.validate('ncf', 'X123')).toEqual({
        status: 'rejected',
        diagnostic: 'ncf: rejected, unknown fiscal document number format: "X123"',
      });
    });
  });

  describe('validator errors', () => {
    class BrokenMoneyValidator extends FieldValidator {
      money(): Normalized {
        throw new Error('money parser broken');
      }
    }

    it('should keep the raw value when a kind validator throws', () => {
      expect(new BrokenMoneyValidator().validate('total', '150.00')).toEqual({
        status: 'raw',
        value: { kind: 'raw', value: '150.00' },
        diagnostic: 'total: validator error, kept raw value (money parser broken)',
      });
    });

    it('should allow subclasses to reject explicitly', () => {
      class StrictTextValidator extends FieldValidator {
        freeText(rawValue: string): Normalized {
          return rawValue.length > 10 ? reject('too long') : super.freeText(rawValue);
        }
      }

      expect(new StrictTextValidator().validate('estacion', 'Las Americas Norte')).toEqual({
        status: 'rejected',
        diagnostic: 'estacion: rejected, too long',
      });
    });
  });
});

describe('field kinds', () => {
  it('should give every canonical field a kind', () => {
    expect(CANONICAL_FIELDS).toHaveLength(14);
    expect(FIELD_KINDS.rnc).toEqual({ kind: 'identifier', expectedDigits: [9, 11] });
    expect(FIELD_KINDS.ncf.kind).toBe('fiscal_document_number');
  });
});

describe('expandTwoDigitYear', () => {
  it('should resolve to 20YY unless that passes 2030', () => {
    expect(expandTwoDigitYear('15/01/30')).toBe('15/01/2030');
    expect(expandTwoDigitYear('15-01-31')).toBe('15-01-1931');
    expect(expandTwoDigitYear('15-01-99')).toBe('15-01-1999');
  });
});

describe('checkAmountCoherence', () => {
  const money = (amount: string) => ({ kind: 'money' as const, amount, cents: Math.round(Number(amount) * 100) });

  it('should accept amounts that add up', () => {
    expect(
      checkAmountCoherence({ subtotal: money('1000.00'), itbis: money('180.00'), total: money('1180.00') })
    ).toEqual([]);
  });

  it('should account for discounts', () => {
    expect(
      checkAmountCoherence({
        subtotal: money('1000.00'),
        descuento: money('100.00'),
        itbis: money('162.00'),
        total: money('1062.00'),
      })
    ).toEqual([]);
  });

  it('should tolerate one cent of rounding', () => {
    expect(
      checkAmountCoherence({ subtotal: money('100.00'), itbis: money('18.00'), total: money('118.01') })
    ).toEqual([]);
  });

  it('should warn when amounts do not add up', () => {
    expect(
      checkAmountCoherence({ subtotal: money('1000.00'), itbis: money('180.00'), total: money('1200.00') })
    ).toEqual([
      'Amounts do not add up: subtotal 1000.00 - descuento 0.00 + itbis 180.00 = 1180.00, total is 1200.00 (difference 20.00)',
    ]);
  });

  it('should skip the check when a component is missing', () => {
    expect(checkAmountCoherence({ subtotal: money('1000.00'), total: money('5.00') })).toEqual([]);
  });
});
