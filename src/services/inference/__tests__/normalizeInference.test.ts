import { describe, expect, it } from 'vitest';
import {
  extractJsonBlock,
  normalizeInference,
  parseInferenceResponse,
  toCategory,
  toPaymentMethod,
} from '../normalizeInference';
import { buildExtractionPrompt } from '../prompt';

const penalties = { invalidAmount: 0.3, invalidCategory: 0.2, invalidPaymentMethod: 0.1 };

describe('extractJsonBlock', () => {
  it('returns the first balanced object, skipping braces inside strings', () => {
    expect(extractJsonBlock('Claro: {"a": "}{", "b": {"c": 1}} listo')).toBe(
      '{"a": "}{", "b": {"c": 1}}'
    );
  });

  it('handles escaped quotes inside strings', () => {
    expect(extractJsonBlock('{"a": "dijo \\"hola}\\""} extra')).toBe('{"a": "dijo \\"hola}\\""}');
  });

  it('returns null without a complete object', () => {
    expect(extractJsonBlock('sin json')).toBeNull();
    expect(extractJsonBlock('{"amount": 1')).toBeNull();
  });
});

describe('category and payment method mapping', () => {
  it('accepts canonical values in any case', () => {
    expect(toCategory('FOOD')).toBe('food');
    expect(toPaymentMethod(' Cash ')).toBe('cash');
  });

  it('maps Spanish aliases', () => {
    expect(toCategory('Transporte')).toBe('transport');
    expect(toCategory('hogar')).toBe('housing');
    expect(toPaymentMethod('Efectivo')).toBe('cash');
    expect(toPaymentMethod('débito')).toBe('debit');
  });

  it('rejects unknown or non-string values', () => {
    expect(toCategory('misc')).toBeNull();
    expect(toCategory(3)).toBeNull();
    expect(toPaymentMethod('bitcoin')).toBeNull();
    expect(toPaymentMethod(null)).toBeNull();
  });
});

describe('normalizeInference', () => {
  it('maps a complete answer onto a record', () => {
    const record = normalizeInference(
      {
        amount: 20000,
        description: ' Almuerzo ',
        category: 'food',
        payment_method: 'cash',
        location: 'Centro',
        date_offset: -1,
        confidence: 0.9,
      },
      'almuerzo 20 mil en el centro ayer',
      penalties
    );

    expect(record).toEqual({
      amount: 20000,
      description: 'Almuerzo',
      category: 'food',
      paymentMethod: 'cash',
      location: 'Centro',
      dateOffset: -1,
      confidence: 0.9,
      origin: 'inference',
    });
  });

  it('substitutes defaults and lowers confidence for invalid fields', () => {
    const record = normalizeInference(
      { amount: 'veinte', category: 'misc', payment_method: 'bitcoin', confidence: 0.9 },
      'algo',
      penalties
    );

    expect(record).toMatchObject({
      amount: null,
      category: 'other',
      paymentMethod: 'card',
      location: null,
      dateOffset: 0,
    });
    expect(record.confidence).toBeCloseTo(0.3);
  });

  it('never lets confidence drop below zero', () => {
    const record = normalizeInference(
      { amount: -5, category: 'food', payment_method: 'cash', confidence: 0.2 },
      'algo',
      penalties
    );

    expect(record.amount).toBeNull();
    expect(record.confidence).toBe(0);
  });

  it('clamps confidence into range and treats a missing one as zero', () => {
    const base = { amount: 1000, category: 'food', payment_method: 'cash' };
    expect(normalizeInference({ ...base, confidence: 1.7 }, 'x', penalties).confidence).toBe(1);
    expect(normalizeInference({ ...base, confidence: 'high' }, 'x', penalties).confidence).toBe(0);
  });

  it('falls back to the start of the message for a missing description', () => {
    const message = `  cafe 5000 ${'y'.repeat(150)}`;
    const record = normalizeInference({ amount: 5000, confidence: 0.8 }, message, penalties);

    expect(record.description).toBe(message.trim().slice(0, 100));
  });

  it('caps long descriptions and truncates fractional day offsets', () => {
    const record = normalizeInference(
      { amount: 5000, description: 'z'.repeat(600), date_offset: 1.7, confidence: 0.8 },
      'x',
      penalties
    );

    expect(record.description).toHaveLength(500);
    expect(record.dateOffset).toBe(1);
  });
});

describe('parseInferenceResponse', () => {
  it('parses an object wrapped in prose', () => {
    const raw = 'Aquí está:\n{"amount": 15000, "description": "Uber", "category": "transport", "payment_method": "transfer", "location": null, "date_offset": 0, "confidence": 0.85}\n';

    expect(parseInferenceResponse(raw, 'uber 15k nequi', penalties)).toEqual({
      amount: 15000,
      description: 'Uber',
      category: 'transport',
      paymentMethod: 'transfer',
      location: null,
      dateOffset: 0,
      confidence: 0.85,
      origin: 'inference',
    });
  });

  it('returns null for an object that is not valid JSON', () => {
    expect(parseInferenceResponse('{amount: 15000}', 'x', penalties)).toBeNull();
  });
});

describe('buildExtractionPrompt', () => {
  it('embeds the message with double quotes replaced', () => {
    expect(buildExtractionPrompt('almuerzo "especial" 20k')).toContain(
      `Mensaje: "almuerzo 'especial' 20k"`
    );
  });

  it('lists every category', () => {
    expect(buildExtractionPrompt('x')).toContain(
      'food, transport, services, entertainment, health, clothing, education, housing, other'
    );
  });
});
