import { describe, expect, it } from 'vitest';
import {
  PatternExtractor,
  detectCategory,
  detectDateOffset,
  detectPaymentMethod,
  extractAmount,
} from '../PatternExtractor';

const extractor = new PatternExtractor({
  baseline: { found: 0.8, missing: 0.2 },
  fallback: { found: 0.6, missing: 0.2 },
});

describe('extractAmount', () => {
  it.each([
    ['almuerzo 50k', 50000],
    ['almuerzo 50mil', 50000],
    ['almuerzo 50 mil pesos', 50000],
    ['almuerzo 50000', 50000],
    ['cafe 50.5k', 50500],
    ['arepa 1.1k', 1100],
    ['pan 2.3 mil', 2300],
  ])('reads %s as %d', (message, expected) => {
    expect(extractAmount(message)).toBe(expected);
  });

  it('returns null when no amount is present', () => {
    expect(extractAmount('compre algo en la tienda')).toBeNull();
  });

  it('ignores short bare numbers', () => {
    expect(extractAmount('2 empanadas')).toBeNull();
  });

  it('moves past a zero amount to the next pattern', () => {
    expect(extractAmount('0k y luego 15000')).toBe(15000);
  });
});

describe('keyword detection', () => {
  it('picks the first category in declaration order', () => {
    expect(detectCategory('taxi al aeropuerto')).toBe('transport');
    expect(detectCategory('Farmacia de la esquina')).toBe('health');
    expect(detectCategory('algo raro')).toBe('other');
  });

  it('matches keywords as whole words only', () => {
    expect(detectCategory('aguacate 5000')).toBe('other');
    expect(detectCategory('pepsi 3000')).toBe('other');
    expect(detectCategory('baranda 20000')).toBe('other');
    expect(detectPaymentMethod('buscar cashback 5000')).toBe('card');
  });

  it('accepts plural forms of a keyword', () => {
    expect(detectCategory('dos hamburguesas 30k')).toBe('food');
    expect(detectCategory('camisas 80000')).toBe('clothing');
  });

  it('defaults the payment method to card', () => {
    expect(detectPaymentMethod('taxi 12000')).toBe('card');
    expect(detectPaymentMethod('pague con nequi')).toBe('transfer');
  });

  it('matches accented and unaccented keywords alike', () => {
    expect(detectPaymentMethod('con débito')).toBe('debit');
    expect(detectPaymentMethod('con debito')).toBe('debit');
  });

  it('reads relative day keywords as whole words', () => {
    expect(detectDateOffset('taxi ayer')).toBe(-1);
    expect(detectDateOffset('taxi anteayer')).toBe(-2);
    expect(detectDateOffset('taxi mañana')).toBe(1);
    expect(detectDateOffset('taxi pasado mañana')).toBe(2);
    expect(detectDateOffset('taxi hoy')).toBe(0);
  });
});

describe('PatternExtractor', () => {
  it('builds a full record from a message', () => {
    expect(extractor.extract('  taxi 12000 en efectivo ayer ', 'fallback')).toEqual({
      amount: 12000,
      description: 'taxi 12000 en efectivo ayer',
      category: 'transport',
      paymentMethod: 'cash',
      location: null,
      dateOffset: -1,
      confidence: 0.6,
      origin: 'pattern-fallback',
    });
  });

  it('uses baseline confidence levels when inference is not in play', () => {
    expect(extractor.extract('mercado 80000 con débito', 'baseline')).toMatchObject({
      amount: 80000,
      category: 'food',
      paymentMethod: 'debit',
      confidence: 0.8,
    });
    expect(extractor.extract('compre en la farmacia', 'baseline')).toMatchObject({
      amount: null,
      category: 'health',
      confidence: 0.2,
    });
  });

  it('reads a spoken thousand with a transfer for a future day', () => {
    expect(extractor.extract('pagué 35 mil con nequi pasado mañana', 'fallback')).toMatchObject({
      amount: 35000,
      category: 'other',
      paymentMethod: 'transfer',
      dateOffset: 2,
    });
  });

  it.each([
    ['50k almuerzo tarjeta', { amount: 50000, category: 'food', paymentMethod: 'card', dateOffset: 0 }],
    [
      'pagué 25000 de uber efectivo ayer',
      { amount: 25000, category: 'transport', paymentMethod: 'cash', dateOffset: -1 },
    ],
  ])('reads %s without inference', (message, expected) => {
    const record = extractor.extract(message, 'baseline');

    expect(record).toMatchObject(expected);
    expect(record.confidence).toBe(0.8);
  });

  it('truncates the description to 100 characters', () => {
    const message = `taxi 12000 ${'x'.repeat(200)}`;
    expect(extractor.extract(message, 'fallback').description).toHaveLength(100);
  });
});
