import { describe, expect, it } from 'vitest';
import { cleanRecognizedText, extractReceiptMetadata } from '../receiptText';

describe('cleanRecognizedText', () => {
  it('collapses whitespace and reads a pipe as a capital I', () => {
    expect(cleanRecognizedText('  TOTAL   $ 45.000\n\n|VA 19% ')).toBe('TOTAL $ 45.000 IVA 19%');
  });

  it('drops symbols outside the receipt alphabet', () => {
    expect(cleanRecognizedText('Café ★ Juan ~ 12.000 €')).toBe('Café  Juan  12.000');
  });

  it('returns an empty string for noise only', () => {
    expect(cleanRecognizedText(' ★ ~ ')).toBe('');
  });
});

describe('extractReceiptMetadata', () => {
  it('finds receipt number, tax, phone and email', () => {
    const text = 'Factura # 004512 IVA: 3.800 Tel 601-555-1234 ventas@tienda.co Total 23.800';

    expect(extractReceiptMetadata(text)).toEqual({
      receiptNumber: '004512',
      taxAmount: '3.800',
      phone: '601-555-1234',
      email: 'ventas@tienda.co',
    });
  });

  it('omits fields it cannot find', () => {
    expect(extractReceiptMetadata('Total 23.800')).toEqual({});
  });
});
