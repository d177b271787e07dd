import { describe, expect, it } from 'vitest';
import { normalizeMessage } from '../Normalizer';

describe('normalizeMessage', () => {
  it('trims and lowercases the text', () => {
    expect(normalizeMessage('  Almuerzo 20K  ').normalizedText).toBe('almuerzo 20k');
  });

  it('gives the same fingerprint to messages that differ only in case and padding', () => {
    const a = normalizeMessage('Uber 15 mil');
    const b = normalizeMessage('  uber 15 MIL\n');

    expect(a.fingerprint).toBe(b.fingerprint);
  });

  it('produces a 32 character hex fingerprint', () => {
    expect(normalizeMessage('taxi 12000').fingerprint).toMatch(/^[0-9a-f]{32}$/);
  });

  it('distinguishes different messages', () => {
    expect(normalizeMessage('taxi 12000').fingerprint).not.toBe(
      normalizeMessage('taxi 13000').fingerprint
    );
  });
});
