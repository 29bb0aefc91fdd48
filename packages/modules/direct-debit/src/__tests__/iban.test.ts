import { describe, it, expect } from 'vitest';
import { formatIban, ibanProblem, isValidIban, normalizeIban, parseIban } from '../helpers/iban';

describe('normalizeIban', () => {
  it('strips whitespace and upper-cases', () => {
    expect(normalizeIban(' de89 3704 0044\t0532 0130 00 ')).toBe('DE89370400440532013000');
  });
});

describe('ibanProblem', () => {
  it('accepts valid check digits', () => {
    expect(ibanProblem('DE89370400440532013000')).toBeNull();
    expect(ibanProblem('GB82WEST12345698765432')).toBeNull();
    expect(isValidIban('gb82 west 1234 5698 7654 32')).toBe(true);
  });

  it('rejects a wrong checksum', () => {
    expect(ibanProblem('DE89370400440532013001')).toBe('Invalid checksum');
  });

  it('checks the country length', () => {
    expect(ibanProblem('DE8937040044053201300')).toBe('Length 21 is invalid for DE, expected 22');
  });

  it('rejects unknown countries and malformed prefixes', () => {
    expect(ibanProblem('ZZ89370400440532013000')).toBe('Unsupported country code ZZ');
    expect(ibanProblem('D189370400440532013000')).toBe('Must start with a country code');
    expect(ibanProblem('DEX9370400440532013000')).toBe('Must have check digits after the country code');
    expect(ibanProblem('DE89-70400440532013000')).toBe('Invalid character');
    expect(ibanProblem('DE8')).toBe('Too short');
  });
});

describe('parseIban', () => {
  it('returns the normalized IBAN', () => {
    expect(parseIban('DE89 3704 0044 0532 0130 00')).toBe('DE89370400440532013000');
  });

  it('throws INVALID_IBAN with a field detail', () => {
    expect(() => parseIban('DE00 3704 0044 0532 0130 00')).toThrow(
      expect.objectContaining({
        code: 'INVALID_IBAN',
        statusCode: 400,
        details: [{ field: 'iban', message: 'Invalid checksum' }],
      }),
    );
  });
});

describe('formatIban', () => {
  it('groups by four', () => {
    expect(formatIban('DE89370400440532013000')).toBe('DE89 3704 0044 0532 0130 00');
  });
});
