import IBAN_LENGTHS from './iban-lengths.json';
import { InvalidIbanError } from '../errors';

const lengths: Record<string, number> = IBAN_LENGTHS;

/** Upper-case and strip whitespace. */
export function normalizeIban(value: string): string {
  return value.replace(/\s+/g, '').toUpperCase();
}

/** Remainder of the IBAN's numeric form modulo 97, computed digit-wise. */
function mod97(iban: string): number {
  const rearranged = iban.slice(4) + iban.slice(0, 4);
  let remainder = 0;
  for (const ch of rearranged) {
    const value = ch >= 'A' && ch <= 'Z' ? ch.charCodeAt(0) - 55 : Number(ch);
    remainder = (value > 9 ? remainder * 100 + value : remainder * 10 + value) % 97;
  }
  return remainder;
}

/** Returns why a normalized IBAN is invalid, or null when it is valid. */
export function ibanProblem(iban: string): string | null {
  if (iban.length < 5) return 'Too short';
  const country = iban.slice(0, 2);
  if (!/^[A-Z]{2}$/.test(country)) return 'Must start with a country code';
  if (!/^\d{2}$/.test(iban.slice(2, 4))) return 'Must have check digits after the country code';
  if (!/^[A-Z0-9]+$/.test(iban.slice(4))) return 'Invalid character';
  const expected = lengths[country];
  if (expected === undefined) return `Unsupported country code ${country}`;
  if (iban.length !== expected) return `Length ${iban.length} is invalid for ${country}, expected ${expected}`;
  if (mod97(iban) !== 1) return 'Invalid checksum';
  return null;
}

export function isValidIban(value: string): boolean {
  return ibanProblem(normalizeIban(value)) === null;
}

/** Normalize and validate; throws InvalidIbanError. */
export function parseIban(value: string): string {
  const iban = normalizeIban(value);
  const problem = ibanProblem(iban);
  if (problem) throw new InvalidIbanError(value, problem);
  return iban;
}

/** Groups of four for display: `DE89 3704 0044 0532 0130 00`. */
export function formatIban(iban: string): string {
  return normalizeIban(iban).replace(/(.{4})(?=.)/g, '$1 ');
}
