import { monotonicFactory } from 'ulid';

const CROCKFORD_BASE32 = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;
const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

const ulid = monotonicFactory();

export function generateUlid(): string {
  return ulid();
}

export function isValidUlid(value: string): boolean {
  if (typeof value !== 'string' || value.length !== 26) {
    return false;
  }
  return CROCKFORD_BASE32.test(value);
}

/** Random `[A-Za-z0-9]` suffix, used for bank message identifiers. */
export function randomAlphanumeric(length: number, random: () => number = Math.random): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += ALPHANUMERIC.charAt(Math.floor(random() * ALPHANUMERIC.length));
  }
  return out;
}
