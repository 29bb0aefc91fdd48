// Amounts travel as decimal strings ("12.50") at the database and API
// boundary and as integer cents everywhere arithmetic happens.

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d*))?$/;

/**
 * Parse a decimal amount into integer cents, rounding half-up (away from
 * zero) at the cent.
 */
function parseCents(value: string | number): number {
  const text = typeof value === 'number' ? value.toFixed(6) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new RangeError(`Not a decimal amount: "${String(value)}"`);
  }
  const [, sign, whole, fraction = ''] = match;
  const digits = fraction.padEnd(3, '0');
  let cents = Number(whole) * 100 + Number(digits.slice(0, 2));
  if (Number(digits[2]) >= 5) cents += 1;
  return sign === '-' && cents !== 0 ? -cents : cents;
}

function formatCents(cents: number): string {
  if (!Number.isSafeInteger(cents)) {
    throw new RangeError(`Not an integer cent amount: ${cents}`);
  }
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const rest = String(abs % 100).padStart(2, '0');
  return `${cents < 0 ? '-' : ''}${whole}.${rest}`;
}

function sumCents(values: Iterable<number>): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/** Normalize any decimal input to the canonical 2-digit string. */
function normalizeAmount(value: string | number): string {
  return formatCents(parseCents(value));
}

function formatEuro(cents: number): string {
  return `${formatCents(cents)} EUR`;
}

export { parseCents, formatCents, sumCents, normalizeAmount, formatEuro };
