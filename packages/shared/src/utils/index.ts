export { generateUlid, isValidUlid, randomAlphanumeric } from './ulid';
export { parseCents, formatCents, sumCents, normalizeAmount, formatEuro } from './money';
export { toIsoDate, parseIsoDate, isoDateOf } from './date';
export { toSepaText } from './sepa-text';
