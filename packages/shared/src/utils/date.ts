/** Calendar date (`YYYY-MM-DD`) of an instant, read in UTC. */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Parse a `YYYY-MM-DD` string as midnight UTC. */
export function parseIsoDate(value: string): Date {
  const date = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Not an ISO date: "${value}"`);
  }
  return date;
}

/**
 * `YYYY-MM-DD` of a value read from the database: a Date, or a date or
 * timestamp string as the driver returns them.
 */
export function isoDateOf(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return toIsoDate(value);
  const text = String(value);
  return /^\d{4}-\d{2}-\d{2}/.test(text) ? text.slice(0, 10) : null;
}
