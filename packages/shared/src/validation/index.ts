import { z } from 'zod';
import { ValidationError } from '../errors';

export const idSchema = z.string().min(1);

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD');

/** Signed decimal with at most two fractional digits. */
export const signedAmountSchema = z
  .string()
  .regex(/^-?\d{1,8}(\.\d{1,2})?$/, 'Amount must be a decimal with at most 2 fractional digits');

/** Non-negative decimal with at most two fractional digits. */
export const amountSchema = z
  .string()
  .regex(/^\d{1,8}(\.\d{1,2})?$/, 'Amount must be a non-negative decimal with at most 2 fractional digits');

/**
 * Assert that a Zod safeParse result succeeded, throwing a ValidationError if not.
 * After calling this, `parsed.data` is type-safe.
 *
 * @example
 * ```ts
 * const parsed = schema.safeParse(body);
 * assertValidated(parsed);
 * // parsed.data is now typed
 * ```
 */
export function assertValidated<T>(
  parsed: z.SafeParseReturnType<unknown, T>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<T> {
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((i) => ({
        field: i.path.join('.'),
        message: i.message,
      })),
    );
  }
}
