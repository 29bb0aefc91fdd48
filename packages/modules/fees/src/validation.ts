import { z } from 'zod';
import { idSchema, isoDateSchema, signedAmountSchema } from '@clubledger/shared';

// ── Fee Kinds ────────────────────────────────────────────────────
export const FEE_KINDS = [
  'regular',
  'reduced',
  'surcharge',
  'discount',
  'donation',
  'storno',
  'external',
] as const;
export type FeeKind = (typeof FEE_KINDS)[number];

// ── Registration Part Statuses ───────────────────────────────────
export const PART_STATUSES = [
  'not_applied',
  'applied',
  'participant',
  'waitlist',
  'guest',
  'cancelled',
  'rejected',
] as const;
export type PartStatus = (typeof PART_STATUSES)[number];

/** Statuses that make a part count towards the participation fee. */
export const PAYING_STATUSES: readonly PartStatus[] = ['applied', 'participant', 'waitlist'];

// ── Field Kinds ──────────────────────────────────────────────────
export const FIELD_KINDS = ['bool', 'int', 'float', 'str', 'date', 'datetime'] as const;
export type FieldKind = (typeof FIELD_KINDS)[number];

// ── Fee Definition Schemas ───────────────────────────────────────
const validityRefinement = (v: { validFrom?: string | null; validUntil?: string | null }) =>
  !v.validFrom || !v.validUntil || v.validFrom <= v.validUntil;

export const createFeeSchema = z
  .object({
    eventId: idSchema,
    title: z.string().trim().min(1).max(200),
    kind: z.enum(FEE_KINDS),
    amount: signedAmountSchema,
    condition: z.string().max(5000).nullish(),
    validFrom: isoDateSchema.nullish(),
    validUntil: isoDateSchema.nullish(),
    notes: z.string().max(2000).nullish(),
  })
  .refine(validityRefinement, { message: 'validFrom must not be after validUntil', path: ['validUntil'] });

export type CreateFeeInput = z.input<typeof createFeeSchema>;

export const updateFeeSchema = z
  .object({
    feeId: idSchema,
    title: z.string().trim().min(1).max(200).optional(),
    kind: z.enum(FEE_KINDS).optional(),
    amount: signedAmountSchema.optional(),
    condition: z.string().max(5000).nullish(),
    validFrom: isoDateSchema.nullish(),
    validUntil: isoDateSchema.nullish(),
    notes: z.string().max(2000).nullish(),
  })
  .refine(validityRefinement, { message: 'validFrom must not be after validUntil', path: ['validUntil'] });

export type UpdateFeeInput = z.input<typeof updateFeeSchema>;

export const deleteFeeSchema = z.object({
  feeId: idSchema,
});

export type DeleteFeeInput = z.input<typeof deleteFeeSchema>;

// ── Recompute Schema ─────────────────────────────────────────────
export const recomputeFeesSchema = z.object({
  eventId: idSchema,
  registrationIds: z.array(idSchema).min(1).optional(),
});

export type RecomputeFeesInput = z.input<typeof recomputeFeesSchema>;

// ── Registration Payment Schema ──────────────────────────────────
export const bookPaymentsSchema = z.object({
  eventId: idSchema,
  payments: z
    .array(
      z.object({
        registrationId: idSchema,
        amount: signedAmountSchema,
        date: isoDateSchema,
      }),
    )
    .min(1)
    .max(1000),
});

export type BookPaymentsInput = z.input<typeof bookPaymentsSchema>;

// ── Precompute (dry-run) Schema ──────────────────────────────────
export const precomputeFeeSchema = z.object({
  eventId: idSchema,
  isMember: z.boolean(),
  isOrga: z.boolean().default(false),
  /** Part id → status for the hypothetical registration. */
  parts: z.record(z.enum(PART_STATUSES)).default({}),
  fields: z.record(z.unknown()).default({}),
  asOf: isoDateSchema.optional(),
});

export type PrecomputeFeeInput = z.input<typeof precomputeFeeSchema>;

// ── Condition Check Schema ───────────────────────────────────────
export const checkConditionSchema = z.object({
  eventId: idSchema,
  condition: z.string().max(5000).nullish(),
});

export type CheckConditionInput = z.input<typeof checkConditionSchema>;
