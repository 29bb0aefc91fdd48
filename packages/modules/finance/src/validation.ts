import { z } from 'zod';
import { FINANCE_LOG_CODE_NAMES, amountSchema, idSchema, isoDateSchema, parseCents } from '@clubledger/shared';

// ── Money Transfers ──────────────────────────────────────────────
export const recordMoneyTransfersSchema = z.object({
  transfers: z
    .array(
      z.object({
        personaId: idSchema,
        amount: amountSchema.refine((v) => parseCents(v) > 0, 'Amount must be positive'),
        transactionDate: isoDateSchema,
        note: z.string().max(500).nullish(),
      }),
    )
    .min(1)
    .max(5000),
});

export type RecordMoneyTransfersInput = z.input<typeof recordMoneyTransfersSchema>;

// ── Balance Correction ───────────────────────────────────────────
export const correctBalanceSchema = z.object({
  personaId: idSchema,
  balance: amountSchema,
  note: z.string().trim().min(1).max(500),
});

export type CorrectBalanceInput = z.input<typeof correctBalanceSchema>;

// ── Membership ───────────────────────────────────────────────────
export const changeMembershipSchema = z.object({
  personaId: idSchema,
  isMember: z.boolean(),
  trial: z.boolean().optional(),
  note: z.string().max(500).nullish(),
});

export type ChangeMembershipInput = z.input<typeof changeMembershipSchema>;

export const archivePersonaSchema = z.object({
  personaId: idSchema,
  note: z.string().max(500).nullish(),
});

export type ArchivePersonaInput = z.input<typeof archivePersonaSchema>;

// ── Finance Log ──────────────────────────────────────────────────
export const listFinanceLogSchema = z.object({
  codes: z.array(z.enum(FINANCE_LOG_CODE_NAMES)).optional(),
  personaId: idSchema.optional(),
  /** Inclusive bounds on the entry's creation date. */
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional(),
  transactionFrom: isoDateSchema.optional(),
  transactionTo: isoDateSchema.optional(),
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export type ListFinanceLogInput = z.input<typeof listFinanceLogSchema>;
