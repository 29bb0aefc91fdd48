import { z } from 'zod';
import { amountSchema, idSchema, isoDateSchema } from '@clubledger/shared';

export const TRANSACTION_STATUSES = ['open', 'skipped', 'success', 'failure', 'cancelled', 'rollback'] as const;
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];

export const SEQUENCE_TYPES = ['FRST', 'RCUR'] as const;
export type SequenceType = (typeof SEQUENCE_TYPES)[number];

export const FINALIZE_OUTCOMES = ['success', 'failure', 'cancelled'] as const;
export type FinalizeOutcome = (typeof FINALIZE_OUTCOMES)[number];

// ── Mandates ─────────────────────────────────────────────────────
export const createMandateSchema = z.object({
  personaId: idSchema,
  iban: z.string().min(1).max(50),
  /** Defaults to the configured standard donation. */
  donation: amountSchema.optional(),
  accountOwner: z.string().trim().max(70).nullish(),
  accountAddress: z.string().trim().max(500).nullish(),
  grantedAt: isoDateSchema.optional(),
  notes: z.string().max(2000).nullish(),
});

export type CreateMandateInput = z.input<typeof createMandateSchema>;

export const updateMandateSchema = z.object({
  mandateId: idSchema,
  iban: z.string().min(1).max(50).optional(),
  donation: amountSchema.optional(),
  accountOwner: z.string().trim().max(70).nullish(),
  accountAddress: z.string().trim().max(500).nullish(),
  notes: z.string().max(2000).nullish(),
});

export type UpdateMandateInput = z.input<typeof updateMandateSchema>;

export const revokeMandateSchema = z.object({
  mandateId: idSchema,
  note: z.string().max(500).nullish(),
});

export type RevokeMandateInput = z.input<typeof revokeMandateSchema>;

export const deleteMandateSchema = z.object({
  mandateId: idSchema,
  /** Also delete the mandate's finalized transactions once the retention period has passed. */
  cascade: z.boolean().optional(),
});

export type DeleteMandateInput = z.input<typeof deleteMandateSchema>;

export const listMandatesSchema = z.object({
  personaId: idSchema.optional(),
  active: z.boolean().optional(),
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export type ListMandatesInput = z.input<typeof listMandatesSchema>;

// ── Transactions ─────────────────────────────────────────────────
export const generateTransactionsSchema = z.object({
  /** Restrict generation to these mandates; all active mandates otherwise. */
  mandateIds: z.array(idSchema).min(1).max(5000).optional(),
});

export type GenerateTransactionsInput = z.input<typeof generateTransactionsSchema>;

export const finalizeTransactionsSchema = z.object({
  items: z
    .array(
      z.object({
        transactionId: idSchema,
        outcome: z.enum(FINALIZE_OUTCOMES),
      }),
    )
    .min(1)
    .max(5000),
});

export type FinalizeTransactionsInput = z.input<typeof finalizeTransactionsSchema>;

export const skipTransactionSchema = z.object({
  mandateId: idSchema,
});

export type SkipTransactionInput = z.input<typeof skipTransactionSchema>;

export const rollbackTransactionSchema = z.object({
  transactionId: idSchema,
});

export type RollbackTransactionInput = z.input<typeof rollbackTransactionSchema>;

export const downloadSepaPainSchema = z.object({
  mandateId: idSchema.optional(),
});

export type DownloadSepaPainInput = z.input<typeof downloadSepaPainSchema>;

export const listTransactionsSchema = z.object({
  status: z.enum(TRANSACTION_STATUSES).optional(),
  mandateId: idSchema.optional(),
  periodId: z.coerce.number().int().positive().optional(),
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export type ListTransactionsInput = z.input<typeof listTransactionsSchema>;
