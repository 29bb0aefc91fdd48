import { sql } from 'drizzle-orm';
import { pgTable, text, integer, timestamp, date, numeric, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { generateUlid } from '@clubledger/shared';
import { personas } from './core';
import { orgPeriods } from './finance';

// ── dd_mandates ────────────────────────────────────────────────
export const ddMandates = pgTable(
  'dd_mandates',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    personaId: text('persona_id')
      .notNull()
      .references(() => personas.id),
    mandateReference: text('mandate_reference').notNull(),
    iban: text('iban').notNull(),
    accountOwner: text('account_owner'),
    accountAddress: text('account_address'),
    donation: numeric('donation', { precision: 8, scale: 2 }).notNull(),
    grantedAt: timestamp('granted_at', { withTimezone: true }).notNull().defaultNow(),
    revokedAt: timestamp('revoked_at', { withTimezone: true }),
    notes: text('notes'),
    submittedBy: text('submitted_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_dd_mandates_reference').on(table.mandateReference),
    uniqueIndex('uq_dd_mandates_active_persona')
      .on(table.personaId)
      .where(sql`revoked_at IS NULL`),
  ],
);

// ── dd_transactions ────────────────────────────────────────────
export const ddTransactions = pgTable(
  'dd_transactions',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    mandateId: text('mandate_id')
      .notNull()
      .references(() => ddMandates.id),
    periodId: integer('period_id')
      .notNull()
      .references(() => orgPeriods.id),
    status: text('status').notNull().default('open'), // open, skipped, success, failure, cancelled, rollback
    sequenceType: text('sequence_type').notNull(), // FRST, RCUR
    amount: numeric('amount', { precision: 8, scale: 2 }).notNull(),
    tally: numeric('tally', { precision: 8, scale: 2 }),
    issuedAt: timestamp('issued_at', { withTimezone: true }).notNull().defaultNow(),
    paymentDate: date('payment_date'),
    processedAt: timestamp('processed_at', { withTimezone: true }),
    submittedBy: text('submitted_by'),
  },
  (table) => [
    index('idx_dd_transactions_mandate').on(table.mandateId),
    index('idx_dd_transactions_status').on(table.status),
    uniqueIndex('uq_dd_transactions_open_mandate')
      .on(table.mandateId)
      .where(sql`status = 'open'`),
  ],
);
