import { pgTable, text, integer, smallint, serial, timestamp, date, numeric, index } from 'drizzle-orm/pg-core';
import { generateUlid } from '@clubledger/shared';
import { personas } from './core';

// ── finance_log ────────────────────────────────────────────────
// Append-only. Nothing in the application updates or deletes rows here.
export const financeLog = pgTable(
  'finance_log',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    ctime: timestamp('ctime', { withTimezone: true }).notNull().defaultNow(),
    code: smallint('code').notNull(),
    submittedBy: text('submitted_by'),
    personaId: text('persona_id').references(() => personas.id),
    delta: numeric('delta', { precision: 8, scale: 2 }),
    newBalance: numeric('new_balance', { precision: 8, scale: 2 }),
    transactionDate: date('transaction_date'),
    changeNote: text('change_note'),
    members: integer('members').notNull(),
    total: numeric('total', { precision: 12, scale: 2 }).notNull(),
    memberTotal: numeric('member_total', { precision: 12, scale: 2 }).notNull(),
  },
  (table) => [
    index('idx_finance_log_persona').on(table.personaId),
    index('idx_finance_log_code').on(table.code),
    index('idx_finance_log_ctime').on(table.ctime),
  ],
);

// ── org_periods ────────────────────────────────────────────────
export const orgPeriods = pgTable('org_periods', {
  id: serial('id').primaryKey(),
  billingDoneAt: timestamp('billing_done_at', { withTimezone: true }),
  billingCount: integer('billing_count').notNull().default(0),
  billingTotal: numeric('billing_total', { precision: 12, scale: 2 }).notNull().default('0'),
  trialEndedCount: integer('trial_ended_count').notNull().default(0),
  deferredCount: integer('deferred_count').notNull().default(0),
  lapsedCount: integer('lapsed_count').notNull().default(0),
  semesterDoneAt: timestamp('semester_done_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
