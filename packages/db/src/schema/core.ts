import { pgTable, text, boolean, timestamp, numeric, jsonb, index } from 'drizzle-orm/pg-core';
import { generateUlid } from '@clubledger/shared';

// ── personas ───────────────────────────────────────────────────
// Identity columns are owned by the persona subsystem; this core reads them
// and writes only the balance and membership flags.
export const personas = pgTable(
  'personas',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    givenNames: text('given_names').notNull(),
    familyName: text('family_name').notNull(),
    email: text('email'),
    balance: numeric('balance', { precision: 8, scale: 2 }).notNull().default('0'),
    isMember: boolean('is_member').notNull().default(false),
    trialMember: boolean('trial_member').notNull().default(false),
    isArchived: boolean('is_archived').notNull().default(false),
    lapsedAt: timestamp('lapsed_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_personas_is_member').on(table.isMember)],
);

// ── event_outbox ───────────────────────────────────────────────
export const eventOutbox = pgTable(
  'event_outbox',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    eventType: text('event_type').notNull(),
    eventId: text('event_id').notNull().unique(),
    idempotencyKey: text('idempotency_key').notNull(),
    payload: jsonb('payload').notNull(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).notNull().defaultNow(),
    publishedAt: timestamp('published_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_outbox_unpublished').on(table.publishedAt)],
);
