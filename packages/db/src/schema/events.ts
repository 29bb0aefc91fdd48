import {
  pgTable,
  text,
  boolean,
  timestamp,
  date,
  numeric,
  jsonb,
  index,
  uniqueIndex,
  primaryKey,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@clubledger/shared';
import { personas } from './core';

// ── events ─────────────────────────────────────────────────────
export const events = pgTable('events', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  title: text('title').notNull(),
  isLocked: boolean('is_locked').notNull().default(false),
  isArchived: boolean('is_archived').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── event_parts ────────────────────────────────────────────────
export const eventParts = pgTable(
  'event_parts',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    eventId: text('event_id')
      .notNull()
      .references(() => events.id),
    shortname: text('shortname').notNull(),
    title: text('title').notNull(),
  },
  (table) => [uniqueIndex('uq_event_parts_event_shortname').on(table.eventId, table.shortname)],
);

// ── event_fields ───────────────────────────────────────────────
export const eventFields = pgTable(
  'event_fields',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    eventId: text('event_id')
      .notNull()
      .references(() => events.id),
    fieldName: text('field_name').notNull(),
    kind: text('kind').notNull(), // bool, int, float, str, date, datetime
    association: text('association').notNull().default('registration'), // registration, course, lodgement
  },
  (table) => [uniqueIndex('uq_event_fields_event_name').on(table.eventId, table.fieldName)],
);

// ── event_orgas ────────────────────────────────────────────────
export const eventOrgas = pgTable(
  'event_orgas',
  {
    eventId: text('event_id')
      .notNull()
      .references(() => events.id),
    personaId: text('persona_id')
      .notNull()
      .references(() => personas.id),
  },
  (table) => [primaryKey({ columns: [table.eventId, table.personaId] })],
);

// ── event_fees ─────────────────────────────────────────────────
export const eventFees = pgTable(
  'event_fees',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    eventId: text('event_id')
      .notNull()
      .references(() => events.id),
    title: text('title').notNull(),
    kind: text('kind').notNull(), // regular, reduced, surcharge, discount, donation, storno, external
    amount: numeric('amount', { precision: 8, scale: 2 }).notNull(),
    condition: text('condition'),
    conditionAst: jsonb('condition_ast').notNull(),
    validFrom: date('valid_from'),
    validUntil: date('valid_until'),
    notes: text('notes'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_event_fees_event').on(table.eventId)],
);

// ── registrations ──────────────────────────────────────────────
export const registrations = pgTable(
  'registrations',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    eventId: text('event_id')
      .notNull()
      .references(() => events.id),
    personaId: text('persona_id')
      .notNull()
      .references(() => personas.id),
    isMember: boolean('is_member').notNull(),
    fields: jsonb('fields').notNull().default({}),
    registeredAt: timestamp('registered_at', { withTimezone: true }).notNull().defaultNow(),
    amountOwed: numeric('amount_owed', { precision: 8, scale: 2 }).notNull().default('0'),
    amountPaid: numeric('amount_paid', { precision: 8, scale: 2 }).notNull().default('0'),
    paymentDate: date('payment_date'),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_registrations_event_persona').on(table.eventId, table.personaId),
    index('idx_registrations_event').on(table.eventId),
  ],
);

// ── registration_parts ─────────────────────────────────────────
export const registrationParts = pgTable(
  'registration_parts',
  {
    registrationId: text('registration_id')
      .notNull()
      .references(() => registrations.id),
    partId: text('part_id')
      .notNull()
      .references(() => eventParts.id),
    status: text('status').notNull(), // not_applied, applied, participant, waitlist, guest, cancelled, rejected
  },
  (table) => [primaryKey({ columns: [table.registrationId, table.partId] })],
);
