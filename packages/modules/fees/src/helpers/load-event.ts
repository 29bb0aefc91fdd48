import { z } from 'zod';
import { sql } from 'drizzle-orm';
import { rowsOf } from '@clubledger/db';
import type { Transaction } from '@clubledger/db';
import { NotFoundError, isoDateOf, normalizeAmount } from '@clubledger/shared';
import { conditionNodeSchema } from '../condition';
import { StoredFeeDataError } from '../errors';
import { FEE_KINDS, PART_STATUSES } from '../validation';
import type { FeeDefinition } from './compute-fees';
import type { EventPartInfo } from './fee-context';
import type { RegistrationWithPayment } from './fee-stats';

export interface EventFeeScope {
  eventId: string;
  isLocked: boolean;
  isArchived: boolean;
  parts: EventPartInfo[];
  fieldNames: string[];
  fees: FeeDefinition[];
}

export interface StoredRegistration extends RegistrationWithPayment {
  amountOwed: string;
}

const feeKindSchema = z.enum(FEE_KINDS);
const partsSchema = z.record(z.enum(PART_STATUSES));
const fieldsSchema = z.record(z.unknown());

export function feeFromRow(r: Record<string, unknown>): FeeDefinition & { condition: string | null; notes: string | null } {
  const id = String(r.id);
  const stored = conditionNodeSchema.safeParse(r.condition_ast);
  if (!stored.success) throw new StoredFeeDataError(`Fee ${id} has no valid compiled condition`);
  return {
    id,
    title: String(r.title),
    kind: feeKindSchema.parse(r.kind),
    amount: String(r.amount),
    ast: stored.data,
    condition: r.condition ? String(r.condition) : null,
    notes: r.notes ? String(r.notes) : null,
    validFrom: isoDateOf(r.valid_from),
    validUntil: isoDateOf(r.valid_until),
  };
}

export async function loadFees(tx: Transaction, eventId: string) {
  const rows = await tx.execute(sql`
    SELECT id, title, kind, amount, condition, condition_ast, valid_from, valid_until, notes
    FROM event_fees
    WHERE event_id = ${eventId}
    ORDER BY id
  `);
  return rowsOf(rows).map(feeFromRow);
}

/** Event lock state, parts, registration fields and fees, read in that order. */
export async function loadEventFeeScope(tx: Transaction, eventId: string): Promise<EventFeeScope> {
  const eventRows = await tx.execute(sql`
    SELECT id, is_locked, is_archived FROM events WHERE id = ${eventId}
  `);
  const event = rowsOf(eventRows)[0];
  if (!event) throw new NotFoundError('Event', eventId);

  const partRows = await tx.execute(sql`
    SELECT id, shortname FROM event_parts WHERE event_id = ${eventId} ORDER BY shortname
  `);
  const fieldRows = await tx.execute(sql`
    SELECT field_name FROM event_fields
    WHERE event_id = ${eventId} AND association = 'registration'
    ORDER BY field_name
  `);
  const fees = await loadFees(tx, eventId);

  return {
    eventId,
    isLocked: Boolean(event.is_locked),
    isArchived: Boolean(event.is_archived),
    parts: rowsOf(partRows).map((r) => ({ id: String(r.id), shortname: String(r.shortname) })),
    fieldNames: rowsOf(fieldRows).map((r) => String(r.field_name)),
    fees,
  };
}

export function registrationFromRow(r: Record<string, unknown>): StoredRegistration {
  const id = String(r.id);
  const registeredOn = isoDateOf(r.registered_at);
  if (!registeredOn) throw new StoredFeeDataError(`Registration ${id} has no registration date`);
  const parts = partsSchema.safeParse(r.parts ?? {});
  const fields = fieldsSchema.safeParse(r.fields ?? {});
  return {
    id,
    personaId: String(r.persona_id),
    isMember: Boolean(r.is_member),
    isOrga: Boolean(r.is_orga),
    registeredOn,
    parts: parts.success ? parts.data : {},
    fields: fields.success ? fields.data : {},
    amountOwed: normalizeAmount(String(r.amount_owed)),
    amountPaid: normalizeAmount(String(r.amount_paid)),
  };
}

/**
 * Registrations of an event with their part statuses. `lock` takes row
 * locks so concurrent recomputations serialize.
 */
export async function loadRegistrations(
  tx: Transaction,
  eventId: string,
  options: { registrationIds?: string[]; lock?: boolean } = {},
): Promise<StoredRegistration[]> {
  const conditions = [sql`r.event_id = ${eventId}`];
  if (options.registrationIds && options.registrationIds.length > 0) {
    conditions.push(sql`r.id IN (${sql.join(options.registrationIds.map((id) => sql`${id}`), sql`, `)})`);
  }
  const rows = await tx.execute(sql`
    SELECT
      r.id, r.persona_id, r.is_member, r.fields, r.registered_at, r.amount_owed, r.amount_paid,
      EXISTS (
        SELECT 1 FROM event_orgas o WHERE o.event_id = r.event_id AND o.persona_id = r.persona_id
      ) AS is_orga,
      COALESCE(
        (SELECT jsonb_object_agg(rp.part_id, rp.status) FROM registration_parts rp WHERE rp.registration_id = r.id),
        '{}'::jsonb
      ) AS parts
    FROM registrations r
    WHERE ${sql.join(conditions, sql` AND `)}
    ORDER BY r.id
    ${options.lock ? sql`FOR UPDATE OF r` : sql``}
  `);
  return rowsOf(rows).map(registrationFromRow);
}

/** A single fee with its event id, row-locked for modification. */
export async function loadFeeForUpdate(tx: Transaction, feeId: string) {
  const rows = await tx.execute(sql`
    SELECT id, event_id, title, kind, amount, condition, condition_ast, valid_from, valid_until, notes
    FROM event_fees
    WHERE id = ${feeId}
    FOR UPDATE
  `);
  const row = rowsOf(rows)[0];
  if (!row) throw new NotFoundError('Fee', feeId);
  return { eventId: String(row.event_id), fee: feeFromRow(row) };
}
