import { z } from 'zod';
import { eq, sql } from 'drizzle-orm';
import { ddMandates, rowsOf } from '@clubledger/db';
import type { Transaction } from '@clubledger/db';
import { NotFoundError, normalizeAmount, parseCents } from '@clubledger/shared';
import { TRANSACTION_STATUSES } from '../validation';
import type { MandateState, TransactionHistoryItem } from './open-for-debit';

const statusSchema = z.enum(TRANSACTION_STATUSES);

export interface MandateRecord extends MandateState {
  personaId: string;
  mandateReference: string;
  iban: string;
  donation: string;
  accountOwner: string | null;
  accountAddress: string | null;
  notes: string | null;
  personaName: string;
}

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}

function optionalText(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

export function mandateFromRow(r: Record<string, unknown>): MandateRecord {
  const donation = normalizeAmount(String(r.donation));
  return {
    id: String(r.id),
    personaId: String(r.persona_id),
    mandateReference: String(r.mandate_reference),
    iban: String(r.iban),
    donation,
    donationCents: parseCents(donation),
    accountOwner: optionalText(r.account_owner),
    accountAddress: optionalText(r.account_address),
    grantedAt: toDate(r.granted_at),
    revokedAt: r.revoked_at ? toDate(r.revoked_at) : null,
    notes: optionalText(r.notes),
    personaName: `${String(r.given_names ?? '')} ${String(r.family_name ?? '')}`.trim(),
  };
}

export function historyFromRow(r: Record<string, unknown>): TransactionHistoryItem & { mandateId: string } {
  return {
    id: String(r.id),
    mandateId: String(r.mandate_id),
    status: statusSchema.parse(r.status),
    periodId: Number(r.period_id),
    issuedAt: toDate(r.issued_at),
  };
}

const MANDATE_COLUMNS = sql`
  m.id, m.persona_id, m.mandate_reference, m.iban, m.donation, m.account_owner,
  m.account_address, m.granted_at, m.revoked_at, m.notes, p.given_names, p.family_name
`;

/**
 * Lock mandate rows in id order. Returns the mandates found; callers decide
 * whether a missing id is an error or a report entry.
 */
export async function lockMandates(tx: Transaction, mandateIds: string[]): Promise<Map<string, MandateRecord>> {
  const ids = [...new Set(mandateIds)].sort();
  const mandates = new Map<string, MandateRecord>();
  if (ids.length === 0) return mandates;

  const rows = await tx.execute(sql`
    SELECT ${MANDATE_COLUMNS}
    FROM dd_mandates m
    JOIN personas p ON p.id = m.persona_id
    WHERE m.id IN (${sql.join(
      ids.map((id) => sql`${id}`),
      sql`, `,
    )})
    ORDER BY m.id
    FOR UPDATE OF m
  `);
  for (const row of rowsOf(rows)) {
    const mandate = mandateFromRow(row);
    mandates.set(mandate.id, mandate);
  }
  return mandates;
}

export async function lockMandate(tx: Transaction, mandateId: string): Promise<MandateRecord> {
  const mandate = (await lockMandates(tx, [mandateId])).get(mandateId);
  if (!mandate) throw new NotFoundError('Mandate', mandateId);
  return mandate;
}

/** Lock every active mandate, in id order. */
export async function lockActiveMandates(tx: Transaction): Promise<Map<string, MandateRecord>> {
  const rows = await tx.execute(sql`
    SELECT ${MANDATE_COLUMNS}
    FROM dd_mandates m
    JOIN personas p ON p.id = m.persona_id
    WHERE m.revoked_at IS NULL
    ORDER BY m.id
    FOR UPDATE OF m
  `);
  const mandates = new Map<string, MandateRecord>();
  for (const row of rowsOf(rows)) {
    const mandate = mandateFromRow(row);
    mandates.set(mandate.id, mandate);
  }
  return mandates;
}

/** Transactions per mandate, oldest first. */
export async function loadHistories(
  tx: Transaction,
  mandateIds: string[],
): Promise<Map<string, TransactionHistoryItem[]>> {
  const histories = new Map<string, TransactionHistoryItem[]>();
  for (const id of mandateIds) histories.set(id, []);
  if (mandateIds.length === 0) return histories;

  const rows = await tx.execute(sql`
    SELECT id, mandate_id, status, period_id, issued_at
    FROM dd_transactions
    WHERE mandate_id IN (${sql.join(
      mandateIds.map((id) => sql`${id}`),
      sql`, `,
    )})
    ORDER BY issued_at, id
  `);
  for (const row of rowsOf(rows)) {
    const { mandateId, ...item } = historyFromRow(row);
    histories.get(mandateId)?.push(item);
  }
  return histories;
}

export async function currentPeriodId(tx: Transaction): Promise<number> {
  const rows = await tx.execute(sql`SELECT id FROM org_periods ORDER BY id DESC LIMIT 1`);
  const row = rowsOf(rows)[0];
  if (!row) throw new Error('org_periods has no current period');
  return Number(row.id);
}

/** Stable bank-facing mandate reference. */
export function mandateReferenceFor(mandateId: string): string {
  return `CL-${mandateId}`;
}

/** Set `revokedAt` on a locked mandate. */
export async function markRevoked(tx: Transaction, mandateId: string, at: Date): Promise<void> {
  await tx.update(ddMandates).set({ revokedAt: at, updatedAt: at }).where(eq(ddMandates.id, mandateId));
}
