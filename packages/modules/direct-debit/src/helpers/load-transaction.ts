import { z } from 'zod';
import { sql } from 'drizzle-orm';
import { rowsOf } from '@clubledger/db';
import type { Transaction } from '@clubledger/db';
import { NotFoundError, isoDateOf, normalizeAmount } from '@clubledger/shared';
import { SEQUENCE_TYPES, TRANSACTION_STATUSES } from '../validation';
import type { SequenceType, TransactionStatus } from '../validation';

const statusSchema = z.enum(TRANSACTION_STATUSES);
const sequenceTypeSchema = z.enum(SEQUENCE_TYPES);

export interface DebitTransaction {
  id: string;
  mandateId: string;
  personaId: string;
  periodId: number;
  status: TransactionStatus;
  sequenceType: SequenceType;
  amount: string;
  tally: string | null;
  issuedAt: string;
  paymentDate: string | null;
  processedAt: string | null;
  mandateRevoked: boolean;
}

function timestamp(value: unknown): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

export function transactionFromRow(r: Record<string, unknown>): DebitTransaction {
  return {
    id: String(r.id),
    mandateId: String(r.mandate_id),
    personaId: String(r.persona_id),
    periodId: Number(r.period_id),
    status: statusSchema.parse(r.status),
    sequenceType: sequenceTypeSchema.parse(r.sequence_type),
    amount: normalizeAmount(String(r.amount)),
    tally: r.tally === null || r.tally === undefined ? null : normalizeAmount(String(r.tally)),
    issuedAt: timestamp(r.issued_at),
    paymentDate: isoDateOf(r.payment_date),
    processedAt: r.processed_at ? timestamp(r.processed_at) : null,
    mandateRevoked: Boolean(r.revoked_at),
  };
}

/** Lock transaction rows, and their mandates, in transaction id order. */
export async function lockTransactions(tx: Transaction, transactionIds: string[]): Promise<Map<string, DebitTransaction>> {
  const ids = [...new Set(transactionIds)].sort();
  const transactions = new Map<string, DebitTransaction>();
  if (ids.length === 0) return transactions;

  const rows = await tx.execute(sql`
    SELECT
      t.id, t.mandate_id, m.persona_id, t.period_id, t.status, t.sequence_type,
      t.amount, t.tally, t.issued_at, t.payment_date, t.processed_at, m.revoked_at
    FROM dd_transactions t
    JOIN dd_mandates m ON m.id = t.mandate_id
    WHERE t.id IN (${sql.join(
      ids.map((id) => sql`${id}`),
      sql`, `,
    )})
    ORDER BY t.id
    FOR UPDATE OF t, m
  `);
  for (const row of rowsOf(rows)) {
    const transaction = transactionFromRow(row);
    transactions.set(transaction.id, transaction);
  }
  return transactions;
}

export async function lockTransaction(tx: Transaction, transactionId: string): Promise<DebitTransaction> {
  const transaction = (await lockTransactions(tx, [transactionId])).get(transactionId);
  if (!transaction) throw new NotFoundError('Transaction', transactionId);
  return transaction;
}
