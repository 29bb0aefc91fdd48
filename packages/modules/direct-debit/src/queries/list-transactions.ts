import { sql } from 'drizzle-orm';
import { rowsOf, withTransaction } from '@clubledger/db';
import { assertValidated } from '@clubledger/shared';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';
import { transactionFromRow } from '../helpers/load-transaction';
import type { DebitTransaction } from '../helpers/load-transaction';
import { listTransactionsSchema } from '../validation';
import type { ListTransactionsInput } from '../validation';

export interface ListTransactionsResult {
  items: DebitTransaction[];
  cursor: string | null;
  hasMore: boolean;
}

export async function listTransactions(
  ctx: RequestContext,
  input: ListTransactionsInput = {},
): Promise<ListTransactionsResult> {
  requirePermission(ctx, PERMISSIONS.FINANCE_VIEW);
  const parsed = listTransactionsSchema.safeParse(input);
  assertValidated(parsed);
  const filters = parsed.data;
  const limit = filters.limit;

  return withTransaction(async (tx) => {
    const conditions = [sql`TRUE`];
    if (filters.status) conditions.push(sql`t.status = ${filters.status}`);
    if (filters.mandateId) conditions.push(sql`t.mandate_id = ${filters.mandateId}`);
    if (filters.periodId) conditions.push(sql`t.period_id = ${filters.periodId}`);
    if (filters.cursor) conditions.push(sql`t.id < ${filters.cursor}`);

    const rows = await tx.execute(sql`
      SELECT
        t.id, t.mandate_id, m.persona_id, t.period_id, t.status, t.sequence_type,
        t.amount, t.tally, t.issued_at, t.payment_date, t.processed_at, m.revoked_at
      FROM dd_transactions t
      JOIN dd_mandates m ON m.id = t.mandate_id
      WHERE ${sql.join(conditions, sql` AND `)}
      ORDER BY t.id DESC
      LIMIT ${limit + 1}
    `);

    const arr = rowsOf(rows);
    const hasMore = arr.length > limit;
    const items = hasMore ? arr.slice(0, limit) : arr;
    const last = items[items.length - 1];

    return {
      items: items.map(transactionFromRow),
      cursor: hasMore && last ? String(last.id) : null,
      hasMore,
    };
  });
}
