import { sql } from 'drizzle-orm';
import { rowsOf, withTransaction } from '@clubledger/db';
import { formatCents, parseCents } from '@clubledger/shared';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';

export interface ReconciliationMismatch {
  personaId: string;
  balance: string;
  loggedTotal: string;
  difference: string;
}

export interface LedgerReconciliation {
  checked: number;
  balanced: boolean;
  mismatches: ReconciliationMismatch[];
}

/** Compare stored balances with the sum of their logged deltas. */
export async function getLedgerReconciliation(
  ctx: RequestContext,
  input: { personaId?: string } = {},
): Promise<LedgerReconciliation> {
  requirePermission(ctx, PERMISSIONS.FINANCE_VIEW);

  return withTransaction(async (tx) => {
    const personaFilter = input.personaId ? sql`WHERE p.id = ${input.personaId}` : sql``;
    const rows = await tx.execute(sql`
      SELECT p.id, p.balance, COALESCE(SUM(f.delta), 0) AS logged_total
      FROM personas p
      LEFT JOIN finance_log f ON f.persona_id = p.id AND f.delta IS NOT NULL
      ${personaFilter}
      GROUP BY p.id, p.balance
      ORDER BY p.id
    `);

    const arr = rowsOf(rows);
    const mismatches: ReconciliationMismatch[] = [];
    for (const r of arr) {
      const balance = parseCents(String(r.balance));
      const logged = parseCents(String(r.logged_total));
      if (balance === logged) continue;
      mismatches.push({
        personaId: String(r.id),
        balance: formatCents(balance),
        loggedTotal: formatCents(logged),
        difference: formatCents(balance - logged),
      });
    }
    return { checked: arr.length, balanced: mismatches.length === 0, mismatches };
  });
}
