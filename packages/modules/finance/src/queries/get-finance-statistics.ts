import { sql } from 'drizzle-orm';
import { rowsOf, withTransaction } from '@clubledger/db';
import { formatCents, normalizeAmount } from '@clubledger/shared';
import { annualFeeCents, getFinanceConfig } from '@clubledger/core/config/finance-config';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';

export interface FinanceStatistics {
  totalMembers: number;
  trialMembers: number;
  /** Members whose balance does not cover a full year. */
  lowBalanceMembers: number;
  lowBalanceTotal: string;
  /** Low-balance members covered by an active mandate. */
  directDebitLowBalanceMembers: number;
  activeMandates: number;
  totalBalance: string;
  memberTotal: string;
  currentPeriodId: number | null;
}

/** Sums come back from postgres as decimal strings. */
function money(value: unknown): string {
  return normalizeAmount(value === null || value === undefined ? '0' : String(value));
}

export async function getFinanceStatistics(ctx: RequestContext): Promise<FinanceStatistics> {
  requirePermission(ctx, PERMISSIONS.FINANCE_VIEW);
  const threshold = formatCents(annualFeeCents(getFinanceConfig()));

  return withTransaction(async (tx) => {
    const rows = await tx.execute(sql`
      SELECT
        COUNT(*) FILTER (WHERE p.is_member)::int AS total_members,
        COUNT(*) FILTER (WHERE p.is_member AND p.trial_member)::int AS trial_members,
        COUNT(*) FILTER (WHERE p.is_member AND p.balance < ${threshold})::int AS low_balance_members,
        COALESCE(SUM(p.balance) FILTER (WHERE p.is_member AND p.balance < ${threshold}), 0) AS low_balance_total,
        COUNT(*) FILTER (WHERE p.is_member AND p.balance < ${threshold} AND m.id IS NOT NULL)::int AS dd_low_balance_members,
        COUNT(m.id)::int AS active_mandates,
        COALESCE(SUM(p.balance), 0) AS total_balance,
        COALESCE(SUM(p.balance) FILTER (WHERE p.is_member), 0) AS member_total,
        (SELECT MAX(id) FROM org_periods) AS current_period_id
      FROM personas p
      LEFT JOIN dd_mandates m ON m.persona_id = p.id AND m.revoked_at IS NULL
    `);
    const r = rowsOf(rows)[0] ?? {};

    return {
      totalMembers: Number(r.total_members ?? 0),
      trialMembers: Number(r.trial_members ?? 0),
      lowBalanceMembers: Number(r.low_balance_members ?? 0),
      lowBalanceTotal: money(r.low_balance_total),
      directDebitLowBalanceMembers: Number(r.dd_low_balance_members ?? 0),
      activeMandates: Number(r.active_mandates ?? 0),
      totalBalance: money(r.total_balance),
      memberTotal: money(r.member_total),
      currentPeriodId: r.current_period_id === null || r.current_period_id === undefined ? null : Number(r.current_period_id),
    };
  });
}
