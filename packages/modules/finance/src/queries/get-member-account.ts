import { sql } from 'drizzle-orm';
import { rowsOf, withTransaction } from '@clubledger/db';
import { NotFoundError, formatCents, parseCents } from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';
import { membershipState } from '../helpers/ledger';
import type { MembershipState } from '../helpers/ledger';

export interface MemberAccountView {
  personaId: string;
  displayName: string;
  balance: string;
  state: MembershipState;
  isMember: boolean;
  trialMember: boolean;
  isArchived: boolean;
  lapsedAt: string | null;
  activeMandateId: string | null;
  /** Full periods the current balance pays for. */
  paidPeriods: number;
}

export async function getMemberAccount(ctx: RequestContext, input: { personaId: string }): Promise<MemberAccountView> {
  requirePermission(ctx, PERMISSIONS.FINANCE_VIEW);
  const feeCents = getFinanceConfig().membershipFeeCents;

  return withTransaction(async (tx) => {
    const rows = await tx.execute(sql`
      SELECT
        p.id, p.given_names, p.family_name, p.balance, p.is_member, p.trial_member,
        p.is_archived, p.lapsed_at, m.id AS mandate_id
      FROM personas p
      LEFT JOIN dd_mandates m ON m.persona_id = p.id AND m.revoked_at IS NULL
      WHERE p.id = ${input.personaId}
    `);
    const r = rowsOf(rows)[0];
    if (!r) throw new NotFoundError('Persona', input.personaId);

    const balanceCents = parseCents(String(r.balance));
    const lapsedAt = r.lapsed_at ? new Date(String(r.lapsed_at)) : null;
    const account = {
      personaId: String(r.id),
      balanceCents,
      isMember: Boolean(r.is_member),
      trialMember: Boolean(r.trial_member),
      isArchived: Boolean(r.is_archived),
      lapsedAt,
    };

    return {
      personaId: account.personaId,
      displayName: `${String(r.given_names)} ${String(r.family_name)}`,
      balance: formatCents(balanceCents),
      state: membershipState(account),
      isMember: account.isMember,
      trialMember: account.trialMember,
      isArchived: account.isArchived,
      lapsedAt: lapsedAt ? lapsedAt.toISOString() : null,
      activeMandateId: r.mandate_id ? String(r.mandate_id) : null,
      paidPeriods: feeCents > 0 ? Math.floor(balanceCents / feeCents) : 0,
    };
  });
}
