import { assertValidated, formatCents } from '@clubledger/shared';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { changeMembership as changeAccountMembership, membershipState } from '../helpers/ledger';
import type { MembershipState } from '../helpers/ledger';
import { revokeActiveMandate } from '../helpers/mandates';
import { applyTransition, lockAccounts, transitionEvents } from '../internal-api';
import { changeMembershipSchema } from '../validation';
import type { ChangeMembershipInput } from '../validation';

export interface ChangeMembershipResult {
  personaId: string;
  previousState: MembershipState;
  state: MembershipState;
  balance: string;
  revokedMandateId: string | null;
}

/** Grant or revoke membership by hand. Losing membership ends direct debit. */
export async function changeMembership(
  ctx: RequestContext,
  input: ChangeMembershipInput,
): Promise<ChangeMembershipResult> {
  requirePermission(ctx, PERMISSIONS.FINANCE_MANAGE);
  const parsed = changeMembershipSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  const result = await publishWithOutbox(ctx, async (tx) => {
    const accounts = await lockAccounts(tx, [data.personaId]);
    const before = accounts.get(data.personaId);
    if (!before) throw new Error(`Persona ${data.personaId} was not locked`);

    const transition = changeAccountMembership(before, {
      isMember: data.isMember,
      trial: data.trial,
      changeNote: data.note,
    });
    const applied = await applyTransition(tx, ctx, before, transition);
    const revokedMandateId =
      before.isMember && !applied.after.isMember
        ? await revokeActiveMandate(tx, ctx, data.personaId, data.note ?? null)
        : null;

    return {
      result: {
        personaId: data.personaId,
        previousState: membershipState(before),
        state: membershipState(applied.after),
        balance: formatCents(applied.after.balanceCents),
        revokedMandateId,
      },
      events: transitionEvents(ctx, applied),
    };
  });

  logger.info('membership changed', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    personaId: data.personaId,
    operation: 'changeMembership',
    previousState: result.previousState,
    state: result.state,
  });
  return result;
}
