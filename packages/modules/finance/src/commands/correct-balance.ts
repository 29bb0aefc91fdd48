import { assertValidated, formatCents, parseCents } from '@clubledger/shared';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { correctBalance as correctAccountBalance } from '../helpers/ledger';
import { applyTransition, lockAccounts, transitionEvents } from '../internal-api';
import { correctBalanceSchema } from '../validation';
import type { CorrectBalanceInput } from '../validation';

export interface CorrectBalanceResult {
  personaId: string;
  previousBalance: string;
  balance: string;
  /** False when the balance already had the requested value. */
  changed: boolean;
}

export async function correctBalance(ctx: RequestContext, input: CorrectBalanceInput): Promise<CorrectBalanceResult> {
  requirePermission(ctx, PERMISSIONS.FINANCE_MANAGE);
  const parsed = correctBalanceSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  const result = await publishWithOutbox(ctx, async (tx) => {
    const accounts = await lockAccounts(tx, [data.personaId]);
    const before = accounts.get(data.personaId);
    if (!before) throw new Error(`Persona ${data.personaId} was not locked`);

    const transition = correctAccountBalance(before, parseCents(data.balance), data.note);
    const applied = await applyTransition(tx, ctx, before, transition);
    return {
      result: {
        personaId: data.personaId,
        previousBalance: formatCents(before.balanceCents),
        balance: formatCents(applied.after.balanceCents),
        changed: applied.entries.length > 0,
      },
      events: transitionEvents(ctx, applied),
    };
  });

  logger.info('balance corrected', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    personaId: data.personaId,
    operation: 'correctBalance',
    changed: result.changed,
  });
  return result;
}
