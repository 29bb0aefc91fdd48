import { assertValidated } from '@clubledger/shared';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { loadEventFeeScope } from '../helpers/load-event';
import { recomputeAmountsOwed } from '../helpers/recompute';
import type { AmountOwedChange } from '../helpers/recompute';
import { recomputeFeesSchema } from '../validation';
import type { RecomputeFeesInput } from '../validation';

export interface RecomputeResult {
  checked: number;
  changes: AmountOwedChange[];
}

/**
 * Bring stored `amount_owed` values in line with the current fee
 * definitions. Called after registration attributes (parts, fields,
 * membership) change. Locked events are recomputed as well: their fees are
 * frozen, their registrations are not.
 */
export async function recomputeRegistrationFees(
  ctx: RequestContext,
  input: RecomputeFeesInput,
): Promise<RecomputeResult> {
  requirePermission(ctx, PERMISSIONS.FEES_MANAGE);
  const parsed = recomputeFeesSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  const result = await publishWithOutbox(ctx, async (tx) => {
    const scope = await loadEventFeeScope(tx, data.eventId);
    const recomputed = await recomputeAmountsOwed(tx, ctx, scope, data.registrationIds);
    return {
      result: { checked: recomputed.checked, changes: recomputed.changes },
      events: recomputed.events,
    };
  });

  logger.info('amounts owed recomputed', {
    requestId: ctx.requestId,
    operation: 'recomputeRegistrationFees',
    eventId: data.eventId,
    checked: result.checked,
    changed: result.changes.length,
  });
  return result;
}
