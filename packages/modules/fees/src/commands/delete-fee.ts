import { eq } from 'drizzle-orm';
import { eventFees } from '@clubledger/db';
import { assertValidated } from '@clubledger/shared';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { FeeLockedError } from '../errors';
import { FEE_EVENTS } from '../events/types';
import { loadEventFeeScope, loadFeeForUpdate } from '../helpers/load-event';
import { recomputeAmountsOwed } from '../helpers/recompute';
import { deleteFeeSchema } from '../validation';
import type { DeleteFeeInput } from '../validation';
import type { FeeMutationResult } from './create-fee';

export async function deleteFee(ctx: RequestContext, input: DeleteFeeInput): Promise<FeeMutationResult> {
  requirePermission(ctx, PERMISSIONS.FEES_MANAGE);
  const parsed = deleteFeeSchema.safeParse(input);
  assertValidated(parsed);
  const { feeId } = parsed.data;

  const result = await publishWithOutbox(ctx, async (tx) => {
    const { eventId, fee } = await loadFeeForUpdate(tx, feeId);
    const scope = await loadEventFeeScope(tx, eventId);
    if (scope.isLocked || scope.isArchived) throw new FeeLockedError(eventId);

    await tx.delete(eventFees).where(eq(eventFees.id, feeId));

    const recomputed = await recomputeAmountsOwed(tx, ctx, {
      ...scope,
      fees: scope.fees.filter((f) => f.id !== feeId),
    });

    const event = buildEventFromContext(ctx, FEE_EVENTS.FEE_DELETED, {
      feeId,
      eventId,
      kind: fee.kind,
      amount: fee.amount,
      condition: fee.condition,
    });

    return {
      result: { feeId, condition: fee.condition, amountOwedChanges: recomputed.changes },
      events: [event, ...recomputed.events],
    };
  });

  logger.info('fee deleted', {
    requestId: ctx.requestId,
    operation: 'deleteFee',
    feeId,
    recomputed: result.amountOwedChanges.length,
  });
  return result;
}
