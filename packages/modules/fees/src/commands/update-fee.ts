import { eq } from 'drizzle-orm';
import { eventFees } from '@clubledger/db';
import { ValidationError, assertValidated, normalizeAmount } from '@clubledger/shared';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { compileCondition } from '../condition';
import { FeeLockedError } from '../errors';
import { FEE_EVENTS } from '../events/types';
import { loadEventFeeScope, loadFeeForUpdate, loadFees } from '../helpers/load-event';
import { recomputeAmountsOwed } from '../helpers/recompute';
import { updateFeeSchema } from '../validation';
import type { UpdateFeeInput } from '../validation';
import type { FeeMutationResult } from './create-fee';

export async function updateFee(ctx: RequestContext, input: UpdateFeeInput): Promise<FeeMutationResult> {
  requirePermission(ctx, PERMISSIONS.FEES_MANAGE);
  const parsed = updateFeeSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  const result = await publishWithOutbox(ctx, async (tx) => {
    const { eventId, fee } = await loadFeeForUpdate(tx, data.feeId);
    const scope = await loadEventFeeScope(tx, eventId);
    if (scope.isLocked || scope.isArchived) throw new FeeLockedError(eventId);

    // `undefined` keeps the stored condition; `null` or blank clears it
    const compiled =
      data.condition === undefined
        ? { condition: fee.condition, ast: fee.ast }
        : compileCondition(data.condition, {
            fieldNames: scope.fieldNames,
            partShortnames: scope.parts.map((p) => p.shortname),
          });
    const amount = data.amount === undefined ? fee.amount : normalizeAmount(data.amount);
    const kind = data.kind ?? fee.kind;
    const validFrom = data.validFrom === undefined ? fee.validFrom : data.validFrom;
    const validUntil = data.validUntil === undefined ? fee.validUntil : data.validUntil;
    if (validFrom && validUntil && validFrom > validUntil) {
      throw new ValidationError('Validation failed', [
        { field: 'validUntil', message: 'validFrom must not be after validUntil' },
      ]);
    }

    await tx
      .update(eventFees)
      .set({
        title: data.title ?? fee.title,
        kind,
        amount,
        condition: compiled.condition,
        conditionAst: compiled.ast,
        validFrom,
        validUntil,
        notes: data.notes === undefined ? fee.notes : data.notes,
        updatedAt: new Date(),
      })
      .where(eq(eventFees.id, data.feeId));

    const fees = await loadFees(tx, eventId);
    const recomputed = await recomputeAmountsOwed(tx, ctx, { ...scope, fees });

    const event = buildEventFromContext(ctx, FEE_EVENTS.FEE_UPDATED, {
      feeId: data.feeId,
      eventId,
      kind,
      amount,
      condition: compiled.condition,
    });

    return {
      result: { feeId: data.feeId, condition: compiled.condition, amountOwedChanges: recomputed.changes },
      events: [event, ...recomputed.events],
    };
  });

  logger.info('fee updated', {
    requestId: ctx.requestId,
    operation: 'updateFee',
    feeId: result.feeId,
    recomputed: result.amountOwedChanges.length,
  });
  return result;
}
