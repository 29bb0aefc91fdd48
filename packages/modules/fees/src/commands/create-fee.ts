import { eventFees } from '@clubledger/db';
import { assertValidated, normalizeAmount } from '@clubledger/shared';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { compileCondition } from '../condition';
import { FeeLockedError } from '../errors';
import { FEE_EVENTS } from '../events/types';
import { loadEventFeeScope, loadFees } from '../helpers/load-event';
import { recomputeAmountsOwed } from '../helpers/recompute';
import type { AmountOwedChange } from '../helpers/recompute';
import { createFeeSchema } from '../validation';
import type { CreateFeeInput } from '../validation';

export interface FeeMutationResult {
  feeId: string;
  condition: string | null;
  amountOwedChanges: AmountOwedChange[];
}

export async function createFee(ctx: RequestContext, input: CreateFeeInput): Promise<FeeMutationResult> {
  requirePermission(ctx, PERMISSIONS.FEES_MANAGE);
  const parsed = createFeeSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  const result = await publishWithOutbox(ctx, async (tx) => {
    const scope = await loadEventFeeScope(tx, data.eventId);
    if (scope.isLocked || scope.isArchived) throw new FeeLockedError(data.eventId);

    const compiled = compileCondition(data.condition, {
      fieldNames: scope.fieldNames,
      partShortnames: scope.parts.map((p) => p.shortname),
    });
    const amount = normalizeAmount(data.amount);

    const [created] = await tx
      .insert(eventFees)
      .values({
        eventId: data.eventId,
        title: data.title,
        kind: data.kind,
        amount,
        condition: compiled.condition,
        conditionAst: compiled.ast,
        validFrom: data.validFrom ?? null,
        validUntil: data.validUntil ?? null,
        notes: data.notes ?? null,
      })
      .returning({ id: eventFees.id });
    if (!created) throw new Error('Fee insert returned no row');

    const fees = await loadFees(tx, data.eventId);
    const recomputed = await recomputeAmountsOwed(tx, ctx, { ...scope, fees });

    const event = buildEventFromContext(ctx, FEE_EVENTS.FEE_CREATED, {
      feeId: created.id,
      eventId: data.eventId,
      kind: data.kind,
      amount,
      condition: compiled.condition,
    });

    return {
      result: { feeId: created.id, condition: compiled.condition, amountOwedChanges: recomputed.changes },
      events: [event, ...recomputed.events],
    };
  });

  logger.info('fee created', {
    requestId: ctx.requestId,
    operation: 'createFee',
    feeId: result.feeId,
    recomputed: result.amountOwedChanges.length,
  });
  return result;
}
