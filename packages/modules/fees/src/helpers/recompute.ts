import { eq } from 'drizzle-orm';
import { registrations } from '@clubledger/db';
import type { Transaction } from '@clubledger/db';
import type { EventEnvelope } from '@clubledger/shared';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import type { RequestContext } from '@clubledger/core/auth/context';
import { FEE_EVENTS } from '../events/types';
import type { AmountOwedChangedPayload } from '../events/types';
import { computeRegistrationFee } from './compute-fees';
import { loadRegistrations } from './load-event';
import type { EventFeeScope } from './load-event';

export interface AmountOwedChange {
  registrationId: string;
  previousAmountOwed: string;
  amountOwed: string;
}

/**
 * Re-derive `amount_owed` for the event's registrations from `scope.fees`
 * and persist the ones that changed.
 */
export async function recomputeAmountsOwed(
  tx: Transaction,
  ctx: RequestContext,
  scope: EventFeeScope,
  registrationIds?: string[],
): Promise<{ changes: AmountOwedChange[]; checked: number; events: EventEnvelope[] }> {
  const regs = await loadRegistrations(tx, scope.eventId, { registrationIds, lock: true });
  const changes: AmountOwedChange[] = [];
  const events: EventEnvelope[] = [];

  for (const reg of regs) {
    const fee = computeRegistrationFee(reg, scope.parts, scope.fees);
    if (fee.amountOwed === reg.amountOwed) continue;

    await tx
      .update(registrations)
      .set({ amountOwed: fee.amountOwed, updatedAt: new Date() })
      .where(eq(registrations.id, reg.id));

    changes.push({ registrationId: reg.id, previousAmountOwed: reg.amountOwed, amountOwed: fee.amountOwed });
    const payload: AmountOwedChangedPayload = {
      registrationId: reg.id,
      eventId: scope.eventId,
      previousAmountOwed: reg.amountOwed,
      amountOwed: fee.amountOwed,
    };
    events.push(buildEventFromContext(ctx, FEE_EVENTS.AMOUNT_OWED_CHANGED, { ...payload }));
  }

  return { changes, checked: regs.length, events };
}
