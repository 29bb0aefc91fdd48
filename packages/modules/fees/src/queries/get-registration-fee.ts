import { withTransaction } from '@clubledger/db';
import { NotFoundError, formatCents, parseCents } from '@clubledger/shared';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';
import { computeRegistrationFee } from '../helpers/compute-fees';
import type { RegistrationFee } from '../helpers/compute-fees';
import { loadEventFeeScope, loadRegistrations } from '../helpers/load-event';

export interface RegistrationFeeDetail extends RegistrationFee {
  storedAmountOwed: string;
  amountPaid: string;
  /** `amountOwed − amountPaid`; negative when over-paid. */
  outstanding: string;
  /** The stored value differs from a fresh computation. */
  stale: boolean;
  appliedFees: Array<{ feeId: string; title: string; kind: string; amount: string }>;
}

export async function getRegistrationFee(
  ctx: RequestContext,
  input: { eventId: string; registrationId: string },
): Promise<RegistrationFeeDetail> {
  requirePermission(ctx, PERMISSIONS.FEES_VIEW);

  return withTransaction(async (tx) => {
    const scope = await loadEventFeeScope(tx, input.eventId);
    const [registration] = await loadRegistrations(tx, input.eventId, {
      registrationIds: [input.registrationId],
    });
    if (!registration) throw new NotFoundError('Registration', input.registrationId);

    const { computation, ...fee } = computeRegistrationFee(registration, scope.parts, scope.fees);
    const byId = new Map(scope.fees.map((f) => [f.id, f]));

    return {
      ...fee,
      storedAmountOwed: registration.amountOwed,
      amountPaid: registration.amountPaid,
      outstanding: formatCents(computation.totalCents - parseCents(registration.amountPaid)),
      stale: registration.amountOwed !== fee.amountOwed,
      appliedFees: computation.activeFeeIds.map((id) => {
        const def = byId.get(id);
        return {
          feeId: id,
          title: def?.title ?? '',
          kind: def?.kind ?? 'regular',
          amount: formatCents(computation.applied[id] ?? 0),
        };
      }),
    };
  });
}
