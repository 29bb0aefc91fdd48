import { withTransaction } from '@clubledger/db';
import { assertValidated, toIsoDate } from '@clubledger/shared';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';
import { computeRegistrationFee } from '../helpers/compute-fees';
import type { RegistrationFee } from '../helpers/compute-fees';
import { loadEventFeeScope } from '../helpers/load-event';
import { precomputeFeeSchema } from '../validation';
import type { PrecomputeFeeInput } from '../validation';

/**
 * Fee a prospective registrant would owe, for the registration form.
 * Nothing is written.
 */
export async function precomputeFee(ctx: RequestContext, input: PrecomputeFeeInput): Promise<RegistrationFee> {
  requirePermission(ctx, PERMISSIONS.FEES_VIEW);
  const parsed = precomputeFeeSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  return withTransaction(async (tx) => {
    const scope = await loadEventFeeScope(tx, data.eventId);
    const { computation: _computation, ...fee } = computeRegistrationFee(
      {
        id: 'preview',
        personaId: ctx.actor?.id ?? 'anonymous',
        isMember: data.isMember,
        isOrga: data.isOrga,
        registeredOn: data.asOf ?? toIsoDate(new Date()),
        parts: data.parts,
        fields: data.fields,
      },
      scope.parts,
      scope.fees,
    );
    return fee;
  });
}
