import { withTransaction } from '@clubledger/db';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';
import { computeFeeStats } from '../helpers/fee-stats';
import type { FeeStats } from '../helpers/fee-stats';
import { loadEventFeeScope, loadRegistrations } from '../helpers/load-event';

export async function getFeeStats(ctx: RequestContext, input: { eventId: string }): Promise<FeeStats> {
  requirePermission(ctx, PERMISSIONS.FEES_VIEW);

  return withTransaction(async (tx) => {
    const scope = await loadEventFeeScope(tx, input.eventId);
    const regs = await loadRegistrations(tx, input.eventId);
    return computeFeeStats(regs, scope.parts, scope.fees);
  });
}
