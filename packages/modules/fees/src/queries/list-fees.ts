import { withTransaction } from '@clubledger/db';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';
import type { ConditionNode } from '../condition';
import type { FeeKind } from '../validation';
import { loadEventFeeScope, loadFees } from '../helpers/load-event';

export interface FeeListItem {
  id: string;
  title: string;
  kind: FeeKind;
  amount: string;
  condition: string | null;
  conditionAst: ConditionNode;
  validFrom: string | null;
  validUntil: string | null;
  notes: string | null;
}

export interface ListFeesResult {
  eventId: string;
  isLocked: boolean;
  items: FeeListItem[];
}

export async function listFees(ctx: RequestContext, input: { eventId: string }): Promise<ListFeesResult> {
  requirePermission(ctx, PERMISSIONS.FEES_VIEW);

  return withTransaction(async (tx) => {
    const scope = await loadEventFeeScope(tx, input.eventId);
    const fees = await loadFees(tx, input.eventId);
    return {
      eventId: input.eventId,
      isLocked: scope.isLocked || scope.isArchived,
      items: fees.map((f) => ({
        id: f.id,
        title: f.title,
        kind: f.kind,
        amount: f.amount,
        condition: f.condition,
        conditionAst: f.ast,
        validFrom: f.validFrom,
        validUntil: f.validUntil,
        notes: f.notes,
      })),
    };
  });
}
