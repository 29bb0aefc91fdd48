import { eq } from 'drizzle-orm';
import { differenceInCalendarDays } from 'date-fns';
import { ddMandates, ddTransactions } from '@clubledger/db';
import { assertValidated } from '@clubledger/shared';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { getLedgerApi } from '@clubledger/core/helpers/ledger-api';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { MandateDeletionBlockedError } from '../errors';
import { DD_EVENTS } from '../events/types';
import type { MandateDeletedPayload } from '../events/types';
import { loadHistories, lockMandate } from '../helpers/load-mandate';
import type { MandateState, TransactionHistoryItem } from '../helpers/open-for-debit';
import { deleteMandateSchema } from '../validation';
import type { DeleteMandateInput } from '../validation';

/** Revoked mandates are retained for 18 months of 30 days. */
export const MANDATE_RETENTION_DAYS = 18 * 30;

export type DeletionBlocker = 'revoked_at' | 'transactions' | 'open_transactions';

/**
 * Reasons a mandate must be kept. With `cascade`, finalized transactions no
 * longer block once the retention period has passed; open ones always do.
 */
export function mandateDeletionBlockers(
  mandate: MandateState,
  history: TransactionHistoryItem[],
  now: Date,
  options: { cascade?: boolean } = {},
): DeletionBlocker[] {
  const blockers: DeletionBlocker[] = [];
  const retained = !mandate.revokedAt || differenceInCalendarDays(now, mandate.revokedAt) < MANDATE_RETENTION_DAYS;
  if (retained) blockers.push('revoked_at');
  if (history.length > 0 && (retained || !options.cascade)) blockers.push('transactions');
  if (history.some((t) => t.status === 'open')) blockers.push('open_transactions');
  return blockers;
}

export interface DeleteMandateResult {
  mandateId: string;
  personaId: string;
  deletedTransactions: number;
}

export async function deleteMandate(ctx: RequestContext, input: DeleteMandateInput): Promise<DeleteMandateResult> {
  requirePermission(ctx, PERMISSIONS.DIRECT_DEBIT_MANAGE);
  const parsed = deleteMandateSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  const result = await publishWithOutbox(ctx, async (tx) => {
    const mandate = await lockMandate(tx, data.mandateId);
    const history = (await loadHistories(tx, [mandate.id])).get(mandate.id) ?? [];
    const blockers = mandateDeletionBlockers(mandate, history, new Date(), { cascade: data.cascade });
    if (blockers.length > 0) throw new MandateDeletionBlockedError(mandate.id, blockers);

    if (history.length > 0) await tx.delete(ddTransactions).where(eq(ddTransactions.mandateId, mandate.id));
    await tx.delete(ddMandates).where(eq(ddMandates.id, mandate.id));
    await getLedgerApi().note(tx, ctx, {
      personaId: mandate.personaId,
      code: 'lastschrift_deleted',
      changeNote: mandate.mandateReference,
    });

    return {
      result: { mandateId: mandate.id, personaId: mandate.personaId, deletedTransactions: history.length },
      events: [
        buildEventFromContext(ctx, DD_EVENTS.MANDATE_DELETED, {
          mandateId: mandate.id,
          personaId: mandate.personaId,
          deletedTransactions: history.length,
        } satisfies MandateDeletedPayload),
      ],
    };
  });

  logger.info('mandate deleted', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    personaId: result.personaId,
    operation: 'deleteMandate',
    mandateId: result.mandateId,
    deletedTransactions: result.deletedTransactions,
  });
  return result;
}
