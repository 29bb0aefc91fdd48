import { ddTransactions } from '@clubledger/db';
import { assertValidated, formatCents, generateUlid } from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { getLedgerApi } from '@clubledger/core/helpers/ledger-api';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { MandateRevokedError, OpenTransactionExistsError, SkipNotAllowedError } from '../errors';
import { DD_EVENTS } from '../events/types';
import type { TransactionSkippedPayload } from '../events/types';
import { currentPeriodId, loadHistories, lockMandate } from '../helpers/load-mandate';
import { maySkip, openTransactionOf, sequenceTypeFor } from '../helpers/open-for-debit';
import { skipTransactionSchema } from '../validation';
import type { SkipTransactionInput } from '../validation';

export interface SkipTransactionResult {
  transactionId: string;
  mandateId: string;
  personaId: string;
  periodId: number;
}

/** Record that a mandate is deliberately not collected this period. */
export async function skipTransaction(ctx: RequestContext, input: SkipTransactionInput): Promise<SkipTransactionResult> {
  requirePermission(ctx, PERMISSIONS.DIRECT_DEBIT_MANAGE);
  const parsed = skipTransactionSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;
  const config = getFinanceConfig();

  const result = await publishWithOutbox(ctx, async (tx) => {
    const mandate = await lockMandate(tx, data.mandateId);
    if (mandate.revokedAt) throw new MandateRevokedError(mandate.id);

    const history = (await loadHistories(tx, [mandate.id])).get(mandate.id) ?? [];
    if (openTransactionOf(history)) throw new OpenTransactionExistsError(mandate.id);

    const periodId = await currentPeriodId(tx);
    const now = new Date();
    if (!maySkip(mandate, history, { currentPeriodId: periodId, periodsPerYear: config.periodsPerYear }, now)) {
      throw new SkipNotAllowedError(mandate.id);
    }

    const transactionId = generateUlid();
    await tx.insert(ddTransactions).values({
      id: transactionId,
      mandateId: mandate.id,
      periodId,
      status: 'skipped',
      sequenceType: sequenceTypeFor(history),
      amount: formatCents(0),
      tally: formatCents(0),
      issuedAt: now,
      processedAt: now,
      submittedBy: ctx.actor?.id ?? null,
    });
    await getLedgerApi().note(tx, ctx, {
      personaId: mandate.personaId,
      code: 'lastschrift_transaction_skip',
    });

    const skipped: SkipTransactionResult = { transactionId, mandateId: mandate.id, personaId: mandate.personaId, periodId };
    return {
      result: skipped,
      events: [
        buildEventFromContext(ctx, DD_EVENTS.TRANSACTION_SKIPPED, { ...skipped } satisfies TransactionSkippedPayload),
      ],
    };
  });

  logger.info('direct debit skipped', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    personaId: result.personaId,
    operation: 'skipTransaction',
    mandateId: result.mandateId,
    periodId: result.periodId,
  });
  return result;
}
