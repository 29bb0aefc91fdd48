import { eq } from 'drizzle-orm';
import { ddTransactions } from '@clubledger/db';
import { assertValidated, formatCents, parseCents } from '@clubledger/shared';
import type { EventEnvelope } from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { getLedgerApi } from '@clubledger/core/helpers/ledger-api';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { TransactionNotSuccessfulError } from '../errors';
import { DD_EVENTS } from '../events/types';
import type { MandateRevokedPayload, TransactionRolledBackPayload } from '../events/types';
import { markRevoked } from '../helpers/load-mandate';
import { lockTransaction } from '../helpers/load-transaction';
import { rollbackTransactionSchema } from '../validation';
import type { RollbackTransactionInput } from '../validation';

export interface RollbackTransactionResult {
  transactionId: string;
  mandateId: string;
  personaId: string;
  tally: string;
  /** Amount actually taken from the balance. */
  debited: string;
  balance: string;
}

/**
 * Undo a successful collection the debtor's bank returned: take the money
 * back from the balance, never below zero, and end the mandate.
 */
export async function rollbackTransaction(
  ctx: RequestContext,
  input: RollbackTransactionInput,
): Promise<RollbackTransactionResult> {
  requirePermission(ctx, PERMISSIONS.DIRECT_DEBIT_MANAGE);
  const parsed = rollbackTransactionSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;
  const config = getFinanceConfig();

  const result = await publishWithOutbox(ctx, async (tx) => {
    const transaction = await lockTransaction(tx, data.transactionId);
    if (transaction.status !== 'success') {
      throw new TransactionNotSuccessfulError(transaction.id, transaction.status);
    }

    const now = new Date();
    const tally = formatCents(-config.sepa.rollbackFeeCents);
    await tx
      .update(ddTransactions)
      .set({ status: 'rollback', tally, processedAt: now })
      .where(eq(ddTransactions.id, transaction.id));

    const debit = await getLedgerApi().debit(tx, ctx, {
      personaId: transaction.personaId,
      amount: transaction.amount,
      code: 'lastschrift_transaction_revoked',
      changeNote: 'Direct debit returned',
      clampAtZero: true,
    });
    const debited = formatCents(
      debit.entries.reduce((sum, entry) => sum - (entry.delta === null ? 0 : parseCents(entry.delta)), 0),
    );

    const events: EventEnvelope[] = [
      buildEventFromContext(ctx, DD_EVENTS.TRANSACTION_ROLLED_BACK, {
        transactionId: transaction.id,
        mandateId: transaction.mandateId,
        personaId: transaction.personaId,
        tally,
        debited,
      } satisfies TransactionRolledBackPayload),
    ];
    if (!transaction.mandateRevoked) {
      await markRevoked(tx, transaction.mandateId, now);
      events.push(
        buildEventFromContext(ctx, DD_EVENTS.MANDATE_REVOKED, {
          mandateId: transaction.mandateId,
          personaId: transaction.personaId,
          reason: 'transaction_rolled_back',
        } satisfies MandateRevokedPayload),
      );
    }

    return {
      result: {
        transactionId: transaction.id,
        mandateId: transaction.mandateId,
        personaId: transaction.personaId,
        tally,
        debited,
        balance: debit.balance,
      },
      events,
    };
  });

  logger.info('direct debit rolled back', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    personaId: result.personaId,
    operation: 'rollbackTransaction',
    transactionId: result.transactionId,
    debited: result.debited,
  });
  return result;
}
