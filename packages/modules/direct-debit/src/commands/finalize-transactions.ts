import { eq } from 'drizzle-orm';
import { ddTransactions } from '@clubledger/db';
import type { Transaction } from '@clubledger/db';
import { NotFoundError, assertValidated, formatCents, isItemError } from '@clubledger/shared';
import type { BatchItemFailure, BatchReport, EventEnvelope } from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { getLedgerApi } from '@clubledger/core/helpers/ledger-api';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { TransactionAlreadyFinalizedError } from '../errors';
import { DD_EVENTS } from '../events/types';
import type { MandateRevokedPayload, TransactionFinalizedPayload } from '../events/types';
import { markRevoked } from '../helpers/load-mandate';
import { lockTransactions } from '../helpers/load-transaction';
import type { DebitTransaction } from '../helpers/load-transaction';
import { finalizeTransactionsSchema } from '../validation';
import type { FinalizeOutcome, FinalizeTransactionsInput } from '../validation';

export interface FinalizedTransaction {
  transactionId: string;
  mandateId: string;
  personaId: string;
  outcome: FinalizeOutcome;
  tally: string;
  /** Balance after a successful collection; null otherwise. */
  balance: string | null;
}

async function finalizeOne(
  tx: Transaction,
  ctx: RequestContext,
  transaction: DebitTransaction,
  outcome: FinalizeOutcome,
  now: Date,
): Promise<{ finalized: FinalizedTransaction; events: EventEnvelope[] }> {
  const ledger = getLedgerApi();
  const events: EventEnvelope[] = [];
  let tally: string;
  let balance: string | null = null;

  if (outcome === 'success') {
    tally = transaction.amount;
    const credited = await ledger.credit(tx, ctx, {
      personaId: transaction.personaId,
      amount: transaction.amount,
      code: 'lastschrift_transaction_success',
      changeNote: 'Direct debit collected',
    });
    balance = credited.balance;
  } else if (outcome === 'failure') {
    tally = formatCents(-getFinanceConfig().sepa.rollbackFeeCents);
    await ledger.note(tx, ctx, {
      personaId: transaction.personaId,
      code: 'lastschrift_transaction_failure',
      changeNote: tally,
    });
    if (!transaction.mandateRevoked) {
      await markRevoked(tx, transaction.mandateId, now);
      events.push(
        buildEventFromContext(ctx, DD_EVENTS.MANDATE_REVOKED, {
          mandateId: transaction.mandateId,
          personaId: transaction.personaId,
          reason: 'transaction_failed',
        } satisfies MandateRevokedPayload),
      );
    }
  } else {
    tally = formatCents(0);
    await ledger.note(tx, ctx, {
      personaId: transaction.personaId,
      code: 'lastschrift_transaction_cancelled',
      changeNote: tally,
    });
  }

  await tx
    .update(ddTransactions)
    .set({ status: outcome, tally, processedAt: now })
    .where(eq(ddTransactions.id, transaction.id));

  const finalized: FinalizedTransaction = {
    transactionId: transaction.id,
    mandateId: transaction.mandateId,
    personaId: transaction.personaId,
    outcome,
    tally,
    balance,
  };
  events.unshift(
    buildEventFromContext(
      ctx,
      DD_EVENTS.TRANSACTION_FINALIZED,
      {
        transactionId: transaction.id,
        mandateId: transaction.mandateId,
        personaId: transaction.personaId,
        outcome,
        tally,
      } satisfies TransactionFinalizedPayload,
      `${DD_EVENTS.TRANSACTION_FINALIZED}:${transaction.id}`,
    ),
  );
  return { finalized, events };
}

/**
 * Record the bank's verdict for open transactions. Items that are unknown or
 * already final are reported and skipped; consistency errors abort the batch.
 */
export async function finalizeTransactions(
  ctx: RequestContext,
  input: FinalizeTransactionsInput,
): Promise<BatchReport<FinalizedTransaction>> {
  requirePermission(ctx, PERMISSIONS.DIRECT_DEBIT_MANAGE);
  const parsed = finalizeTransactionsSchema.safeParse(input);
  assertValidated(parsed);
  const items = parsed.data.items;
  const startedAt = Date.now();

  const report = await publishWithOutbox(ctx, async (tx) => {
    const transactions = await lockTransactions(
      tx,
      items.map((item) => item.transactionId),
    );
    const now = new Date();
    const succeeded: FinalizedTransaction[] = [];
    const failed: BatchItemFailure[] = [];
    const events: EventEnvelope[] = [];

    for (const item of items) {
      try {
        const transaction = transactions.get(item.transactionId);
        if (!transaction) throw new NotFoundError('Transaction', item.transactionId);
        if (transaction.status !== 'open') {
          throw new TransactionAlreadyFinalizedError(transaction.id, transaction.status);
        }
        const done = await finalizeOne(tx, ctx, transaction, item.outcome, now);
        transactions.set(transaction.id, {
          ...transaction,
          status: item.outcome,
          tally: done.finalized.tally,
          mandateRevoked: transaction.mandateRevoked || item.outcome === 'failure',
        });
        succeeded.push(done.finalized);
        events.push(...done.events);
      } catch (err) {
        if (!isItemError(err)) throw err;
        failed.push({ id: item.transactionId, code: err.code, message: err.message });
      }
    }

    return { result: { succeeded, failed }, events };
  });

  logger.info('direct debit transactions finalized', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    operation: 'finalizeTransactions',
    durationMs: Date.now() - startedAt,
    succeeded: report.succeeded.filter((t) => t.outcome === 'success').length,
    failedDebits: report.succeeded.filter((t) => t.outcome === 'failure').length,
    cancelled: report.succeeded.filter((t) => t.outcome === 'cancelled').length,
    failed: report.failed.length,
  });
  return report;
}
