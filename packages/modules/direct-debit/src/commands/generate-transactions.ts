import { ddTransactions } from '@clubledger/db';
import { assertValidated, formatCents, generateUlid, toIsoDate } from '@clubledger/shared';
import type { BatchItemFailure, BatchReport, EventEnvelope } from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { getLedgerApi } from '@clubledger/core/helpers/ledger-api';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { DD_EVENTS } from '../events/types';
import type { TransactionIssuedPayload } from '../events/types';
import { currentPeriodId, loadHistories, lockActiveMandates, lockMandates } from '../helpers/load-mandate';
import { DEBIT_BLOCK_MESSAGES, assessMandate } from '../helpers/open-for-debit';
import { calculatePaymentDate } from '../helpers/payment-date';
import { generateTransactionsSchema } from '../validation';
import type { GenerateTransactionsInput, SequenceType } from '../validation';

export interface IssuedTransaction {
  transactionId: string;
  mandateId: string;
  personaId: string;
  periodId: number;
  sequenceType: SequenceType;
  amount: string;
  paymentDate: string;
}

/**
 * Issue one open transaction for every mandate that is open for debit.
 * Mandates that are not come back in `failed` with the reason.
 */
export async function generateTransactions(
  ctx: RequestContext,
  input: GenerateTransactionsInput = {},
): Promise<BatchReport<IssuedTransaction>> {
  requirePermission(ctx, PERMISSIONS.DIRECT_DEBIT_MANAGE);
  const parsed = generateTransactionsSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;
  const config = getFinanceConfig();
  const startedAt = Date.now();

  const report = await publishWithOutbox(ctx, async (tx) => {
    const failed: BatchItemFailure[] = [];
    const mandates = data.mandateIds ? await lockMandates(tx, data.mandateIds) : await lockActiveMandates(tx);
    if (data.mandateIds) {
      for (const id of new Set(data.mandateIds)) {
        if (!mandates.has(id)) failed.push({ id, code: 'NOT_FOUND', message: `Mandate ${id} not found` });
      }
    }

    const periodId = await currentPeriodId(tx);
    const histories = await loadHistories(tx, [...mandates.keys()]);
    const now = new Date();
    const paymentDate = calculatePaymentDate(toIsoDate(now), config.sepa.paymentOffsetDays);
    const policy = {
      currentPeriodId: periodId,
      periodsPerYear: config.periodsPerYear,
      membershipFeeCents: config.membershipFeeCents,
    };

    const succeeded: IssuedTransaction[] = [];
    const events: EventEnvelope[] = [];
    for (const mandate of mandates.values()) {
      const assessment = assessMandate(mandate, histories.get(mandate.id) ?? [], policy);
      if (!assessment.open) {
        failed.push({ id: mandate.id, code: assessment.reason, message: DEBIT_BLOCK_MESSAGES[assessment.reason] });
        continue;
      }

      const issued: IssuedTransaction = {
        transactionId: generateUlid(),
        mandateId: mandate.id,
        personaId: mandate.personaId,
        periodId,
        sequenceType: assessment.sequenceType,
        amount: formatCents(assessment.amountCents),
        paymentDate,
      };
      await tx.insert(ddTransactions).values({
        id: issued.transactionId,
        mandateId: issued.mandateId,
        periodId,
        status: 'open',
        sequenceType: issued.sequenceType,
        amount: issued.amount,
        issuedAt: now,
        paymentDate,
        submittedBy: ctx.actor?.id ?? null,
      });
      await getLedgerApi().note(tx, ctx, {
        personaId: mandate.personaId,
        code: 'lastschrift_transaction_issue',
        changeNote: issued.amount,
      });

      succeeded.push(issued);
      events.push(
        buildEventFromContext(ctx, DD_EVENTS.TRANSACTION_ISSUED, { ...issued } satisfies TransactionIssuedPayload),
      );
    }

    return { result: { succeeded, failed }, events };
  });

  logger.info('direct debit transactions generated', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    operation: 'generateTransactions',
    durationMs: Date.now() - startedAt,
    generated: report.succeeded.length,
    skipped: report.failed.filter((f) => f.code !== 'NOT_FOUND').length,
    failed: report.failed.filter((f) => f.code === 'NOT_FOUND').length,
  });
  return report;
}
