import { eq } from 'drizzle-orm';
import { registrations } from '@clubledger/db';
import { NotFoundError, assertValidated, formatCents, parseCents } from '@clubledger/shared';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { NegativeAmountPaidError, ZeroPaymentError } from '../errors';
import { FEE_EVENTS } from '../events/types';
import { loadRegistrations } from '../helpers/load-event';
import { bookPaymentsSchema } from '../validation';
import type { BookPaymentsInput } from '../validation';

export interface BookedPayment {
  registrationId: string;
  amount: string;
  amountPaid: string;
  amountOwed: string;
  paymentDate: string;
}

/**
 * Book received participation-fee payments onto registrations. Negative
 * amounts are refunds and may not take the paid amount below zero. The whole batch is applied atomically.
 */
export async function bookRegistrationPayments(
  ctx: RequestContext,
  input: BookPaymentsInput,
): Promise<BookedPayment[]> {
  requirePermission(ctx, PERMISSIONS.FEES_MANAGE);
  const parsed = bookPaymentsSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  for (const payment of data.payments) {
    if (parseCents(payment.amount) === 0) throw new ZeroPaymentError(payment.registrationId);
  }

  const booked = await publishWithOutbox(ctx, async (tx) => {
    const ids = [...new Set(data.payments.map((p) => p.registrationId))].sort();
    const regs = await loadRegistrations(tx, data.eventId, { registrationIds: ids, lock: true });
    const paid = new Map(regs.map((r) => [r.id, parseCents(r.amountPaid)]));
    const owed = new Map(regs.map((r) => [r.id, r.amountOwed]));

    const results: BookedPayment[] = [];
    for (const payment of data.payments) {
      const current = paid.get(payment.registrationId);
      if (current === undefined) throw new NotFoundError('Registration', payment.registrationId);
      const next = current + parseCents(payment.amount);
      if (next < 0) throw new NegativeAmountPaidError(payment.registrationId, formatCents(next));
      paid.set(payment.registrationId, next);
      results.push({
        registrationId: payment.registrationId,
        amount: formatCents(parseCents(payment.amount)),
        amountPaid: formatCents(next),
        amountOwed: owed.get(payment.registrationId) ?? '0.00',
        paymentDate: payment.date,
      });
    }

    // One write per registration with its final state
    const finalState = new Map(results.map((r) => [r.registrationId, r]));
    for (const [registrationId, state] of finalState) {
      await tx
        .update(registrations)
        .set({ amountPaid: state.amountPaid, paymentDate: state.paymentDate, updatedAt: new Date() })
        .where(eq(registrations.id, registrationId));
    }

    const events = results.map((r) =>
      buildEventFromContext(ctx, FEE_EVENTS.PAYMENT_BOOKED, {
        registrationId: r.registrationId,
        eventId: data.eventId,
        amount: r.amount,
        amountPaid: r.amountPaid,
        date: r.paymentDate,
      }),
    );
    return { result: results, events };
  });

  logger.info('registration payments booked', {
    requestId: ctx.requestId,
    operation: 'bookRegistrationPayments',
    eventId: data.eventId,
    count: booked.length,
  });
  return booked;
}
