import { eq, sql } from 'drizzle-orm';
import { orgPeriods, rowsOf } from '@clubledger/db';
import type { Transaction } from '@clubledger/db';
import { formatCents } from '@clubledger/shared';
import type { EventEnvelope } from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { PeriodAlreadyBilledError } from '../errors';
import { FINANCE_EVENTS } from '../events/types';
import { chargePeriodFee } from '../helpers/ledger';
import type { PeriodFeeOutcome } from '../helpers/ledger';
import { applyTransition, lockAccounts, transitionEvents } from '../internal-api';

export interface SemesterBillingResult {
  periodId: number;
  nextPeriodId: number;
  counts: Record<PeriodFeeOutcome, number>;
  billingTotal: string;
  /** Persona id → outcome, for members that were not simply charged. */
  exceptions: Array<{ personaId: string; outcome: PeriodFeeOutcome }>;
}

async function lockCurrentPeriod(tx: Transaction) {
  const rows = await tx.execute(sql`
    SELECT id, billing_done_at FROM org_periods ORDER BY id DESC LIMIT 1 FOR UPDATE
  `);
  const row = rowsOf(rows)[0];
  if (!row) throw new Error('org_periods has no current period');
  return { id: Number(row.id), billed: row.billing_done_at !== null && row.billing_done_at !== undefined };
}

/**
 * Charge every member the period fee, end trial memberships and lapse
 * members who can neither pay nor are covered by a direct-debit mandate.
 * Runs once per period and opens the next one.
 */
export async function runSemesterBilling(ctx: RequestContext): Promise<SemesterBillingResult> {
  requirePermission(ctx, PERMISSIONS.FINANCE_MANAGE);
  const config = getFinanceConfig();
  const startedAt = Date.now();

  const result = await publishWithOutbox(ctx, async (tx) => {
    const period = await lockCurrentPeriod(tx);
    if (period.billed) throw new PeriodAlreadyBilledError(period.id);

    const memberRows = await tx.execute(sql`
      SELECT id FROM personas WHERE is_member AND NOT is_archived ORDER BY id
    `);
    const mandateRows = await tx.execute(sql`
      SELECT persona_id FROM dd_mandates WHERE revoked_at IS NULL ORDER BY id FOR UPDATE
    `);
    const covered = new Set(rowsOf(mandateRows).map((r) => String(r.persona_id)));
    const accounts = await lockAccounts(
      tx,
      rowsOf(memberRows).map((r) => String(r.id)),
    );

    const counts: Record<PeriodFeeOutcome, number> = {
      not_member: 0,
      trial_ended: 0,
      deducted: 0,
      deferred: 0,
      lapsed: 0,
    };
    const exceptions: SemesterBillingResult['exceptions'] = [];
    const events: EventEnvelope[] = [];
    let billedCents = 0;
    const now = new Date();

    for (const before of accounts.values()) {
      const { outcome, ...transition } = chargePeriodFee(before, config.membershipFeeCents, {
        hasActiveMandate: covered.has(before.personaId),
        now,
      });
      counts[outcome]++;
      if (outcome === 'deducted') billedCents += config.membershipFeeCents;
      else exceptions.push({ personaId: before.personaId, outcome });

      const applied = await applyTransition(tx, ctx, before, transition);
      events.push(...transitionEvents(ctx, applied));
    }

    const [next] = await tx.insert(orgPeriods).values({}).returning({ id: orgPeriods.id });
    if (!next) throw new Error('Opening the next period returned no row');

    await tx
      .update(orgPeriods)
      .set({
        billingDoneAt: now,
        billingCount: counts.deducted,
        billingTotal: formatCents(billedCents),
        trialEndedCount: counts.trial_ended,
        deferredCount: counts.deferred,
        lapsedCount: counts.lapsed,
        semesterDoneAt: now,
      })
      .where(eq(orgPeriods.id, period.id));

    const billingTotal = formatCents(billedCents);
    events.push(
      buildEventFromContext(
        ctx,
        FINANCE_EVENTS.SEMESTER_BILLED,
        { periodId: period.id, nextPeriodId: next.id, counts, billingTotal },
        `${FINANCE_EVENTS.SEMESTER_BILLED}:${period.id}`,
      ),
    );

    return {
      result: { periodId: period.id, nextPeriodId: next.id, counts, billingTotal, exceptions },
      events,
    };
  });

  logger.info('semester billing finished', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    operation: 'runSemesterBilling',
    durationMs: Date.now() - startedAt,
    periodId: result.periodId,
    deducted: result.counts.deducted,
    trialEnded: result.counts.trial_ended,
    deferred: result.counts.deferred,
    lapsed: result.counts.lapsed,
  });
  return result;
}
