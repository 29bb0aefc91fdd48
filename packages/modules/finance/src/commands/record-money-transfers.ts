import { assertValidated, formatCents, parseCents } from '@clubledger/shared';
import type { EventEnvelope } from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { creditPayment, membershipState } from '../helpers/ledger';
import type { MembershipState } from '../helpers/ledger';
import { applyTransition, lockAccounts, transitionEvents } from '../internal-api';
import { recordMoneyTransfersSchema } from '../validation';
import type { RecordMoneyTransfersInput } from '../validation';

export interface MoneyTransferResult {
  personaId: string;
  amount: string;
  balance: string;
  state: MembershipState;
  entryIds: string[];
}

/**
 * Book incoming bank transfers onto member balances. All transfers commit
 * together or not at all.
 */
export async function recordMoneyTransfers(
  ctx: RequestContext,
  input: RecordMoneyTransfersInput,
): Promise<MoneyTransferResult[]> {
  requirePermission(ctx, PERMISSIONS.FINANCE_MANAGE);
  const parsed = recordMoneyTransfersSchema.safeParse(input);
  assertValidated(parsed);
  const { transfers } = parsed.data;

  const config = getFinanceConfig();
  const results = await publishWithOutbox(ctx, async (tx) => {
    const accounts = await lockAccounts(tx, transfers.map((t) => t.personaId));
    const out: MoneyTransferResult[] = [];
    const events: EventEnvelope[] = [];

    for (const transfer of transfers) {
      const before = accounts.get(transfer.personaId);
      if (!before) throw new Error(`Persona ${transfer.personaId} was not locked`);

      const transition = creditPayment(before, parseCents(transfer.amount), {
        code: 'increase_balance',
        feeCents: config.membershipFeeCents,
        transactionDate: transfer.transactionDate,
        changeNote: transfer.note,
      });
      const applied = await applyTransition(tx, ctx, before, transition);
      accounts.set(transfer.personaId, applied.after);
      events.push(...transitionEvents(ctx, applied));

      out.push({
        personaId: transfer.personaId,
        amount: formatCents(parseCents(transfer.amount)),
        balance: formatCents(applied.after.balanceCents),
        state: membershipState(applied.after),
        entryIds: applied.entries.map((e) => e.id),
      });
    }
    return { result: out, events };
  });

  logger.info('money transfers recorded', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    operation: 'recordMoneyTransfers',
    count: results.length,
    total: formatCents(results.reduce((sum, r) => sum + parseCents(r.amount), 0)),
  });
  return results;
}
