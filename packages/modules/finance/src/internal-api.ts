import { eq, sql } from 'drizzle-orm';
import { financeLog, personas, rowsOf } from '@clubledger/db';
import type { Transaction } from '@clubledger/db';
import {
  NotFoundError,
  financeLogCodeValue,
  formatCents,
  generateUlid,
  parseCents,
} from '@clubledger/shared';
import type { EventEnvelope } from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import type {
  BalanceChangeInput,
  BalanceChangeResult,
  LedgerApi,
  LedgerEntryRecord,
  LedgerNoteInput,
} from '@clubledger/core/helpers/ledger-api';
import { FINANCE_EVENTS } from './events/types';
import {
  assertLedgerConsistency,
  creditPayment,
  debitBalance,
  membershipState,
  noteEntry,
} from './helpers/ledger';
import type { LedgerTransition, MemberAccount, PlannedEntry } from './helpers/ledger';
import { LedgerConsistencyError } from './errors';

// ── Row mapping ─────────────────────────────────────────────────

function accountFromRow(r: Record<string, unknown>): MemberAccount {
  return {
    personaId: String(r.id),
    balanceCents: parseCents(String(r.balance)),
    isMember: Boolean(r.is_member),
    trialMember: Boolean(r.trial_member),
    isArchived: Boolean(r.is_archived),
    lapsedAt: r.lapsed_at ? new Date(String(r.lapsed_at)) : null,
  };
}

/**
 * Lock persona rows in id order and return their accounts. Unknown ids are
 * a NotFoundError.
 */
export async function lockAccounts(tx: Transaction, personaIds: string[]): Promise<Map<string, MemberAccount>> {
  const ids = [...new Set(personaIds)].sort();
  const accounts = new Map<string, MemberAccount>();
  if (ids.length === 0) return accounts;

  const rows = await tx.execute(sql`
    SELECT id, balance, is_member, trial_member, is_archived, lapsed_at
    FROM personas
    WHERE id IN (${sql.join(
      ids.map((id) => sql`${id}`),
      sql`, `,
    )})
    ORDER BY id
    FOR UPDATE
  `);
  for (const row of rowsOf(rows)) {
    const account = accountFromRow(row);
    accounts.set(account.personaId, account);
  }
  for (const id of ids) {
    if (!accounts.has(id)) throw new NotFoundError('Persona', id);
  }
  return accounts;
}

// ── Committed changes ───────────────────────────────────────────

export interface AppliedTransition {
  before: MemberAccount;
  after: MemberAccount;
  entries: LedgerEntryRecord[];
}

function snapshotColumns(enabled: boolean) {
  if (!enabled) return { members: -1, total: '-1', memberTotal: '-1' };
  return {
    members: sql<number>`(SELECT COUNT(*)::int FROM personas WHERE is_member)`,
    total: sql<string>`(SELECT COALESCE(SUM(balance), 0) FROM personas)`,
    memberTotal: sql<string>`(SELECT COALESCE(SUM(balance), 0) FROM personas WHERE is_member)`,
  };
}

function toRecord(id: string, personaId: string | null, entry: PlannedEntry): LedgerEntryRecord {
  return {
    id,
    code: entry.code,
    personaId,
    delta: entry.deltaCents === null ? null : formatCents(entry.deltaCents),
    newBalance: entry.newBalanceCents === null ? null : formatCents(entry.newBalanceCents),
    transactionDate: entry.transactionDate,
    changeNote: entry.changeNote,
  };
}

export async function insertEntries(
  tx: Transaction,
  ctx: RequestContext,
  personaId: string | null,
  entries: PlannedEntry[],
): Promise<LedgerEntryRecord[]> {
  if (entries.length === 0) return [];
  const snapshots = snapshotColumns(getFinanceConfig().logSnapshots);
  const records = entries.map((entry) => toRecord(generateUlid(), personaId, entry));

  // Snapshots are evaluated after the persona update, so they reflect the new state
  await tx.insert(financeLog).values(
    records.map((record) => ({
      id: record.id,
      code: financeLogCodeValue(record.code),
      submittedBy: ctx.actor?.id ?? null,
      personaId: record.personaId,
      delta: record.delta,
      newBalance: record.newBalance,
      transactionDate: record.transactionDate,
      changeNote: record.changeNote,
      ...snapshots,
    })),
  );
  return records;
}

/**
 * Check, persist and log one transition. The persona row must already be
 * locked by the caller through `lockAccounts`.
 */
export async function applyTransition(
  tx: Transaction,
  ctx: RequestContext,
  before: MemberAccount,
  transition: LedgerTransition,
): Promise<AppliedTransition> {
  try {
    assertLedgerConsistency(before, transition);
  } catch (err) {
    if (err instanceof LedgerConsistencyError) {
      logger.error('ledger consistency violation', {
        requestId: ctx.requestId,
        actorId: ctx.actor?.id ?? null,
        personaId: before.personaId,
        error: { code: err.code, message: err.message, stack: err.stack },
      });
    }
    throw err;
  }

  const after = transition.account;
  const changed =
    after.balanceCents !== before.balanceCents ||
    after.isMember !== before.isMember ||
    after.trialMember !== before.trialMember ||
    after.isArchived !== before.isArchived ||
    after.lapsedAt !== before.lapsedAt;

  if (changed) {
    await tx
      .update(personas)
      .set({
        balance: formatCents(after.balanceCents),
        isMember: after.isMember,
        trialMember: after.trialMember,
        isArchived: after.isArchived,
        lapsedAt: after.lapsedAt,
        updatedAt: new Date(),
      })
      .where(eq(personas.id, after.personaId));
  }

  const entries = await insertEntries(tx, ctx, after.personaId, transition.entries);
  return { before, after, entries };
}

/** Domain events for a committed transition. */
export function transitionEvents(ctx: RequestContext, applied: AppliedTransition): EventEnvelope[] {
  const events: EventEnvelope[] = [];
  for (const entry of applied.entries) {
    if (entry.delta === null || entry.newBalance === null) continue;
    events.push(
      buildEventFromContext(ctx, FINANCE_EVENTS.BALANCE_CHANGED, {
        personaId: applied.after.personaId,
        code: entry.code,
        delta: entry.delta,
        balance: entry.newBalance,
      }),
    );
  }
  const previousState = membershipState(applied.before);
  const state = membershipState(applied.after);
  if (previousState !== state) {
    events.push(
      buildEventFromContext(ctx, FINANCE_EVENTS.MEMBERSHIP_CHANGED, {
        personaId: applied.after.personaId,
        previousState,
        state,
      }),
    );
  }
  return events;
}

function toResult(applied: AppliedTransition): BalanceChangeResult {
  return {
    personaId: applied.after.personaId,
    balance: formatCents(applied.after.balanceCents),
    isMember: applied.after.isMember,
    trialMember: applied.after.trialMember,
    entries: applied.entries,
  };
}

// ── LedgerApi implementation ────────────────────────────────────

/** Balance writes requested by other modules, such as direct-debit finalization. */
class DrizzleLedger implements LedgerApi {
  async credit(tx: Transaction, ctx: RequestContext, input: BalanceChangeInput): Promise<BalanceChangeResult> {
    const accounts = await lockAccounts(tx, [input.personaId]);
    const before = accounts.get(input.personaId);
    if (!before) throw new NotFoundError('Persona', input.personaId);

    const transition = creditPayment(before, parseCents(input.amount), {
      code: input.code,
      feeCents: getFinanceConfig().membershipFeeCents,
      transactionDate: input.transactionDate,
      changeNote: input.changeNote,
    });
    return toResult(await applyTransition(tx, ctx, before, transition));
  }

  async debit(
    tx: Transaction,
    ctx: RequestContext,
    input: BalanceChangeInput & { clampAtZero?: boolean },
  ): Promise<BalanceChangeResult> {
    const accounts = await lockAccounts(tx, [input.personaId]);
    const before = accounts.get(input.personaId);
    if (!before) throw new NotFoundError('Persona', input.personaId);

    const transition = debitBalance(before, parseCents(input.amount), {
      code: input.code,
      clampAtZero: input.clampAtZero,
      transactionDate: input.transactionDate,
      changeNote: input.changeNote,
    });
    return toResult(await applyTransition(tx, ctx, before, transition));
  }

  async note(tx: Transaction, ctx: RequestContext, input: LedgerNoteInput): Promise<LedgerEntryRecord> {
    const [record] = await insertEntries(tx, ctx, input.personaId, [
      noteEntry(input.code, input.changeNote ?? null),
    ]);
    if (!record) throw new Error('Finance log insert produced no entry');
    return record;
  }
}

export function createDrizzleLedgerApi(): LedgerApi {
  return new DrizzleLedger();
}
