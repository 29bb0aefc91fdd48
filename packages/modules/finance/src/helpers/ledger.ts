import { ValidationError, formatCents } from '@clubledger/shared';
import type { FinanceLogCode } from '@clubledger/shared';
import { InsufficientBalanceError, LedgerConsistencyError, PersonaArchivedError } from '../errors';

// ── Account state ────────────────────────────────────────────────

export interface MemberAccount {
  personaId: string;
  balanceCents: number;
  isMember: boolean;
  trialMember: boolean;
  isArchived: boolean;
  lapsedAt: Date | null;
}

export type MembershipState = 'archived' | 'trial_member' | 'member' | 'lapsed' | 'no_membership';

export function membershipState(account: MemberAccount): MembershipState {
  if (account.isArchived) return 'archived';
  if (account.isMember && account.trialMember) return 'trial_member';
  if (account.isMember) return 'member';
  if (account.lapsedAt) return 'lapsed';
  return 'no_membership';
}

/** A finance log entry before it is written. `deltaCents` is null for non-balance entries. */
export interface PlannedEntry {
  code: FinanceLogCode;
  deltaCents: number | null;
  newBalanceCents: number | null;
  transactionDate: string | null;
  changeNote: string | null;
}

export interface LedgerTransition {
  account: MemberAccount;
  entries: PlannedEntry[];
}

interface EntryMeta {
  transactionDate?: string | null;
  changeNote?: string | null;
}

function balanceEntry(code: FinanceLogCode, deltaCents: number, newBalanceCents: number, meta: EntryMeta = {}): PlannedEntry {
  return {
    code,
    deltaCents,
    newBalanceCents,
    transactionDate: meta.transactionDate ?? null,
    changeNote: meta.changeNote ?? null,
  };
}

export function noteEntry(code: FinanceLogCode, changeNote: string | null = null): PlannedEntry {
  return { code, deltaCents: null, newBalanceCents: null, transactionDate: null, changeNote };
}

function assertPositive(amountCents: number): void {
  if (!Number.isSafeInteger(amountCents) || amountCents <= 0) {
    throw new ValidationError('Validation failed', [{ field: 'amount', message: 'Amount must be positive' }]);
  }
}

// ── Transitions ──────────────────────────────────────────────────

export interface CreditOptions extends EntryMeta {
  code?: FinanceLogCode;
  /** Period fee; a credit that reaches it ends a trial or restores membership. */
  feeCents: number;
}

/**
 * Add money to the balance. A trial member whose balance now covers the fee
 * becomes a regular member; a non-member regains membership.
 */
export function creditPayment(account: MemberAccount, amountCents: number, options: CreditOptions): LedgerTransition {
  assertPositive(amountCents);
  if (account.isArchived) throw new PersonaArchivedError(account.personaId);

  const balanceCents = account.balanceCents + amountCents;
  const entries = [
    balanceEntry(options.code ?? 'increase_balance', amountCents, balanceCents, options),
  ];
  let next: MemberAccount = { ...account, balanceCents };

  if (balanceCents >= options.feeCents) {
    if (next.isMember && next.trialMember) {
      next = { ...next, trialMember: false };
      entries.push(noteEntry('end_trial_membership'));
    } else if (!next.isMember) {
      next = { ...next, isMember: true, lapsedAt: null };
      entries.push(noteEntry('gain_membership'));
    }
  }
  return { account: next, entries };
}

export interface DebitOptions extends EntryMeta {
  code: FinanceLogCode;
  /** Take at most the current balance instead of failing. */
  clampAtZero?: boolean;
}

export function debitBalance(account: MemberAccount, amountCents: number, options: DebitOptions): LedgerTransition {
  assertPositive(amountCents);
  if (account.balanceCents < amountCents && !options.clampAtZero) {
    throw new InsufficientBalanceError(account.personaId, formatCents(account.balanceCents), formatCents(amountCents));
  }
  const taken = Math.min(amountCents, account.balanceCents);
  const balanceCents = account.balanceCents - taken;
  return {
    account: { ...account, balanceCents },
    entries: [balanceEntry(options.code, -taken, balanceCents, options)],
  };
}

/** Set the balance to `targetCents`; no entry when nothing changes. */
export function correctBalance(account: MemberAccount, targetCents: number, changeNote: string): LedgerTransition {
  if (!Number.isSafeInteger(targetCents) || targetCents < 0) {
    throw new ValidationError('Validation failed', [{ field: 'balance', message: 'Balance must not be negative' }]);
  }
  if (account.isArchived) throw new PersonaArchivedError(account.personaId);
  if (targetCents === account.balanceCents) return { account, entries: [] };

  return {
    account: { ...account, balanceCents: targetCents },
    entries: [
      balanceEntry('manual_balance_correction', targetCents - account.balanceCents, targetCents, { changeNote }),
    ],
  };
}

export type PeriodFeeOutcome = 'not_member' | 'trial_ended' | 'deducted' | 'deferred' | 'lapsed';

export interface PeriodFeeOptions {
  hasActiveMandate: boolean;
  now: Date;
}

/** Semester step for one persona. Never takes a partial fee. */
export function chargePeriodFee(
  account: MemberAccount,
  feeCents: number,
  options: PeriodFeeOptions,
): LedgerTransition & { outcome: PeriodFeeOutcome } {
  if (!account.isMember || account.isArchived) {
    return { account, entries: [], outcome: 'not_member' };
  }
  if (account.trialMember) {
    return {
      account: { ...account, trialMember: false },
      entries: [noteEntry('end_trial_membership')],
      outcome: 'trial_ended',
    };
  }
  if (account.balanceCents >= feeCents) {
    if (feeCents === 0) return { account, entries: [], outcome: 'deducted' };
    const balanceCents = account.balanceCents - feeCents;
    return {
      account: { ...account, balanceCents },
      entries: [balanceEntry('deduct_membership_fee', -feeCents, balanceCents)],
      outcome: 'deducted',
    };
  }
  if (options.hasActiveMandate) {
    return { account, entries: [], outcome: 'deferred' };
  }
  return {
    account: { ...account, isMember: false, trialMember: false, lapsedAt: options.now },
    entries: [noteEntry('lose_membership')],
    outcome: 'lapsed',
  };
}

export interface MembershipChange {
  isMember: boolean;
  trial?: boolean;
  now?: Date;
  changeNote?: string | null;
}

export function changeMembership(account: MemberAccount, change: MembershipChange): LedgerTransition {
  if (account.isArchived) throw new PersonaArchivedError(account.personaId);
  const note = change.changeNote ?? null;
  const entries: PlannedEntry[] = [];
  let next = account;

  if (!change.isMember) {
    if (account.isMember) {
      next = { ...account, isMember: false, trialMember: false };
      entries.push(noteEntry('lose_membership', note));
    }
    return { account: next, entries };
  }

  if (!account.isMember) {
    next = { ...next, isMember: true, lapsedAt: null };
    entries.push(noteEntry('gain_membership', note));
  }
  if (change.trial && !next.trialMember) {
    next = { ...next, trialMember: true };
    entries.push(noteEntry('start_trial_membership', note));
  } else if (change.trial === false && next.trialMember) {
    next = { ...next, trialMember: false };
    entries.push(noteEntry('end_trial_membership', note));
  }
  return { account: next, entries };
}

/** Remove any remaining balance and mark the account archived. */
export function archiveAccount(account: MemberAccount, changeNote: string | null = null): LedgerTransition {
  const entries: PlannedEntry[] = [];
  if (account.balanceCents > 0) {
    entries.push(balanceEntry('remove_balance_on_archival', -account.balanceCents, 0, { changeNote }));
  }
  return { account: { ...account, balanceCents: 0, isArchived: true }, entries };
}

// ── Invariants ───────────────────────────────────────────────────

/**
 * Every balance change is carried by a delta entry whose `newBalance` is the
 * running balance, and the final balance is non-negative.
 */
export function assertLedgerConsistency(before: MemberAccount, transition: LedgerTransition): void {
  const { account: after, entries } = transition;
  const fail = (message: string) => {
    throw new LedgerConsistencyError(message, before.personaId);
  };

  if (after.personaId !== before.personaId) fail('transition changed the persona');
  let running = before.balanceCents;
  let deltaEntries = 0;
  for (const entry of entries) {
    if (entry.deltaCents === null) {
      if (entry.newBalanceCents !== null) fail(`${entry.code} has a new balance but no delta`);
      continue;
    }
    deltaEntries++;
    running += entry.deltaCents;
    if (entry.newBalanceCents !== running) {
      fail(`${entry.code} records new balance ${String(entry.newBalanceCents)}, expected ${running}`);
    }
  }
  if (running !== after.balanceCents) {
    fail(`balance ${after.balanceCents} differs from initial ${before.balanceCents} plus logged deltas`);
  }
  if (after.balanceCents < 0) fail(`balance would become negative (${after.balanceCents})`);
  if (after.balanceCents !== before.balanceCents && deltaEntries === 0) fail('balance changed without an entry');
}
