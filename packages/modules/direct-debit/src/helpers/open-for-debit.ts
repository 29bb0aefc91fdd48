import { differenceInCalendarDays } from 'date-fns';
import type { SequenceType, TransactionStatus } from '../validation';

export interface MandateState {
  id: string;
  revokedAt: Date | null;
  grantedAt: Date;
  donationCents: number;
}

export interface TransactionHistoryItem {
  id: string;
  status: TransactionStatus;
  periodId: number;
  issuedAt: Date;
}

export interface DebitPolicy {
  currentPeriodId: number;
  periodsPerYear: number;
  membershipFeeCents: number;
}

export type DebitBlockReason =
  | 'MANDATE_REVOKED'
  | 'OPEN_TRANSACTION_EXISTS'
  | 'LAST_TRANSACTION_FAILED'
  | 'ALREADY_DEBITED_THIS_PERIOD'
  | 'NOTHING_TO_COLLECT';

export type DebitAssessment =
  | { open: true; amountCents: number; sequenceType: SequenceType }
  | { open: false; reason: DebitBlockReason };

export const DEBIT_BLOCK_MESSAGES: Record<DebitBlockReason, string> = {
  MANDATE_REVOKED: 'Mandate is revoked',
  OPEN_TRANSACTION_EXISTS: 'Mandate already has an open transaction',
  LAST_TRANSACTION_FAILED: 'The last transaction of this mandate failed',
  ALREADY_DEBITED_THIS_PERIOD: 'Mandate was already debited or skipped within the last year',
  NOTHING_TO_COLLECT: 'Donation and annual fee add up to nothing',
};

/** History sorted oldest first; ties broken by id. */
function chronological(history: TransactionHistoryItem[]): TransactionHistoryItem[] {
  return [...history].sort(
    (a, b) => a.issuedAt.getTime() - b.issuedAt.getTime() || a.id.localeCompare(b.id),
  );
}

/** Donation plus a full year of membership fees. */
export function obligationCents(donationCents: number, policy: Pick<DebitPolicy, 'periodsPerYear' | 'membershipFeeCents'>): number {
  return donationCents + policy.periodsPerYear * policy.membershipFeeCents;
}

/** `RCUR` once the debtor's bank has seen a collection on this mandate. */
export function sequenceTypeFor(history: TransactionHistoryItem[]): SequenceType {
  return history.some((t) => t.status === 'success' || t.status === 'rollback') ? 'RCUR' : 'FRST';
}

export function openTransactionOf(history: TransactionHistoryItem[]): TransactionHistoryItem | null {
  return history.find((t) => t.status === 'open') ?? null;
}

export function assessMandate(
  mandate: MandateState,
  history: TransactionHistoryItem[],
  policy: DebitPolicy,
): DebitAssessment {
  if (mandate.revokedAt) return { open: false, reason: 'MANDATE_REVOKED' };
  if (openTransactionOf(history)) return { open: false, reason: 'OPEN_TRANSACTION_EXISTS' };

  const finalized = chronological(history).filter((t) => t.status !== 'open');
  const latest = finalized[finalized.length - 1];
  if (latest?.status === 'failure') return { open: false, reason: 'LAST_TRANSACTION_FAILED' };

  const firstRecentPeriod = policy.currentPeriodId - policy.periodsPerYear + 1;
  const recent = history.some(
    (t) => (t.status === 'success' || t.status === 'skipped') && t.periodId >= firstRecentPeriod,
  );
  if (recent) return { open: false, reason: 'ALREADY_DEBITED_THIS_PERIOD' };

  const amountCents = obligationCents(mandate.donationCents, policy);
  if (amountCents <= 0) return { open: false, reason: 'NOTHING_TO_COLLECT' };

  return { open: true, amountCents, sequenceType: sequenceTypeFor(history) };
}

/** Mandates unused for three years expire, so skipping stops once that is near. */
export function maySkip(
  mandate: MandateState,
  history: TransactionHistoryItem[],
  policy: Pick<DebitPolicy, 'currentPeriodId' | 'periodsPerYear'>,
  now: Date,
): boolean {
  if (differenceInCalendarDays(now, mandate.grantedAt) < 2 * 365) return true;
  const cutoff = policy.currentPeriodId - 3 * policy.periodsPerYear + 1;
  return history.some((t) => t.status === 'success' && t.periodId >= cutoff);
}
