import { describe, it, expect } from 'vitest';
import { assessMandate, maySkip, obligationCents, sequenceTypeFor } from '../helpers/open-for-debit';
import type { MandateState, TransactionHistoryItem } from '../helpers/open-for-debit';
import type { TransactionStatus } from '../validation';

const policy = { currentPeriodId: 10, periodsPerYear: 2, membershipFeeCents: 400 };

function mandate(overrides: Partial<MandateState> = {}): MandateState {
  return { id: 'm-1', revokedAt: null, grantedAt: new Date('2015-01-01T00:00:00Z'), donationCents: 2000, ...overrides };
}

let seq = 0;
function tx(status: TransactionStatus, periodId: number, issuedAt: string): TransactionHistoryItem {
  seq += 1;
  return { id: `t-${String(seq).padStart(3, '0')}`, status, periodId, issuedAt: new Date(issuedAt) };
}

describe('obligationCents', () => {
  it('adds a year of fees to the donation', () => {
    expect(obligationCents(2000, policy)).toBe(2800);
  });
});

describe('sequenceTypeFor', () => {
  it('is FRST until a collection happened', () => {
    expect(sequenceTypeFor([])).toBe('FRST');
    expect(sequenceTypeFor([tx('failure', 3, '2020-01-01'), tx('cancelled', 4, '2020-06-01')])).toBe('FRST');
    expect(sequenceTypeFor([tx('rollback', 3, '2020-01-01')])).toBe('RCUR');
    expect(sequenceTypeFor([tx('success', 3, '2020-01-01')])).toBe('RCUR');
  });
});

describe('assessMandate', () => {
  it('opens a fresh mandate for donation plus annual fee', () => {
    expect(assessMandate(mandate(), [], policy)).toEqual({ open: true, amountCents: 2800, sequenceType: 'FRST' });
  });

  it('blocks revoked mandates first', () => {
    const history = [tx('open', 10, '2024-01-01')];
    expect(assessMandate(mandate({ revokedAt: new Date('2024-01-02') }), history, policy)).toEqual({
      open: false,
      reason: 'MANDATE_REVOKED',
    });
  });

  it('blocks while a transaction is open', () => {
    expect(assessMandate(mandate(), [tx('open', 10, '2024-01-01')], policy)).toEqual({
      open: false,
      reason: 'OPEN_TRANSACTION_EXISTS',
    });
  });

  it('blocks when the latest finalized transaction failed', () => {
    const history = [tx('success', 4, '2021-01-01'), tx('failure', 6, '2022-01-01')];
    expect(assessMandate(mandate(), history, policy)).toEqual({ open: false, reason: 'LAST_TRANSACTION_FAILED' });
  });

  it('orders history by issue date rather than input order', () => {
    const history = [tx('cancelled', 7, '2022-06-01'), tx('failure', 6, '2022-01-01')];
    expect(assessMandate(mandate(), history, policy)).toEqual({ open: true, amountCents: 2800, sequenceType: 'FRST' });
  });

  it('blocks a success or skip within the last year of periods', () => {
    expect(assessMandate(mandate(), [tx('success', 9, '2024-01-01')], policy)).toEqual({
      open: false,
      reason: 'ALREADY_DEBITED_THIS_PERIOD',
    });
    expect(assessMandate(mandate(), [tx('skipped', 10, '2024-06-01')], policy)).toEqual({
      open: false,
      reason: 'ALREADY_DEBITED_THIS_PERIOD',
    });
  });

  it('reopens once the last success is older than a year', () => {
    expect(assessMandate(mandate(), [tx('success', 8, '2023-01-01')], policy)).toEqual({
      open: true,
      amountCents: 2800,
      sequenceType: 'RCUR',
    });
  });

  it('has nothing to collect without fee or donation', () => {
    const free = { ...policy, membershipFeeCents: 0 };
    expect(assessMandate(mandate({ donationCents: 0 }), [], free)).toEqual({ open: false, reason: 'NOTHING_TO_COLLECT' });
  });
});

describe('maySkip', () => {
  const now = new Date('2024-06-01T12:00:00Z');

  it('allows skipping within two years of the grant', () => {
    expect(maySkip(mandate({ grantedAt: new Date('2023-01-01T00:00:00Z') }), [], policy, now)).toBe(true);
  });

  it('requires a success within three years for older mandates', () => {
    expect(maySkip(mandate(), [], policy, now)).toBe(false);
    expect(maySkip(mandate(), [tx('success', 5, '2022-01-01')], policy, now)).toBe(true);
    expect(maySkip(mandate(), [tx('success', 4, '2021-06-01')], policy, now)).toBe(false);
    expect(maySkip(mandate(), [tx('skipped', 9, '2023-06-01')], policy, now)).toBe(false);
  });
});
