import type { FinanceLogCode } from '@clubledger/shared';
import type { MembershipState, PeriodFeeOutcome } from '../helpers/ledger';

export const FINANCE_EVENTS = {
  BALANCE_CHANGED: 'finance.balance.changed.v1',
  MEMBERSHIP_CHANGED: 'finance.membership.changed.v1',
  SEMESTER_BILLED: 'finance.semester.billed.v1',
} as const;

export interface BalanceChangedPayload {
  personaId: string;
  code: FinanceLogCode;
  delta: string;
  balance: string;
}

export interface MembershipChangedPayload {
  personaId: string;
  previousState: MembershipState;
  state: MembershipState;
}

export interface SemesterBilledPayload {
  periodId: number;
  nextPeriodId: number;
  counts: Record<PeriodFeeOutcome, number>;
  billingTotal: string;
}
