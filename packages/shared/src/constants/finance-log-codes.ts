export const FINANCE_LOG_CODE_NAMES = [
  'new_member',
  'gain_membership',
  'lose_membership',
  'increase_balance',
  'deduct_membership_fee',
  'end_trial_membership',
  'manual_balance_correction',
  'remove_balance_on_archival',
  'start_trial_membership',
  'remove_exmember_balance',
  'grant_lastschrift',
  'revoke_lastschrift',
  'modify_lastschrift',
  'lastschrift_deleted',
  'lastschrift_transaction_issue',
  'lastschrift_transaction_success',
  'lastschrift_transaction_failure',
  'lastschrift_transaction_skip',
  'lastschrift_transaction_cancelled',
  'lastschrift_transaction_revoked',
  'honorary_membership_granted',
  'honorary_membership_revoked',
  'other',
] as const;

export type FinanceLogCode = (typeof FINANCE_LOG_CODE_NAMES)[number];

/** Integer stored in `finance_log.code` for each code. */
export const FINANCE_LOG_CODES: Record<FinanceLogCode, number> = {
  new_member: 1,
  gain_membership: 2,
  lose_membership: 3,
  increase_balance: 10,
  deduct_membership_fee: 11,
  end_trial_membership: 12,
  manual_balance_correction: 13,
  remove_balance_on_archival: 14,
  start_trial_membership: 15,
  remove_exmember_balance: 17,
  grant_lastschrift: 20,
  revoke_lastschrift: 21,
  modify_lastschrift: 22,
  lastschrift_deleted: 23,
  lastschrift_transaction_issue: 30,
  lastschrift_transaction_success: 31,
  lastschrift_transaction_failure: 32,
  lastschrift_transaction_skip: 33,
  lastschrift_transaction_cancelled: 34,
  lastschrift_transaction_revoked: 35,
  honorary_membership_granted: 51,
  honorary_membership_revoked: 52,
  other: 99,
};

export function financeLogCodeValue(code: FinanceLogCode): number {
  return FINANCE_LOG_CODES[code];
}

export function financeLogCodeName(value: number): FinanceLogCode | null {
  for (const name of FINANCE_LOG_CODE_NAMES) {
    if (FINANCE_LOG_CODES[name] === value) return name;
  }
  return null;
}
