// Module metadata
export const MODULE_KEY = 'finance' as const;
export const MODULE_NAME = 'Member Finances';
export const MODULE_VERSION = '0.1.0';

/** SQL tables owned by this module */
export const MODULE_TABLES = ['finance_log', 'org_periods'] as const;

// Registration
export { registerLedgerApi } from './register';
export { createDrizzleLedgerApi, lockAccounts, applyTransition, transitionEvents } from './internal-api';
export type { AppliedTransition } from './internal-api';

// Commands
export { recordMoneyTransfers } from './commands/record-money-transfers';
export type { MoneyTransferResult } from './commands/record-money-transfers';
export { correctBalance } from './commands/correct-balance';
export type { CorrectBalanceResult } from './commands/correct-balance';
export { changeMembership } from './commands/change-membership';
export type { ChangeMembershipResult } from './commands/change-membership';
export { archivePersona } from './commands/archive-persona';
export type { ArchivePersonaResult } from './commands/archive-persona';
export { runSemesterBilling } from './commands/run-semester-billing';
export type { SemesterBillingResult } from './commands/run-semester-billing';

// Queries
export { listFinanceLog } from './queries/list-finance-log';
export type { FinanceLogItem, ListFinanceLogResult } from './queries/list-finance-log';
export { getFinanceStatistics } from './queries/get-finance-statistics';
export type { FinanceStatistics } from './queries/get-finance-statistics';
export { getMemberAccount } from './queries/get-member-account';
export type { MemberAccountView } from './queries/get-member-account';
export { getLedgerReconciliation } from './queries/get-ledger-reconciliation';
export type { LedgerReconciliation, ReconciliationMismatch } from './queries/get-ledger-reconciliation';

// Ledger engine
export {
  membershipState,
  creditPayment,
  debitBalance,
  correctBalance as correctAccountBalance,
  chargePeriodFee,
  changeMembership as changeAccountMembership,
  archiveAccount,
  assertLedgerConsistency,
} from './helpers/ledger';
export type {
  MemberAccount,
  MembershipState,
  PlannedEntry,
  LedgerTransition,
  PeriodFeeOutcome,
} from './helpers/ledger';

// Errors
export {
  LedgerConsistencyError,
  InsufficientBalanceError,
  PersonaArchivedError,
  PersonaIsMemberError,
  PeriodAlreadyBilledError,
  MandateHasOpenTransactionError,
} from './errors';

// Events
export { FINANCE_EVENTS } from './events/types';
export type { BalanceChangedPayload, MembershipChangedPayload, SemesterBilledPayload } from './events/types';

// Validation
export {
  recordMoneyTransfersSchema,
  correctBalanceSchema,
  changeMembershipSchema,
  archivePersonaSchema,
  listFinanceLogSchema,
} from './validation';
export type {
  RecordMoneyTransfersInput,
  CorrectBalanceInput,
  ChangeMembershipInput,
  ArchivePersonaInput,
  ListFinanceLogInput,
} from './validation';
