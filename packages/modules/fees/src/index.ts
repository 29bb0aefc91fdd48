// Module metadata
export const MODULE_KEY = 'fees' as const;
export const MODULE_NAME = 'Event Fees';
export const MODULE_VERSION = '0.1.0';

/** SQL tables owned by this module */
export const MODULE_TABLES = ['event_fees'] as const;

// Commands
export { createFee } from './commands/create-fee';
export type { FeeMutationResult } from './commands/create-fee';
export { updateFee } from './commands/update-fee';
export { deleteFee } from './commands/delete-fee';
export { recomputeRegistrationFees } from './commands/recompute-registration-fees';
export type { RecomputeResult } from './commands/recompute-registration-fees';
export { bookRegistrationPayments } from './commands/book-registration-payments';
export type { BookedPayment } from './commands/book-registration-payments';

// Queries
export { listFees } from './queries/list-fees';
export type { FeeListItem, ListFeesResult } from './queries/list-fees';
export { getRegistrationFee } from './queries/get-registration-fee';
export type { RegistrationFeeDetail } from './queries/get-registration-fee';
export { precomputeFee } from './queries/precompute-fee';
export { getFeeStats } from './queries/get-fee-stats';
export { validateFeeCondition } from './queries/validate-fee-condition';
export type { ConditionCheckResult } from './queries/validate-fee-condition';

// Condition language
export {
  parseCondition,
  evaluateCondition,
  serializeCondition,
  checkCondition,
  compileCondition,
  isFieldTruthy,
  ALWAYS,
} from './condition';
export type { ConditionNode, ConditionContext } from './condition';

// Fee computation
export { computeFees, totalOwed, computeRegistrationFee, isFeeValidOn } from './helpers/compute-fees';
export type { FeeDefinition, FeeComputation, RegistrationFee } from './helpers/compute-fees';
export { computeFeeStats } from './helpers/fee-stats';
export type { FeeStats, FeeKindStats } from './helpers/fee-stats';
export { buildConditionContext, hasToPay } from './helpers/fee-context';
export type { EventPartInfo, RegistrationSnapshot } from './helpers/fee-context';

// Errors
export {
  FeeConditionError,
  FeeLockedError,
  NegativeAmountPaidError,
  StoredFeeDataError,
  ZeroPaymentError,
} from './errors';

// Events
export { FEE_EVENTS } from './events/types';
export type { FeeChangedPayload, AmountOwedChangedPayload, PaymentBookedPayload } from './events/types';

// Validation
export {
  FEE_KINDS,
  PART_STATUSES,
  PAYING_STATUSES,
  createFeeSchema,
  updateFeeSchema,
  deleteFeeSchema,
  recomputeFeesSchema,
  bookPaymentsSchema,
  precomputeFeeSchema,
  checkConditionSchema,
} from './validation';
export type {
  FeeKind,
  PartStatus,
  CreateFeeInput,
  UpdateFeeInput,
  DeleteFeeInput,
  RecomputeFeesInput,
  BookPaymentsInput,
  PrecomputeFeeInput,
  CheckConditionInput,
} from './validation';
