// Module metadata
export const MODULE_KEY = 'direct_debit' as const;
export const MODULE_NAME = 'SEPA Direct Debit';
export const MODULE_VERSION = '0.1.0';

/** SQL tables owned by this module */
export const MODULE_TABLES = ['dd_mandates', 'dd_transactions'] as const;

// Commands
export { createMandate, checkDonation } from './commands/create-mandate';
export type { CreateMandateResult } from './commands/create-mandate';
export { updateMandate } from './commands/update-mandate';
export type { UpdateMandateResult } from './commands/update-mandate';
export { revokeMandate } from './commands/revoke-mandate';
export type { RevokeMandateResult } from './commands/revoke-mandate';
export { deleteMandate, mandateDeletionBlockers, MANDATE_RETENTION_DAYS } from './commands/delete-mandate';
export type { DeleteMandateResult, DeletionBlocker } from './commands/delete-mandate';
export { generateTransactions } from './commands/generate-transactions';
export type { IssuedTransaction } from './commands/generate-transactions';
export { finalizeTransactions } from './commands/finalize-transactions';
export type { FinalizedTransaction } from './commands/finalize-transactions';
export { skipTransaction } from './commands/skip-transaction';
export type { SkipTransactionResult } from './commands/skip-transaction';
export { rollbackTransaction } from './commands/rollback-transaction';
export type { RollbackTransactionResult } from './commands/rollback-transaction';

// Queries
export { listMandates } from './queries/list-mandates';
export type { ListMandatesResult, MandateListItem } from './queries/list-mandates';
export { getMandate } from './queries/get-mandate';
export type { MandateDetail } from './queries/get-mandate';
export { listTransactions } from './queries/list-transactions';
export type { ListTransactionsResult } from './queries/list-transactions';
export { downloadSepaPain } from './queries/download-sepa-pain';
export type { ExportedTransaction, SepaPainExport } from './queries/download-sepa-pain';

// Helpers
export { normalizeIban, ibanProblem, isValidIban, parseIban, formatIban } from './helpers/iban';
export { calculatePaymentDate, easterSunday } from './helpers/payment-date';
export { assessMandate, maySkip, obligationCents, sequenceTypeFor } from './helpers/open-for-debit';
export type { DebitAssessment, DebitBlockReason, MandateState, TransactionHistoryItem } from './helpers/open-for-debit';
export { buildSepaPain, mandateSignatureDate, PAIN_NAMESPACE } from './helpers/sepa-pain';
export type { PainDocument, PainTransaction } from './helpers/sepa-pain';
export type { DebitTransaction } from './helpers/load-transaction';

// Errors
export {
  InvalidIbanError,
  ActiveMandateExistsError,
  OpenTransactionExistsError,
  TransactionAlreadyFinalizedError,
  TransactionNotSuccessfulError,
  MandateRevokedError,
  MandateDeletionBlockedError,
  SkipNotAllowedError,
  ArchivedPersonaError,
  NothingToExportError,
} from './errors';

// Events
export { DD_EVENTS } from './events/types';
export type {
  MandateCreatedPayload,
  MandateUpdatedPayload,
  MandateRevokedPayload,
  MandateDeletedPayload,
  TransactionIssuedPayload,
  TransactionFinalizedPayload,
  TransactionSkippedPayload,
  TransactionRolledBackPayload,
} from './events/types';

// Validation
export {
  TRANSACTION_STATUSES,
  SEQUENCE_TYPES,
  FINALIZE_OUTCOMES,
  createMandateSchema,
  updateMandateSchema,
  revokeMandateSchema,
  deleteMandateSchema,
  listMandatesSchema,
  generateTransactionsSchema,
  finalizeTransactionsSchema,
  skipTransactionSchema,
  rollbackTransactionSchema,
  downloadSepaPainSchema,
  listTransactionsSchema,
} from './validation';
export type {
  TransactionStatus,
  SequenceType,
  FinalizeOutcome,
  CreateMandateInput,
  UpdateMandateInput,
  RevokeMandateInput,
  DeleteMandateInput,
  ListMandatesInput,
  GenerateTransactionsInput,
  FinalizeTransactionsInput,
  SkipTransactionInput,
  RollbackTransactionInput,
  DownloadSepaPainInput,
  ListTransactionsInput,
} from './validation';
