import type { FinalizeOutcome, SequenceType } from '../validation';

export const DD_EVENTS = {
  MANDATE_CREATED: 'direct_debit.mandate.created.v1',
  MANDATE_UPDATED: 'direct_debit.mandate.updated.v1',
  MANDATE_REVOKED: 'direct_debit.mandate.revoked.v1',
  MANDATE_DELETED: 'direct_debit.mandate.deleted.v1',
  TRANSACTION_ISSUED: 'direct_debit.transaction.issued.v1',
  TRANSACTION_FINALIZED: 'direct_debit.transaction.finalized.v1',
  TRANSACTION_SKIPPED: 'direct_debit.transaction.skipped.v1',
  TRANSACTION_ROLLED_BACK: 'direct_debit.transaction.rolled_back.v1',
} as const;

export interface MandateCreatedPayload {
  mandateId: string;
  personaId: string;
  mandateReference: string;
  donation: string;
}

export interface MandateUpdatedPayload {
  mandateId: string;
  personaId: string;
  changedFields: string[];
}

export interface MandateRevokedPayload {
  mandateId: string;
  personaId: string;
  /** Why the mandate ended: by request, a failed debit or a returned debit. */
  reason: 'revoked' | 'transaction_failed' | 'transaction_rolled_back';
}

export interface MandateDeletedPayload {
  mandateId: string;
  personaId: string;
  deletedTransactions: number;
}

export interface TransactionIssuedPayload {
  transactionId: string;
  mandateId: string;
  personaId: string;
  periodId: number;
  sequenceType: SequenceType;
  amount: string;
  paymentDate: string;
}

export interface TransactionFinalizedPayload {
  transactionId: string;
  mandateId: string;
  personaId: string;
  outcome: FinalizeOutcome;
  tally: string;
}

export interface TransactionSkippedPayload {
  transactionId: string;
  mandateId: string;
  personaId: string;
  periodId: number;
}

export interface TransactionRolledBackPayload {
  transactionId: string;
  mandateId: string;
  personaId: string;
  tally: string;
  debited: string;
}
