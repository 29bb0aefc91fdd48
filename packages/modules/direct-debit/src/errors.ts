import { AppError, ConflictError } from '@clubledger/shared';

export class InvalidIbanError extends AppError {
  constructor(iban: string, reason: string) {
    super('INVALID_IBAN', `Invalid IBAN "${iban}": ${reason}`, 400, [{ field: 'iban', message: reason }]);
  }
}

export class ActiveMandateExistsError extends ConflictError {
  constructor(personaId: string, mandateId: string) {
    super(`Persona ${personaId} already has active mandate ${mandateId}`, 'ACTIVE_MANDATE_EXISTS');
  }
}

export class OpenTransactionExistsError extends ConflictError {
  constructor(mandateId: string) {
    super(`Mandate ${mandateId} has an open transaction`, 'OPEN_TRANSACTION_EXISTS');
  }
}

export class TransactionAlreadyFinalizedError extends ConflictError {
  constructor(transactionId: string, status: string) {
    super(`Transaction ${transactionId} is already ${status}`, 'TRANSACTION_ALREADY_FINALIZED');
  }
}

export class TransactionNotSuccessfulError extends ConflictError {
  constructor(transactionId: string, status: string) {
    super(`Transaction ${transactionId} is ${status}; only successful transactions can be rolled back`, 'TRANSACTION_NOT_SUCCESSFUL');
  }
}

export class MandateRevokedError extends ConflictError {
  constructor(mandateId: string) {
    super(`Mandate ${mandateId} is revoked`, 'MANDATE_REVOKED');
  }
}

export class MandateDeletionBlockedError extends ConflictError {
  constructor(
    mandateId: string,
    public readonly blockers: string[],
  ) {
    super(`Deletion of mandate ${mandateId} blocked by ${blockers.join(', ')}`, 'MANDATE_DELETION_BLOCKED');
  }
}

/** Skipping would leave the mandate unused long enough to expire. */
export class SkipNotAllowedError extends ConflictError {
  constructor(mandateId: string) {
    super(`Mandate ${mandateId} has not been used recently enough to be skipped`, 'SKIP_NOT_ALLOWED');
  }
}

export class ArchivedPersonaError extends ConflictError {
  constructor(personaId: string) {
    super(`Persona ${personaId} is archived`, 'PERSONA_ARCHIVED');
  }
}

export class NothingToExportError extends ConflictError {
  constructor() {
    super('There are no open transactions to export', 'NOTHING_TO_EXPORT');
  }
}
