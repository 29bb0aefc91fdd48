import { ConflictError, ConsistencyError } from '@clubledger/shared';

/** A balance change would break the ledger invariants; aborts the transaction. */
export class LedgerConsistencyError extends ConsistencyError {
  constructor(
    message: string,
    public readonly personaId: string,
  ) {
    super('LEDGER_CONSISTENCY', `Ledger inconsistency for persona ${personaId}: ${message}`);
  }
}

export class InsufficientBalanceError extends ConflictError {
  constructor(personaId: string, balance: string, amount: string) {
    super(`Balance ${balance} of persona ${personaId} cannot cover ${amount}`, 'INSUFFICIENT_BALANCE');
  }
}

export class PersonaArchivedError extends ConflictError {
  constructor(personaId: string) {
    super(`Persona ${personaId} is archived`, 'PERSONA_ARCHIVED');
  }
}

export class PersonaIsMemberError extends ConflictError {
  constructor(personaId: string) {
    super(`Persona ${personaId} is still a member and cannot be archived`, 'PERSONA_IS_MEMBER');
  }
}

export class PeriodAlreadyBilledError extends ConflictError {
  constructor(periodId: number) {
    super(`Period ${periodId} has already been billed`, 'PERIOD_ALREADY_BILLED');
  }
}

/** Direct debit cannot end while a transaction of the mandate awaits collection. */
export class MandateHasOpenTransactionError extends ConflictError {
  constructor(personaId: string, mandateId: string) {
    super(
      `Mandate ${mandateId} of persona ${personaId} has an open transaction; finalize or cancel it first`,
      'OPEN_TRANSACTION_EXISTS',
    );
  }
}
