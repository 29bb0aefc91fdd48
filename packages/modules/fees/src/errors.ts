import { AppError, ConflictError, ConsistencyError } from '@clubledger/shared';

export class FeeConditionError extends AppError {
  constructor(
    message: string,
    public readonly position?: number,
  ) {
    super(
      'FEE_CONDITION_INVALID',
      position === undefined ? message : `${message} at position ${position}`,
      400,
      [{ field: 'condition', message }],
    );
  }
}

export class FeeLockedError extends ConflictError {
  constructor(eventId: string) {
    super(`Fees of event ${eventId} are frozen because the event is locked or archived`, 'FEE_LOCKED');
  }
}

export class ZeroPaymentError extends AppError {
  constructor(registrationId: string) {
    super('ZERO_PAYMENT', `Payment for registration ${registrationId} must not be zero`, 400);
  }
}

export class NegativeAmountPaidError extends ConflictError {
  constructor(registrationId: string, amountPaid: string) {
    super(
      `Refund would leave registration ${registrationId} with a paid amount of ${amountPaid}`,
      'AMOUNT_PAID_NEGATIVE',
    );
  }
}

/** A stored fee or registration row that cannot be evaluated. */
export class StoredFeeDataError extends ConsistencyError {
  constructor(message: string) {
    super('FEE_DATA_CORRUPT', message);
  }
}
