export const FEE_EVENTS = {
  FEE_CREATED: 'fees.fee.created.v1',
  FEE_UPDATED: 'fees.fee.updated.v1',
  FEE_DELETED: 'fees.fee.deleted.v1',
  AMOUNT_OWED_CHANGED: 'fees.registration.amount_owed_changed.v1',
  PAYMENT_BOOKED: 'fees.registration.payment_booked.v1',
} as const;

export interface FeeChangedPayload {
  feeId: string;
  eventId: string;
  kind: string;
  amount: string;
  condition: string | null;
}

export interface AmountOwedChangedPayload {
  registrationId: string;
  eventId: string;
  previousAmountOwed: string;
  amountOwed: string;
}

export interface PaymentBookedPayload {
  registrationId: string;
  eventId: string;
  amount: string;
  amountPaid: string;
  date: string;
}
