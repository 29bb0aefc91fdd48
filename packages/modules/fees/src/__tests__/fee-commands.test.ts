import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { RequestContext } from '@clubledger/core/auth/context';

// ── Hoisted mocks ────────────────────────────────────────────────────
const mocks = vi.hoisted(() => {
  const tx = {
    execute: vi.fn(),
    insert: vi.fn(),
    values: vi.fn(),
    returning: vi.fn(),
    update: vi.fn(),
    set: vi.fn(),
    where: vi.fn(),
    delete: vi.fn(),
  };
  tx.insert.mockReturnValue(tx);
  tx.values.mockReturnValue(tx);
  tx.update.mockReturnValue(tx);
  tx.set.mockReturnValue(tx);
  tx.where.mockResolvedValue(undefined);
  tx.delete.mockReturnValue(tx);
  return { tx, published: [] as Array<{ eventType: string; data: Record<string, unknown> }> };
});

vi.mock('@clubledger/db', () => ({
  rowsOf: (result: unknown) => Array.from(result as Iterable<Record<string, unknown>>),
  withTransaction: vi.fn(async (fn: (tx: unknown) => Promise<unknown>) => fn(mocks.tx)),
  eventFees: { id: 'id' },
  registrations: { id: 'id' },
}));

vi.mock('@clubledger/core/events/publish-with-outbox', () => ({
  publishWithOutbox: vi.fn(
    async (
      _ctx: unknown,
      fn: (tx: unknown) => Promise<{ result: unknown; events: Array<{ eventType: string; data: Record<string, unknown> }> }>,
    ) => {
      const { result, events } = await fn(mocks.tx);
      mocks.published.push(...events);
      return result;
    },
  ),
}));

vi.mock('@clubledger/core/observability/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

// ── Fixtures ──────────────────────────────────────────────────────────

const ctx: RequestContext = { actor: { id: 'user-1', name: 'Treasurer' }, requestId: 'req-1', permissions: ['fees.*'] };

const EVENT_ROW = { id: 'evt-1', is_locked: false, is_archived: false };
const PART_ROWS = [
  { id: 'p-wu', shortname: 'Wu' },
  { id: 'p-1h', shortname: '1.H.' },
];
const FIELD_ROWS = [{ field_name: 'is_child' }];

function feeRow(id: string, amount: string, condition: string | null, ast: unknown, kind = 'regular') {
  return {
    id,
    event_id: 'evt-1',
    title: `Fee ${id}`,
    kind,
    amount,
    condition,
    condition_ast: ast,
    valid_from: null,
    valid_until: null,
    notes: null,
  };
}

function registrationRow(id: string, parts: Record<string, string>, extra: Record<string, unknown> = {}) {
  return {
    id,
    persona_id: `persona-${id}`,
    is_member: true,
    fields: {},
    registered_at: new Date('2024-03-01T10:00:00Z'),
    amount_owed: '0.00',
    amount_paid: '0.00',
    is_orga: false,
    parts,
    ...extra,
  };
}

const PART_1H_AST = { kind: 'part', shortname: '1.H.' };
const CHILD_DISCOUNT_AST = { kind: 'and', left: PART_1H_AST, right: { kind: 'field', name: 'is_child' } };

beforeEach(() => {
  mocks.tx.execute.mockReset();
  mocks.tx.returning.mockReset();
  mocks.tx.set.mockClear();
  mocks.tx.values.mockClear();
  mocks.tx.delete.mockClear();
  mocks.tx.insert.mockClear();
  mocks.published.length = 0;
});

// ── createFee ─────────────────────────────────────────────────────────

describe('createFee', () => {
  it('stores the canonical condition and recomputes amounts owed', async () => {
    mocks.tx.execute
      .mockResolvedValueOnce([EVENT_ROW])
      .mockResolvedValueOnce(PART_ROWS)
      .mockResolvedValueOnce(FIELD_ROWS)
      .mockResolvedValueOnce([feeRow('fee-0', '123.00', 'part.1.H.', PART_1H_AST)])
      .mockResolvedValueOnce([
        feeRow('fee-0', '123.00', 'part.1.H.', PART_1H_AST),
        feeRow('fee-1', '-12.00', 'part.1.H. and field.is_child', CHILD_DISCOUNT_AST, 'discount'),
      ])
      .mockResolvedValueOnce([
        registrationRow('reg-1', { 'p-1h': 'participant' }, { fields: { is_child: true }, amount_owed: '123.00' }),
        registrationRow('reg-2', { 'p-1h': 'participant' }, { amount_owed: '123.00' }),
      ]);
    mocks.tx.returning.mockResolvedValueOnce([{ id: 'fee-1' }]);

    const { createFee } = await import('../commands/create-fee');
    const result = await createFee(ctx, {
      eventId: 'evt-1',
      title: 'Child discount',
      kind: 'discount',
      amount: '-12',
      condition: 'PART.1.H.  AND  field.is_child',
    });

    expect(result).toEqual({
      feeId: 'fee-1',
      condition: 'part.1.H. and field.is_child',
      amountOwedChanges: [{ registrationId: 'reg-1', previousAmountOwed: '123.00', amountOwed: '111.00' }],
    });
    expect(mocks.tx.values).toHaveBeenCalledWith(
      expect.objectContaining({
        eventId: 'evt-1',
        kind: 'discount',
        amount: '-12.00',
        condition: 'part.1.H. and field.is_child',
        conditionAst: CHILD_DISCOUNT_AST,
      }),
    );
    expect(mocks.tx.set).toHaveBeenCalledTimes(1);
    expect(mocks.tx.set).toHaveBeenCalledWith({ amountOwed: '111.00', updatedAt: expect.any(Date) });
    expect(mocks.published.map((e) => e.eventType)).toEqual([
      'fees.fee.created.v1',
      'fees.registration.amount_owed_changed.v1',
    ]);
  });

  it('rejects conditions referencing unknown fields', async () => {
    mocks.tx.execute
      .mockResolvedValueOnce([EVENT_ROW])
      .mockResolvedValueOnce(PART_ROWS)
      .mockResolvedValueOnce(FIELD_ROWS)
      .mockResolvedValueOnce([]);

    const { createFee } = await import('../commands/create-fee');
    await expect(
      createFee(ctx, { eventId: 'evt-1', title: 'X', kind: 'regular', amount: '5.00', condition: 'field.nope' }),
    ).rejects.toMatchObject({ code: 'FEE_CONDITION_INVALID', message: "Unknown field(s): 'nope'." });
    expect(mocks.tx.insert).not.toHaveBeenCalled();
  });

  it('refuses to change fees of a locked event', async () => {
    mocks.tx.execute
      .mockResolvedValueOnce([{ ...EVENT_ROW, is_locked: true }])
      .mockResolvedValueOnce(PART_ROWS)
      .mockResolvedValueOnce(FIELD_ROWS)
      .mockResolvedValueOnce([]);

    const { createFee } = await import('../commands/create-fee');
    await expect(
      createFee(ctx, { eventId: 'evt-1', title: 'Late', kind: 'surcharge', amount: '5.00' }),
    ).rejects.toMatchObject({ code: 'FEE_LOCKED', statusCode: 409 });
  });

  it('validates the amount format', async () => {
    const { createFee } = await import('../commands/create-fee');
    await expect(
      createFee(ctx, { eventId: 'evt-1', title: 'Bad', kind: 'regular', amount: '1.234' }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
    expect(mocks.tx.execute).not.toHaveBeenCalled();
  });

  it('requires the manage permission', async () => {
    const { createFee } = await import('../commands/create-fee');
    await expect(
      createFee(
        { ...ctx, permissions: ['fees.view'] },
        { eventId: 'evt-1', title: 'Base', kind: 'regular', amount: '5.00' },
      ),
    ).rejects.toMatchObject({ statusCode: 403 });
  });
});

// ── updateFee / deleteFee ─────────────────────────────────────────────

describe('updateFee', () => {
  it('keeps the stored condition when none is given', async () => {
    const stored = feeRow('fee-1', '10.50', 'part.Wu', { kind: 'part', shortname: 'Wu' });
    mocks.tx.execute
      .mockResolvedValueOnce([stored])
      .mockResolvedValueOnce([EVENT_ROW])
      .mockResolvedValueOnce(PART_ROWS)
      .mockResolvedValueOnce(FIELD_ROWS)
      .mockResolvedValueOnce([stored])
      .mockResolvedValueOnce([{ ...stored, amount: '12.00' }])
      .mockResolvedValueOnce([registrationRow('reg-1', { 'p-wu': 'applied' }, { amount_owed: '10.50' })]);

    const { updateFee } = await import('../commands/update-fee');
    const result = await updateFee(ctx, { feeId: 'fee-1', amount: '12' });

    expect(result.condition).toBe('part.Wu');
    expect(result.amountOwedChanges).toEqual([
      { registrationId: 'reg-1', previousAmountOwed: '10.50', amountOwed: '12.00' },
    ]);
    expect(mocks.tx.set).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({ amount: '12.00', condition: 'part.Wu', conditionAst: { kind: 'part', shortname: 'Wu' } }),
    );
  });

  it('rejects an inverted validity window against stored dates', async () => {
    const stored = { ...feeRow('fee-1', '10.00', null, { kind: 'literal', value: true }), valid_from: '2024-05-01' };
    mocks.tx.execute
      .mockResolvedValueOnce([stored])
      .mockResolvedValueOnce([EVENT_ROW])
      .mockResolvedValueOnce(PART_ROWS)
      .mockResolvedValueOnce(FIELD_ROWS)
      .mockResolvedValueOnce([stored]);

    const { updateFee } = await import('../commands/update-fee');
    await expect(updateFee(ctx, { feeId: 'fee-1', validUntil: '2024-04-01' })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
    });
  });

  it('reports a missing fee', async () => {
    mocks.tx.execute.mockResolvedValueOnce([]);
    const { updateFee } = await import('../commands/update-fee');
    await expect(updateFee(ctx, { feeId: 'nope', title: 'X' })).rejects.toMatchObject({ statusCode: 404 });
  });
});

describe('deleteFee', () => {
  it('recomputes without the deleted fee', async () => {
    const stored = feeRow('fee-1', '10.50', 'part.Wu', { kind: 'part', shortname: 'Wu' });
    mocks.tx.execute
      .mockResolvedValueOnce([stored])
      .mockResolvedValueOnce([EVENT_ROW])
      .mockResolvedValueOnce(PART_ROWS)
      .mockResolvedValueOnce(FIELD_ROWS)
      .mockResolvedValueOnce([stored])
      .mockResolvedValueOnce([registrationRow('reg-1', { 'p-wu': 'participant' }, { amount_owed: '10.50' })]);

    const { deleteFee } = await import('../commands/delete-fee');
    const result = await deleteFee(ctx, { feeId: 'fee-1' });

    expect(mocks.tx.delete).toHaveBeenCalledTimes(1);
    expect(result.amountOwedChanges).toEqual([
      { registrationId: 'reg-1', previousAmountOwed: '10.50', amountOwed: '0.00' },
    ]);
    expect(mocks.published[0]).toMatchObject({
      eventType: 'fees.fee.deleted.v1',
      data: { feeId: 'fee-1', eventId: 'evt-1', amount: '10.50' },
    });
  });
});

// ── bookRegistrationPayments ──────────────────────────────────────────

describe('bookRegistrationPayments', () => {
  it('accumulates several payments for one registration into one write', async () => {
    mocks.tx.execute.mockResolvedValueOnce([
      registrationRow('reg-1', {}, { amount_owed: '50.00', amount_paid: '10.00' }),
    ]);

    const { bookRegistrationPayments } = await import('../commands/book-registration-payments');
    const booked = await bookRegistrationPayments(ctx, {
      eventId: 'evt-1',
      payments: [
        { registrationId: 'reg-1', amount: '25.00', date: '2024-03-02' },
        { registrationId: 'reg-1', amount: '15.5', date: '2024-03-05' },
      ],
    });

    expect(booked.map((b) => b.amountPaid)).toEqual(['35.00', '50.50']);
    expect(mocks.tx.set).toHaveBeenCalledTimes(1);
    expect(mocks.tx.set).toHaveBeenCalledWith({
      amountPaid: '50.50',
      paymentDate: '2024-03-05',
      updatedAt: expect.any(Date),
    });
    expect(mocks.published).toHaveLength(2);
  });

  it('rejects zero payments before touching the database', async () => {
    const { bookRegistrationPayments } = await import('../commands/book-registration-payments');
    await expect(
      bookRegistrationPayments(ctx, {
        eventId: 'evt-1',
        payments: [{ registrationId: 'reg-1', amount: '0.00', date: '2024-03-02' }],
      }),
    ).rejects.toMatchObject({ code: 'ZERO_PAYMENT' });
    expect(mocks.tx.execute).not.toHaveBeenCalled();
  });

  it('rejects a refund that exceeds what was paid', async () => {
    mocks.tx.execute.mockResolvedValueOnce([
      registrationRow('reg-1', {}, { amount_owed: '50.00', amount_paid: '10.00' }),
    ]);
    const { bookRegistrationPayments } = await import('../commands/book-registration-payments');
    await expect(
      bookRegistrationPayments(ctx, {
        eventId: 'evt-1',
        payments: [{ registrationId: 'reg-1', amount: '-12.50', date: '2024-03-02' }],
      }),
    ).rejects.toMatchObject({
      code: 'AMOUNT_PAID_NEGATIVE',
      message: 'Refund would leave registration reg-1 with a paid amount of -2.50',
    });
    expect(mocks.tx.set).not.toHaveBeenCalled();
    expect(mocks.published).toHaveLength(0);
  });

  it('allows a refund down to exactly zero', async () => {
    mocks.tx.execute.mockResolvedValueOnce([
      registrationRow('reg-1', {}, { amount_owed: '50.00', amount_paid: '10.00' }),
    ]);
    const { bookRegistrationPayments } = await import('../commands/book-registration-payments');
    const booked = await bookRegistrationPayments(ctx, {
      eventId: 'evt-1',
      payments: [{ registrationId: 'reg-1', amount: '-10.00', date: '2024-03-02' }],
    });
    expect(booked[0].amountPaid).toBe('0.00');
  });

  it('rejects registrations of other events', async () => {
    mocks.tx.execute.mockResolvedValueOnce([]);
    const { bookRegistrationPayments } = await import('../commands/book-registration-payments');
    await expect(
      bookRegistrationPayments(ctx, {
        eventId: 'evt-1',
        payments: [{ registrationId: 'reg-x', amount: '5.00', date: '2024-03-02' }],
      }),
    ).rejects.toMatchObject({ statusCode: 404 });
  });
});

// ── Stored rows ───────────────────────────────────────────────────────

describe('stored fee data', () => {
  it('rejects a fee whose compiled condition is unreadable', async () => {
    const { feeFromRow } = await import('../helpers/load-event');
    expect(() => feeFromRow(feeRow('fee-9', '1.00', 'part.Wu', { kind: 'bogus' }))).toThrow(
      expect.objectContaining({
        code: 'FEE_DATA_CORRUPT',
        message: 'Fee fee-9 has no valid compiled condition',
      }),
    );
  });

  it('keeps the source text next to a valid compiled condition', async () => {
    const { feeFromRow } = await import('../helpers/load-event');
    const fee = feeFromRow(feeRow('fee-0', '123.00', 'part.1.H.', PART_1H_AST));
    expect(fee.ast).toEqual(PART_1H_AST);
    expect(fee.condition).toBe('part.1.H.');
  });

  it('rejects a registration without a registration date', async () => {
    const { registrationFromRow } = await import('../helpers/load-event');
    expect(() => registrationFromRow(registrationRow('reg-9', {}, { registered_at: null }))).toThrow(
      expect.objectContaining({
        code: 'FEE_DATA_CORRUPT',
        message: 'Registration reg-9 has no registration date',
      }),
    );
  });

  it('fails fee computation when a stored condition is unreadable', async () => {
    mocks.tx.execute
      .mockResolvedValueOnce([EVENT_ROW])
      .mockResolvedValueOnce(PART_ROWS)
      .mockResolvedValueOnce(FIELD_ROWS)
      .mockResolvedValueOnce([feeRow('fee-9', '1.00', 'part.Wu', null)]);

    const { precomputeFee } = await import('../queries/precompute-fee');
    await expect(
      precomputeFee(ctx, { eventId: 'evt-1', isMember: true, parts: {}, fields: {}, asOf: '2024-03-01' }),
    ).rejects.toMatchObject({ code: 'FEE_DATA_CORRUPT', statusCode: 500 });
  });
});

// ── Queries ───────────────────────────────────────────────────────────

describe('validateFeeCondition', () => {
  it('returns parse errors instead of throwing', async () => {
    mocks.tx.execute
      .mockResolvedValueOnce([EVENT_ROW])
      .mockResolvedValueOnce(PART_ROWS)
      .mockResolvedValueOnce(FIELD_ROWS)
      .mockResolvedValueOnce([]);

    const { validateFeeCondition } = await import('../queries/validate-fee-condition');
    const result = await validateFeeCondition(ctx, { eventId: 'evt-1', condition: 'part.Wu and' });
    expect(result).toEqual({
      valid: false,
      message: 'Unexpected end of condition at position 11',
      position: 11,
    });
  });
});

describe('precomputeFee', () => {
  it('prices a hypothetical registration', async () => {
    mocks.tx.execute
      .mockResolvedValueOnce([EVENT_ROW])
      .mockResolvedValueOnce(PART_ROWS)
      .mockResolvedValueOnce(FIELD_ROWS)
      .mockResolvedValueOnce([
        feeRow('fee-0', '123.00', 'part.1.H.', PART_1H_AST),
        feeRow('fee-1', '-12.00', 'part.1.H. and field.is_child', CHILD_DISCOUNT_AST, 'discount'),
      ]);

    const { precomputeFee } = await import('../queries/precompute-fee');
    const fee = await precomputeFee(ctx, {
      eventId: 'evt-1',
      isMember: true,
      parts: { 'p-1h': 'applied' },
      fields: { is_child: true },
      asOf: '2024-03-01',
    });
    expect(fee.amountOwed).toBe('111.00');
    expect(fee.byKind).toEqual({ regular: '123.00', discount: '-12.00' });
  });
});
