import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { RequestContext } from '@clubledger/core/auth/context';
import { loadFinanceConfig, setFinanceConfig } from '@clubledger/core/config/finance-config';
import { setLedgerApi } from '@clubledger/core/helpers/ledger-api';

// ── Hoisted mocks ────────────────────────────────────────────────────
const mocks = vi.hoisted(() => {
  const tx = {
    execute: vi.fn(),
    insert: vi.fn(),
    values: vi.fn(),
    update: vi.fn(),
    set: vi.fn(),
    where: vi.fn(),
    delete: vi.fn(),
  };
  tx.insert.mockReturnValue(tx);
  tx.values.mockReturnValue(tx);
  tx.update.mockReturnValue(tx);
  tx.set.mockReturnValue(tx);
  tx.where.mockReturnValue(tx);
  tx.delete.mockReturnValue(tx);
  const ledger = { credit: vi.fn(), debit: vi.fn(), note: vi.fn() };
  return { tx, ledger, published: [] as Array<{ eventType: string; data: Record<string, unknown> }> };
});

vi.mock('@clubledger/db', () => ({
  rowsOf: (result: unknown) => Array.from(result as Iterable<Record<string, unknown>>),
  withTransaction: vi.fn(async (fn: (tx: unknown) => Promise<unknown>) => fn(mocks.tx)),
  ddMandates: { id: 'id' },
  ddTransactions: { id: 'id', mandateId: 'mandate_id' },
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

const ctx: RequestContext = {
  actor: { id: 'user-1', name: 'Treasurer' },
  requestId: 'req-1',
  permissions: ['direct_debit.*', 'finance.view'],
};

function mandateRow(id: string, extra: Record<string, unknown> = {}) {
  return {
    id,
    persona_id: `p-${id}`,
    mandate_reference: `CL-${id}`,
    iban: 'DE89370400440532013000',
    donation: '20.00',
    account_owner: null,
    account_address: null,
    granted_at: '2015-01-10T00:00:00Z',
    revoked_at: null,
    notes: null,
    given_names: 'Anna',
    family_name: 'Schmidt',
    ...extra,
  };
}

function historyRow(id: string, mandateId: string, status: string, periodId: number) {
  return { id, mandate_id: mandateId, status, period_id: periodId, issued_at: '2024-01-15T00:00:00Z' };
}

function daysAgo(days: number): string {
  return new Date(Date.now() - days * 24 * 60 * 60 * 1000).toISOString();
}

beforeEach(() => {
  mocks.tx.execute.mockReset();
  mocks.tx.values.mockClear();
  mocks.tx.set.mockClear();
  mocks.tx.delete.mockClear();
  mocks.ledger.note.mockReset();
  mocks.ledger.note.mockResolvedValue({
    id: 'log-1',
    code: 'grant_lastschrift',
    personaId: null,
    delta: null,
    newBalance: null,
    transactionDate: null,
    changeNote: null,
  });
  mocks.published.length = 0;
  setFinanceConfig(loadFinanceConfig({}));
  setLedgerApi(mocks.ledger);
});

// ── createMandate ─────────────────────────────────────────────────────

describe('createMandate', () => {
  it('stores the normalized IBAN with the default donation', async () => {
    mocks.tx.execute.mockResolvedValueOnce([{ id: 'p-1', is_archived: false }]).mockResolvedValueOnce([]);

    const { createMandate } = await import('../commands/create-mandate');
    const result = await createMandate(ctx, { personaId: 'p-1', iban: 'de89 3704 0044 0532 0130 00' });

    expect(result).toMatchObject({ personaId: 'p-1', iban: 'DE89370400440532013000', donation: '20.00' });
    expect(result.mandateReference).toBe(`CL-${result.mandateId}`);
    expect(mocks.tx.values).toHaveBeenCalledWith(
      expect.objectContaining({
        id: result.mandateId,
        personaId: 'p-1',
        iban: 'DE89370400440532013000',
        donation: '20.00',
      }),
    );
    expect(mocks.ledger.note).toHaveBeenCalledWith(mocks.tx, ctx, {
      personaId: 'p-1',
      code: 'grant_lastschrift',
      changeNote: result.mandateReference,
    });
    expect(mocks.published.map((e) => e.eventType)).toEqual(['direct_debit.mandate.created.v1']);
  });

  it('rejects an invalid IBAN before touching the database', async () => {
    const { createMandate } = await import('../commands/create-mandate');
    await expect(createMandate(ctx, { personaId: 'p-1', iban: 'DE00370400440532013000' })).rejects.toMatchObject({
      code: 'INVALID_IBAN',
    });
    expect(mocks.tx.execute).not.toHaveBeenCalled();
  });

  it('rejects donations below the minimum', async () => {
    const { createMandate } = await import('../commands/create-mandate');
    await expect(
      createMandate(ctx, { personaId: 'p-1', iban: 'DE89370400440532013000', donation: '1.00' }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('refuses a second active mandate', async () => {
    mocks.tx.execute.mockResolvedValueOnce([{ id: 'p-1', is_archived: false }]).mockResolvedValueOnce([{ id: 'm-1' }]);
    const { createMandate } = await import('../commands/create-mandate');
    await expect(createMandate(ctx, { personaId: 'p-1', iban: 'DE89370400440532013000' })).rejects.toMatchObject({
      code: 'ACTIVE_MANDATE_EXISTS',
    });
    expect(mocks.tx.values).not.toHaveBeenCalled();
  });

  it('refuses archived personas', async () => {
    mocks.tx.execute.mockResolvedValueOnce([{ id: 'p-1', is_archived: true }]);
    const { createMandate } = await import('../commands/create-mandate');
    await expect(createMandate(ctx, { personaId: 'p-1', iban: 'DE89370400440532013000' })).rejects.toMatchObject({
      code: 'PERSONA_ARCHIVED',
    });
  });

  it('requires the manage permission', async () => {
    const { createMandate } = await import('../commands/create-mandate');
    await expect(
      createMandate({ ...ctx, permissions: ['finance.view'] }, { personaId: 'p-1', iban: 'DE89370400440532013000' }),
    ).rejects.toMatchObject({ statusCode: 403 });
  });
});

// ── updateMandate ─────────────────────────────────────────────────────

describe('updateMandate', () => {
  it('writes only the changed fields', async () => {
    mocks.tx.execute.mockResolvedValueOnce([mandateRow('m-1')]);
    const { updateMandate } = await import('../commands/update-mandate');
    const result = await updateMandate(ctx, {
      mandateId: 'm-1',
      iban: 'GB82 WEST 1234 5698 7654 32',
      donation: '25',
      notes: null,
    });

    expect(result.changedFields).toEqual(['donation', 'iban']);
    expect(mocks.tx.set).toHaveBeenCalledWith({
      iban: 'GB82WEST12345698765432',
      donation: '25.00',
      updatedAt: expect.any(Date),
    });
    expect(mocks.ledger.note).toHaveBeenCalledWith(mocks.tx, ctx, {
      personaId: 'p-m-1',
      code: 'modify_lastschrift',
      changeNote: 'donation, iban',
    });
  });

  it('does nothing when every value is unchanged', async () => {
    mocks.tx.execute.mockResolvedValueOnce([mandateRow('m-1')]);
    const { updateMandate } = await import('../commands/update-mandate');
    const result = await updateMandate(ctx, { mandateId: 'm-1', donation: '20.00' });

    expect(result.changedFields).toEqual([]);
    expect(mocks.tx.set).not.toHaveBeenCalled();
    expect(mocks.published).toEqual([]);
  });

  it('refuses revoked mandates', async () => {
    mocks.tx.execute.mockResolvedValueOnce([mandateRow('m-1', { revoked_at: '2024-01-01T00:00:00Z' })]);
    const { updateMandate } = await import('../commands/update-mandate');
    await expect(updateMandate(ctx, { mandateId: 'm-1', donation: '30.00' })).rejects.toMatchObject({
      code: 'MANDATE_REVOKED',
    });
  });
});

// ── revokeMandate ─────────────────────────────────────────────────────

describe('revokeMandate', () => {
  it('revokes and logs the note', async () => {
    mocks.tx.execute.mockResolvedValueOnce([mandateRow('m-1')]).mockResolvedValueOnce([
      historyRow('t-1', 'm-1', 'success', 8),
    ]);
    const { revokeMandate } = await import('../commands/revoke-mandate');
    const result = await revokeMandate(ctx, { mandateId: 'm-1', note: 'Member asked' });

    expect(result.mandateId).toBe('m-1');
    expect(mocks.tx.set).toHaveBeenCalledWith({ revokedAt: expect.any(Date), updatedAt: expect.any(Date) });
    expect(mocks.ledger.note).toHaveBeenCalledWith(mocks.tx, ctx, {
      personaId: 'p-m-1',
      code: 'revoke_lastschrift',
      changeNote: 'Member asked',
    });
    expect(mocks.published[0]).toMatchObject({
      eventType: 'direct_debit.mandate.revoked.v1',
      data: { mandateId: 'm-1', personaId: 'p-m-1', reason: 'revoked' },
    });
  });

  it('is blocked by an open transaction', async () => {
    mocks.tx.execute.mockResolvedValueOnce([mandateRow('m-1')]).mockResolvedValueOnce([
      historyRow('t-1', 'm-1', 'open', 10),
    ]);
    const { revokeMandate } = await import('../commands/revoke-mandate');
    await expect(revokeMandate(ctx, { mandateId: 'm-1' })).rejects.toMatchObject({
      message: 'Mandate m-1 has an open transaction',
    });
    expect(mocks.tx.set).not.toHaveBeenCalled();
  });

  it('reports unknown mandates', async () => {
    mocks.tx.execute.mockResolvedValueOnce([]);
    const { revokeMandate } = await import('../commands/revoke-mandate');
    await expect(revokeMandate(ctx, { mandateId: 'm-9' })).rejects.toMatchObject({ statusCode: 404 });
  });
});

// ── deleteMandate ─────────────────────────────────────────────────────

describe('mandateDeletionBlockers', () => {
  it('lists every reason that keeps a mandate', async () => {
    const { mandateDeletionBlockers } = await import('../commands/delete-mandate');
    const now = new Date('2024-06-01T00:00:00Z');
    const base = { id: 'm-1', grantedAt: new Date('2015-01-01T00:00:00Z'), donationCents: 2000 };
    const open = [{ id: 't-1', status: 'open' as const, periodId: 10, issuedAt: new Date('2024-05-01T00:00:00Z') }];

    expect(mandateDeletionBlockers({ ...base, revokedAt: null }, [], now)).toEqual(['revoked_at']);
    expect(mandateDeletionBlockers({ ...base, revokedAt: new Date('2024-01-01T00:00:00Z') }, open, now)).toEqual([
      'revoked_at',
      'transactions',
      'open_transactions',
    ]);
    expect(mandateDeletionBlockers({ ...base, revokedAt: new Date('2022-01-01T00:00:00Z') }, [], now)).toEqual([]);
  });

  it('lets cascade deletion past finalized history only after retention', async () => {
    const { mandateDeletionBlockers } = await import('../commands/delete-mandate');
    const now = new Date('2024-06-01T00:00:00Z');
    const base = { id: 'm-1', grantedAt: new Date('2015-01-01T00:00:00Z'), donationCents: 2000 };
    const done = [{ id: 't-1', status: 'success' as const, periodId: 8, issuedAt: new Date('2021-10-01T00:00:00Z') }];
    const open = [{ id: 't-2', status: 'open' as const, periodId: 9, issuedAt: new Date('2022-02-01T00:00:00Z') }];
    const longRevoked = { ...base, revokedAt: new Date('2022-01-01T00:00:00Z') };
    const recentlyRevoked = { ...base, revokedAt: new Date('2024-01-01T00:00:00Z') };

    expect(mandateDeletionBlockers(longRevoked, done, now)).toEqual(['transactions']);
    expect(mandateDeletionBlockers(longRevoked, done, now, { cascade: true })).toEqual([]);
    expect(mandateDeletionBlockers(recentlyRevoked, done, now, { cascade: true })).toEqual(['revoked_at', 'transactions']);
    expect(mandateDeletionBlockers(longRevoked, open, now, { cascade: true })).toEqual(['open_transactions']);
  });
});

describe('deleteMandate', () => {
  it('deletes a long revoked mandate without transactions', async () => {
    mocks.tx.execute.mockResolvedValueOnce([mandateRow('m-1', { revoked_at: daysAgo(800) })]).mockResolvedValueOnce([]);
    const { deleteMandate } = await import('../commands/delete-mandate');
    await deleteMandate(ctx, { mandateId: 'm-1' });

    expect(mocks.tx.delete).toHaveBeenCalledTimes(1);
    expect(mocks.ledger.note).toHaveBeenCalledWith(mocks.tx, ctx, {
      personaId: 'p-m-1',
      code: 'lastschrift_deleted',
      changeNote: 'CL-m-1',
    });
  });

  it('reports the blockers', async () => {
    mocks.tx.execute.mockResolvedValueOnce([mandateRow('m-1')]).mockResolvedValueOnce([
      historyRow('t-1', 'm-1', 'success', 8),
    ]);
    const { deleteMandate } = await import('../commands/delete-mandate');
    await expect(deleteMandate(ctx, { mandateId: 'm-1' })).rejects.toMatchObject({
      code: 'MANDATE_DELETION_BLOCKED',
      message: 'Deletion of mandate m-1 blocked by revoked_at, transactions',
    });
    expect(mocks.tx.delete).not.toHaveBeenCalled();
  });

  it('deletes finalized transactions with the mandate on cascade', async () => {
    mocks.tx.execute
      .mockResolvedValueOnce([mandateRow('m-1', { revoked_at: daysAgo(800) })])
      .mockResolvedValueOnce([historyRow('t-1', 'm-1', 'success', 8), historyRow('t-2', 'm-1', 'failure', 9)]);
    const { deleteMandate } = await import('../commands/delete-mandate');
    const result = await deleteMandate(ctx, { mandateId: 'm-1', cascade: true });

    expect(result).toEqual({ mandateId: 'm-1', personaId: 'p-m-1', deletedTransactions: 2 });
    expect(mocks.tx.delete).toHaveBeenCalledTimes(2);
    expect(mocks.tx.delete.mock.calls[0][0]).toEqual({ id: 'id', mandateId: 'mandate_id' });
    expect(mocks.tx.delete.mock.calls[1][0]).toEqual({ id: 'id' });
    expect(mocks.published.at(-1)?.data).toEqual({ mandateId: 'm-1', personaId: 'p-m-1', deletedTransactions: 2 });
  });

  it('keeps history without cascade', async () => {
    mocks.tx.execute
      .mockResolvedValueOnce([mandateRow('m-1', { revoked_at: daysAgo(800) })])
      .mockResolvedValueOnce([historyRow('t-1', 'm-1', 'success', 8)]);
    const { deleteMandate } = await import('../commands/delete-mandate');
    await expect(deleteMandate(ctx, { mandateId: 'm-1' })).rejects.toMatchObject({
      message: 'Deletion of mandate m-1 blocked by transactions',
    });
    expect(mocks.tx.delete).not.toHaveBeenCalled();
  });
});
