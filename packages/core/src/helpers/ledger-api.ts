import type { FinanceLogCode } from '@clubledger/shared';
import type { Transaction } from '@clubledger/db';
import type { RequestContext } from '../auth/context';

// ── Input types ─────────────────────────────────────────────────

export interface BalanceChangeInput {
  personaId: string;
  /** Positive decimal amount; the direction comes from the method. */
  amount: string;
  code: FinanceLogCode;
  transactionDate?: string | null;
  changeNote?: string | null;
}

export interface LedgerNoteInput {
  personaId: string | null;
  code: FinanceLogCode;
  changeNote?: string | null;
}

// ── Output types ────────────────────────────────────────────────

export interface LedgerEntryRecord {
  id: string;
  code: FinanceLogCode;
  personaId: string | null;
  delta: string | null;
  newBalance: string | null;
  transactionDate: string | null;
  changeNote: string | null;
}

export interface BalanceChangeResult {
  personaId: string;
  balance: string;
  isMember: boolean;
  trialMember: boolean;
  entries: LedgerEntryRecord[];
}

// ── Interface ───────────────────────────────────────────────────

/**
 * The only writer of persona balances. Implementations lock the persona row,
 * update it and append the matching finance log entries on `tx`.
 */
export interface LedgerApi {
  credit(tx: Transaction, ctx: RequestContext, input: BalanceChangeInput): Promise<BalanceChangeResult>;

  debit(
    tx: Transaction,
    ctx: RequestContext,
    input: BalanceChangeInput & { clampAtZero?: boolean },
  ): Promise<BalanceChangeResult>;

  /** Append an entry that records no balance change. */
  note(tx: Transaction, ctx: RequestContext, input: LedgerNoteInput): Promise<LedgerEntryRecord>;
}

// ── Singleton ───────────────────────────────────────────────────

let ledgerApi: LedgerApi | null = null;

export function getLedgerApi(): LedgerApi {
  if (!ledgerApi) throw new Error('LedgerApi not initialized');
  return ledgerApi;
}

export function setLedgerApi(api: LedgerApi | null): void {
  ledgerApi = api;
}
