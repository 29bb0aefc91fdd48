import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { getTableConfig } from 'drizzle-orm/pg-core';
import { ddMandates, ddTransactions, financeLog, personas, eventFees } from '../schema';

const migrationSql = readFileSync(path.resolve(__dirname, '../../migrations/0000_initial.sql'), 'utf8');

describe('schema', () => {
  it('allows at most one active mandate per persona', () => {
    const config = getTableConfig(ddMandates);
    const index = config.indexes.find((i) => i.config.name === 'uq_dd_mandates_active_persona');
    expect(index?.config.unique).toBe(true);
    expect(index?.config.where).toBeDefined();
  });

  it('allows at most one open transaction per mandate', () => {
    const config = getTableConfig(ddTransactions);
    const index = config.indexes.find((i) => i.config.name === 'uq_dd_transactions_open_mandate');
    expect(index?.config.unique).toBe(true);
  });

  it('stores money as two-decimal numerics', () => {
    const balance = getTableConfig(personas).columns.find((c) => c.name === 'balance');
    expect(balance?.getSQLType()).toMatch(/^numeric\(8, ?2\)$/);
    const amount = getTableConfig(eventFees).columns.find((c) => c.name === 'amount');
    expect(amount?.getSQLType()).toMatch(/^numeric\(8, ?2\)$/);
  });

  it('keeps delta and new_balance nullable in the finance log', () => {
    const columns = getTableConfig(financeLog).columns;
    expect(columns.find((c) => c.name === 'delta')?.notNull).toBe(false);
    expect(columns.find((c) => c.name === 'new_balance')?.notNull).toBe(false);
    expect(columns.find((c) => c.name === 'members')?.notNull).toBe(true);
  });

  it('creates every drizzle table in the initial migration', () => {
    for (const table of [personas, eventFees, financeLog, ddMandates, ddTransactions]) {
      const { name } = getTableConfig(table);
      expect(migrationSql).toContain(`CREATE TABLE IF NOT EXISTS ${name} (`);
    }
  });

  it('guards the finance log against updates and deletes', () => {
    expect(migrationSql).toContain('BEFORE UPDATE OR DELETE ON finance_log');
  });
});
