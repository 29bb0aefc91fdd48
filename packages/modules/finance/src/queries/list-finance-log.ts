import { sql } from 'drizzle-orm';
import { rowsOf, withTransaction } from '@clubledger/db';
import { assertValidated, financeLogCodeName, financeLogCodeValue, isoDateOf } from '@clubledger/shared';
import type { FinanceLogCode } from '@clubledger/shared';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';
import { listFinanceLogSchema } from '../validation';
import type { ListFinanceLogInput } from '../validation';

export interface FinanceLogItem {
  id: string;
  ctime: string;
  code: FinanceLogCode | null;
  codeValue: number;
  submittedBy: string | null;
  personaId: string | null;
  personaName: string | null;
  delta: string | null;
  newBalance: string | null;
  transactionDate: string | null;
  changeNote: string | null;
  members: number;
  total: string;
  memberTotal: string;
}

export interface ListFinanceLogResult {
  items: FinanceLogItem[];
  cursor: string | null;
  hasMore: boolean;
}

export async function listFinanceLog(ctx: RequestContext, input: ListFinanceLogInput = {}): Promise<ListFinanceLogResult> {
  requirePermission(ctx, PERMISSIONS.FINANCE_VIEW);
  const parsed = listFinanceLogSchema.safeParse(input);
  assertValidated(parsed);
  const filters = parsed.data;
  const limit = filters.limit;

  return withTransaction(async (tx) => {
    const conditions = [sql`TRUE`];
    if (filters.codes && filters.codes.length > 0) {
      const values = filters.codes.map((c) => sql`${financeLogCodeValue(c)}`);
      conditions.push(sql`f.code IN (${sql.join(values, sql`, `)})`);
    }
    if (filters.personaId) conditions.push(sql`f.persona_id = ${filters.personaId}`);
    if (filters.from) conditions.push(sql`f.ctime >= ${filters.from}::date`);
    if (filters.to) conditions.push(sql`f.ctime < ${filters.to}::date + 1`);
    if (filters.transactionFrom) conditions.push(sql`f.transaction_date >= ${filters.transactionFrom}`);
    if (filters.transactionTo) conditions.push(sql`f.transaction_date <= ${filters.transactionTo}`);
    if (filters.cursor) conditions.push(sql`f.id < ${filters.cursor}`);

    const rows = await tx.execute(sql`
      SELECT
        f.id, f.ctime, f.code, f.submitted_by, f.persona_id,
        p.given_names || ' ' || p.family_name AS persona_name,
        f.delta, f.new_balance, f.transaction_date, f.change_note,
        f.members, f.total, f.member_total
      FROM finance_log f
      LEFT JOIN personas p ON p.id = f.persona_id
      WHERE ${sql.join(conditions, sql` AND `)}
      ORDER BY f.id DESC
      LIMIT ${limit + 1}
    `);

    const arr = rowsOf(rows);
    const hasMore = arr.length > limit;
    const items = hasMore ? arr.slice(0, limit) : arr;
    const last = items[items.length - 1];

    return {
      items: items.map((r) => ({
        id: String(r.id),
        ctime: r.ctime instanceof Date ? r.ctime.toISOString() : String(r.ctime),
        code: financeLogCodeName(Number(r.code)),
        codeValue: Number(r.code),
        submittedBy: r.submitted_by ? String(r.submitted_by) : null,
        personaId: r.persona_id ? String(r.persona_id) : null,
        personaName: r.persona_name ? String(r.persona_name) : null,
        delta: r.delta === null || r.delta === undefined ? null : String(r.delta),
        newBalance: r.new_balance === null || r.new_balance === undefined ? null : String(r.new_balance),
        transactionDate: isoDateOf(r.transaction_date),
        changeNote: r.change_note ? String(r.change_note) : null,
        members: Number(r.members),
        total: String(r.total),
        memberTotal: String(r.member_total),
      })),
      cursor: hasMore && last ? String(last.id) : null,
      hasMore,
    };
  });
}
