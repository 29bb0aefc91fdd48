import { sql } from 'drizzle-orm';
import { rowsOf, withTransaction } from '@clubledger/db';
import { assertValidated } from '@clubledger/shared';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';
import { formatIban } from '../helpers/iban';
import { mandateFromRow } from '../helpers/load-mandate';
import { listMandatesSchema } from '../validation';
import type { ListMandatesInput } from '../validation';

export interface MandateListItem {
  id: string;
  personaId: string;
  personaName: string;
  mandateReference: string;
  iban: string;
  accountOwner: string | null;
  donation: string;
  grantedAt: string;
  revokedAt: string | null;
  openTransactionId: string | null;
}

export interface ListMandatesResult {
  items: MandateListItem[];
  cursor: string | null;
  hasMore: boolean;
}

export async function listMandates(ctx: RequestContext, input: ListMandatesInput = {}): Promise<ListMandatesResult> {
  requirePermission(ctx, PERMISSIONS.FINANCE_VIEW);
  const parsed = listMandatesSchema.safeParse(input);
  assertValidated(parsed);
  const filters = parsed.data;
  const limit = filters.limit;

  return withTransaction(async (tx) => {
    const conditions = [sql`TRUE`];
    if (filters.personaId) conditions.push(sql`m.persona_id = ${filters.personaId}`);
    if (filters.active === true) conditions.push(sql`m.revoked_at IS NULL`);
    if (filters.active === false) conditions.push(sql`m.revoked_at IS NOT NULL`);
    if (filters.cursor) conditions.push(sql`m.id < ${filters.cursor}`);

    const rows = await tx.execute(sql`
      SELECT
        m.id, m.persona_id, m.mandate_reference, m.iban, m.donation, m.account_owner,
        m.account_address, m.granted_at, m.revoked_at, m.notes, p.given_names, p.family_name,
        (SELECT t.id FROM dd_transactions t WHERE t.mandate_id = m.id AND t.status = 'open') AS open_transaction_id
      FROM dd_mandates m
      JOIN personas p ON p.id = m.persona_id
      WHERE ${sql.join(conditions, sql` AND `)}
      ORDER BY m.id DESC
      LIMIT ${limit + 1}
    `);

    const arr = rowsOf(rows);
    const hasMore = arr.length > limit;
    const items = hasMore ? arr.slice(0, limit) : arr;
    const last = items[items.length - 1];

    return {
      items: items.map((r) => {
        const mandate = mandateFromRow(r);
        return {
          id: mandate.id,
          personaId: mandate.personaId,
          personaName: mandate.personaName,
          mandateReference: mandate.mandateReference,
          iban: formatIban(mandate.iban),
          accountOwner: mandate.accountOwner,
          donation: mandate.donation,
          grantedAt: mandate.grantedAt.toISOString(),
          revokedAt: mandate.revokedAt ? mandate.revokedAt.toISOString() : null,
          openTransactionId: r.open_transaction_id ? String(r.open_transaction_id) : null,
        };
      }),
      cursor: hasMore && last ? String(last.id) : null,
      hasMore,
    };
  });
}
