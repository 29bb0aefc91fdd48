import { eq, sql } from 'drizzle-orm';
import { ddMandates, rowsOf } from '@clubledger/db';
import type { Transaction } from '@clubledger/db';
import type { RequestContext } from '@clubledger/core/auth/context';
import { MandateHasOpenTransactionError } from '../errors';
import { insertEntries } from '../internal-api';
import { noteEntry } from './ledger';

/**
 * Revoke the persona's active direct-debit mandate, if any, and log it.
 * A mandate with a transaction still awaiting collection stays active and
 * the caller's transaction is aborted.
 */
export async function revokeActiveMandate(
  tx: Transaction,
  ctx: RequestContext,
  personaId: string,
  changeNote: string | null,
): Promise<string | null> {
  const rows = await tx.execute(sql`
    SELECT m.id,
      EXISTS (
        SELECT 1 FROM dd_transactions t WHERE t.mandate_id = m.id AND t.status = 'open'
      ) AS has_open_transaction
    FROM dd_mandates m
    WHERE m.persona_id = ${personaId} AND m.revoked_at IS NULL
    FOR UPDATE OF m
  `);
  const [active] = rowsOf(rows);
  if (!active) return null;

  const mandateId = String(active.id);
  if (active.has_open_transaction === true) throw new MandateHasOpenTransactionError(personaId, mandateId);

  const now = new Date();
  await tx.update(ddMandates).set({ revokedAt: now, updatedAt: now }).where(eq(ddMandates.id, mandateId));
  await insertEntries(tx, ctx, personaId, [noteEntry('revoke_lastschrift', changeNote)]);
  return mandateId;
}
