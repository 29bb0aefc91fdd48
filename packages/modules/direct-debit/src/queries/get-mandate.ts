import { sql } from 'drizzle-orm';
import { rowsOf, withTransaction } from '@clubledger/db';
import { NotFoundError, formatCents } from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import type { RequestContext } from '@clubledger/core/auth/context';
import { formatIban } from '../helpers/iban';
import { mandateFromRow } from '../helpers/load-mandate';
import { transactionFromRow } from '../helpers/load-transaction';
import type { DebitTransaction } from '../helpers/load-transaction';
import { obligationCents } from '../helpers/open-for-debit';

export interface MandateDetail {
  id: string;
  personaId: string;
  personaName: string;
  mandateReference: string;
  iban: string;
  accountOwner: string | null;
  accountAddress: string | null;
  donation: string;
  /** What the next collection would take: donation plus a year of fees. */
  annualAmount: string;
  grantedAt: string;
  revokedAt: string | null;
  notes: string | null;
  transactions: DebitTransaction[];
}

export async function getMandate(ctx: RequestContext, input: { mandateId: string }): Promise<MandateDetail> {
  requirePermission(ctx, PERMISSIONS.FINANCE_VIEW);
  const config = getFinanceConfig();

  return withTransaction(async (tx) => {
    const rows = await tx.execute(sql`
      SELECT
        m.id, m.persona_id, m.mandate_reference, m.iban, m.donation, m.account_owner,
        m.account_address, m.granted_at, m.revoked_at, m.notes, p.given_names, p.family_name
      FROM dd_mandates m
      JOIN personas p ON p.id = m.persona_id
      WHERE m.id = ${input.mandateId}
    `);
    const row = rowsOf(rows)[0];
    if (!row) throw new NotFoundError('Mandate', input.mandateId);
    const mandate = mandateFromRow(row);

    const transactionRows = await tx.execute(sql`
      SELECT
        t.id, t.mandate_id, m.persona_id, t.period_id, t.status, t.sequence_type,
        t.amount, t.tally, t.issued_at, t.payment_date, t.processed_at, m.revoked_at
      FROM dd_transactions t
      JOIN dd_mandates m ON m.id = t.mandate_id
      WHERE t.mandate_id = ${mandate.id}
      ORDER BY t.issued_at DESC, t.id DESC
    `);

    return {
      id: mandate.id,
      personaId: mandate.personaId,
      personaName: mandate.personaName,
      mandateReference: mandate.mandateReference,
      iban: formatIban(mandate.iban),
      accountOwner: mandate.accountOwner,
      accountAddress: mandate.accountAddress,
      donation: mandate.donation,
      annualAmount: formatCents(obligationCents(mandate.donationCents, config)),
      grantedAt: mandate.grantedAt.toISOString(),
      revokedAt: mandate.revokedAt ? mandate.revokedAt.toISOString() : null,
      notes: mandate.notes,
      transactions: rowsOf(transactionRows).map(transactionFromRow),
    };
  });
}
