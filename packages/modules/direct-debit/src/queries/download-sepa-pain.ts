import { sql } from 'drizzle-orm';
import { rowsOf, withTransaction } from '@clubledger/db';
import { assertValidated, formatCents, isoDateOf, parseCents, toIsoDate } from '@clubledger/shared';
import type { BatchItemFailure, BatchReport } from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { NothingToExportError } from '../errors';
import { ibanProblem } from '../helpers/iban';
import { calculatePaymentDate } from '../helpers/payment-date';
import { buildSepaPain } from '../helpers/sepa-pain';
import type { PainDocument, PainTransaction } from '../helpers/sepa-pain';
import { downloadSepaPainSchema, SEQUENCE_TYPES } from '../validation';
import type { DownloadSepaPainInput, SequenceType } from '../validation';

export interface ExportedTransaction {
  transactionId: string;
  mandateId: string;
  sequenceType: SequenceType;
  amount: string;
}

export interface SepaPainExport extends BatchReport<ExportedTransaction> {
  document: PainDocument;
  collectionDate: string;
  filename: string;
}

function isSequenceType(value: unknown): value is SequenceType {
  return SEQUENCE_TYPES.some((type) => type === value);
}

/**
 * Build the bank file for all open transactions, or those of one mandate.
 * Transactions of revoked mandates are reported, never exported. Reads only; the transactions stay open until finalized.
 */
export async function downloadSepaPain(ctx: RequestContext, input: DownloadSepaPainInput = {}): Promise<SepaPainExport> {
  requirePermission(ctx, PERMISSIONS.DIRECT_DEBIT_EXPORT);
  const parsed = downloadSepaPainSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;
  const config = getFinanceConfig();

  const rows = await withTransaction(async (tx) => {
    const result = await tx.execute(sql`
      SELECT
        t.id, t.mandate_id, t.sequence_type, t.amount, t.payment_date,
        m.mandate_reference, m.iban, m.account_owner, m.granted_at, m.revoked_at,
        p.given_names, p.family_name
      FROM dd_transactions t
      JOIN dd_mandates m ON m.id = t.mandate_id
      JOIN personas p ON p.id = m.persona_id
      WHERE t.status = 'open'
        ${data.mandateId ? sql`AND t.mandate_id = ${data.mandateId}` : sql``}
      ORDER BY t.id
    `);
    return rowsOf(result);
  });
  if (rows.length === 0) throw new NothingToExportError();

  const transactions: PainTransaction[] = [];
  const succeeded: ExportedTransaction[] = [];
  const failed: BatchItemFailure[] = [];
  let latestPaymentDate = '';

  for (const r of rows) {
    const id = String(r.id);
    if (r.revoked_at !== null && r.revoked_at !== undefined) {
      failed.push({ id, code: 'MANDATE_REVOKED', message: `Mandate ${String(r.mandate_id)} is revoked` });
      continue;
    }
    const iban = String(r.iban);
    const problem = ibanProblem(iban);
    if (problem) {
      failed.push({ id, code: 'INVALID_IBAN', message: `Mandate IBAN is invalid: ${problem}` });
      continue;
    }
    const sequenceType = r.sequence_type;
    if (!isSequenceType(sequenceType)) {
      failed.push({ id, code: 'INVALID_SEQUENCE_TYPE', message: `Unknown sequence type ${String(sequenceType)}` });
      continue;
    }

    const givenNames = String(r.given_names);
    const familyName = String(r.family_name);
    const reference = String(r.mandate_reference);
    const amountCents = parseCents(String(r.amount));
    const paymentDate = isoDateOf(r.payment_date);
    if (paymentDate && paymentDate > latestPaymentDate) latestPaymentDate = paymentDate;

    transactions.push({
      transactionId: id,
      sequenceType,
      amountCents,
      mandateReference: reference,
      mandateGrantedOn: isoDateOf(r.granted_at) ?? config.sepa.cutoffDate,
      debtorName: r.account_owner ? String(r.account_owner) : `${givenNames} ${familyName}`,
      iban,
      remittance: `${reference}, ${familyName}, ${givenNames}, membership fee and donation ${config.sepa.name}`,
    });
    succeeded.push({
      transactionId: id,
      mandateId: String(r.mandate_id),
      sequenceType,
      amount: formatCents(amountCents),
    });
  }
  if (transactions.length === 0) throw new NothingToExportError();

  const now = new Date();
  const earliest = calculatePaymentDate(toIsoDate(now), config.sepa.paymentOffsetDays);
  const collectionDate = latestPaymentDate > earliest ? latestPaymentDate : earliest;
  const document = buildSepaPain(transactions, { creditor: config.sepa, collectionDate, now });

  logger.info('sepa pain exported', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    operation: 'downloadSepaPain',
    messageId: document.messageId,
    exported: document.count,
    ctrlSum: document.ctrlSum,
    failed: failed.length,
  });

  return {
    succeeded,
    failed,
    document,
    collectionDate,
    filename: `sepa-direct-debit-${collectionDate}.xml`,
  };
}
