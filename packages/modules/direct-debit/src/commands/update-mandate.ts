import { eq } from 'drizzle-orm';
import { ddMandates } from '@clubledger/db';
import { assertValidated } from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { getLedgerApi } from '@clubledger/core/helpers/ledger-api';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { MandateRevokedError } from '../errors';
import { DD_EVENTS } from '../events/types';
import type { MandateUpdatedPayload } from '../events/types';
import { parseIban } from '../helpers/iban';
import { lockMandate } from '../helpers/load-mandate';
import { updateMandateSchema } from '../validation';
import type { UpdateMandateInput } from '../validation';
import { checkDonation } from './create-mandate';

export interface UpdateMandateResult {
  mandateId: string;
  changedFields: string[];
}

type MandateChanges = Partial<{
  iban: string;
  donation: string;
  accountOwner: string | null;
  accountAddress: string | null;
  notes: string | null;
}>;

/** Edit donation, bank account or notes of an active mandate. */
export async function updateMandate(ctx: RequestContext, input: UpdateMandateInput): Promise<UpdateMandateResult> {
  requirePermission(ctx, PERMISSIONS.DIRECT_DEBIT_MANAGE);
  const parsed = updateMandateSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  const iban = data.iban === undefined ? undefined : parseIban(data.iban);
  const donation = data.donation === undefined ? undefined : checkDonation(data.donation, getFinanceConfig());

  const result = await publishWithOutbox(ctx, async (tx) => {
    const mandate = await lockMandate(tx, data.mandateId);
    if (mandate.revokedAt) throw new MandateRevokedError(mandate.id);

    const changes: MandateChanges = {};
    if (iban !== undefined && iban !== mandate.iban) changes.iban = iban;
    if (donation !== undefined && donation !== mandate.donation) changes.donation = donation;
    if (data.accountOwner !== undefined && data.accountOwner !== mandate.accountOwner) {
      changes.accountOwner = data.accountOwner;
    }
    if (data.accountAddress !== undefined && data.accountAddress !== mandate.accountAddress) {
      changes.accountAddress = data.accountAddress;
    }
    if (data.notes !== undefined && data.notes !== mandate.notes) changes.notes = data.notes;

    const changedFields = Object.keys(changes).sort();
    if (changedFields.length === 0) {
      return { result: { mandateId: mandate.id, changedFields }, events: [] };
    }

    await tx
      .update(ddMandates)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(ddMandates.id, mandate.id));
    await getLedgerApi().note(tx, ctx, {
      personaId: mandate.personaId,
      code: 'modify_lastschrift',
      changeNote: changedFields.join(', '),
    });

    return {
      result: { mandateId: mandate.id, changedFields },
      events: [
        buildEventFromContext(ctx, DD_EVENTS.MANDATE_UPDATED, {
          mandateId: mandate.id,
          personaId: mandate.personaId,
          changedFields,
        } satisfies MandateUpdatedPayload),
      ],
    };
  });

  logger.info('mandate updated', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    operation: 'updateMandate',
    mandateId: result.mandateId,
    changedFields: result.changedFields,
  });
  return result;
}
