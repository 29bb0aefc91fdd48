import { sql } from 'drizzle-orm';
import { ddMandates, rowsOf } from '@clubledger/db';
import {
  NotFoundError,
  ValidationError,
  assertValidated,
  formatCents,
  generateUlid,
  parseCents,
  parseIsoDate,
} from '@clubledger/shared';
import { getFinanceConfig } from '@clubledger/core/config/finance-config';
import type { FinanceConfig } from '@clubledger/core/config/finance-config';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { getLedgerApi } from '@clubledger/core/helpers/ledger-api';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { ActiveMandateExistsError, ArchivedPersonaError } from '../errors';
import { DD_EVENTS } from '../events/types';
import type { MandateCreatedPayload } from '../events/types';
import { parseIban } from '../helpers/iban';
import { mandateReferenceFor } from '../helpers/load-mandate';
import { createMandateSchema } from '../validation';
import type { CreateMandateInput } from '../validation';

export interface CreateMandateResult {
  mandateId: string;
  personaId: string;
  mandateReference: string;
  iban: string;
  donation: string;
}

/** Donations outside the configured range are rejected. */
export function checkDonation(donation: string, config: FinanceConfig): string {
  const cents = parseCents(donation);
  if (cents < config.donationMinCents || cents > config.donationMaxCents) {
    throw new ValidationError('Validation failed', [
      {
        field: 'donation',
        message: `Donation must be between ${formatCents(config.donationMinCents)} and ${formatCents(config.donationMaxCents)}`,
      },
    ]);
  }
  return formatCents(cents);
}

export async function createMandate(ctx: RequestContext, input: CreateMandateInput): Promise<CreateMandateResult> {
  requirePermission(ctx, PERMISSIONS.DIRECT_DEBIT_MANAGE);
  const parsed = createMandateSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;
  const config = getFinanceConfig();

  const iban = parseIban(data.iban);
  const donation = checkDonation(data.donation ?? formatCents(config.donationDefaultCents), config);

  const result = await publishWithOutbox(ctx, async (tx) => {
    const personaRows = await tx.execute(sql`
      SELECT id, is_archived FROM personas WHERE id = ${data.personaId} FOR UPDATE
    `);
    const persona = rowsOf(personaRows)[0];
    if (!persona) throw new NotFoundError('Persona', data.personaId);
    if (persona.is_archived) throw new ArchivedPersonaError(data.personaId);

    const activeRows = await tx.execute(sql`
      SELECT id FROM dd_mandates WHERE persona_id = ${data.personaId} AND revoked_at IS NULL
    `);
    const active = rowsOf(activeRows)[0];
    if (active) throw new ActiveMandateExistsError(data.personaId, String(active.id));

    const mandateId = generateUlid();
    const mandateReference = mandateReferenceFor(mandateId);
    await tx.insert(ddMandates).values({
      id: mandateId,
      personaId: data.personaId,
      mandateReference,
      iban,
      accountOwner: data.accountOwner ?? null,
      accountAddress: data.accountAddress ?? null,
      donation,
      grantedAt: data.grantedAt ? parseIsoDate(data.grantedAt) : new Date(),
      notes: data.notes ?? null,
      submittedBy: ctx.actor?.id ?? null,
    });
    await getLedgerApi().note(tx, ctx, {
      personaId: data.personaId,
      code: 'grant_lastschrift',
      changeNote: mandateReference,
    });

    const created: CreateMandateResult = { mandateId, personaId: data.personaId, mandateReference, iban, donation };
    return {
      result: created,
      events: [
        buildEventFromContext(ctx, DD_EVENTS.MANDATE_CREATED, {
          mandateId,
          personaId: data.personaId,
          mandateReference,
          donation,
        } satisfies MandateCreatedPayload),
      ],
    };
  });

  logger.info('mandate created', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    personaId: result.personaId,
    operation: 'createMandate',
    mandateId: result.mandateId,
  });
  return result;
}
