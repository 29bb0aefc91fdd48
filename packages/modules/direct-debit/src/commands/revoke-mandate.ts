import { assertValidated } from '@clubledger/shared';
import { buildEventFromContext } from '@clubledger/core/events/build-event';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { getLedgerApi } from '@clubledger/core/helpers/ledger-api';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { MandateRevokedError, OpenTransactionExistsError } from '../errors';
import { DD_EVENTS } from '../events/types';
import type { MandateRevokedPayload } from '../events/types';
import { loadHistories, lockMandate, markRevoked } from '../helpers/load-mandate';
import { openTransactionOf } from '../helpers/open-for-debit';
import { revokeMandateSchema } from '../validation';
import type { RevokeMandateInput } from '../validation';

export interface RevokeMandateResult {
  mandateId: string;
  personaId: string;
  revokedAt: string;
}

export async function revokeMandate(ctx: RequestContext, input: RevokeMandateInput): Promise<RevokeMandateResult> {
  requirePermission(ctx, PERMISSIONS.DIRECT_DEBIT_MANAGE);
  const parsed = revokeMandateSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  const result = await publishWithOutbox(ctx, async (tx) => {
    const mandate = await lockMandate(tx, data.mandateId);
    if (mandate.revokedAt) throw new MandateRevokedError(mandate.id);

    const history = (await loadHistories(tx, [mandate.id])).get(mandate.id) ?? [];
    if (openTransactionOf(history)) throw new OpenTransactionExistsError(mandate.id);

    const now = new Date();
    await markRevoked(tx, mandate.id, now);
    await getLedgerApi().note(tx, ctx, {
      personaId: mandate.personaId,
      code: 'revoke_lastschrift',
      changeNote: data.note ?? null,
    });

    return {
      result: { mandateId: mandate.id, personaId: mandate.personaId, revokedAt: now.toISOString() },
      events: [
        buildEventFromContext(ctx, DD_EVENTS.MANDATE_REVOKED, {
          mandateId: mandate.id,
          personaId: mandate.personaId,
          reason: 'revoked',
        } satisfies MandateRevokedPayload),
      ],
    };
  });

  logger.info('mandate revoked', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    personaId: result.personaId,
    operation: 'revokeMandate',
    mandateId: result.mandateId,
  });
  return result;
}
