import { assertValidated, formatCents } from '@clubledger/shared';
import { publishWithOutbox } from '@clubledger/core/events/publish-with-outbox';
import { requirePermission, PERMISSIONS } from '@clubledger/core/permissions';
import { logger } from '@clubledger/core/observability/logger';
import type { RequestContext } from '@clubledger/core/auth/context';
import { PersonaArchivedError, PersonaIsMemberError } from '../errors';
import { archiveAccount } from '../helpers/ledger';
import { revokeActiveMandate } from '../helpers/mandates';
import { applyTransition, lockAccounts, transitionEvents } from '../internal-api';
import { archivePersonaSchema } from '../validation';
import type { ArchivePersonaInput } from '../validation';

export interface ArchivePersonaResult {
  personaId: string;
  removedBalance: string;
  revokedMandateId: string | null;
}

export async function archivePersona(ctx: RequestContext, input: ArchivePersonaInput): Promise<ArchivePersonaResult> {
  requirePermission(ctx, PERMISSIONS.FINANCE_MANAGE);
  const parsed = archivePersonaSchema.safeParse(input);
  assertValidated(parsed);
  const data = parsed.data;

  const result = await publishWithOutbox(ctx, async (tx) => {
    const accounts = await lockAccounts(tx, [data.personaId]);
    const before = accounts.get(data.personaId);
    if (!before) throw new Error(`Persona ${data.personaId} was not locked`);
    if (before.isArchived) throw new PersonaArchivedError(data.personaId);
    if (before.isMember) throw new PersonaIsMemberError(data.personaId);

    const revokedMandateId = await revokeActiveMandate(tx, ctx, data.personaId, data.note ?? null);
    const applied = await applyTransition(tx, ctx, before, archiveAccount(before, data.note ?? null));

    return {
      result: {
        personaId: data.personaId,
        removedBalance: formatCents(before.balanceCents),
        revokedMandateId,
      },
      events: transitionEvents(ctx, applied),
    };
  });

  logger.info('persona archived', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    personaId: data.personaId,
    operation: 'archivePersona',
    removedBalance: result.removedBalance,
  });
  return result;
}
