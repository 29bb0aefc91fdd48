import { generateUlid } from '@clubledger/shared';
import type { EventEnvelope } from '@clubledger/shared';
import type { RequestContext } from '../auth/context';

/**
 * Envelope a domain event raised while serving `ctx`. Events that must be
 * recorded once per business fact (a billed period, a finalized
 * transaction) pass their own idempotency key.
 */
export function buildEventFromContext(
  ctx: RequestContext,
  eventType: string,
  data: Record<string, unknown>,
  idempotencyKey?: string,
): EventEnvelope {
  const eventId = generateUlid();
  return {
    eventId,
    eventType,
    occurredAt: new Date().toISOString(),
    actorId: ctx.actor?.id,
    correlationId: ctx.requestId,
    idempotencyKey: idempotencyKey ?? `${eventType}:${eventId}`,
    data,
  };
}
