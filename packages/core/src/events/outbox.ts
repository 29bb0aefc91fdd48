import { generateUlid } from '@clubledger/shared';
import type { EventEnvelope } from '@clubledger/shared';
import { eventOutbox } from '@clubledger/db';
import type { Transaction } from '@clubledger/db';

/** Store an event as unpublished in the caller's transaction. */
export async function appendToOutbox(tx: Transaction, event: EventEnvelope): Promise<void> {
  await tx.insert(eventOutbox).values({
    id: generateUlid(),
    eventType: event.eventType,
    eventId: event.eventId,
    idempotencyKey: event.idempotencyKey,
    payload: event,
    occurredAt: new Date(event.occurredAt),
    publishedAt: null,
  });
}
