import type { EventEnvelope } from '@clubledger/shared';
import { db, sql } from '@clubledger/db';
import type { Transaction } from '@clubledger/db';
import type { RequestContext } from '../auth/context';
import { logger } from '../observability/logger';
import { appendToOutbox } from './outbox';

const STATEMENT_TIMEOUT_MS = 30_000;

/**
 * Run `operation` in one database transaction and append its events to the
 * outbox before commit. A throw anywhere rolls back both.
 */
export async function publishWithOutbox<T>(
  ctx: RequestContext,
  operation: (tx: Transaction) => Promise<{
    result: T;
    events: EventEnvelope[];
  }>,
): Promise<T> {
  const startedAt = Date.now();

  const result = await db.transaction(async (tx) => {
    await tx.execute(sql`SET LOCAL statement_timeout = ${sql.raw(String(STATEMENT_TIMEOUT_MS))}`);

    const { result, events } = await operation(tx);

    for (const event of events) {
      await appendToOutbox(tx, event);
    }

    return result;
  });

  logger.debug('transaction committed', {
    requestId: ctx.requestId,
    actorId: ctx.actor?.id ?? null,
    durationMs: Date.now() - startedAt,
  });
  return result;
}
