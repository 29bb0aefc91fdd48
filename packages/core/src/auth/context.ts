import { AsyncLocalStorage } from 'node:async_hooks';
import { generateUlid } from '@clubledger/shared';

export interface Actor {
  id: string;
  name: string;
}

export interface RequestContext {
  /** `null` for scheduled runs; ledger entries then carry no submitter. */
  actor: Actor | null;
  requestId: string;
  /** Granted permission patterns, e.g. `finance.*` or `fees.manage`. */
  permissions: string[];
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext {
  const ctx = requestContext.getStore();
  if (!ctx) {
    throw new Error('No request context available. Ensure middleware has been applied.');
  }
  return ctx;
}

/** Context for cron-triggered administrative runs. */
export function createSystemContext(permissions: string[] = ['*']): RequestContext {
  return {
    actor: null,
    requestId: `system-${generateUlid()}`,
    permissions,
  };
}
