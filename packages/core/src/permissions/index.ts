import { AuthorizationError } from '@clubledger/shared';
import type { RequestContext } from '../auth/context';

export const PERMISSIONS = {
  FEES_MANAGE: 'fees.manage',
  FEES_VIEW: 'fees.view',
  FINANCE_MANAGE: 'finance.manage',
  FINANCE_VIEW: 'finance.view',
  DIRECT_DEBIT_MANAGE: 'direct_debit.manage',
  DIRECT_DEBIT_EXPORT: 'direct_debit.export',
} as const;

export type Permission = (typeof PERMISSIONS)[keyof typeof PERMISSIONS];

export function matchPermission(granted: string, requested: string): boolean {
  if (granted === '*') return true;
  if (granted === requested) return true;
  if (granted.endsWith('.*')) {
    const grantedModule = granted.slice(0, -2);
    const requestedModule = requested.split('.')[0];
    return grantedModule === requestedModule;
  }
  return false;
}

export function hasPermission(ctx: RequestContext, permission: Permission): boolean {
  return ctx.permissions.some((granted) => matchPermission(granted, permission));
}

export function requirePermission(ctx: RequestContext, permission: Permission): void {
  if (!hasPermission(ctx, permission)) {
    throw new AuthorizationError(`Missing permission: ${permission}`);
  }
}
