import { formatCents, parseCents } from '@clubledger/shared';
import { evaluateCondition } from '../condition';
import type { ConditionContext, ConditionNode } from '../condition';
import { FEE_KINDS } from '../validation';
import type { FeeKind } from '../validation';
import { buildConditionContext } from './fee-context';
import type { EventPartInfo, RegistrationSnapshot } from './fee-context';

export interface FeeDefinition {
  id: string;
  title: string;
  kind: FeeKind;
  /** Signed decimal string, e.g. `"-12.00"`. */
  amount: string;
  ast: ConditionNode;
  validFrom: string | null;
  validUntil: string | null;
}

export interface FeeComputation {
  /** Fee id → applied amount in cents. */
  applied: Record<string, number>;
  activeFeeIds: string[];
  /** Fee kind → summed applied cents. */
  byKind: Partial<Record<FeeKind, number>>;
  /** Plain sum of applied fees; may be negative. */
  rawTotalCents: number;
  /** `max(0, rawTotalCents)`. */
  totalCents: number;
}

export function isFeeValidOn(fee: Pick<FeeDefinition, 'validFrom' | 'validUntil'>, asOf: string): boolean {
  if (fee.validFrom && asOf < fee.validFrom) return false;
  if (fee.validUntil && asOf > fee.validUntil) return false;
  return true;
}

export function computeFees(ctx: ConditionContext, fees: FeeDefinition[], asOf: string): FeeComputation {
  const applied: Record<string, number> = {};
  const activeFeeIds: string[] = [];
  const byKind: Partial<Record<FeeKind, number>> = {};
  let rawTotalCents = 0;

  for (const fee of fees) {
    if (!isFeeValidOn(fee, asOf) || !evaluateCondition(fee.ast, ctx)) continue;
    const cents = parseCents(fee.amount);
    applied[fee.id] = cents;
    activeFeeIds.push(fee.id);
    byKind[fee.kind] = (byKind[fee.kind] ?? 0) + cents;
    rawTotalCents += cents;
  }

  return {
    applied,
    activeFeeIds,
    byKind,
    rawTotalCents,
    totalCents: Math.max(0, rawTotalCents),
  };
}

export function totalOwed(ctx: ConditionContext, fees: FeeDefinition[], asOf: string): string {
  return formatCents(computeFees(ctx, fees, asOf).totalCents);
}

export interface RegistrationFee {
  registrationId: string;
  amountOwed: string;
  memberFee: string;
  nonmemberFee: string;
  nonmemberSurcharge: string;
  activeFeeIds: string[];
  byKind: Partial<Record<FeeKind, string>>;
}

export function formatByKind(byKind: Partial<Record<FeeKind, number>>): Partial<Record<FeeKind, string>> {
  const out: Partial<Record<FeeKind, string>> = {};
  for (const kind of FEE_KINDS) {
    const cents = byKind[kind];
    if (cents !== undefined) out[kind] = formatCents(cents);
  }
  return out;
}

/**
 * Fee of one registration, evaluated both as member and as non-member; the
 * owed amount follows the registration's own membership snapshot.
 */
export function computeRegistrationFee(
  registration: RegistrationSnapshot,
  eventParts: EventPartInfo[],
  fees: FeeDefinition[],
): RegistrationFee & { computation: FeeComputation } {
  const asMember = computeFees(
    buildConditionContext({ ...registration, isMember: true }, eventParts),
    fees,
    registration.registeredOn,
  );
  const asNonmember = computeFees(
    buildConditionContext({ ...registration, isMember: false }, eventParts),
    fees,
    registration.registeredOn,
  );
  const own = registration.isMember ? asMember : asNonmember;

  return {
    registrationId: registration.id,
    amountOwed: formatCents(own.totalCents),
    memberFee: formatCents(asMember.totalCents),
    nonmemberFee: formatCents(asNonmember.totalCents),
    nonmemberSurcharge: formatCents(asNonmember.totalCents - asMember.totalCents),
    activeFeeIds: own.activeFeeIds,
    byKind: formatByKind(own.byKind),
    computation: own,
  };
}
