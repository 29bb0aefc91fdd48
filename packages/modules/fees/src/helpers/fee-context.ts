import type { ConditionContext } from '../condition';
import { PAYING_STATUSES } from '../validation';
import type { PartStatus } from '../validation';

export interface EventPartInfo {
  id: string;
  shortname: string;
}

/** The registration attributes fee conditions can see. */
export interface RegistrationSnapshot {
  id: string;
  personaId: string;
  isMember: boolean;
  isOrga: boolean;
  /** `YYYY-MM-DD`; fees are valued as of this date. */
  registeredOn: string;
  /** Part id → status. Parts without an entry count as `not_applied`. */
  parts: Record<string, PartStatus>;
  fields: Record<string, unknown>;
}

export function hasToPay(status: PartStatus | undefined): boolean {
  return status !== undefined && PAYING_STATUSES.includes(status);
}

export function buildConditionContext(
  registration: Omit<RegistrationSnapshot, 'id' | 'personaId' | 'registeredOn'>,
  eventParts: EventPartInfo[],
): ConditionContext {
  const parts: Record<string, boolean> = {};
  for (const part of eventParts) {
    parts[part.shortname] = hasToPay(registration.parts[part.id]);
  }
  const flags = Object.values(parts);
  return {
    parts,
    fields: registration.fields,
    isMember: registration.isMember,
    isOrga: registration.isOrga,
    anyPart: flags.some(Boolean),
    allParts: flags.every(Boolean),
  };
}
