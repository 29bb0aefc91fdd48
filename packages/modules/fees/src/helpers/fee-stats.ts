import { formatCents, parseCents } from '@clubledger/shared';
import { FEE_KINDS } from '../validation';
import type { FeeKind } from '../validation';
import { computeRegistrationFee } from './compute-fees';
import type { FeeDefinition } from './compute-fees';
import type { EventPartInfo, RegistrationSnapshot } from './fee-context';

export interface FeeKindStats {
  owed: string;
  paid: string;
  owedCount: number;
  paidCount: number;
}

export interface FeeStats {
  byKind: Record<FeeKind, FeeKindStats>;
  totals: {
    owed: string;
    /** Payments counted up to each registration's amount owed. */
    paid: string;
    registrations: number;
    fullyPaid: number;
  };
}

export interface RegistrationWithPayment extends RegistrationSnapshot {
  amountPaid: string;
}

function perKind<T>(make: (kind: FeeKind) => T): Record<FeeKind, T> {
  return {
    regular: make('regular'),
    reduced: make('reduced'),
    surcharge: make('surcharge'),
    discount: make('discount'),
    donation: make('donation'),
    storno: make('storno'),
    external: make('external'),
  };
}

/**
 * Owed and paid amounts grouped by fee kind. A registration's per-kind
 * amounts count as paid only once it is paid in full.
 */
export function computeFeeStats(
  registrations: RegistrationWithPayment[],
  eventParts: EventPartInfo[],
  fees: FeeDefinition[],
): FeeStats {
  const acc = perKind(() => ({ owed: 0, paid: 0, owedCount: 0, paidCount: 0 }));

  let owedTotal = 0;
  let paidTotal = 0;
  let fullyPaid = 0;

  for (const registration of registrations) {
    const { computation } = computeRegistrationFee(registration, eventParts, fees);
    const paidCents = parseCents(registration.amountPaid);
    const isPaid = paidCents >= computation.totalCents;

    owedTotal += computation.totalCents;
    paidTotal += Math.max(0, Math.min(paidCents, computation.totalCents));
    if (isPaid) fullyPaid++;

    for (const kind of FEE_KINDS) {
      const cents = computation.byKind[kind];
      const entry = acc[kind];
      if (cents === undefined) continue;
      entry.owed += cents;
      entry.owedCount++;
      if (isPaid) {
        entry.paid += cents;
        entry.paidCount++;
      }
    }
  }

  const byKind = perKind((kind): FeeKindStats => ({
    owed: formatCents(acc[kind].owed),
    paid: formatCents(acc[kind].paid),
    owedCount: acc[kind].owedCount,
    paidCount: acc[kind].paidCount,
  }));

  return {
    byKind,
    totals: {
      owed: formatCents(owedTotal),
      paid: formatCents(paidTotal),
      registrations: registrations.length,
      fullyPaid,
    },
  };
}
