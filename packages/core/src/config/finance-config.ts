import { z } from 'zod';
import { assertValidated, parseCents } from '@clubledger/shared';

const decimal = z.string().regex(/^\d+(\.\d{1,2})?$/, 'Must be a decimal with at most 2 fractional digits');
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD');

const financeEnvSchema = z.object({
  MEMBERSHIP_FEE: decimal.default('4.00'),
  PERIODS_PER_YEAR: z.coerce.number().int().min(1).max(12).default(2),
  DONATION_MIN: decimal.default('2.00'),
  DONATION_MAX: decimal.default('1000.00'),
  DONATION_DEFAULT: decimal.default('20.00'),
  SEPA_SENDER_NAME: z.string().min(1).max(70).default('Club Ledger e.V.'),
  SEPA_SENDER_ADDRESS_LINE1: z.string().max(70).default('Musterstrasse 1'),
  SEPA_SENDER_ADDRESS_LINE2: z.string().max(70).default('12345 Musterstadt'),
  SEPA_SENDER_COUNTRY: z.string().regex(/^[A-Z]{2}$/).default('DE'),
  SEPA_SENDER_IBAN: z.string().min(5).max(34).default('DE89370400440532013000'),
  SEPA_CREDITOR_ID: z.string().min(1).max(35).default('DE98ZZZ09999999999'),
  SEPA_INITIALISATION_DATE: isoDate.default('2013-07-30'),
  SEPA_CUTOFF_DATE: isoDate.default('2013-10-14'),
  SEPA_PAYMENT_OFFSET_DAYS: z.coerce.number().int().min(0).max(60).default(17),
  SEPA_ROLLBACK_FEE: decimal.default('4.50'),
  FINANCE_LOG_SNAPSHOTS: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
});

export interface SepaCreditorConfig {
  name: string;
  addressLines: [string, string];
  country: string;
  iban: string;
  creditorId: string;
  /** Mandates granted before this date are dated `cutoffDate` in exports. */
  initialisationDate: string;
  cutoffDate: string;
  paymentOffsetDays: number;
  rollbackFeeCents: number;
}

export interface FinanceConfig {
  membershipFeeCents: number;
  periodsPerYear: number;
  donationMinCents: number;
  donationMaxCents: number;
  donationDefaultCents: number;
  sepa: SepaCreditorConfig;
  /** Write member/total snapshots into finance log entries (-1 when off). */
  logSnapshots: boolean;
}

export function loadFinanceConfig(env: Record<string, string | undefined> = process.env): FinanceConfig {
  const parsed = financeEnvSchema.safeParse(env);
  assertValidated(parsed, 'Invalid finance configuration');
  const c = parsed.data;
  return {
    membershipFeeCents: parseCents(c.MEMBERSHIP_FEE),
    periodsPerYear: c.PERIODS_PER_YEAR,
    donationMinCents: parseCents(c.DONATION_MIN),
    donationMaxCents: parseCents(c.DONATION_MAX),
    donationDefaultCents: parseCents(c.DONATION_DEFAULT),
    sepa: {
      name: c.SEPA_SENDER_NAME,
      addressLines: [c.SEPA_SENDER_ADDRESS_LINE1, c.SEPA_SENDER_ADDRESS_LINE2],
      country: c.SEPA_SENDER_COUNTRY,
      iban: c.SEPA_SENDER_IBAN.replace(/\s+/g, '').toUpperCase(),
      creditorId: c.SEPA_CREDITOR_ID,
      initialisationDate: c.SEPA_INITIALISATION_DATE,
      cutoffDate: c.SEPA_CUTOFF_DATE,
      paymentOffsetDays: c.SEPA_PAYMENT_OFFSET_DAYS,
      rollbackFeeCents: parseCents(c.SEPA_ROLLBACK_FEE),
    },
    logSnapshots: c.FINANCE_LOG_SNAPSHOTS,
  };
}

let current: FinanceConfig | null = null;

export function getFinanceConfig(): FinanceConfig {
  if (!current) {
    current = loadFinanceConfig();
  }
  return current;
}

/** Override the process-wide config; `null` reloads from the environment on next access. */
export function setFinanceConfig(config: FinanceConfig | null): void {
  current = config;
}

/** Fee for a full year of membership. */
export function annualFeeCents(config: FinanceConfig): number {
  return config.membershipFeeCents * config.periodsPerYear;
}
