export { requestContext, getRequestContext, createSystemContext } from './auth/context';
export type { Actor, RequestContext } from './auth/context';
export { PERMISSIONS, matchPermission, hasPermission, requirePermission } from './permissions';
export type { Permission } from './permissions';
export { logger, log, setLogLevel, errorFields } from './observability/logger';
export type { LogLevel, LogEntry } from './observability/logger';
export {
  loadFinanceConfig,
  getFinanceConfig,
  setFinanceConfig,
  annualFeeCents,
} from './config/finance-config';
export type { FinanceConfig, SepaCreditorConfig } from './config/finance-config';
export { buildEventFromContext } from './events/build-event';
export { publishWithOutbox } from './events/publish-with-outbox';
export { getLedgerApi, setLedgerApi } from './helpers/ledger-api';
export type {
  LedgerApi,
  BalanceChangeInput,
  BalanceChangeResult,
  LedgerEntryRecord,
  LedgerNoteInput,
} from './helpers/ledger-api';
