export {
  FINANCE_LOG_CODES,
  FINANCE_LOG_CODE_NAMES,
  financeLogCodeValue,
  financeLogCodeName,
} from './finance-log-codes';
export type { FinanceLogCode } from './finance-log-codes';
