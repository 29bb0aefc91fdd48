import { setLedgerApi } from '@clubledger/core/helpers/ledger-api';
import { createDrizzleLedgerApi } from './internal-api';

let _registered = false;

export function registerLedgerApi(): void {
  if (_registered) return;
  setLedgerApi(createDrizzleLedgerApi());
  _registered = true;
}
