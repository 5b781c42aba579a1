import { config } from '../config';
import { MemoryLedgerStore } from './MemoryLedgerStore';
import { PostgresLedgerStore } from './PostgresLedgerStore';
import type { LedgerStore } from './LedgerStore';

export function createLedgerStore(driver: LedgerStore['driver'] = config.ledger.driver): LedgerStore {
  if (driver === 'memory') {
    return new MemoryLedgerStore({ lockTimeoutMs: config.database.lockTimeoutMs });
  }
  return new PostgresLedgerStore({ lockTimeoutMs: config.database.lockTimeoutMs });
}

export { MemoryLedgerStore } from './MemoryLedgerStore';
export { PostgresLedgerStore } from './PostgresLedgerStore';
export { FeatureCatalogIndex, loadFeatureCatalog, DEFAULT_CATALOG_PATH } from './catalog';
export type {
  EconomyStats,
  LedgerStore,
  LedgerTx,
  NewAccount,
  SpeedUpdate,
  TransactionQuery,
  TransactionTotals,
} from './LedgerStore';
