export { VestingLedger, MAX_SCHEDULE_DAYS, checkCreateInput } from './vesting-ledger.js';
export type { VestingLedgerConfig, LedgerEventListener } from './vesting-ledger.js';
export { BatchInterruptedError, LedgerError, isLedgerError } from './errors.js';
export type { LedgerErrorKind } from './errors.js';
export { SqliteTicketStore } from './ticket-store.js';
export type { TicketStore } from './ticket-store.js';
export { BalanceBook, LEDGER_CUSTODY } from './asset-transfer.js';
export type { AssetTransfer } from './asset-transfer.js';
export { KeyedMutex } from './keyed-mutex.js';
export * from './vesting-math.js';
