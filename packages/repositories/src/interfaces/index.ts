// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type { OrderLedger } from './order-ledger.js';
export type { FileStore } from './file-store.js';
