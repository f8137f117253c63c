export { createJsonFileOrderLedger, type JsonFileLedgerOptions } from './json-file-ledger.js';
export { DuplicateOrderError } from './errors.js';
export { createSerialQueue } from './serial.js';
