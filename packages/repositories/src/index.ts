// @parley/repositories
// Durable storage and reference-data access for the session engine.
//
// This package defines the "contract" for data operations. The runtime codes
// against the OrderLedger interface; the JSON-file ledger backs it in production
// and the in-memory ledger backs it in tests.

export * from './interfaces/index.js';
export * from './files/index.js';
export * from './ledger/index.js';
export * from './reference/index.js';
export * as memory from './in-memory/index.js';
