// @parley/protocol
// Shared types and reference-data validation for the session engine

export * from './types/index.js';
export * from './validation/index.js';
