// Ledger error types

/**
 * Error when an order id is already present in the ledger.
 */
export class DuplicateOrderError extends Error {
  readonly code = 'DUPLICATE_ORDER';
  readonly orderId: string;

  constructor(orderId: string) {
    super(`Order already recorded: ${orderId}`);
    this.name = 'DuplicateOrderError';
    this.orderId = orderId;
  }
}
