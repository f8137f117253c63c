// In-memory order ledger for development and testing
//
// Data does not persist between restarts.

import type { Order } from '@parley/protocol';
import type { OrderLedger } from '../interfaces/order-ledger.js';
import { DuplicateOrderError } from '../ledger/errors.js';

/**
 * Extended ledger with access to the underlying records and a clear function.
 */
export interface InMemoryOrderLedger extends OrderLedger {
  /** Direct access to the recorded orders (for debugging/testing) */
  _data: Order[];
  /** Clear all data */
  clear(): void;
}

/**
 * Create an in-memory order ledger.
 *
 * @example
 * ```typescript
 * const ledger = createInMemoryOrderLedger();
 * await ledger.append(order);
 * console.log(ledger._data.length);
 * ```
 */
export function createInMemoryOrderLedger(seed: Order[] = []): InMemoryOrderLedger {
  const orders: Order[] = [...seed];

  return {
    _data: orders,
    clear() {
      orders.length = 0;
    },
    async init() {},
    async append(order) {
      if (orders.some((o) => o.id === order.id)) {
        throw new DuplicateOrderError(order.id);
      }
      orders.push(order);
      return order;
    },
    async readAll() {
      return [...orders];
    },
    async mostRecent() {
      return orders.length > 0 ? orders[orders.length - 1] : null;
    },
    async get(id) {
      return orders.find((o) => o.id === id) ?? null;
    },
  };
}
