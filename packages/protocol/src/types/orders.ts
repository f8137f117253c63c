// Order types - durable records written to the order ledger

import type { Attributes, Id, Timestamp } from './common.js';

export type OrderItem = {
  productId: Id;
  name: string;
  unitPrice: number;
  quantity: number;

  /**
   * unitPrice × quantity
   */
  lineTotal: number;
  attrs: Attributes;
};

/**
 * A placed order. Immutable once appended to the ledger.
 *
 * `total` is the sum of every item's `lineTotal`.
 */
export type Order = {
  id: Id;
  items: OrderItem[];
  total: number;
  currency: string;
  createdAt: Timestamp;
};
