// Order record guards, used when reading the ledger back from disk

import type { Order, OrderItem } from '../types/orders.js';
import { isRecord } from './result.js';

function isAttributes(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'string');
}

export function isOrderItem(value: unknown): value is OrderItem {
  return (
    isRecord(value) &&
    typeof value.productId === 'string' &&
    typeof value.name === 'string' &&
    typeof value.unitPrice === 'number' &&
    typeof value.quantity === 'number' &&
    typeof value.lineTotal === 'number' &&
    isAttributes(value.attrs)
  );
}

export function isOrder(value: unknown): value is Order {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    Array.isArray(value.items) &&
    value.items.every(isOrderItem) &&
    typeof value.total === 'number' &&
    typeof value.currency === 'string' &&
    typeof value.createdAt === 'string'
  );
}
