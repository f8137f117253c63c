import { describe, it, expect } from 'vitest';
import type { Order } from '@parley/protocol';
import { createInMemoryOrderLedger } from './index.js';
import { DuplicateOrderError } from '../ledger/errors.js';

function createOrder(id: string): Order {
  return { id, items: [], total: 0, currency: 'INR', createdAt: '2024-01-15T08:00:00.000Z' };
}

describe('createInMemoryOrderLedger', () => {
  it('should append and read back orders in order', async () => {
    const ledger = createInMemoryOrderLedger();

    await ledger.append(createOrder('ORD-1'));
    await ledger.append(createOrder('ORD-2'));

    expect((await ledger.readAll()).map((o) => o.id)).toEqual(['ORD-1', 'ORD-2']);
    expect((await ledger.mostRecent())?.id).toBe('ORD-2');
  });

  it('should start from seed data and clear', async () => {
    const ledger = createInMemoryOrderLedger([createOrder('ORD-1')]);

    expect(ledger._data).toHaveLength(1);
    ledger.clear();
    expect(await ledger.mostRecent()).toBeNull();
  });

  it('should reject duplicate ids', async () => {
    const ledger = createInMemoryOrderLedger([createOrder('ORD-1')]);

    await expect(ledger.append(createOrder('ORD-1'))).rejects.toBeInstanceOf(DuplicateOrderError);
  });
});
