// Tests for order construction and placement

import { describe, it, expect } from 'vitest';
import type { Catalog, Order } from '@parley/protocol';
import { memory, type OrderLedger } from '@parley/repositories';
import { createOrder, lastOrder, placeOrder } from './orders.js';
import { createShopSession } from './session.js';
import { EmptyCartError, ProductNotFoundError } from '../errors.js';

// --- Test Fixtures ---

const CATALOG: Catalog = {
  currency: 'INR',
  products: [
    { id: 'mug-001', name: 'Classic Ceramic Mug', description: 'Everyday mug.', category: 'mug', price: 299, currency: 'INR' },
    { id: 'tsh-001', name: 'Basic Cotton T-Shirt', description: 'Soft tee.', category: 'tshirt', price: 499.99, currency: 'INR', sizes: ['S', 'M'] },
  ],
};

const identity = {
  now: () => '2024-01-01T00:00:00.000Z',
  sessionId: () => 'shop0001',
  orderId: () => 'ORD-0000000A',
};

function createFailingLedger(): OrderLedger {
  const inner = memory.createInMemoryOrderLedger();
  return {
    ...inner,
    async append() {
      throw new Error('disk full');
    },
  };
}

// --- Tests ---

describe('createOrder', () => {
  it('should total a two-mug order at 598', () => {
    const order = createOrder([{ productId: 'mug-001', quantity: 2, attrs: {} }], CATALOG, {
      id: 'ORD-0000000A',
      createdAt: '2024-01-01T00:00:00.000Z',
    });

    expect(order).toEqual({
      id: 'ORD-0000000A',
      items: [
        { productId: 'mug-001', name: 'Classic Ceramic Mug', unitPrice: 299, quantity: 2, lineTotal: 598, attrs: {} },
      ],
      total: 598,
      currency: 'INR',
      createdAt: '2024-01-01T00:00:00.000Z',
    });
  });

  it('should round line totals to cents', () => {
    const order = createOrder(
      [
        { productId: 'tsh-001', quantity: 3, attrs: { size: 'M' } },
        { productId: 'mug-001', quantity: 1, attrs: {} },
      ],
      CATALOG,
      { id: 'ORD-0000000B', createdAt: '2024-01-01T00:00:00.000Z' }
    );

    expect(order.items.map((i) => i.lineTotal)).toEqual([1499.97, 299]);
    expect(order.total).toBe(1798.97);
  });

  it('should refuse lines naming unknown products', () => {
    expect(() =>
      createOrder([{ productId: 'gone-001', quantity: 1, attrs: {} }], CATALOG, {
        id: 'ORD-0000000C',
        createdAt: '2024-01-01T00:00:00.000Z',
      })
    ).toThrow(ProductNotFoundError);
  });
});

describe('placeOrder', () => {
  it('should append to the ledger, record the order, and clear the cart', async () => {
    const ledger = memory.createInMemoryOrderLedger();
    const session = createShopSession({ identity });
    session.cart.push({ productId: 'mug-001', quantity: 2, attrs: {} });

    const order = await placeOrder(session, CATALOG, ledger, { identity });

    expect(order.total).toBe(598);
    expect((await ledger.mostRecent())?.id).toBe(order.id);
    expect(session.cart).toEqual([]);
    expect(session.orders).toEqual(['ORD-0000000A']);
    expect(session.history).toEqual([
      { from: 'cart:1', action: 'place_order:ORD-0000000A', to: 'cart:0', timestamp: '2024-01-01T00:00:00.000Z' },
    ]);
  });

  it('should reject an empty cart without touching the ledger', async () => {
    const ledger = memory.createInMemoryOrderLedger();
    const session = createShopSession({ identity });

    await expect(placeOrder(session, CATALOG, ledger, { identity })).rejects.toThrow(EmptyCartError);
    expect(ledger._data).toEqual([]);
  });

  it('should persist nothing when a product is missing', async () => {
    const ledger = memory.createInMemoryOrderLedger();
    const session = createShopSession({ identity });
    session.cart.push({ productId: 'mug-001', quantity: 1, attrs: {} }, { productId: 'gone-001', quantity: 1, attrs: {} });

    await expect(placeOrder(session, CATALOG, ledger, { identity })).rejects.toThrow(ProductNotFoundError);
    expect(ledger._data).toEqual([]);
    expect(session.cart).toHaveLength(2);
    expect(session.orders).toEqual([]);
  });

  it('should keep the cart when the ledger write fails', async () => {
    const session = createShopSession({ identity });
    session.cart.push({ productId: 'mug-001', quantity: 1, attrs: {} });

    await expect(placeOrder(session, CATALOG, createFailingLedger(), { identity })).rejects.toThrow('disk full');
    expect(session.cart).toHaveLength(1);
    expect(session.history).toEqual([]);
  });
});

describe('lastOrder', () => {
  it('should return null for an empty ledger and the newest order otherwise', async () => {
    const ledger = memory.createInMemoryOrderLedger();
    expect(await lastOrder(ledger)).toBeNull();

    const older: Order = { id: 'ORD-00000001', items: [], total: 0, currency: 'INR', createdAt: '2024-01-01T00:00:00.000Z' };
    const newer: Order = { ...older, id: 'ORD-00000002' };
    await ledger.append(older);
    await ledger.append(newer);

    expect((await lastOrder(ledger))?.id).toBe('ORD-00000002');
  });
});
