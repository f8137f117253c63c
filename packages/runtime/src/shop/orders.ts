// Order construction and placement

import type { CartLine, Catalog, Logger, Order, OrderItem, ShopSession } from '@parley/protocol';
import type { OrderLedger } from '@parley/repositories';
import { applyEffects } from '../effects/executor.js';
import type { EffectHandlerRegistry } from '../effects/registry.js';
import { appendHistory } from '../sessions/history.js';
import { resolveIdentity, type IdentitySource } from '../sessions/ids.js';
import { silentLogger } from '../logging.js';
import { EmptyCartError, ProductNotFoundError } from '../errors.js';
import { findProduct, roundMoney } from './catalog.js';
import { cartPosition } from './session.js';

export type CreateOrderOptions = {
  id: string;
  createdAt: string;
};

/**
 * Build an order from cart lines at current catalog prices.
 *
 * @throws ProductNotFoundError if any line names a product the catalog lacks;
 * no order is built in that case
 */
export function createOrder(
  cart: readonly CartLine[],
  catalog: Catalog,
  options: CreateOrderOptions
): Order {
  const items: OrderItem[] = cart.map((line) => {
    const product = findProduct(catalog, line.productId);
    if (!product) {
      throw new ProductNotFoundError(line.productId);
    }
    return {
      productId: product.id,
      name: product.name,
      unitPrice: product.price,
      quantity: line.quantity,
      lineTotal: roundMoney(product.price * line.quantity),
      attrs: { ...line.attrs },
    };
  });

  return {
    id: options.id,
    items,
    total: roundMoney(items.reduce((sum, item) => sum + item.lineTotal, 0)),
    currency: catalog.currency,
    createdAt: options.createdAt,
  };
}

export type PlaceOrderOptions = {
  logger?: Logger;
  identity?: Partial<IdentitySource>;
  registry?: EffectHandlerRegistry;
};

/**
 * Turn the cart into an order, append it to the ledger, then clear the cart.
 *
 * The session is only touched after the ledger write succeeds.
 *
 * @throws EmptyCartError, ProductNotFoundError
 */
export async function placeOrder(
  session: ShopSession,
  catalog: Catalog,
  ledger: OrderLedger,
  options: PlaceOrderOptions = {}
): Promise<Order> {
  const logger = options.logger ?? silentLogger;
  const identity = resolveIdentity(options.identity);

  if (session.cart.length === 0) {
    throw new EmptyCartError();
  }

  const order = createOrder(session.cart, catalog, { id: identity.orderId(), createdAt: identity.now() });
  await ledger.append(order);

  const from = cartPosition(session);
  applyEffects(
    [{ kind: 'record_order', orderId: order.id }, { kind: 'clear_cart' }],
    { session, logger },
    options.registry
  );
  appendHistory(session, { from, action: `place_order:${order.id}`, to: cartPosition(session) }, identity.now());

  logger.info('Order placed', {
    sessionId: session.sessionId,
    orderId: order.id,
    total: order.total,
    items: order.items.length,
  });
  return order;
}

/**
 * The most recent order in the ledger, from any session.
 */
export function lastOrder(ledger: OrderLedger): Promise<Order | null> {
  return ledger.mostRecent();
}
