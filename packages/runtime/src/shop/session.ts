// Shop session lifecycle

import type { ShopSession } from '@parley/protocol';
import { resolveIdentity, type IdentitySource } from '../sessions/ids.js';

export type ShopSessionOptions = {
  customerName?: string;
  identity?: Partial<IdentitySource>;
};

export function createShopSession(options: ShopSessionOptions = {}): ShopSession {
  const identity = resolveIdentity(options.identity);
  const session: ShopSession = {
    kind: 'shop',
    sessionId: identity.sessionId(),
    startedAt: identity.now(),
    history: [],
    cart: [],
    orders: [],
    lastResults: [],
  };
  const customerName = options.customerName?.trim();
  if (customerName) {
    session.customerName = customerName;
  }
  return session;
}

/**
 * Reset in place. The customer name survives unless a new one is given.
 */
export function resetShopSession(session: ShopSession, options: ShopSessionOptions = {}): ShopSession {
  const fresh = createShopSession({
    identity: options.identity,
    customerName: options.customerName?.trim() || session.customerName,
  });
  Object.assign(session, fresh);
  if (fresh.customerName === undefined) {
    delete session.customerName;
  }
  return session;
}

/**
 * Position label used in history entries.
 */
export function cartPosition(session: ShopSession): string {
  return `cart:${session.cart.length}`;
}
