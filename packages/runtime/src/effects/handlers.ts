// Built-in effect handlers

import type { Attributes, GameSession, Session, ShopSession } from '@parley/protocol';
import type { EffectHandler, EffectOfKind } from './types.js';
import { EffectTargetError, InvalidQuantityError } from '../errors.js';

function requireGameSession(session: Session, effectKind: string): GameSession {
  if (session.kind !== 'game') {
    throw new EffectTargetError(effectKind, session.kind);
  }
  return session;
}

function requireShopSession(session: Session, effectKind: string): ShopSession {
  if (session.kind !== 'shop') {
    throw new EffectTargetError(effectKind, session.kind);
  }
  return session;
}

export function sameAttributes(a: Attributes, b: Attributes): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((key) => b[key] === a[key]);
}

// --- Handler implementations ---

/**
 * add_journal: append an entry to the journal. Repeats are kept.
 */
export const addJournalHandler: EffectHandler<EffectOfKind<'add_journal'>> = (effect, ctx) => {
  requireGameSession(ctx.session, effect.kind).journal.push(effect.text);
};

/**
 * add_inventory: append an item to the inventory. Repeats are kept.
 */
export const addInventoryHandler: EffectHandler<EffectOfKind<'add_inventory'>> = (effect, ctx) => {
  requireGameSession(ctx.session, effect.kind).inventory.push(effect.item);
};

/**
 * add_to_cart: merge into the line with the same product and attributes,
 * or append a new line.
 */
export const addToCartHandler: EffectHandler<EffectOfKind<'add_to_cart'>> = (effect, ctx) => {
  const session = requireShopSession(ctx.session, effect.kind);
  if (!Number.isInteger(effect.quantity) || effect.quantity < 1) {
    throw new InvalidQuantityError(effect.quantity);
  }

  const line = session.cart.find(
    (l) => l.productId === effect.productId && sameAttributes(l.attrs, effect.attrs)
  );
  if (line) {
    line.quantity += effect.quantity;
    ctx.logger.debug('Cart line merged', { productId: effect.productId, quantity: line.quantity });
    return;
  }

  session.cart.push({ productId: effect.productId, quantity: effect.quantity, attrs: { ...effect.attrs } });
};

/**
 * clear_cart: remove every line.
 */
export const clearCartHandler: EffectHandler<EffectOfKind<'clear_cart'>> = (effect, ctx) => {
  requireShopSession(ctx.session, effect.kind).cart = [];
};

/**
 * record_order: reference a placed order from the session.
 */
export const recordOrderHandler: EffectHandler<EffectOfKind<'record_order'>> = (effect, ctx) => {
  requireShopSession(ctx.session, effect.kind).orders.push(effect.orderId);
};
