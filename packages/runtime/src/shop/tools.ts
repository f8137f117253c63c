// Shopping assistant tool surface - one text block per call, never rejects

import type { Catalog, CatalogFilters, Logger, Order, ShopSession } from '@parley/protocol';
import type { OrderLedger } from '@parley/repositories';
import type { EffectHandlerRegistry } from '../effects/registry.js';
import { resolveIdentity, type IdentitySource } from '../sessions/ids.js';
import { silentLogger } from '../logging.js';
import {
  EmptyCartError,
  InvalidAttributeError,
  InvalidQuantityError,
  ProductNotFoundError,
  UnresolvedReferenceError,
} from '../errors.js';
import { queryCatalog } from './catalog.js';
import { addToCart, clearCart, viewCart } from './cart.js';
import { lastOrder, placeOrder } from './orders.js';
import { createShopSession, resetShopSession } from './session.js';
import {
  MAX_LISTED_PRODUCTS,
  renderAdded,
  renderCart,
  renderLastOrder,
  renderListing,
  renderOrderHistory,
  renderOrderPlaced,
  renderWelcome,
  withPrompt,
} from './render.js';

export type ShoppingToolsOptions = {
  catalog: Catalog;
  ledger: OrderLedger;
  logger?: Logger;
  identity?: Partial<IdentitySource>;
  registry?: EffectHandlerRegistry;
};

export type ShoppingTools = {
  readonly session: ShopSession;

  startShopping(customerName?: string): Promise<string>;
  browseCatalog(filters: CatalogFilters): Promise<string>;
  addToCart(reference: string, quantity?: number, size?: string): Promise<string>;
  showCart(): Promise<string>;
  clearCart(): Promise<string>;
  placeOrder(): Promise<string>;
  showLastOrder(): Promise<string>;
  showOrderHistory(): Promise<string>;
};

export const SHOP_FAILURE_TEXT = withPrompt('Sorry, something went wrong on my side. Please try that again.');

/**
 * Spoken guidance for an expected failure, or null for anything unexpected.
 */
export function describeShopError(error: unknown): string | null {
  if (error instanceof UnresolvedReferenceError) {
    return withPrompt(
      `I couldn't find a product matching "${error.reference}". Try browsing the catalog first, or use a product id.`
    );
  }
  if (error instanceof InvalidAttributeError) {
    const options = `Available ${error.attribute}s: ${error.allowed.join(', ')}.`;
    return withPrompt(
      error.value === undefined
        ? `Please choose a ${error.attribute}. ${options}`
        : `${error.attribute[0].toUpperCase()}${error.attribute.slice(1)} ${error.value} isn't available. ${options}`
    );
  }
  if (error instanceof InvalidQuantityError) {
    return withPrompt('Quantities need to be whole numbers of at least 1.');
  }
  if (error instanceof EmptyCartError) {
    return withPrompt('Your cart is empty, so there is nothing to order yet.');
  }
  if (error instanceof ProductNotFoundError) {
    return withPrompt(
      `I couldn't place the order because ${error.productId} is no longer in the catalog. Your cart is unchanged.`
    );
  }
  return null;
}

/**
 * Create the shopping tools over one session.
 */
export function createShoppingTools(options: ShoppingToolsOptions): ShoppingTools {
  const { catalog, ledger, registry } = options;
  const logger = options.logger ?? silentLogger;
  const identity = resolveIdentity(options.identity);
  const session = createShopSession({ identity });
  const cartOptions = { logger, now: identity.now, registry };

  const guard = async (tool: string, run: () => string | Promise<string>): Promise<string> => {
    try {
      return await run();
    } catch (error) {
      const guidance = describeShopError(error);
      if (guidance !== null) {
        logger.debug('Shop tool declined', { tool, sessionId: session.sessionId });
        return guidance;
      }
      logger.error('Shop tool failed', {
        tool,
        sessionId: session.sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      return SHOP_FAILURE_TEXT;
    }
  };

  return {
    session,

    startShopping(customerName) {
      return guard('startShopping', () => {
        resetShopSession(session, { customerName, identity });
        logger.info('Shopping started', { sessionId: session.sessionId });
        return renderWelcome(session);
      });
    },

    browseCatalog(filters) {
      return guard('browseCatalog', () => {
        const results = queryCatalog(catalog, filters);
        session.lastResults = results.slice(0, MAX_LISTED_PRODUCTS).map((p) => p.id);
        logger.debug('Catalog queried', { sessionId: session.sessionId, filters, matches: results.length });
        return renderListing(results);
      });
    },

    addToCart(reference, quantity, size) {
      return guard('addToCart', () => {
        const result = addToCart(session, catalog, { reference, quantity, size }, cartOptions);
        return renderAdded(result, session);
      });
    },

    showCart() {
      return guard('showCart', () => renderCart(viewCart(session, catalog), catalog));
    },

    clearCart() {
      return guard('clearCart', () => {
        clearCart(session, cartOptions);
        return withPrompt('Your cart is now empty.');
      });
    },

    placeOrder() {
      return guard('placeOrder', async () => {
        const order = await placeOrder(session, catalog, ledger, { logger, identity, registry });
        return renderOrderPlaced(order);
      });
    },

    showLastOrder() {
      return guard('showLastOrder', async () => renderLastOrder(await lastOrder(ledger)));
    },

    showOrderHistory() {
      return guard('showOrderHistory', async () => {
        const orders: Order[] = [];
        for (const id of session.orders) {
          const order = await ledger.get(id);
          if (order) {
            orders.push(order);
          }
        }
        return renderOrderHistory(session, orders);
      });
    },
  };
}
