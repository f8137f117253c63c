// Cart operations - resolve a spoken reference and mutate the cart through effects

import type { Attributes, CartLine, Catalog, Logger, Product, ShopSession } from '@parley/protocol';
import { resolveReference } from '../resolution/reference-resolver.js';
import { applyEffects } from '../effects/executor.js';
import type { EffectHandlerRegistry } from '../effects/registry.js';
import { sameAttributes } from '../effects/handlers.js';
import { appendHistory } from '../sessions/history.js';
import { silentLogger } from '../logging.js';
import { InvalidAttributeError, InvalidQuantityError, UnresolvedReferenceError } from '../errors.js';
import { CATEGORY_SYNONYMS } from './categories.js';
import { findProduct, roundMoney } from './catalog.js';
import { cartPosition } from './session.js';

export type CartOperationOptions = {
  logger?: Logger;
  now?: () => string;
  registry?: EffectHandlerRegistry;
};

export type AddToCartRequest = {
  /**
   * Free text naming the product ("the second one", "black mug", "mug-001")
   */
  reference: string;

  /**
   * Defaults to 1
   */
  quantity?: number;

  size?: string;

  /**
   * Products to resolve against. Defaults to the last query results, or the
   * whole catalog when there are none.
   */
  candidates?: readonly Product[];
};

export type AddToCartResult = {
  product: Product;
  quantity: number;
  attrs: Attributes;

  /**
   * The cart line after merging
   */
  line: CartLine;

  strategy: string;
};

/**
 * A cart line joined with its product. `product` is null if the catalog no
 * longer has it.
 */
export type CartLineView = {
  line: CartLine;
  product: Product | null;
  lineTotal: number;
};

function defaultCandidates(session: ShopSession, catalog: Catalog): readonly Product[] {
  const recent = session.lastResults
    .map((id) => findProduct(catalog, id))
    .filter((product): product is Product => product !== null);
  return recent.length > 0 ? recent : catalog.products;
}

function resolveProduct(
  reference: string,
  candidates: readonly Product[],
  catalog: Catalog
): { product: Product; strategy: string } | null {
  const first = resolveReference(reference, candidates, { categorySynonyms: CATEGORY_SYNONYMS });
  if (first.kind === 'matched') {
    return { product: first.entity, strategy: first.strategy };
  }
  if (candidates === catalog.products) {
    return null;
  }
  // Positions refer to the listing, so the catalog-wide retry matches by id and name only
  const retry = resolveReference(reference, catalog.products, {
    categorySynonyms: CATEGORY_SYNONYMS,
    positional: false,
  });
  return retry.kind === 'matched' ? { product: retry.entity, strategy: retry.strategy } : null;
}

/**
 * Canonical size for the product, or no attributes for unsized products.
 */
function resolveAttributes(product: Product, size: string | undefined, logger: Logger): Attributes {
  const sizes = product.sizes ?? [];
  const requested = size?.trim();

  if (sizes.length === 0) {
    if (requested) {
      logger.debug('Size ignored for unsized product', { productId: product.id, size: requested });
    }
    return {};
  }

  if (!requested) {
    throw new InvalidAttributeError('size', undefined, sizes);
  }
  const match = sizes.find((s) => s.toLowerCase() === requested.toLowerCase());
  if (match === undefined) {
    throw new InvalidAttributeError('size', requested, sizes);
  }
  return { size: match };
}

/**
 * Resolve the reference and add the product to the cart.
 *
 * A miss against the last query results is retried against the whole catalog.
 *
 * @throws UnresolvedReferenceError, InvalidQuantityError, InvalidAttributeError
 */
export function addToCart(
  session: ShopSession,
  catalog: Catalog,
  request: AddToCartRequest,
  options: CartOperationOptions = {}
): AddToCartResult {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date().toISOString());

  const candidates = request.candidates ?? defaultCandidates(session, catalog);
  const resolved = resolveProduct(request.reference, candidates, catalog);
  if (!resolved) {
    logger.debug('Product reference not resolved', { sessionId: session.sessionId, reference: request.reference });
    throw new UnresolvedReferenceError(request.reference);
  }

  const quantity = request.quantity ?? 1;
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new InvalidQuantityError(quantity);
  }

  const { product } = resolved;
  const attrs = resolveAttributes(product, request.size, logger);

  const from = cartPosition(session);
  applyEffects(
    [{ kind: 'add_to_cart', productId: product.id, quantity, attrs }],
    { session, logger },
    options.registry
  );
  const to = cartPosition(session);
  appendHistory(session, { from, action: `add_to_cart:${product.id}`, to }, now());

  const line = session.cart.find((l) => l.productId === product.id && sameAttributes(l.attrs, attrs));
  if (!line) {
    throw new Error(`Cart line for ${product.id} missing after add`);
  }

  logger.info('Added to cart', {
    sessionId: session.sessionId,
    productId: product.id,
    quantity,
    strategy: resolved.strategy,
  });

  return { product, quantity, attrs, line, strategy: resolved.strategy };
}

/**
 * Empty the cart.
 */
export function clearCart(session: ShopSession, options: CartOperationOptions = {}): void {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date().toISOString());

  const from = cartPosition(session);
  applyEffects([{ kind: 'clear_cart' }], { session, logger }, options.registry);
  appendHistory(session, { from, action: 'clear_cart', to: cartPosition(session) }, now());
  logger.info('Cart cleared', { sessionId: session.sessionId });
}

export function viewCart(session: ShopSession, catalog: Catalog): { lines: CartLineView[]; total: number } {
  const lines = session.cart.map((line) => {
    const product = findProduct(catalog, line.productId);
    return { line, product, lineTotal: product ? roundMoney(product.price * line.quantity) : 0 };
  });
  return { lines, total: roundMoney(lines.reduce((sum, l) => sum + l.lineTotal, 0)) };
}
