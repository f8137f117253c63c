// Shop response rendering. Every block ends with the prompt.

import type { Attributes, Catalog, Order, Product, ShopSession } from '@parley/protocol';
import { recentHistory } from '../sessions/history.js';
import { formatPrice } from './catalog.js';
import type { AddToCartResult, CartLineView } from './cart.js';

export const SHOP_PROMPT = 'What would you like to do next?';

export const MAX_LISTED_PRODUCTS = 8;

const ACTIVITY_LIMIT = 6;

export function withPrompt(text: string): string {
  return `${text}\n\n${SHOP_PROMPT}`;
}

function describeAttributes(attrs: Attributes): string {
  const entries = Object.entries(attrs);
  return entries.length === 0 ? '' : ` (${entries.map(([key, value]) => `${key}: ${value}`).join(', ')})`;
}

export function renderWelcome(session: ShopSession): string {
  return withPrompt(
    `Hello ${session.customerName || 'there'}! Welcome to the shop. ` +
      'Ask me to show you products, or tell me what to add to your cart.'
  );
}

/**
 * Numbered listing of at most eight products.
 */
export function renderListing(products: readonly Product[]): string {
  if (products.length === 0) {
    return withPrompt("I couldn't find any products matching that.");
  }

  const shown = products.slice(0, MAX_LISTED_PRODUCTS);
  const heading =
    products.length > shown.length
      ? `Here are the first ${shown.length} of ${products.length} matching products:`
      : `I found ${products.length} matching ${products.length === 1 ? 'product' : 'products'}:`;

  const lines = shown.map((p, index) => {
    const sizes = p.sizes && p.sizes.length > 0 ? ` - sizes: ${p.sizes.join(', ')}` : '';
    return `${index + 1}. ${p.name} (id: ${p.id}) - ${formatPrice(p.price, p.currency)}${sizes}`;
  });

  return withPrompt([heading, ...lines].join('\n'));
}

export function renderAdded(result: AddToCartResult, session: ShopSession): string {
  const itemCount = session.cart.reduce((sum, line) => sum + line.quantity, 0);
  return withPrompt(
    `Added ${result.quantity} x ${result.product.name}${describeAttributes(result.attrs)} to your cart. ` +
      `Your cart now holds ${itemCount} ${itemCount === 1 ? 'item' : 'items'}.`
  );
}

export function renderCart(view: { lines: CartLineView[]; total: number }, catalog: Catalog): string {
  if (view.lines.length === 0) {
    return withPrompt('Your cart is empty.');
  }

  const lines = view.lines.map(({ line, product, lineTotal }) =>
    product
      ? `- ${line.quantity} x ${product.name}${describeAttributes(line.attrs)} - ${formatPrice(lineTotal, product.currency)}`
      : `- ${line.quantity} x unavailable product ${line.productId}`
  );

  return withPrompt(['Your cart:', ...lines, `Total: ${formatPrice(view.total, catalog.currency)}`].join('\n'));
}

function orderLines(order: Order): string[] {
  return [
    ...order.items.map(
      (item) =>
        `- ${item.quantity} x ${item.name}${describeAttributes(item.attrs)} - ${formatPrice(item.lineTotal, order.currency)}`
    ),
    `Total: ${formatPrice(order.total, order.currency)}`,
  ];
}

export function renderOrderPlaced(order: Order): string {
  return withPrompt([`Your order ${order.id} is confirmed.`, ...orderLines(order)].join('\n'));
}

export function renderLastOrder(order: Order | null): string {
  if (!order) {
    return withPrompt('No orders have been placed yet.');
  }
  return withPrompt([`Order ${order.id} placed at ${order.createdAt}:`, ...orderLines(order)].join('\n'));
}

/**
 * Session line, this session's orders, and recent cart activity.
 */
export function renderOrderHistory(session: ShopSession, orders: readonly Order[]): string {
  const lines: string[] = [`Session: ${session.sessionId} | Started at: ${session.startedAt}`];
  if (session.customerName) {
    lines.push(`Customer: ${session.customerName}`);
  }

  if (orders.length > 0) {
    lines.push('\nOrders this session:');
    for (const order of orders) {
      lines.push(`- ${order.id} | ${formatPrice(order.total, order.currency)} | ${order.createdAt}`);
    }
  } else {
    lines.push('\nNo orders placed in this session yet.');
  }

  lines.push('\nRecent activity:');
  const recent = recentHistory(session, ACTIVITY_LIMIT);
  if (recent.length > 0) {
    for (const h of recent) {
      lines.push(`- ${h.timestamp} | from ${h.from} -> ${h.to} via ${h.action}`);
    }
  } else {
    lines.push('- Nothing yet.');
  }

  return withPrompt(lines.join('\n'));
}
