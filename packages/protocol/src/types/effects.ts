// Effect descriptors - declared mutations attached to actions

import type { Attributes, Id } from './common.js';

/**
 * Append an entry to the session journal.
 */
export type AddJournalEffect = {
  kind: 'add_journal';
  text: string;
};

/**
 * Append an item to the session inventory.
 */
export type AddInventoryEffect = {
  kind: 'add_inventory';
  item: string;
};

/**
 * Add a product to the cart. Merges into an existing line with the same
 * product id and attributes, otherwise appends a new line.
 */
export type AddToCartEffect = {
  kind: 'add_to_cart';
  productId: Id;
  quantity: number;
  attrs: Attributes;
};

/**
 * Remove every line from the cart.
 */
export type ClearCartEffect = {
  kind: 'clear_cart';
};

/**
 * Reference a placed order from the session.
 */
export type RecordOrderEffect = {
  kind: 'record_order';
  orderId: Id;
};

/**
 * Union of all effect descriptors.
 */
export type EffectDescriptor =
  | AddJournalEffect
  | AddInventoryEffect
  | AddToCartEffect
  | ClearCartEffect
  | RecordOrderEffect;

export type EffectKind = EffectDescriptor['kind'];

export const EFFECT_KINDS: readonly EffectKind[] = [
  'add_journal',
  'add_inventory',
  'add_to_cart',
  'clear_cart',
  'record_order',
] as const;

export function isEffectKind(value: string): value is EffectKind {
  return (EFFECT_KINDS as readonly string[]).includes(value);
}
