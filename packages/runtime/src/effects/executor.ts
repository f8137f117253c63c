// Effect executor - applies effect descriptors to a session

import type { EffectDescriptor } from '@parley/protocol';
import type { EffectContext, EffectsApplicationResult } from './types.js';
import { EffectHandlerRegistry } from './registry.js';
import {
  addJournalHandler,
  addInventoryHandler,
  addToCartHandler,
  clearCartHandler,
  recordOrderHandler,
} from './handlers.js';
import { UnknownEffectError } from '../errors.js';

/**
 * Create a registry with every built-in handler registered.
 */
export function createEffectRegistry(): EffectHandlerRegistry {
  const registry = new EffectHandlerRegistry();
  registry.register('add_journal', addJournalHandler);
  registry.register('add_inventory', addInventoryHandler);
  registry.register('add_to_cart', addToCartHandler);
  registry.register('clear_cart', clearCartHandler);
  registry.register('record_order', recordOrderHandler);
  return registry;
}

/**
 * Shared registry used when callers do not supply their own.
 */
export const effectRegistry = createEffectRegistry();

/**
 * Apply a single effect.
 *
 * @throws UnknownEffectError if no handler is registered for the kind
 */
export function applyEffect(
  effect: EffectDescriptor,
  ctx: EffectContext,
  registry: EffectHandlerRegistry = effectRegistry
): void {
  const handler = registry.get(effect.kind);
  if (!handler) {
    throw new UnknownEffectError(effect.kind);
  }
  handler(effect, ctx);
  ctx.logger.debug(`Effect applied: ${effect.kind}`, { sessionId: ctx.session.sessionId });
}

/**
 * Apply effects in order, without deduplication.
 *
 * Every kind is checked for a handler before the first effect runs, so an
 * unknown kind leaves the session untouched.
 */
export function applyEffects(
  effects: readonly EffectDescriptor[],
  ctx: EffectContext,
  registry: EffectHandlerRegistry = effectRegistry
): EffectsApplicationResult {
  const missing = effects.find((effect) => !registry.has(effect.kind));
  if (missing) {
    throw new UnknownEffectError(missing.kind);
  }

  for (const effect of effects) {
    applyEffect(effect, ctx, registry);
  }

  return { count: effects.length };
}
