// Effect application module

export type {
  EffectContext,
  EffectHandler,
  EffectOfKind,
  EffectsApplicationResult,
} from './types.js';

export { EffectHandlerRegistry, isEffectOfKind } from './registry.js';

export {
  addJournalHandler,
  addInventoryHandler,
  addToCartHandler,
  clearCartHandler,
  recordOrderHandler,
  sameAttributes,
} from './handlers.js';

export { applyEffect, applyEffects, createEffectRegistry, effectRegistry } from './executor.js';
