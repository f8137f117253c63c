// Effect handler registry - maps effect kinds to handlers

import type { EffectDescriptor, EffectKind } from '@parley/protocol';
import type { EffectHandler, EffectOfKind } from './types.js';

export function isEffectOfKind<K extends EffectKind>(
  effect: EffectDescriptor,
  kind: K
): effect is EffectOfKind<K> {
  return effect.kind === kind;
}

/**
 * Registry for effect handlers.
 * Maps effect kinds to handler functions.
 */
export class EffectHandlerRegistry {
  private handlers = new Map<string, EffectHandler>();

  /**
   * Register a handler for an effect kind.
   *
   * @throws Error if a handler is already registered (use forceRegister to override)
   */
  register<K extends EffectKind>(kind: K, handler: EffectHandler<EffectOfKind<K>>): void {
    if (this.handlers.has(kind)) {
      throw new Error(`Effect handler already registered for kind: ${kind}`);
    }
    this.forceRegister(kind, handler);
  }

  /**
   * Register a handler, overwriting any existing handler.
   * Use with caution - primarily for testing.
   */
  forceRegister<K extends EffectKind>(kind: K, handler: EffectHandler<EffectOfKind<K>>): void {
    this.handlers.set(kind, (effect, ctx) => {
      if (!isEffectOfKind(effect, kind)) {
        throw new Error(`Handler for ${kind} received a ${effect.kind} effect`);
      }
      handler(effect, ctx);
    });
  }

  /**
   * @returns true if a handler was removed, false if none existed
   */
  unregister(kind: string): boolean {
    return this.handlers.delete(kind);
  }

  get(kind: string): EffectHandler | undefined {
    return this.handlers.get(kind);
  }

  has(kind: string): boolean {
    return this.handlers.has(kind);
  }

  getRegisteredKinds(): string[] {
    return Array.from(this.handlers.keys());
  }
}
