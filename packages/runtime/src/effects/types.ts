// Effect application types

import type { EffectDescriptor, EffectKind, Logger, Session } from '@parley/protocol';

/**
 * Context passed to effect handlers.
 */
export type EffectContext = {
  /**
   * The session being mutated
   */
  session: Session;

  logger: Logger;
};

/**
 * Applies one effect descriptor to the session in the context.
 * Handlers are synchronous and throw on failure.
 */
export type EffectHandler<T extends EffectDescriptor = EffectDescriptor> = (
  effect: T,
  ctx: EffectContext
) => void;

/**
 * The descriptor type for one effect kind.
 */
export type EffectOfKind<K extends EffectKind> = Extract<EffectDescriptor, { kind: K }>;

/**
 * Result of applying a list of effects
 */
export type EffectsApplicationResult = {
  count: number;
};
